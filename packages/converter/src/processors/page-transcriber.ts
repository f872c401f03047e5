import type { LoggerMethods } from '@pagescribe/logger';
import type {
  PageCompletionClient,
  TokenUsageAggregator,
} from '@pagescribe/shared';

import type { PageImage } from '../types/document';

import { PAGE_TRANSCRIBER } from '../config/constants';
import { TRANSCRIPTION_PROMPT } from '../config/prompts';
import { ConversionError } from '../errors/conversion-error';

export interface PageTranscriberOptions {
  /** Attempts per page (default: 3) */
  maxAttempts?: number;
  /** Wait after each failed attempt in milliseconds (default: 500) */
  backoffMs?: number;
  /** Temperature for transcription (default: 0.3) */
  temperature?: number;
  /** Token budget per page (default: 8192) */
  maxTokens?: number;
  /** Token usage aggregator for tracking */
  aggregator?: TokenUsageAggregator;
  /** Wait implementation; replaced in tests */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Transcribes page images to Markdown through a completion client.
 *
 * Each page gets a fixed number of attempts with a constant back-off after
 * every failure. A page whose attempts are all exhausted yields an empty
 * string and the run carries on; callers that need every page check for
 * empty fragments.
 */
export class PageTranscriber {
  private readonly maxAttempts: number;
  private readonly backoffMs: number;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly client: PageCompletionClient,
    private readonly logger: LoggerMethods,
    private readonly options: PageTranscriberOptions = {},
  ) {
    this.maxAttempts = options.maxAttempts ?? PAGE_TRANSCRIBER.MAX_ATTEMPTS;
    this.backoffMs = options.backoffMs ?? PAGE_TRANSCRIBER.BACKOFF_MS;
    this.temperature = options.temperature ?? PAGE_TRANSCRIBER.TEMPERATURE;
    this.maxTokens = options.maxTokens ?? PAGE_TRANSCRIBER.MAX_TOKENS;
    this.sleep =
      options.sleep ??
      ((ms) => new Promise<void>((resolve) => setTimeout(resolve, ms)));
  }

  /**
   * Transcribe one page.
   *
   * @returns the model's raw response, or '' when every attempt failed
   */
  async transcribe(page: PageImage): Promise<string> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const response = await this.client.complete({
          userPrompt: TRANSCRIPTION_PROMPT,
          imagePath: page.path,
          temperature: this.temperature,
          maxTokens: this.maxTokens,
        });

        this.options.aggregator?.track({
          pageNo: page.pageNo,
          modelName: this.client.modelName,
          ...response.usage,
        });

        return response.text;
      } catch (error) {
        this.logger.error(
          `[PageTranscriber] Page ${page.pageNo}: LLM call failed (attempt ${attempt}/${this.maxAttempts}): ${ConversionError.getErrorMessage(error)}`,
        );
        await this.sleep(this.backoffMs);
      }
    }

    this.logger.warn(
      `[PageTranscriber] Page ${page.pageNo}: all ${this.maxAttempts} attempts failed, leaving the page empty`,
    );
    return '';
  }
}
