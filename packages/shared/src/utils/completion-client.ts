import type { LoggerMethods } from '@pagescribe/logger';
import type { FilePart, LanguageModel, ModelMessage, TextPart } from 'ai';

import { createOpenAI } from '@ai-sdk/openai';
import { generateText } from 'ai';
import { readFileSync } from 'node:fs';

import type { TokenUsage } from './token-usage-aggregator';

import { normalizeBaseUrl } from './endpoint';
import { type ProviderProfile, resolveProviderProfile } from './provider-detector';

/**
 * One chat completion: a text instruction plus at most one image
 */
export interface CompletionRequest {
  /**
   * Instruction sent as the first part of the user message
   */
  userPrompt: string;

  /**
   * System instruction; sent as an empty system message when omitted
   */
  systemPrompt?: string;

  /**
   * Path of an image attached after the instruction
   */
  imagePath?: string;

  /**
   * Temperature for generation
   */
  temperature: number;

  /**
   * Maximum number of tokens to generate
   */
  maxTokens: number;
}

export interface CompletionResponse {
  text: string;
  usage: TokenUsage;
}

/**
 * Anything that can answer a completion request. `CompletionClient` is the
 * production implementation; tests substitute their own.
 */
export interface PageCompletionClient {
  readonly modelName: string;
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

export interface CompletionClientOptions {
  /** Operator-supplied API base URL; normalized before use */
  baseUrl: string;
  apiKey: string;
  modelName: string;
  logger: LoggerMethods;
}

/**
 * CompletionClient - Chat completion calls against an OpenAI-compatible API
 *
 * Normalizes the base URL to the provider's `/v1` root and resolves the
 * provider profile once at construction. Requests go through the AI SDK's
 * `generateText` with SDK retries disabled; callers own the retry policy.
 *
 * @example
 * ```typescript
 * const client = new CompletionClient({
 *   baseUrl: 'https://openrouter.ai/api',
 *   apiKey: process.env.OPENAI_API_KEY,
 *   modelName: 'gpt-4o',
 *   logger,
 * });
 *
 * const { text } = await client.complete({
 *   userPrompt: 'Transcribe this page',
 *   imagePath: '/tmp/pages/page_0001.png',
 *   temperature: 0.3,
 *   maxTokens: 8192,
 * });
 * ```
 */
export class CompletionClient implements PageCompletionClient {
  readonly baseUrl: string;
  readonly modelName: string;
  readonly profile: ProviderProfile;

  private readonly logger: LoggerMethods;
  private readonly model: LanguageModel;

  constructor(options: CompletionClientOptions) {
    this.logger = options.logger;
    this.modelName = options.modelName;
    this.baseUrl = normalizeBaseUrl(options.baseUrl);
    this.profile = resolveProviderProfile(this.baseUrl);

    this.logger.info(`[CompletionClient] Using API base URL: ${this.baseUrl}`);

    const provider = createOpenAI({
      baseURL: this.baseUrl,
      apiKey: options.apiKey,
      ...(this.profile.kind === 'openrouter'
        ? { headers: this.profile.headers }
        : {}),
    });
    this.model = provider.chat(options.modelName);
  }

  /**
   * Send one completion request and return the model's text.
   *
   * @throws the SDK's error unchanged when the request fails
   */
  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const messages = [this.buildUserMessage(request)];

    try {
      const result = await generateText({
        model: this.model,
        system: request.systemPrompt ?? '',
        messages,
        temperature: request.temperature,
        maxOutputTokens: request.maxTokens,
        maxRetries: 0,
      });

      return {
        text: result.text,
        usage: {
          inputTokens: result.usage.inputTokens ?? 0,
          outputTokens: result.usage.outputTokens ?? 0,
          totalTokens: result.usage.totalTokens ?? 0,
        },
      };
    } catch (error) {
      this.logger.error(
        `[CompletionClient] API request failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw error;
    }
  }

  /**
   * Build the user message: the instruction, then the page image.
   *
   * Images are always sent as `image/jpeg`, whatever their encoding. Only
   * file parts keep their declared media type through the SDK.
   */
  private buildUserMessage(request: CompletionRequest): ModelMessage {
    const content: Array<TextPart | FilePart> = [
      { type: 'text', text: request.userPrompt },
    ];

    if (request.imagePath) {
      content.push({
        type: 'file',
        data: readFileSync(request.imagePath),
        mediaType: 'image/jpeg',
      });
    }

    return { role: 'user', content };
  }
}
