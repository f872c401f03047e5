import type { LoggerMethods } from '@pagescribe/logger';
import type { PageCompletionClient, TokenUsage } from '@pagescribe/shared';

import { TokenUsageAggregator } from '@pagescribe/shared';

import type { DocumentInput, PageImage, PageRange } from '../types/document';

import { classifyDocument } from '../classifiers/input-classifier';
import {
  WHOLE_DOCUMENT,
  formatPageRange,
} from '../parsers/page-range-resolver';
import {
  assembleMarkdown,
  unwrapMarkdownFence,
} from '../processors/markdown-assembler';
import {
  PageTranscriber,
  type PageTranscriberOptions,
} from '../processors/page-transcriber';
import {
  type RenderWorkerFactory,
  createRenderWorker,
} from '../renderers/render-worker';
import { WorkArea } from './work-area';

export interface DocumentConverterOptions {
  logger: LoggerMethods;
  /** Completion client used for every page */
  client: PageCompletionClient;
  /** Directory receiving per-run work areas (default: 'output') */
  workRoot?: string;
  /** DPI for rasterized PDF pages (default: 300) */
  dpi?: number;
  /** Retry and generation settings for page transcription */
  transcription?: Omit<PageTranscriberOptions, 'aggregator'>;
  /** Render worker factory (default: createRenderWorker) */
  renderWorkerFactory?: RenderWorkerFactory;
  /** Clock for the work area name */
  now?: () => Date;
}

export interface ConversionResult {
  /** Assembled Markdown, one blank-line-terminated fragment per page */
  markdown: string;
  /** Number of pages transcribed (including empty ones) */
  pageCount: number;
  /** Page ordinals whose fragment is empty */
  emptyPages: number[];
  /** Token usage summed over all pages */
  usage: TokenUsage;
}

/**
 * Order rendered page files by path, as plain string comparison.
 *
 * Renderers that want numeric order zero-pad their page numbers.
 */
export function sortPagePaths(paths: readonly string[]): PageImage[] {
  return [...paths]
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((path, index) => ({ pageNo: index + 1, path }));
}

/**
 * DocumentConverter - Converts a PDF or image to Markdown page by page
 *
 * Pipeline:
 * 1. Classify the input (extension, then byte signature)
 * 2. Materialize it into a fresh work area
 * 3. Render the requested pages to images
 * 4. Transcribe each page in path order, retrying failed calls
 * 5. Strip Markdown fences and assemble the document
 *
 * The work area is removed when the run ends, whether it succeeded or threw.
 * Pages whose transcription failed on every attempt become empty fragments;
 * they are listed in `emptyPages`.
 *
 * @example
 * ```typescript
 * const converter = new DocumentConverter({ logger, client });
 * const { markdown } = await converter.convert(
 *   { filename: 'paper.pdf', data },
 *   { start: 1, end: 3 },
 * );
 * ```
 */
export class DocumentConverter {
  private readonly logger: LoggerMethods;
  private readonly renderWorkerFactory: RenderWorkerFactory;

  constructor(private readonly options: DocumentConverterOptions) {
    this.logger = options.logger;
    this.renderWorkerFactory =
      options.renderWorkerFactory ?? createRenderWorker;
  }

  /**
   * Convert one document.
   *
   * @throws ConversionError subclasses for unusable input or renderer failures
   */
  async convert(
    input: DocumentInput,
    range: PageRange = WHOLE_DOCUMENT,
  ): Promise<ConversionResult> {
    const document = classifyDocument(input, this.logger);

    const workArea = WorkArea.create(
      this.logger,
      this.options.workRoot,
      this.options.now?.(),
    );

    try {
      const documentPath = workArea.materialize(
        document.data,
        document.extension,
      );

      this.logger.info(
        `[DocumentConverter] Converting ${document.type} document, pages ${formatPageRange(range)}`,
      );

      const worker = this.renderWorkerFactory(documentPath, range, {
        logger: this.logger,
        outputDir: workArea.path,
        dpi: this.options.dpi,
      });
      const pages = sortPagePaths(await worker.render());
      this.logger.info('[DocumentConverter] Image conversion completed');

      const aggregator = new TokenUsageAggregator();
      const transcriber = new PageTranscriber(this.options.client, this.logger, {
        ...this.options.transcription,
        aggregator,
      });

      const fragments: string[] = [];
      for (const page of pages) {
        this.logger.info(
          `[DocumentConverter] Converting image ${page.path} to Markdown`,
        );
        const response = await transcriber.transcribe(page);
        fragments.push(unwrapMarkdownFence(response, 'markdown'));
      }

      const markdown = assembleMarkdown(fragments);
      this.logger.info(
        '[DocumentConverter] Image conversion to Markdown completed',
      );

      const emptyPages = pages
        .filter((_, index) => fragments[index].trim().length === 0)
        .map((page) => page.pageNo);
      if (emptyPages.length > 0) {
        this.logger.warn(
          `[DocumentConverter] ${emptyPages.length} of ${pages.length} pages produced no Markdown: ${emptyPages.join(', ')}`,
        );
      }

      aggregator.logSummary(this.logger);

      return {
        markdown,
        pageCount: pages.length,
        emptyPages,
        usage: aggregator.getTotalUsage(),
      };
    } finally {
      workArea.dispose();
    }
  }
}
