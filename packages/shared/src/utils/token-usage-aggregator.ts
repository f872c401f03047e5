import type { LoggerMethods } from '@pagescribe/logger';

/**
 * Token usage totals
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Token usage of one page's completion
 */
export interface PageTokenUsage extends TokenUsage {
  pageNo: number;
  modelName: string;
}

/**
 * Format token usage as a human-readable string
 *
 * @returns Formatted string like "1500 input, 300 output, 1800 total"
 */
function formatTokens(usage: TokenUsage): string {
  return `${usage.inputTokens} input, ${usage.outputTokens} output, ${usage.totalTokens} total`;
}

/**
 * TokenUsageAggregator - Collects token usage across the pages of one run
 *
 * A page transcribed more than once accumulates into a single entry.
 *
 * @example
 * ```typescript
 * const aggregator = new TokenUsageAggregator();
 * aggregator.track({
 *   pageNo: 1,
 *   modelName: 'gpt-4o',
 *   inputTokens: 1500,
 *   outputTokens: 300,
 *   totalTokens: 1800,
 * });
 * aggregator.logSummary(logger);
 * // [DocumentConverter] Token usage summary:
 * //   - page 1 (gpt-4o): 1500 input, 300 output, 1800 total
 * // Grand total: 1500 input, 300 output, 1800 total
 * ```
 */
export class TokenUsageAggregator {
  private readonly pages = new Map<number, PageTokenUsage>();

  track(usage: PageTokenUsage): void {
    const existing = this.pages.get(usage.pageNo);

    if (!existing) {
      this.pages.set(usage.pageNo, { ...usage });
      return;
    }

    existing.inputTokens += usage.inputTokens;
    existing.outputTokens += usage.outputTokens;
    existing.totalTokens += usage.totalTokens;
  }

  /**
   * Per-page usage, ordered by page number
   */
  getByPage(): PageTokenUsage[] {
    return [...this.pages.values()]
      .sort((a, b) => a.pageNo - b.pageNo)
      .map((page) => ({ ...page }));
  }

  getTotalUsage(): TokenUsage {
    const total: TokenUsage = { inputTokens: 0, outputTokens: 0, totalTokens: 0 };

    for (const page of this.pages.values()) {
      total.inputTokens += page.inputTokens;
      total.outputTokens += page.outputTokens;
      total.totalTokens += page.totalTokens;
    }

    return total;
  }

  /**
   * Log per-page usage and the grand total. Call once at the end of a run.
   */
  logSummary(logger: LoggerMethods): void {
    const pages = this.getByPage();

    if (pages.length === 0) {
      logger.info('[DocumentConverter] No token usage to report');
      return;
    }

    logger.info('[DocumentConverter] Token usage summary:');
    for (const page of pages) {
      logger.info(
        `  - page ${page.pageNo} (${page.modelName}): ${formatTokens(page)}`,
      );
    }
    logger.info(`Grand total: ${formatTokens(this.getTotalUsage())}`);
  }
}
