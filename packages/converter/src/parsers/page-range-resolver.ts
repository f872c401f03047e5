import type { PageRange } from '../types/document';

import { InvalidPageNumberError } from '../errors/conversion-error';

/** Whole document: first page through the last */
export const WHOLE_DOCUMENT: PageRange = Object.freeze({ start: 1, end: 0 });

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse one page argument as a base-10 integer.
 *
 * @throws InvalidPageNumberError when the value is not an integer
 */
export function parsePageNumber(value: string): number {
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new InvalidPageNumberError(value);
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Resolve optional start/end page arguments into a PageRange.
 *
 * Missing values default to the whole document (`start = 1`, `end = 0`).
 * Only the lower bounds are checked here; pages past the end of the document
 * are reported by the renderer.
 *
 * @throws InvalidPageNumberError when a value is not an integer or the range
 *   is inverted
 */
export function resolvePageRange(start?: string, end?: string): PageRange {
  const startPage =
    start === undefined ? WHOLE_DOCUMENT.start : parsePageNumber(start);
  const endPage = end === undefined ? WHOLE_DOCUMENT.end : parsePageNumber(end);

  if (startPage < 1) {
    throw new InvalidPageNumberError(
      String(start),
      `Invalid page number: start page must be at least 1 (got ${startPage})`,
    );
  }

  if (endPage < 0 || (endPage !== 0 && endPage < startPage)) {
    throw new InvalidPageNumberError(
      String(end),
      `Invalid page number: end page ${endPage} is before start page ${startPage}`,
    );
  }

  return { start: startPage, end: endPage };
}

/**
 * Human-readable form of a range, e.g. "1-end" or "3-5"
 */
export function formatPageRange(range: PageRange): string {
  return `${range.start}-${range.end === 0 ? 'end' : range.end}`;
}
