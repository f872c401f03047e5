import type { LoggerMethods } from '@pagescribe/logger';

import { type SpawnResult, spawnAsync } from '@pagescribe/shared';
import { existsSync, mkdirSync, readdirSync } from 'node:fs';
import { join } from 'node:path';

import type { PageRange } from '../types/document';

import { EXTENSION_TYPES, PDF_RENDERER } from '../config/constants';
import { getExtension } from '../classifiers/input-classifier';
import {
  ConversionError,
  InvalidDocumentError,
  PageRangeError,
  RenderError,
} from '../errors/conversion-error';

/**
 * Turns a document into one image file per page.
 *
 * The order of the returned paths is unspecified; callers sort them.
 */
export interface RenderWorker {
  render(): Promise<string[]>;
}

export interface RenderWorkerOptions {
  logger: LoggerMethods;
  /** Work area directory; rendered pages go to its pages/ subdirectory */
  outputDir: string;
  /** DPI for rasterized PDF pages (default: 300) */
  dpi?: number;
}

export type RenderWorkerFactory = (
  documentPath: string,
  range: PageRange,
  options: RenderWorkerOptions,
) => RenderWorker;

/**
 * Pin an open-ended range to the document and check it fits.
 *
 * @throws PageRangeError when a bound is past the last page
 */
export function clampPageRange(
  range: PageRange,
  pageCount: number,
): { start: number; end: number } {
  const end = range.end === 0 ? pageCount : range.end;

  if (range.start > pageCount) {
    throw new PageRangeError(
      `Start page ${range.start} is out of range (document has ${pageCount} page${pageCount === 1 ? '' : 's'})`,
    );
  }
  if (end > pageCount) {
    throw new PageRangeError(
      `End page ${end} is out of range (document has ${pageCount} page${pageCount === 1 ? '' : 's'})`,
    );
  }

  return { start: range.start, end };
}

/**
 * Rasterizes PDF pages with ImageMagick.
 *
 * ## System Requirements
 * - ImageMagick (`magick`) with Ghostscript for PDF input
 * - Poppler utils (`pdfinfo`) for the page count
 */
export class PdfRenderWorker implements RenderWorker {
  constructor(
    private readonly pdfPath: string,
    private readonly range: PageRange,
    private readonly options: RenderWorkerOptions,
  ) {}

  async render(): Promise<string[]> {
    const { logger, outputDir } = this.options;
    const dpi = this.options.dpi ?? PDF_RENDERER.DENSITY;

    const pageCount = await this.getPageCount();
    const { start, end } = clampPageRange(this.range, pageCount);

    const pagesDir = join(outputDir, PDF_RENDERER.PAGES_DIR);
    if (!existsSync(pagesDir)) {
      mkdirSync(pagesDir, { recursive: true });
    }

    logger.info(
      `[PdfRenderWorker] Rendering pages ${start}-${end} of ${pageCount} at ${dpi} DPI...`,
    );

    const result = await this.run('magick', [
      '-density',
      dpi.toString(),
      `${this.pdfPath}[${start - 1}-${end - 1}]`,
      '-scene',
      start.toString(),
      '-background',
      'white',
      '-alpha',
      'remove',
      '-alpha',
      'off',
      join(pagesDir, PDF_RENDERER.PAGE_PATTERN),
    ]);

    if (result.code !== 0) {
      throw new RenderError(
        `Failed to render PDF pages: ${result.stderr || 'Unknown error'}`,
      );
    }

    const pageFiles = readdirSync(pagesDir)
      .filter((f) => f.startsWith('page_') && f.endsWith('.png'))
      .map((f) => join(pagesDir, f));

    logger.info(
      `[PdfRenderWorker] Rendered ${pageFiles.length} pages to ${pagesDir}`,
    );

    return pageFiles;
  }

  /**
   * Read the page count with pdfinfo.
   *
   * @throws InvalidDocumentError when the file is not a readable PDF
   */
  private async getPageCount(): Promise<number> {
    const result = await this.run('pdfinfo', [this.pdfPath]);

    if (result.code !== 0) {
      throw new InvalidDocumentError(
        `Unable to read PDF: ${result.stderr || 'Unknown error'}`,
      );
    }

    const match = result.stdout.match(/^Pages:\s+(\d+)/m);
    const pageCount = match ? Number.parseInt(match[1], 10) : 0;
    if (pageCount === 0) {
      throw new InvalidDocumentError('Unable to read PDF: no pages found');
    }

    return pageCount;
  }

  private async run(command: string, args: string[]): Promise<SpawnResult> {
    try {
      return await spawnAsync(command, args);
    } catch (error) {
      throw new RenderError(
        `Failed to run ${command}: ${ConversionError.getErrorMessage(error)}`,
        { cause: error },
      );
    }
  }
}

/**
 * A single image is a one-page document; it is sent to the model as is.
 */
export class ImageRenderWorker implements RenderWorker {
  constructor(
    private readonly imagePath: string,
    private readonly range: PageRange,
    private readonly options: RenderWorkerOptions,
  ) {}

  async render(): Promise<string[]> {
    clampPageRange(this.range, 1);
    this.options.logger.info(
      `[ImageRenderWorker] Using image ${this.imagePath} as a single page`,
    );
    return [this.imagePath];
  }
}

/**
 * Create the render worker for a materialized document.
 *
 * @throws InvalidDocumentError when the extension is not a supported type
 */
export const createRenderWorker: RenderWorkerFactory = (
  documentPath,
  range,
  options,
) => {
  const extension = getExtension(documentPath);
  const type = EXTENSION_TYPES[extension];

  if (!type) {
    throw new InvalidDocumentError(
      `Unsupported document type: ${extension || documentPath}`,
    );
  }

  return type === 'pdf'
    ? new PdfRenderWorker(documentPath, range, options)
    : new ImageRenderWorker(documentPath, range, options);
};
