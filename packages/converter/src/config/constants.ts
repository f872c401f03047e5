import type { DocumentType } from '../types/document';

/**
 * Configuration constants for PageTranscriber
 */
export const PAGE_TRANSCRIBER = {
  /**
   * Attempts per page before the page degrades to an empty fragment
   */
  MAX_ATTEMPTS: 3,

  /**
   * Fixed wait after each failed attempt, in milliseconds
   */
  BACKOFF_MS: 500,

  /**
   * Temperature for transcription
   */
  TEMPERATURE: 0.3,

  /**
   * Token budget per page
   */
  MAX_TOKENS: 8192,
} as const;

/**
 * Configuration constants for PdfRenderWorker
 */
export const PDF_RENDERER = {
  /**
   * ImageMagick density option (DPI) for page rasterization
   */
  DENSITY: 300,

  /**
   * Subdirectory of the work area receiving rendered pages
   */
  PAGES_DIR: 'pages',

  /**
   * Output pattern; zero-padded so file names sort in page order
   */
  PAGE_PATTERN: 'page_%04d.png',
} as const;

/**
 * Configuration constants for WorkArea
 */
export const WORK_AREA = {
  /**
   * Directory (relative to the working directory) holding per-run areas
   */
  ROOT: 'output',

  /**
   * Base name of the materialized input document
   */
  INPUT_BASENAME: 'input',
} as const;

/**
 * Recognized file extensions, lower-case with leading dot
 */
export const EXTENSION_TYPES: Readonly<Record<string, DocumentType>> = {
  '.pdf': 'pdf',
  '.jpg': 'jpeg',
  '.jpeg': 'jpeg',
  '.png': 'png',
  '.bmp': 'bmp',
};

/**
 * Extension used when the type was recognized from content
 */
export const CANONICAL_EXTENSIONS: Readonly<Record<DocumentType, string>> = {
  pdf: '.pdf',
  jpeg: '.jpg',
  png: '.png',
  bmp: '.bmp',
};
