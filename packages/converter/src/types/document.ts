/**
 * Document types the pipeline accepts
 */
export type DocumentType = 'pdf' | 'jpeg' | 'png' | 'bmp';

/**
 * Raw input as it arrives from a file or standard input
 */
export interface DocumentInput {
  /** Original file name; absent or `<stdin>` when read from a stream */
  filename?: string;
  data: Buffer;
}

/**
 * Input after classification
 */
export interface ClassifiedDocument {
  type: DocumentType;
  /** Extension (with leading dot) the document is materialized under */
  extension: string;
  data: Buffer;
}

/**
 * Inclusive 1-based page range. `end = 0` means "to the last page".
 */
export interface PageRange {
  readonly start: number;
  readonly end: number;
}

/**
 * One rendered page
 */
export interface PageImage {
  /** 1-based position within the resolved range */
  pageNo: number;
  path: string;
}
