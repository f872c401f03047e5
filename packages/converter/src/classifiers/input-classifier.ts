import type { LoggerMethods } from '@pagescribe/logger';

import type {
  ClassifiedDocument,
  DocumentInput,
  DocumentType,
} from '../types/document';

import { CANONICAL_EXTENSIONS, EXTENSION_TYPES } from '../config/constants';
import { UnsupportedFormatError } from '../errors/conversion-error';

/** Pseudo file name of standard input */
export const STDIN_FILENAME = '<stdin>';

/** Leading-byte signatures, checked in order */
const SIGNATURES: ReadonlyArray<{ type: DocumentType; bytes: number[] }> = [
  { type: 'pdf', bytes: [0x25, 0x50, 0x44, 0x46, 0x2d] }, // %PDF-
  { type: 'jpeg', bytes: [0xff, 0xd8, 0xff, 0xdb] },
  { type: 'png', bytes: [0x89, 0x50, 0x4e, 0x47] },
  { type: 'bmp', bytes: [0x42, 0x4d] }, // BM
];

const TYPE_LABELS: Record<DocumentType, string> = {
  pdf: 'PDF',
  jpeg: 'JPEG',
  png: 'PNG',
  bmp: 'BMP',
};

/**
 * Lower-case extension (with leading dot) of a file name, or '' when it has none.
 */
export function getExtension(filename: string): string {
  const base = filename.slice(
    Math.max(filename.lastIndexOf('/'), filename.lastIndexOf('\\')) + 1,
  );
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(dot).toLowerCase() : '';
}

/**
 * Match the leading bytes against the signature table.
 */
export function sniffDocumentType(data: Uint8Array): DocumentType | null {
  const match = SIGNATURES.find(
    ({ bytes }) =>
      data.length >= bytes.length && bytes.every((b, i) => data[i] === b),
  );
  return match?.type ?? null;
}

/**
 * Determine the document type of an input.
 *
 * A recognized file extension wins. Inputs without a usable extension
 * (including standard input) are classified by their leading bytes.
 *
 * @throws UnsupportedFormatError when neither extension nor content matches
 */
export function classifyDocument(
  input: DocumentInput,
  logger: LoggerMethods,
): ClassifiedDocument {
  const extension =
    input.filename && input.filename !== STDIN_FILENAME
      ? getExtension(input.filename)
      : '';

  const extensionType = EXTENSION_TYPES[extension];
  if (extensionType) {
    return { type: extensionType, extension, data: input.data };
  }

  const sniffedType = sniffDocumentType(input.data);
  if (!sniffedType) {
    throw new UnsupportedFormatError();
  }

  logger.info(
    `[InputClassifier] Recognized as ${TYPE_LABELS[sniffedType]} file by file content`,
  );

  return {
    type: sniffedType,
    extension: CANONICAL_EXTENSIONS[sniffedType],
    data: input.data,
  };
}
