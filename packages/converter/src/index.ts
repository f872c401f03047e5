export {
  DocumentConverter,
  sortPagePaths,
  type ConversionResult,
  type DocumentConverterOptions,
} from './core/document-converter';
export { WorkArea, formatTimestamp } from './core/work-area';
export {
  STDIN_FILENAME,
  classifyDocument,
  getExtension,
  sniffDocumentType,
} from './classifiers/input-classifier';
export {
  WHOLE_DOCUMENT,
  formatPageRange,
  parsePageNumber,
  resolvePageRange,
} from './parsers/page-range-resolver';
export {
  ImageRenderWorker,
  PdfRenderWorker,
  clampPageRange,
  createRenderWorker,
  type RenderWorker,
  type RenderWorkerFactory,
  type RenderWorkerOptions,
} from './renderers/render-worker';
export {
  PageTranscriber,
  type PageTranscriberOptions,
} from './processors/page-transcriber';
export {
  PAGE_SEPARATOR,
  assembleMarkdown,
  unwrapMarkdownFence,
} from './processors/markdown-assembler';
export {
  ConfigurationError,
  ConversionError,
  EmptyInputError,
  InputReadError,
  InvalidDocumentError,
  InvalidPageNumberError,
  OutputWriteError,
  PageRangeError,
  RenderError,
  UnsupportedFormatError,
  type ConversionErrorKind,
} from './errors/conversion-error';
export { PAGE_TRANSCRIBER, PDF_RENDERER, WORK_AREA } from './config/constants';
export { TRANSCRIPTION_PROMPT } from './config/prompts';
export type {
  ClassifiedDocument,
  DocumentInput,
  DocumentType,
  PageImage,
  PageRange,
} from './types/document';
