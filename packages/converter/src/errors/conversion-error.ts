/**
 * Stage a fatal error belongs to
 *
 * - `configuration`: the environment is incomplete; nothing has run yet
 * - `input`: arguments or input bytes are unusable; nothing was rendered
 * - `collaborator`: the renderer rejected the document or the page range
 * - `output`: the Markdown was produced but could not be written
 */
export type ConversionErrorKind =
  | 'configuration'
  | 'input'
  | 'collaborator'
  | 'output';

/**
 * ConversionError
 *
 * Base class of every fatal pipeline error. Components throw these; only the
 * command-line boundary decides what a failure means for the process.
 */
export class ConversionError extends Error {
  constructor(
    public readonly kind: ConversionErrorKind,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ConversionError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}

export class ConfigurationError extends ConversionError {
  constructor(message: string, options?: ErrorOptions) {
    super('configuration', message, options);
    this.name = 'ConfigurationError';
  }
}

export class InvalidPageNumberError extends ConversionError {
  constructor(
    public readonly value: string,
    message = `Invalid page number: "${value}"`,
  ) {
    super('input', message);
    this.name = 'InvalidPageNumberError';
  }
}

export class UnsupportedFormatError extends ConversionError {
  constructor(message = 'Unsupported file type') {
    super('input', message);
    this.name = 'UnsupportedFormatError';
  }
}

export class EmptyInputError extends ConversionError {
  constructor(message = 'No input data received') {
    super('input', message);
    this.name = 'EmptyInputError';
  }
}

export class InputReadError extends ConversionError {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    super(
      'input',
      `Unable to read input file ${path}: ${ConversionError.getErrorMessage(cause)}`,
      { cause },
    );
    this.name = 'InputReadError';
  }
}

export class InvalidDocumentError extends ConversionError {
  constructor(message: string) {
    super('collaborator', message);
    this.name = 'InvalidDocumentError';
  }
}

export class PageRangeError extends ConversionError {
  constructor(message: string) {
    super('collaborator', message);
    this.name = 'PageRangeError';
  }
}

export class RenderError extends ConversionError {
  constructor(message: string, options?: ErrorOptions) {
    super('collaborator', message, options);
    this.name = 'RenderError';
  }
}

export class OutputWriteError extends ConversionError {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    super(
      'output',
      `Unable to write output file ${path}: ${ConversionError.getErrorMessage(cause)}`,
      { cause },
    );
    this.name = 'OutputWriteError';
  }
}
