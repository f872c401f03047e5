import {
  type DocumentInput,
  EmptyInputError,
  InputReadError,
  STDIN_FILENAME,
} from '@pagescribe/converter';
import { readFileSync } from 'node:fs';
import { basename } from 'node:path';

/**
 * Read the input document from a file.
 *
 * @throws InputReadError when the file cannot be read
 */
export function readInputFile(path: string): DocumentInput {
  try {
    return { filename: basename(path), data: readFileSync(path) };
  } catch (error) {
    throw new InputReadError(path, error);
  }
}

/**
 * Read the input document from a stream until it ends.
 *
 * @throws EmptyInputError when the stream carries no bytes
 */
export async function readInputStream(
  stream: AsyncIterable<Buffer | string>,
): Promise<DocumentInput> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }

  const data = Buffer.concat(chunks);
  if (data.length === 0) {
    throw new EmptyInputError();
  }

  return { filename: STDIN_FILENAME, data };
}
