import type { LoggerMethods } from '@pagescribe/logger';

import {
  type ConversionResult,
  ConversionError,
  type DocumentInput,
  DocumentConverter,
  EmptyInputError,
  InvalidPageNumberError,
  OutputWriteError,
  type PageRange,
  resolvePageRange,
} from '@pagescribe/converter';
import { isLogLevel } from '@pagescribe/logger';
import { CompletionClient } from '@pagescribe/shared';
import { statSync, writeFileSync } from 'node:fs';

import { USAGE, parseArgs } from './args';
import { type AppConfig, DEFAULT_LOG_LEVEL, loadConfig } from './config/env';
import { readInputFile, readInputStream } from './input';
import { createCliLogger } from './logger';

export type RunOutcome =
  | { status: 'succeeded'; result: ConversionResult; outputPath?: string }
  | { status: 'help' }
  | { status: 'failed'; error: unknown };

/**
 * Anything that turns a document into Markdown
 */
export interface MarkdownConverter {
  convert(input: DocumentInput, range: PageRange): Promise<ConversionResult>;
}

/**
 * Process-level collaborators of a run. `main.ts` passes the real ones;
 * tests pass fakes.
 */
export interface CliDependencies {
  env: Record<string, string | undefined>;
  stdin: AsyncIterable<Buffer | string>;
  writeStdout: (text: string) => void;
  /** Sink for log lines */
  writeStderr: (line: string) => void;
  isFile: (path: string) => boolean;
  readFile: (path: string) => DocumentInput;
  writeFile: (path: string, markdown: string) => void;
  createConverter: (
    config: AppConfig,
    logger: LoggerMethods,
  ) => MarkdownConverter;
  now?: () => Date;
}

export function isFile(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
}

export function createDefaultConverter(
  config: AppConfig,
  logger: LoggerMethods,
): MarkdownConverter {
  const client = new CompletionClient({
    baseUrl: config.baseUrl,
    apiKey: config.apiKey,
    modelName: config.model,
    logger,
  });
  return new DocumentConverter({ logger, client });
}

export function createProcessDependencies(): CliDependencies {
  return {
    env: process.env,
    stdin: process.stdin,
    writeStdout: (text) => void process.stdout.write(text),
    writeStderr: (line) => void process.stderr.write(line),
    isFile,
    readFile: readInputFile,
    writeFile: (path, markdown) => writeFileSync(path, markdown, 'utf-8'),
    createConverter: createDefaultConverter,
  };
}

/**
 * Run one conversion from command-line arguments.
 *
 * Never throws: every failure is returned as a `failed` outcome.
 */
export async function runConversion(
  argv: readonly string[],
  deps: CliDependencies,
  logger: LoggerMethods,
): Promise<RunOutcome> {
  try {
    const args = parseArgs(argv, deps.isFile);
    if (args.help) {
      deps.writeStdout(`${USAGE}\n`);
      return { status: 'help' };
    }

    const config = loadConfig(deps.env);

    let range: PageRange;
    try {
      range = resolvePageRange(args.startPage, args.endPage);
    } catch (error) {
      if (error instanceof InvalidPageNumberError) {
        logger.error(USAGE);
      }
      throw error;
    }

    let input: DocumentInput;
    try {
      input =
        args.inputPath === undefined
          ? await readInputStream(deps.stdin)
          : deps.readFile(args.inputPath);
    } catch (error) {
      if (error instanceof EmptyInputError) {
        logger.error(USAGE);
      }
      throw error;
    }

    const converter = deps.createConverter(config, logger);
    const result = await converter.convert(input, range);

    if (args.outputPath === undefined) {
      deps.writeStdout(`${result.markdown}\n`);
      return { status: 'succeeded', result };
    }

    try {
      deps.writeFile(args.outputPath, result.markdown);
    } catch (error) {
      throw new OutputWriteError(args.outputPath, error);
    }
    logger.info(`[CLI] Markdown saved to ${args.outputPath}`);
    return { status: 'succeeded', result, outputPath: args.outputPath };
  } catch (error) {
    return { status: 'failed', error };
  }
}

export function exitCodeFor(outcome: RunOutcome): number {
  return outcome.status === 'failed' ? 1 : 0;
}

function logFailure(logger: LoggerMethods, error: unknown): void {
  if (error instanceof ConversionError) {
    logger.error(`[CLI] ${error.kind} error: ${error.message}`);
    return;
  }
  logger.error(
    `[CLI] Unexpected error: ${ConversionError.getErrorMessage(error)}`,
  );
}

/**
 * Command-line entry point. Returns the process exit code.
 */
export async function runCli(
  argv: readonly string[],
  deps: CliDependencies,
): Promise<number> {
  const requested = deps.env.LOG_LEVEL?.trim() ?? '';
  const logger = createCliLogger({
    level: isLogLevel(requested) ? requested : DEFAULT_LOG_LEVEL,
    write: deps.writeStderr,
    now: deps.now,
  });

  const outcome = await runConversion(argv, deps, logger);
  if (outcome.status === 'failed') {
    logFailure(logger, outcome.error);
  }
  return exitCodeFor(outcome);
}
