import type { LogLevel, LoggerMethods } from '@pagescribe/logger';

import { Logger } from '@pagescribe/logger';
import { format } from 'node:util';

export interface CliLoggerOptions {
  level: LogLevel;
  /** Sink for formatted lines (default: standard error) */
  write?: (line: string) => void;
  now?: () => Date;
}

/**
 * Logger writing `<timestamp> - <LEVEL> - <message>` lines to standard error,
 * keeping standard output free for the Markdown.
 */
export function createCliLogger(options: CliLoggerOptions): Logger {
  const write =
    options.write ?? ((line: string) => void process.stderr.write(line));
  const now = options.now ?? (() => new Date());

  const emit =
    (level: LogLevel) =>
    (...args: unknown[]) => {
      write(
        `${now().toISOString()} - ${level.toUpperCase()} - ${format(...args)}\n`,
      );
    };

  const methods: LoggerMethods = {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };

  return new Logger(methods, { level: options.level });
}
