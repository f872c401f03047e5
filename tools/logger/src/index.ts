type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

interface LoggerOptions {
  /** Minimum level that is forwarded (default: 'debug') */
  level?: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const noop: LogFn = () => {};

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

class Logger implements LoggerMethods {
  public readonly level: LogLevel;
  public readonly debug: LogFn;
  public readonly info: LogFn;
  public readonly warn: LogFn;
  public readonly error: LogFn;

  constructor(methods: LoggerMethods, options: LoggerOptions = {}) {
    this.level = options.level ?? 'debug';

    const threshold = LOG_LEVELS.indexOf(this.level);
    const pick = (level: LogLevel): LogFn =>
      LOG_LEVELS.indexOf(level) >= threshold ? methods[level] : noop;

    this.debug = pick('debug');
    this.info = pick('info');
    this.warn = pick('warn');
    this.error = pick('error');
  }
}

export { LOG_LEVELS, Logger, isLogLevel };
export type { LogFn, LogLevel, LoggerMethods, LoggerOptions };
