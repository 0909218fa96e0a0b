type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

/**
 * Minimal sink for console logger output (process.stderr satisfies it)
 */
interface LogStream {
  write(chunk: string): unknown;
}

interface ConsoleLoggerOptions {
  /**
   * Lowest level that is written; `'silent'` drops everything (default: 'info')
   */
  level?: LogLevel | 'silent';

  /**
   * Destination stream (default: process.stderr)
   */
  stream?: LogStream;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

class Logger implements LoggerMethods {
  public readonly debug: LogFn;
  public readonly info: LogFn;
  public readonly warn: LogFn;
  public readonly error: LogFn;

  constructor(methods: LoggerMethods) {
    this.debug = methods.debug;
    this.info = methods.info;
    this.warn = methods.warn;
    this.error = methods.error;
  }
}

function formatArgs(args: unknown[]): string {
  return args
    .map((arg) => {
      if (arg instanceof Error) {
        return arg.stack ?? arg.message;
      }
      return typeof arg === 'object' && arg !== null
        ? JSON.stringify(arg)
        : String(arg);
    })
    .join(' ');
}

/**
 * Create a logger writing `[LEVEL] message` lines.
 *
 * Output goes to stderr by default so that stdout stays free for command output.
 */
function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const { level = 'info', stream = process.stderr } = options;
  const threshold =
    level === 'silent' ? Number.POSITIVE_INFINITY : LOG_LEVEL_ORDER[level];

  const emit =
    (target: LogLevel): LogFn =>
    (...args: unknown[]) => {
      if (LOG_LEVEL_ORDER[target] < threshold) {
        return;
      }
      stream.write(`[${target.toUpperCase()}] ${formatArgs(args)}\n`);
    };

  return new Logger({
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  });
}

export { LOG_LEVELS, Logger, createConsoleLogger };
export type {
  ConsoleLoggerOptions,
  LoggerMethods,
  LogFn,
  LogLevel,
  LogStream,
};
