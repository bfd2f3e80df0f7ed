type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const noop: LogFn = () => {};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_ORDER, value);
}

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

  /**
   * Wrap existing methods so that calls below `minLevel` are dropped.
   */
  static withLevel(methods: LoggerMethods, minLevel: LogLevel): Logger {
    const enabled = (level: LogLevel) =>
      LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];

    return new Logger({
      debug: enabled('debug') ? methods.debug : noop,
      info: enabled('info') ? methods.info : noop,
      warn: enabled('warn') ? methods.warn : noop,
      error: enabled('error') ? methods.error : noop,
    });
  }
}

/**
 * Console-backed logger for hosts that have nothing better to forward to.
 */
function createConsoleLogger(minLevel: LogLevel = 'info'): Logger {
  return Logger.withLevel(
    {
      debug: (...args) => console.debug(...args),
      info: (...args) => console.info(...args),
      warn: (...args) => console.warn(...args),
      error: (...args) => console.error(...args),
    },
    minLevel,
  );
}

/**
 * Parse a LOG_LEVEL-style string, falling back when it is not a known level.
 */
function parseLogLevel(
  value: string | undefined,
  fallback: LogLevel = 'info',
): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized && isLogLevel(normalized)) {
    return normalized;
  }
  return fallback;
}

export { Logger, createConsoleLogger, parseLogLevel };
export type { LoggerMethods, LogFn, LogLevel };
