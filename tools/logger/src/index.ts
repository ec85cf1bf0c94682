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
   * Console-backed logger that drops messages below `minLevel`
   */
  static console(minLevel: LogLevel = 'info'): Logger {
    const threshold = LOG_LEVEL_ORDER[minLevel];
    const pick = (level: LogLevel, fn: LogFn): LogFn =>
      LOG_LEVEL_ORDER[level] >= threshold ? fn : noop;

    return new Logger({
      debug: pick('debug', (...args) => console.debug(...args)),
      info: pick('info', (...args) => console.info(...args)),
      warn: pick('warn', (...args) => console.warn(...args)),
      error: pick('error', (...args) => console.error(...args)),
    });
  }

  static silent(): Logger {
    return new Logger({ debug: noop, info: noop, warn: noop, error: noop });
  }
}

export { Logger, LOG_LEVEL_ORDER };
export type { LoggerMethods, LogFn, LogLevel };
