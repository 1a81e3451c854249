type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

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
   * Logger that forwards to `console`, dropping calls below `minLevel`
   */
  static console(minLevel: LogLevel = 'info'): Logger {
    const threshold = LOG_LEVELS.indexOf(minLevel);
    const enabled = (level: LogLevel): boolean =>
      LOG_LEVELS.indexOf(level) >= threshold;

    return new Logger({
      debug: enabled('debug') ? (...args) => console.debug(...args) : noop,
      info: enabled('info') ? (...args) => console.info(...args) : noop,
      warn: enabled('warn') ? (...args) => console.warn(...args) : noop,
      error: enabled('error') ? (...args) => console.error(...args) : noop,
    });
  }

  /**
   * Logger that discards everything
   */
  static silent(): Logger {
    return new Logger({ debug: noop, info: noop, warn: noop, error: noop });
  }
}

export { Logger, LOG_LEVELS };
export type { LoggerMethods, LogFn, LogLevel };
