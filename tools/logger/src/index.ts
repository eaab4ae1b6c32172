type LogFn = (...args: unknown[]) => void;

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

type LogLevel = (typeof LOG_LEVELS)[number];

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
   * Console-backed logger that drops messages below `level`
   *
   * @example
   * ```typescript
   * const logger = Logger.console('warn');
   * logger.info('ignored');
   * logger.warn('[TextNormalizer] spacing failed'); // printed
   * ```
   */
  static console(level: LogLevel = 'info', sink: LoggerMethods = console): Logger {
    const threshold = LOG_LEVELS.indexOf(level);
    const pick = (name: LogLevel): LogFn =>
      LOG_LEVELS.indexOf(name) >= threshold
        ? (...args: unknown[]) => sink[name](...args)
        : noop;

    return new Logger({
      debug: pick('debug'),
      info: pick('info'),
      warn: pick('warn'),
      error: pick('error'),
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
