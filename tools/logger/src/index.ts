type LogFn = (...args: unknown[]) => void;

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

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

interface CreateLoggerOptions {
  /**
   * Minimum level that reaches the sink (default: BOOKPACK_LOG_LEVEL or 'info')
   */
  level?: LogLevel;

  /**
   * Prepended to every message, e.g. a run identifier
   */
  prefix?: string;

  /**
   * Output sink (default: console)
   */
  sink?: LoggerMethods;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Resolve the log level from the environment, falling back to 'info'
 */
function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env.BOOKPACK_LOG_LEVEL?.toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

/**
 * Create a console-backed logger that drops calls below the configured level.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', prefix: 'run-42' });
 * logger.info('[PackageProcessor] Starting');
 * // => "run-42 [PackageProcessor] Starting"
 * ```
 */
function createLogger(options: CreateLoggerOptions = {}): Logger {
  const level = options.level ?? resolveLogLevel();
  const sink = options.sink ?? console;
  const threshold = LEVEL_ORDER[level];

  const bind = (method: Exclude<LogLevel, 'silent'>): LogFn => {
    if (LEVEL_ORDER[method] < threshold) {
      return () => {};
    }
    const target = sink[method];
    return options.prefix
      ? (...args: unknown[]) => target(options.prefix, ...args)
      : (...args: unknown[]) => target(...args);
  };

  return new Logger({
    debug: bind('debug'),
    info: bind('info'),
    warn: bind('warn'),
    error: bind('error'),
  });
}

export { Logger, createLogger, resolveLogLevel };
export type { CreateLoggerOptions, LoggerMethods, LogFn, LogLevel };
