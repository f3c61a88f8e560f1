/**
 * Logger port.
 *
 * The dispatch core never writes to a logging backend directly; every
 * component takes an `ILogger` and callers plug in whatever they use.
 */

/**
 * Structured log metadata.
 */
export type LogMetadata = Record<string, unknown>;

/**
 * Log severity, lowest first.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Logger interface
 */
export interface ILogger {
  debug(message: string, meta?: LogMetadata): void;
  info(message: string, meta?: LogMetadata): void;
  warn(message: string, meta?: LogMetadata): void;
  error(message: string, meta?: LogMetadata): void;
}

/**
 * Default console logger
 */
export const consoleLogger: ILogger = {
  debug: (message, meta) => console.debug(`[DEBUG] ${message}`, ...withMeta(meta)),
  info: (message, meta) => console.info(`[INFO] ${message}`, ...withMeta(meta)),
  warn: (message, meta) => console.warn(`[WARN] ${message}`, ...withMeta(meta)),
  error: (message, meta) => console.error(`[ERROR] ${message}`, ...withMeta(meta)),
};

/**
 * Logger that discards everything. Library default.
 */
export const noopLogger: ILogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Console logger options
 */
export interface ConsoleLoggerOptions {
  /** Minimum level written. @defaultValue 'info' */
  level?: LogLevel;

  /** Prefix identifying the component, e.g. `command-bus` */
  name?: string;
}

/**
 * Create a console logger that drops entries below `level`.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): ILogger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const prefix = options.name ? `[${options.name}] ` : '';

  const write =
    (level: LogLevel) =>
    (message: string, meta?: LogMetadata): void => {
      if (LEVEL_ORDER[level] < threshold) {
        return;
      }
      consoleLogger[level](`${prefix}${message}`, meta);
    };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}

/**
 * Wrap a logger so every entry carries the given metadata.
 */
export function childLogger(logger: ILogger, bindings: LogMetadata): ILogger {
  return {
    debug: (message, meta) => logger.debug(message, { ...bindings, ...meta }),
    info: (message, meta) => logger.info(message, { ...bindings, ...meta }),
    warn: (message, meta) => logger.warn(message, { ...bindings, ...meta }),
    error: (message, meta) => logger.error(message, { ...bindings, ...meta }),
  };
}

function withMeta(meta: LogMetadata | undefined): LogMetadata[] {
  return meta && Object.keys(meta).length > 0 ? [meta] : [];
}
