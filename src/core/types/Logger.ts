export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, unknown>;

/**
 * Logger interface for flexible logging integration
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

/**
 * Silent logger implementation (no-op)
 */
export class SilentLogger implements Logger {
  debug(_message: string, _context?: LogContext): void {}
  info(_message: string, _context?: LogContext): void {}
  warn(_message: string, _context?: LogContext): void {}
  error(_message: string, _error?: Error, _context?: LogContext): void {}
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface ConsoleLoggerOptions {
  minLevel?: LogLevel;
  /** Prefix lines with an ISO timestamp (default true) */
  timestamps?: boolean;
}

/**
 * Console logger writing `[LEVEL] message {json context}` lines
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly timestamps: boolean;

  constructor(options: LogLevel | ConsoleLoggerOptions = {}) {
    const resolved = typeof options === 'string' ? { minLevel: options } : options;
    this.minLevel = resolved.minLevel ?? 'info';
    this.timestamps = resolved.timestamps ?? true;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.minLevel];
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    const errorInfo = error ? ` - ${error.message}` : '';
    if (this.write('error', `${message}${errorInfo}`, context) && error?.stack) {
      console.error(error.stack);
    }
  }

  private write(level: LogLevel, message: string, context?: LogContext): boolean {
    if (!this.isEnabled(level)) {
      return false;
    }

    const prefix = this.timestamps ? `${new Date().toISOString()} ` : '';
    const suffix = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    console[level](`${prefix}[${level.toUpperCase()}] ${message}${suffix}`);
    return true;
  }
}

/**
 * Logger that merges fixed bindings into every context
 *
 * @example
 * ```typescript
 * const log = withContext(logger, { connectionId });
 * log.info('Frame rejected', { format: 'json' });
 * // [INFO] Frame rejected {"connectionId":"...","format":"json"}
 * ```
 */
export const withContext = (logger: Logger, bindings: LogContext): Logger => ({
  debug: (message, context) => logger.debug(message, { ...bindings, ...context }),
  info: (message, context) => logger.info(message, { ...bindings, ...context }),
  warn: (message, context) => logger.warn(message, { ...bindings, ...context }),
  error: (message, error, context) => logger.error(message, error, { ...bindings, ...context }),
});

/**
 * Normalize an unknown thrown value into an Error for logging
 */
export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));
