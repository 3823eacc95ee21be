/**
 * Structured logging utilities
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'pretty' | 'json' | 'compact';

export interface LoggingConfig {
  level: LogLevel;
  format: LogFormat;
  includeTimestamps: boolean;
  /** Name printed with every line, e.g. the tenant */
  target?: string;
}

export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export function createDefaultLoggingConfig(): LoggingConfig {
  return {
    level: 'info',
    format: 'pretty',
    includeTimestamps: true,
  };
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/**
 * Resolves a level name (case-insensitive, `WARNING` accepted); anything else falls back to `info`.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  if (value === undefined) {
    return 'info';
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === 'warning') {
    return 'warn';
  }

  return isLogLevel(normalized) ? normalized : 'info';
}

/**
 * Console-based logger with structured output
 */
export class ConsoleLogger implements Logger {
  private readonly config: LoggingConfig;

  constructor(config?: Partial<LoggingConfig>) {
    this.config = { ...createDefaultLoggingConfig(), ...config };
  }

  get level(): LogLevel {
    return this.config.level;
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log('trace', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.level]) {
      return;
    }

    const timestamp = this.config.includeTimestamps ? new Date().toISOString() : undefined;
    const target = this.config.target;

    if (this.config.format === 'json') {
      console.log(JSON.stringify({ timestamp, level, target, message, ...context }));
    } else if (this.config.format === 'compact') {
      const contextStr = context ? ` ${JSON.stringify(context)}` : '';
      console.log(`[${level.toUpperCase()}] ${message}${contextStr}`);
    } else {
      const parts: string[] = [];
      if (timestamp) parts.push(`[${timestamp}]`);
      parts.push(`[${level.toUpperCase()}]`);
      if (target) parts.push(`${target}:`);
      parts.push(message);
      if (context && Object.keys(context).length > 0) {
        parts.push('\n  ' + Object.entries(context)
          .map(([k, v]) => `${k}: ${JSON.stringify(v)}`)
          .join('\n  '));
      }
      console.log(parts.join(' '));
    }
  }
}

/**
 * Logger that discards everything
 */
export class NoopLogger implements Logger {
  trace(_message: string, _context?: Record<string, unknown>): void {}
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}

/**
 * Logs the elapsed time of an HTTP call
 */
export function logElapsed(
  logger: Logger,
  method: string,
  url: string,
  status: number,
  durationMs: number
): void {
  logger.debug('HTTP response', { method, url, status, durationMs });
}

/**
 * Logs an error with context
 */
export function logError(
  logger: Logger,
  error: unknown,
  context: string
): void {
  if (error instanceof Error) {
    logger.error(context, {
      errorName: error.name,
      errorMessage: error.message,
    });
  } else {
    logger.error(context, { error: String(error) });
  }
}
