/**
 * Structured logging for the rule checker
 *
 * Console-backed, with level filtering and either JSON lines or a
 * human-readable format. Components take a `Logger` so callers (and tests)
 * can substitute their own sink.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

class ConsoleLogger implements Logger {
  private readonly service: string;
  private readonly level: LogLevel;
  private readonly pretty: boolean;

  constructor(service: string, options: LoggerOptions) {
    this.service = service;
    this.level = options.level ?? 'info';
    this.pretty = options.pretty ?? false;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.level];
  }

  private format(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const hasMetadata = metadata !== undefined && Object.keys(metadata).length > 0;

    if (this.pretty) {
      const metaStr = hasMetadata ? ` ${JSON.stringify(metadata)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.service}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.service,
      message,
      ...(hasMetadata ? metadata : {}),
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    console.debug(this.format('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    console.info(this.format('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    console.warn(this.format('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    console.error(this.format('error', message, metadata));
  }
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVELS;
}

export function createLogger(service: string, options: LoggerOptions = {}): Logger {
  return new ConsoleLogger(service, options);
}

const envLevel = process.env.LOG_LEVEL;

/** Default logger used when a component is given none */
export const logger: Logger = createLogger('model-rule-checker', {
  level: isLogLevel(envLevel) ? envLevel : 'info',
  pretty: process.env.NODE_ENV !== 'production',
});
