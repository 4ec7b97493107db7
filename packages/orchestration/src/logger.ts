/**
 * Console logging with `[Tag] message` lines, level filtering and an optional
 * JSON-lines mode.
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

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  json?: boolean;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const level = value?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return fallback;
}

export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly json: boolean;

  constructor(
    private readonly tag: string,
    options: ConsoleLoggerOptions = {}
  ) {
    this.level = options.level ?? parseLogLevel(process.env.LOG_LEVEL);
    this.json = options.json ?? process.env.LOG_JSON === 'true';
  }

  /**
   * Logger for a sub-component, e.g. `[Orchestrator:Remote]`.
   */
  child(tag: string): ConsoleLogger {
    return new ConsoleLogger(`${this.tag}:${tag}`, { level: this.level, json: this.json });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    console.debug(this.format('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    console.log(this.format('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    console.warn(this.format('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    console.error(this.format('error', message, metadata));
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.level];
  }

  private format(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const hasMetadata = metadata !== undefined && Object.keys(metadata).length > 0;
    if (this.json) {
      return JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        tag: this.tag,
        message,
        ...(hasMetadata ? metadata : {}),
      });
    }
    return `[${this.tag}] ${message}${hasMetadata ? ` ${JSON.stringify(metadata)}` : ''}`;
  }
}

export function createLogger(tag: string, options?: ConsoleLoggerOptions): ConsoleLogger {
  return new ConsoleLogger(tag, options);
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
