/**
 * Structured logging utility for unicef-data
 *
 * Console-based structured logger with levels, timestamps, and contextual
 * metadata. JSON lines in production, a single readable line otherwise.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export type LogSink = (level: Exclude<LogLevel, 'silent'>, line: string) => void;

interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  readonly pretty: boolean;
  /** Line sink (default: console, by level) */
  readonly write?: LogSink;
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
};

/**
 * Every level to stderr, for processes whose stdout carries data
 */
export const stderrSink: LogSink = (_level, line) => {
  process.stderr.write(`${line}\n`);
};

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export class Logger {
  private readonly config: LoggerConfig;
  private readonly write: LogSink;

  constructor(config: LoggerConfig) {
    this.config = config;
    this.write = config.write ?? consoleSink;
  }

  get service(): string {
    return this.config.service;
  }

  private shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVELS[level] >= LEVELS[this.config.level];
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    metadata?: LogMetadata
  ): string {
    const timestamp = new Date().toISOString();
    const hasMetadata = metadata !== undefined && Object.keys(metadata).length > 0;

    if (this.config.pretty) {
      const metaStr = hasMetadata ? ` ${JSON.stringify(metadata)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.config.service}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.config.service,
      message,
      ...(hasMetadata ? metadata : {}),
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    this.write('debug', this.formatMessage('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    this.write('info', this.formatMessage('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    this.write('warn', this.formatMessage('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    this.write('error', this.formatMessage('error', message, metadata));
  }

  /**
   * Derive a logger for a submodule, keeping level and format
   */
  child(module: string): Logger {
    return new Logger({ ...this.config, service: `${this.config.service}:${module}` });
  }
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const level = value?.toLowerCase();
  if (
    level === 'debug' ||
    level === 'info' ||
    level === 'warn' ||
    level === 'error' ||
    level === 'silent'
  ) {
    return level;
  }
  return undefined;
}

const getLogLevel = (): LogLevel => parseLogLevel(process.env.LOG_LEVEL) ?? 'info';

export const logger = new Logger({
  level: getLogLevel(),
  service: 'unicef-data',
  pretty: process.env.NODE_ENV !== 'production',
});

/**
 * Create a child logger with additional context
 */
export function createLogger(context: { readonly module: string; readonly level?: LogLevel }): Logger {
  return new Logger({
    level: context.level ?? getLogLevel(),
    service: `unicef-data:${context.module}`,
    pretty: process.env.NODE_ENV !== 'production',
  });
}
