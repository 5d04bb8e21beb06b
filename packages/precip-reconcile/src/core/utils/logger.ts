/**
 * Structured logging utility for precip-reconcile
 *
 * Provides structured logging with levels, timestamps, and contextual metadata.
 * Console-based: pretty single lines for terminals, JSON lines for machines.
 *
 * Level and format are process-wide and can be changed at runtime by the CLI
 * (`--verbose`, `--json`) through configureLogger(); module loggers created
 * before that call pick up the new settings.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

interface LoggerSettings {
  level: LogLevel;
  pretty: boolean;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

const getLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(level) ? level : 'info';
};

const settings: LoggerSettings = {
  level: getLogLevel(),
  pretty: process.env.NODE_ENV !== 'production',
};

/**
 * Change the process-wide log level and output format
 */
export function configureLogger(options: { level?: LogLevel; json?: boolean }): void {
  if (options.level) {
    settings.level = options.level;
  }
  if (options.json !== undefined) {
    settings.pretty = !options.json;
  }
}

export class Logger {
  private readonly service: string;

  constructor(service: string) {
    this.service = service;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[settings.level];
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    metadata?: LogMetadata
  ): string {
    const timestamp = new Date().toISOString();
    const hasMeta = metadata !== undefined && Object.keys(metadata).length > 0;

    if (settings.pretty) {
      const metaStr = hasMeta ? ` ${JSON.stringify(metadata)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.service}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.service,
      message,
      ...(hasMeta ? metadata : {}),
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    console.debug(this.formatMessage('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    console.info(this.formatMessage('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    console.warn(this.formatMessage('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    console.error(this.formatMessage('error', message, metadata));
  }
}

export const logger = new Logger('precip-reconcile');

/**
 * Create a module logger, named `precip-reconcile:<module>`
 */
export function createLogger(context: { readonly module: string }): Logger {
  return new Logger(`precip-reconcile:${context.module}`);
}

/**
 * Render an unknown thrown value for log metadata
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
