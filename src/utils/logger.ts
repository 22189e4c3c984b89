/**
 * @file Shared console logger.
 * Level-filtered wrapper around console, configured by LOG_LEVEL.
 * Callers prefix their messages with a `[Component]` tag.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function parseLevel(raw: string | undefined): LogLevel {
  const value = raw?.toLowerCase();
  if (value && isLogLevel(value)) {
    return value;
  }
  // Jest runs quiet unless asked otherwise
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export class ConsoleLogger implements Logger {
  private threshold: number;

  constructor(level: LogLevel = parseLevel(process.env.LOG_LEVEL)) {
    this.threshold = LEVEL_ORDER[level];
  }

  setLevel(level: LogLevel): void {
    this.threshold = LEVEL_ORDER[level];
  }

  debug(message: string, ...meta: unknown[]): void {
    if (this.enabled('debug')) console.debug(this.stamp(message), ...meta);
  }

  info(message: string, ...meta: unknown[]): void {
    if (this.enabled('info')) console.info(this.stamp(message), ...meta);
  }

  warn(message: string, ...meta: unknown[]): void {
    if (this.enabled('warn')) console.warn(this.stamp(message), ...meta);
  }

  error(message: string, ...meta: unknown[]): void {
    if (this.enabled('error')) console.error(this.stamp(message), ...meta);
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= this.threshold;
  }

  private stamp(message: string): string {
    return `${new Date().toISOString()} ${message}`;
  }
}

export const logger: Logger & { setLevel(level: LogLevel): void } = new ConsoleLogger();
