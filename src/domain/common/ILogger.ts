export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type LogMetadata = Record<string, unknown>;

/**
 * Structured logger. Metadata is merged into every line as JSON.
 */
export interface ILogger {
  error(message: string, error?: Error, meta?: LogMetadata): void;
  warn(message: string, meta?: LogMetadata): void;
  info(message: string, meta?: LogMetadata): void;
  debug(message: string, meta?: LogMetadata): void;

  /**
   * Logger whose lines all carry `context`, e.g. the collection ID.
   */
  child?(context: LogMetadata): ILogger;
}
