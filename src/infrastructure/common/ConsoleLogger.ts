import { ILogger, LogLevel, LogMetadata } from '../../domain/common/ILogger';

const SEVERITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

/**
 * Writes one line per entry to the console stream matching its level:
 * `2024-01-01T00:00:00.000Z [INFO] Created record {"collection":"items","id":3}`.
 * Child context is merged under the call's own metadata.
 */
export class ConsoleLogger implements ILogger {
  constructor(
    private readonly level: LogLevel = 'info',
    private readonly context: LogMetadata = {}
  ) {}

  error(message: string, error?: Error, meta?: LogMetadata): void {
    this.write('error', message, error ? { ...meta, error: error.message, stack: error.stack } : meta);
  }

  warn(message: string, meta?: LogMetadata): void {
    this.write('warn', message, meta);
  }

  info(message: string, meta?: LogMetadata): void {
    this.write('info', message, meta);
  }

  debug(message: string, meta?: LogMetadata): void {
    this.write('debug', message, meta);
  }

  child(context: LogMetadata): ILogger {
    return new ConsoleLogger(this.level, { ...this.context, ...context });
  }

  private write(level: LogLevel, message: string, meta?: LogMetadata): void {
    if (SEVERITY[level] > SEVERITY[this.level]) return;

    const fields = { ...this.context, ...meta };
    const suffix = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
    console[level](`${new Date().toISOString()} [${level.toUpperCase()}] ${message}${suffix}`);
  }
}
