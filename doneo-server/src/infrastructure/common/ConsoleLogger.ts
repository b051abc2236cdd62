import { ILogger, LogLevel, LogMetadata } from '../../domain/common/ILogger';

export type LogFormat = 'json' | 'pretty';

const SEVERITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3
};

const SINKS: Record<LogLevel, (line: string) => void> = {
  error: (line) => console.error(line),
  warn: (line) => console.warn(line),
  info: (line) => console.info(line),
  debug: (line) => console.debug(line)
};

/**
 * Console logger with a level threshold and context fields inherited by
 * child loggers. `json` writes one object per line for log shippers,
 * `pretty` is meant for a terminal.
 */
export class ConsoleLogger implements ILogger {
  constructor(
    private level: LogLevel = 'info',
    private readonly context: LogMetadata = {},
    private readonly format: LogFormat = 'pretty'
  ) {}

  formatMessage(level: LogLevel, message: string, meta?: LogMetadata): string {
    const timestamp = new Date().toISOString();

    if (this.format === 'json') {
      return JSON.stringify({ timestamp, level, message, ...this.context, ...meta });
    }

    const contextFields = Object.entries(this.context).map(([k, v]) => `${k}=${String(v)}`);
    const prefix = contextFields.length > 0 ? ` [${contextFields.join(' ')}]` : '';
    const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} [${level.toUpperCase()}]${prefix} ${message}${suffix}`;
  }

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
    return new ConsoleLogger(this.level, { ...this.context, ...context }, this.format);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private write(level: LogLevel, message: string, meta?: LogMetadata): void {
    if (SEVERITY[level] > SEVERITY[this.level]) return;
    SINKS[level](this.formatMessage(level, message, meta));
  }
}
