export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/** Structured fields attached to a log line. */
export type LogMetadata = Record<string, unknown>;

/**
 * Logging port used by services and infrastructure. Services log through
 * this interface only; the console implementation lives in infrastructure.
 */
export interface ILogger {
  /** The error's message and stack are added to the metadata. */
  error(message: string, error?: Error, meta?: LogMetadata): void;
  warn(message: string, meta?: LogMetadata): void;
  info(message: string, meta?: LogMetadata): void;
  debug(message: string, meta?: LogMetadata): void;

  /** Logger whose lines also carry `context`. */
  child?(context: LogMetadata): ILogger;
  setLevel?(level: LogLevel): void;
}
