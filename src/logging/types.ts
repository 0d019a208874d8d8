/**
 * Log levels ordered from least to most verbose.
 * Silent disables all logging output.
 */
export enum LogLevel {
  Silent,
  Fatal,
  Error,
  Warn,
  Info,
  Debug,
  Trace,
}

/**
 * Available destinations for log output.
 */
export enum LogDestination {
  StdOut = 'log',
  StdErr = 'error',
}

/**
 * Metadata object that can be attached to log messages.
 */
export type LogMeta = Record<string, unknown>;

/**
 * Configuration options for creating a logger instance.
 */
export interface LoggerOptions {
  /** The minimum log level to output. Defaults to Info. */
  level?: LogLevel;
  /** Array of object paths to redact from log output. */
  redactPaths?: string[];
  /** Key names redacted wherever they appear in context or meta. */
  redactKeys?: string[];
  /** Where to send log output. Defaults to StdOut. */
  destination?: LogDestination;
}

/**
 * Logger interface defining the contract for all logger implementations.
 */
export interface Logger {
  /**
   * Creates a child logger with additional context metadata.
   * @param context - Metadata to bind to all messages from this child logger
   */
  child(context: LogMeta): Logger;

  /** The current log level for this logger instance */
  level: LogLevel;

  /** Unrecoverable errors. */
  fatal(msg: string, meta?: LogMeta): void;

  /** Errors that may be recoverable. */
  error(msg: string, meta?: LogMeta): void;

  /** Potential issues. */
  warn(msg: string, meta?: LogMeta): void;

  /** Normal application flow. */
  info(msg: string, meta?: LogMeta): void;

  debug(msg: string, meta?: LogMeta): void;

  trace(msg: string, meta?: LogMeta): void;
}

export type LogWriter = (message: LogMeta) => void;

export interface LogTransport {
  log: LogWriter;
  error: LogWriter;
}
