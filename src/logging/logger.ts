import { redact } from './redaction.js';
import {
  LogDestination,
  LogLevel,
  type LogMeta,
  type LogTransport,
  type LogWriter,
  type Logger,
  type LoggerOptions,
} from './types.js';

export { LogDestination, LogLevel };
export type { LogMeta, Logger, LoggerOptions, LogTransport };

const LEVEL_NAMES: Record<string, LogLevel> = {
  silent: LogLevel.Silent,
  fatal: LogLevel.Fatal,
  error: LogLevel.Error,
  warn: LogLevel.Warn,
  info: LogLevel.Info,
  debug: LogLevel.Debug,
  trace: LogLevel.Trace,
};

/**
 * Map a case-insensitive level name (e.g. from the environment) to a LogLevel
 */
export function parseLogLevel(
  name: string | undefined,
  fallback: LogLevel = DefaultLogger.defaultLevel
): LogLevel {
  if (!name) return fallback;
  return LEVEL_NAMES[name.trim().toLowerCase()] ?? fallback;
}

export class DefaultLogger implements Logger {
  // Defaults for this implementation of Logger
  static readonly defaultLevel = LogLevel.Info;
  static readonly defaultDestination = LogDestination.StdOut;
  static readonly defaultRedactPaths: string[] = [];
  static readonly defaultRedactKeys: string[] = [];

  private readonly context: LogMeta;
  private readonly writeMessage: LogWriter;
  private readonly transport: LogTransport;

  public readonly destination: LogDestination;
  public redactPaths: string[];
  public redactKeys: string[];
  public level: LogLevel;

  constructor(
    context: LogMeta,
    options?: LoggerOptions,
    transport: LogTransport = console
  ) {
    this.context = context;
    this.level = options?.level ?? DefaultLogger.defaultLevel;
    this.destination = options?.destination ?? DefaultLogger.defaultDestination;
    this.redactPaths = options?.redactPaths ?? DefaultLogger.defaultRedactPaths;
    this.redactKeys = options?.redactKeys ?? DefaultLogger.defaultRedactKeys;
    this.transport = transport;
    this.writeMessage = transport[this.destination].bind(transport);
  }

  child(context: LogMeta): Logger {
    const childContext = { ...this.context, ...context };
    const childOptions = {
      level: this.level,
      redactPaths: this.redactPaths,
      redactKeys: this.redactKeys,
      destination: this.destination,
    };

    return new DefaultLogger(childContext, childOptions, this.transport);
  }

  fatal(msg: string, meta?: LogMeta): void {
    this.log(LogLevel.Fatal, msg, meta);
  }

  error(msg: string, meta?: LogMeta): void {
    this.log(LogLevel.Error, msg, meta);
  }

  warn(msg: string, meta?: LogMeta): void {
    this.log(LogLevel.Warn, msg, meta);
  }

  info(msg: string, meta?: LogMeta): void {
    this.log(LogLevel.Info, msg, meta);
  }

  debug(msg: string, meta?: LogMeta): void {
    this.log(LogLevel.Debug, msg, meta);
  }

  trace(msg: string, meta?: LogMeta): void {
    this.log(LogLevel.Trace, msg, meta);
  }

  private log(level: LogLevel, msg: string, meta?: LogMeta): void {
    if (this.level === LogLevel.Silent) {
      return;
    }

    if (level <= this.level) {
      const rules = { paths: this.redactPaths, keys: this.redactKeys };
      const message = {
        message: msg,
        level: LogLevel[level],
        ...redact(this.context, rules),
        ...redact(meta, rules),
      };

      this.writeMessage(message);
    }
  }
}
