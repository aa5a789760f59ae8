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
 * Console method a log record is written through.
 */
export enum LogDestination {
  StdOut = 'log',
  StdErr = 'error',
}

/**
 * Structured metadata attached to a log record.
 */
export type LogMeta = Record<string, unknown>;

/**
 * A single structured log record as handed to a transport.
 */
export type LogRecord = LogMeta & {
  message: string;
  level: string;
};

/**
 * Options for creating a logger instance.
 */
export interface LoggerOptions {
  /** The minimum log level to output. Defaults to Info. */
  level?: LogLevel;
  /** Dot-notation paths redacted from context and meta before writing. */
  redactPaths?: string[];
  /** Where to send log output. Defaults to StdOut. */
  destination?: LogDestination;
}

/**
 * Logger contract used by every component of the library.
 * Callers may pass their own implementation (pino, winston, ...) as long as it
 * satisfies this shape.
 */
export interface Logger {
  /**
   * Creates a child logger with additional bound context.
   * @param context - Metadata bound to every record from the child
   */
  child(context: LogMeta): Logger;

  /** The current log level for this logger instance */
  level: LogLevel;

  /** Unrecoverable failures. */
  fatal(msg: string, meta?: LogMeta): void;
  /** Failures surfaced to a caller. */
  error(msg: string, meta?: LogMeta): void;
  /** Degraded but continuing (fallbacks, best-effort steps that failed). */
  warn(msg: string, meta?: LogMeta): void;
  /** Normal flow: state transitions, completed exchanges. */
  info(msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  trace(msg: string, meta?: LogMeta): void;
}

export type LogWriter = (record: LogRecord) => void;

/**
 * Sink for log records; `console` satisfies it.
 */
export interface LogTransport {
  log: LogWriter;
  error: LogWriter;
}
