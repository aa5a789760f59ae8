import { redact } from './redaction.js';
import {
  LogDestination,
  LogLevel,
  type LogMeta,
  type LogRecord,
  type LogTransport,
  type LogWriter,
  type Logger,
  type LoggerOptions,
} from './types.js';

/**
 * Paths that carry credentials anywhere in this library's log metadata.
 * Applied by {@link createLogger} unless the caller supplies their own list.
 */
export const CREDENTIAL_REDACTION_PATHS = [
  // Direct fields
  'accessToken',
  'refreshToken',
  'clientSecret',
  'codeVerifier',
  'code',

  // Wire-format fields (token and registration responses)
  'access_token',
  'refresh_token',
  'client_secret',
  'code_verifier',

  // Nested holders
  'tokens.accessToken',
  'tokens.refreshToken',
  'credentials.client_secret',
  'headers.Authorization',
  'headers.authorization',
];

const LEVEL_NAMES: Record<string, LogLevel> = {
  silent: LogLevel.Silent,
  fatal: LogLevel.Fatal,
  error: LogLevel.Error,
  warn: LogLevel.Warn,
  warning: LogLevel.Warn,
  info: LogLevel.Info,
  debug: LogLevel.Debug,
  trace: LogLevel.Trace,
};

/**
 * Map a configuration string (`"debug"`, `"WARN"`, ...) to a {@link LogLevel}.
 * Returns undefined for unknown names so callers can fall back to a default.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) {
    return undefined;
  }
  return LEVEL_NAMES[value.trim().toLowerCase()];
}

export class DefaultLogger implements Logger {
  static readonly defaultLevel = LogLevel.Info;
  static readonly defaultDestination = LogDestination.StdOut;
  static readonly defaultRedactPaths: string[] = [];

  private readonly context: LogMeta;
  private readonly transport: LogTransport;
  private readonly writeRecord: LogWriter;

  public readonly destination: LogDestination;
  public readonly redactPaths: string[];
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
    this.transport = transport;
    this.writeRecord = transport[this.destination].bind(transport);
  }

  child(context: LogMeta): Logger {
    return new DefaultLogger(
      { ...this.context, ...context },
      {
        level: this.level,
        redactPaths: this.redactPaths,
        destination: this.destination,
      },
      this.transport
    );
  }

  fatal(msg: string, meta?: LogMeta): void {
    this.write(LogLevel.Fatal, msg, meta);
  }

  error(msg: string, meta?: LogMeta): void {
    this.write(LogLevel.Error, msg, meta);
  }

  warn(msg: string, meta?: LogMeta): void {
    this.write(LogLevel.Warn, msg, meta);
  }

  info(msg: string, meta?: LogMeta): void {
    this.write(LogLevel.Info, msg, meta);
  }

  debug(msg: string, meta?: LogMeta): void {
    this.write(LogLevel.Debug, msg, meta);
  }

  trace(msg: string, meta?: LogMeta): void {
    this.write(LogLevel.Trace, msg, meta);
  }

  private write(level: LogLevel, msg: string, meta?: LogMeta): void {
    if (this.level === LogLevel.Silent || level > this.level) {
      return;
    }

    const record: LogRecord = {
      message: msg,
      level: LogLevel[level],
      ...redact(this.context, this.redactPaths),
      ...redact(meta ?? {}, this.redactPaths),
    };

    this.writeRecord(record);
  }
}

/**
 * Build the logger a component uses when the caller did not inject one:
 * a {@link DefaultLogger} bound to the component's context with credential
 * redaction switched on.
 */
export function createLogger(
  context: LogMeta,
  options: LoggerOptions = {},
  transport?: LogTransport
): Logger {
  return new DefaultLogger(
    context,
    {
      ...options,
      redactPaths: options.redactPaths ?? CREDENTIAL_REDACTION_PATHS,
    },
    transport
  );
}
