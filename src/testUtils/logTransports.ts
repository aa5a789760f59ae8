import { DefaultLogger } from '../logging/logger.js';
import { LogLevel, type LogRecord, type LogTransport } from '../logging/types.js';

// Emulates console transport
export class MockTransport implements LogTransport {
  public logs: LogRecord[] = [];
  public errors: LogRecord[] = [];

  log(record: LogRecord): void {
    this.logs.push(record);
  }

  error(record: LogRecord): void {
    this.errors.push(record);
  }

  messages(): string[] {
    return [...this.logs, ...this.errors].map((record) => record.message);
  }
}

/**
 * Logger that records everything down to Debug into a MockTransport.
 */
export function createRecordingLogger(): {
  logger: DefaultLogger;
  transport: MockTransport;
} {
  const transport = new MockTransport();
  const logger = new DefaultLogger(
    {},
    { level: LogLevel.Debug },
    transport
  );
  return { logger, transport };
}

/**
 * Logger that drops everything; keeps test output clean.
 */
export function createSilentLogger(): DefaultLogger {
  return new DefaultLogger({}, { level: LogLevel.Silent }, new MockTransport());
}
