/**
 * Error classes raised by calltrace itself.
 *
 * Errors thrown by traced code are never wrapped in any of these.
 */

/**
 * Raised when a module selected for tracing cannot be read or parsed.
 */
export class InstrumentationError extends Error {
  cause?: Error;
  filename: string;

  constructor(message: string, filename: string, cause?: Error) {
    super(message);
    this.name = 'InstrumentationError';
    this.filename = filename;
    this.cause = cause;
  }
}

/**
 * Raised when the trace store rejects a read or write.
 */
export class TraceStoreError extends Error {
  cause?: Error;
  operation: string;

  constructor(operation: string, cause?: Error) {
    super(`Trace store ${operation} failed${cause ? `: ${cause.message}` : ''}`);
    this.name = 'TraceStoreError';
    this.operation = operation;
    this.cause = cause;
  }
}

/**
 * Raised for invalid options or environment values.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
