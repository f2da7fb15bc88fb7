/**
 * Custom error types for the benchmarking toolkit
 */

/**
 * Base error class for all benchmark errors
 */
export class BenchError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'BenchError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }

  /**
   * Convert to JSON for structured logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.cause && { cause: this.cause.message }),
    };
  }
}

/**
 * Configuration errors (missing file, missing required keys)
 */
export class ConfigurationError extends BenchError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIGURATION_ERROR', cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Schema validation errors for configuration files and persisted reports
 */
export class ValidationError extends BenchError {
  constructor(
    message: string,
    public readonly errors: Array<{ path: string; message: string }>,
    cause?: Error
  ) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }
}

/**
 * The inference server could not be reached at all
 */
export class ServerUnavailableError extends BenchError {
  constructor(
    message: string,
    public readonly host: string,
    cause?: Error
  ) {
    super(message, 'SERVER_UNAVAILABLE', cause);
    this.name = 'ServerUnavailableError';
  }
}

/**
 * The inference server answered with an error status or reported one mid-stream
 */
export class ServerError extends BenchError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: Error
  ) {
    super(message, 'SERVER_ERROR', cause);
    this.name = 'ServerError';
  }
}

/**
 * A telemetry source (sensor tool, process stats) could not be read
 */
export class TelemetryUnavailableError extends BenchError {
  constructor(
    message: string,
    public readonly source: string,
    cause?: Error
  ) {
    super(message, 'TELEMETRY_UNAVAILABLE', cause);
    this.name = 'TelemetryUnavailableError';
  }
}

/**
 * The tracked server process no longer exists
 */
export class ProcessLostError extends BenchError {
  constructor(
    public readonly pid: number,
    cause?: Error
  ) {
    super(`Process ${pid} no longer exists`, 'PROCESS_LOST', cause);
    this.name = 'ProcessLostError';
  }
}

/**
 * A persisted report is missing, unreadable or malformed
 */
export class ReportLoadError extends BenchError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: Error
  ) {
    super(message, 'REPORT_LOAD_ERROR', cause);
    this.name = 'ReportLoadError';
  }
}

/**
 * Check if error is a benchmark error
 */
export function isBenchError(error: unknown): error is BenchError {
  return error instanceof BenchError;
}

/**
 * Wrap unknown error as BenchError
 */
export function wrapError(error: unknown, message?: string): BenchError {
  if (isBenchError(error)) {
    return error;
  }

  const errorMessage = message || (error instanceof Error ? error.message : String(error));
  const cause = error instanceof Error ? error : undefined;

  return new BenchError(errorMessage, 'UNKNOWN_ERROR', cause);
}

/**
 * Narrow an unknown throw to an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
