/**
 * Base application error class for consistent error handling.
 *
 * Every failure the CLI reports is one of the subclasses below; the entry
 * point prints the message and, when present, the underlying cause.
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/** An explicit date flag does not match the expected format. */
export class FormatError extends AppError {
  constructor(flag: string, value: string, expected: string) {
    super('FORMAT_ERROR', `invalid ${flag} "${value}", expected format ${expected}`, { flag, value, expected });
  }
}

/** The resolved start date falls after the resolved end date. */
export class DateRangeError extends AppError {
  constructor(start: string, end: string) {
    super('RANGE_ERROR', `start day ${start} is after end day ${end}`, { start, end });
  }
}

export class IOError extends AppError {
  constructor(message: string, cause: unknown, details?: Record<string, unknown>) {
    super('IO_ERROR', message, details, { cause });
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIG_ERROR', message, details);
  }
}

/**
 * Renders an error for the diagnostic stream: the message, followed by the
 * cause chain one level deep.
 */
export function describeError(err: unknown): string {
  if (!(err instanceof Error)) {
    return String(err);
  }
  if (err.cause === undefined) {
    return err.message;
  }
  const cause = err.cause instanceof Error ? err.cause.message : String(err.cause);
  return `${err.message}\ncaused by: ${cause}`;
}
