/**
 * Error types for record index operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - Missing keys, duplicate keys and deleted records are outcomes, not errors
 */

/**
 * Base class for all record index errors
 */
export abstract class RecordIndexError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a stored position does not address a record in the sequence
 */
export class RecordPositionError extends RecordIndexError {
  readonly code = "E_POSITION";

  constructor(
    public readonly cpf: string,
    public readonly position: number,
    public readonly sequenceLength: number,
    options?: ErrorOptions
  ) {
    super(
      `Position ${position} for CPF "${cpf}" is outside the record sequence (length ${sequenceLength})`,
      options
    );
  }
}

/**
 * A single validation problem, with the path of the offending field
 */
export interface RecordIssue {
  path: string;
  message: string;
}

/**
 * Thrown when record input fails validation
 */
export class InvalidRecordError extends RecordIndexError {
  readonly code = "E_INVALID_RECORD";

  constructor(
    public readonly issues: RecordIssue[],
    options?: ErrorOptions
  ) {
    super(
      `Invalid record input: ${issues.map((issue) => `${issue.path || "<root>"}: ${issue.message}`).join("; ")}`,
      options
    );
  }
}
