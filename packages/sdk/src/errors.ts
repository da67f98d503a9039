/**
 * Error types for coefficient record operations
 *
 * Invariants:
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - All errors support a `cause` property for wrapping underlying errors
 * - File errors include the target path in the message
 */

/**
 * Base class for all coefstore errors
 */
export abstract class CoefstoreError extends Error {
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
 * Thrown when a vector index has no feature identity while encoding
 */
export class LookupError extends CoefstoreError {
  readonly code = "E_LOOKUP";

  constructor(
    public readonly index: number,
    options?: ErrorOptions
  ) {
    super(`Feature index ${index} not found in the feature map`, options);
  }
}

/**
 * Thrown when a top-level input (vector, map, record, option) is missing or malformed
 */
export class StructuralError extends CoefstoreError {
  readonly code = "E_STRUCTURE";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * Thrown when a record file does not exist
 */
export class RecordNotFoundError extends CoefstoreError {
  readonly code = "ENOENT";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Record file not found: ${filePath}`, options);
  }
}

/**
 * Thrown when a record file cannot be read
 */
export class RecordReadError extends CoefstoreError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read record file: ${filePath}`, options);
  }
}

/**
 * Thrown when a record file cannot be written
 */
export class RecordWriteError extends CoefstoreError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write record file: ${filePath}`, options);
  }
}

/**
 * Narrow an unknown thrown value to a Node.js errno exception
 */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}
