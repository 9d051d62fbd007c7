/**
 * Error codes for flat array operations.
 * Every code marks a broken precondition on the caller's side.
 */
export type GridErrorCode =
  | "INVALID_DIMENSIONS"
  | "INDEX_OUT_OF_BOUNDS"
  | "INVALID_CELL_SIZE";

/**
 * Unified error type for all flat array operations.
 *
 * @example
 * ```typescript
 * throw GridError.indexOutOfBounds("Invalid index", { index: 16, len: 16 });
 * ```
 */
export class GridError extends Error {
  readonly name = "GridError";

  constructor(
    public readonly code: GridErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GridError);
    }
  }

  /**
   * Create an error for a zero, negative or fractional extent.
   */
  static invalidDimensions(
    message: string,
    details?: Record<string, unknown>,
  ): GridError {
    return new GridError("INVALID_DIMENSIONS", message, details);
  }

  /**
   * Create an error for a coordinate or raw offset outside the buffer.
   */
  static indexOutOfBounds(
    message: string,
    details?: Record<string, unknown>,
  ): GridError {
    return new GridError("INDEX_OUT_OF_BOUNDS", message, details);
  }

  static invalidCellSize(
    message: string,
    details?: Record<string, unknown>,
  ): GridError {
    return new GridError("INVALID_CELL_SIZE", message, details);
  }

  /**
   * Check if an unknown error is a GridError.
   */
  static isGridError(error: unknown): error is GridError {
    return error instanceof GridError;
  }

  /**
   * Convert to a plain object for serialization.
   */
  toJSON(): {
    name: string;
    code: GridErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
