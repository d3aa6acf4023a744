/**
 * Error types for trimseq collections
 *
 * Invariants:
 * - Reads never throw; an index outside the window reads as `undefined`
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - A throwing call leaves the structure exactly as it was before the call
 */

/**
 * Base class for all trimseq errors
 */
export abstract class TrimSeqError extends Error {
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
 * Thrown when a ChunkedArray write targets an index at or beyond its fixed capacity
 */
export class CapacityExceededError extends TrimSeqError {
  readonly code = "E_CAPACITY";

  constructor(
    public readonly index: number,
    public readonly capacity: number,
    options?: ErrorOptions
  ) {
    super(`Index ${index} exceeds capacity (max index ${capacity - 1})`, options);
  }
}

/**
 * Thrown when an index is not a usable write target
 */
export class InvalidIndexError extends TrimSeqError {
  readonly code = "E_INDEX";

  constructor(
    public readonly index: number,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid index ${index}: ${reason}`, options);
  }
}

/**
 * Thrown when a selector is neither a step-1 range nor an iterable of integers
 */
export class InvalidSelectorError extends TrimSeqError {
  readonly code = "E_SELECTOR";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Invalid selector: ${reason}`, options);
  }
}

/**
 * Thrown when a buffer of the wrong shape is handed back to a chunk pool
 */
export class InvalidChunkError extends TrimSeqError {
  readonly code = "E_CHUNK";

  constructor(
    public readonly capacity: number,
    public readonly expected: number,
    options?: ErrorOptions
  ) {
    super(`Cannot pool chunk of ${capacity} slots (expected ${expected})`, options);
  }
}
