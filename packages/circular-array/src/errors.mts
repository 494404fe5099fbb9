/**
 * Error classes thrown by circular array operations
 */

/**
 * Base error class for all circular array errors
 */
export class CircularArrayError extends Error {
  constructor(message: string, public readonly code: string, public readonly context?: unknown) {
    super(message);
    this.name = 'CircularArrayError';

    // maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error thrown when an element is requested from an empty array and no default was given
 */
export class EmptyContainerError extends CircularArrayError {
  constructor(public readonly operation: string) {
    super(
      `Cannot ${operation} on an empty circular array`,
      'EMPTY_CONTAINER',
      { operation }
    );
    this.name = 'EmptyContainerError';
  }
}

/**
 * Error thrown when a resolved index falls outside the logical window
 */
export class IndexOutOfRangeError extends CircularArrayError {
  constructor(
    public readonly index: number,
    public readonly length: number,
    public readonly operation: 'get' | 'set' | 'delete'
  ) {
    super(
      length === 0
        ? `Cannot ${operation} index ${index} of an empty circular array`
        : `Index ${index} out of range while trying to ${operation}: expected an integer between ${-length} and ${length - 1}`,
      'INDEX_OUT_OF_RANGE',
      { index, length, operation }
    );
    this.name = 'IndexOutOfRangeError';
  }
}

/**
 * Error thrown when a slice is requested with a zero step
 */
export class InvalidSliceStepError extends CircularArrayError {
  constructor(public readonly step: number) {
    super(`Slice step must be a non-zero integer, got ${step}`, 'INVALID_SLICE_STEP', { step });
    this.name = 'InvalidSliceStepError';
  }
}

/**
 * Error thrown when an extended slice is assigned a sequence of a different size
 */
export class SliceAssignmentError extends CircularArrayError {
  constructor(
    public readonly expected: number,
    public readonly received: number
  ) {
    super(
      `Attempt to assign sequence of size ${received} to extended slice of size ${expected}`,
      'SLICE_LENGTH_MISMATCH',
      { expected, received }
    );
    this.name = 'SliceAssignmentError';
  }
}

/**
 * Error thrown when a vacant slot is found inside the logical window
 */
export class CorruptStorageError extends CircularArrayError {
  constructor(public readonly physicalIndex: number) {
    super(`Vacant slot ${physicalIndex} found inside the occupied window`, 'CORRUPT_STORAGE', {
      physicalIndex,
    });
    this.name = 'CorruptStorageError';
  }
}
