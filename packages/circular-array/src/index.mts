/**
 * Auto-resizing, double-ended circular array with slicing and snapshot iteration
 *
 * @packageDocumentation
 */

export { CircularArray, circularArray } from './circular-array.mjs';
export {
  CircularArrayError,
  CorruptStorageError,
  EmptyContainerError,
  IndexOutOfRangeError,
  InvalidSliceStepError,
  SliceAssignmentError,
} from './errors.mjs';
export { elementsEqual, isEquatable } from './equality.mjs';
export type { Equatable } from './equality.mjs';
export { COMPACT_SLACK, MIN_CAPACITY } from './capacity.mjs';
export { DEFAULT_DIAGNOSTICS_CONFIG, resolveDiagnosticsConfig } from './config.mjs';
export type { DiagnosticsConfig } from './config.mjs';
export { setDiagnosticsLogger } from './diagnostics.mjs';
