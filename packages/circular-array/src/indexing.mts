/**
 * Index normalisation shared by element access and slicing.
 *
 * Negative positions count back from the rear (`-1` is the last element).
 * Single indices are bounds-checked by the caller; slice bounds are clamped.
 */

import { InvalidSliceStepError } from './errors.mjs';

/**
 * A slice resolved against a concrete length
 */
export interface ResolvedSlice {
  readonly start: number;
  readonly stop: number;
  readonly step: number;
  /** Number of positions the slice selects */
  readonly length: number;
}

/**
 * Resolves a possibly negative index against `length`.
 *
 * @returns the position in `[0, length)`, or `undefined` when out of range or not an integer
 */
export function resolveIndex(index: number, length: number): number | undefined {
  if (!Number.isInteger(index)) {
    return undefined;
  }
  const resolved = index < 0 ? length + index : index;
  return resolved >= 0 && resolved < length ? resolved : undefined;
}

const clampBound = (bound: number, length: number, lower: number, upper: number): number => {
  const value = bound < 0 ? bound + length : bound;
  if (value < lower) {
    return lower;
  }
  return value > upper ? upper : value;
};

/**
 * Resolves `start:stop:step` against `length`, clamping out-of-range bounds.
 * Omitted bounds default to the whole sequence in the direction of `step`.
 *
 * @throws {InvalidSliceStepError} when `step` is zero
 */
export function resolveSlice(length: number, start?: number, stop?: number, step?: number): ResolvedSlice {
  const stride = step === undefined ? 1 : Math.trunc(step);
  if (stride === 0 || Number.isNaN(stride)) {
    throw new InvalidSliceStepError(step ?? 0);
  }

  // a negative stride walks from upper down to lower, where -1 means "before the front"
  const lower = stride > 0 ? 0 : -1;
  const upper = stride > 0 ? length : length - 1;

  const from =
    start === undefined ? (stride > 0 ? lower : upper) : clampBound(Math.trunc(start), length, lower, upper);
  const to =
    stop === undefined ? (stride > 0 ? upper : lower) : clampBound(Math.trunc(stop), length, lower, upper);

  let count = 0;
  if (stride > 0 && from < to) {
    count = Math.floor((to - from - 1) / stride) + 1;
  } else if (stride < 0 && to < from) {
    count = Math.floor((from - to - 1) / -stride) + 1;
  }

  return { start: from, stop: to, step: stride, length: count };
}

/**
 * Lists the positions a resolved slice selects, in slice order
 */
export function sliceIndices(slice: ResolvedSlice): number[] {
  return Array.from({ length: slice.length }, (_, k) => slice.start + k * slice.step);
}
