/**
 * Capacity policy: doubling growth on overflow, explicit compaction
 *
 * Every reallocation goes through `RingStorage.relayout`, which builds the new
 * slot array completely before swapping it in.
 */

import { getDiagnosticsLogger } from './diagnostics.mjs';

import type { RingStorage } from './storage.mjs';

/** Smallest capacity any buffer is given */
export const MIN_CAPACITY = 2;

/** Free slots kept around the elements on construction and compaction */
export const COMPACT_SLACK = 2;

/**
 * Capacity after one growth step
 */
export const grownCapacity = (capacity: number): number => Math.max(MIN_CAPACITY, 2 * capacity);

/**
 * Capacity used for `count` elements on construction and compaction
 */
export const fittedCapacity = (count: number): number => Math.max(MIN_CAPACITY, count + COMPACT_SLACK);

const relayout = <T,>(
  storage: RingStorage<T>,
  capacity: number,
  reason: 'grow' | 'compact' | 'resize'
): void => {
  const from = storage.capacity;
  const count = storage.size;
  storage.relayout(capacity);
  getDiagnosticsLogger().debug(`circular array storage ${reason}`, {
    from,
    to: capacity,
    count,
    copied: count,
  });
};

/**
 * Doubles the storage when no slot is free. O(size) when it grows, O(1) otherwise.
 */
export function ensureRoom<T>(storage: RingStorage<T>): void {
  if (storage.isFull()) {
    relayout(storage, grownCapacity(storage.capacity), 'grow');
  }
}

/**
 * Shrinks (or grows) the storage to `max(fittedCapacity(size), minimumCapacity)`.
 * A buffer already at that capacity and starting at physical 0 is left untouched.
 */
export function compact<T>(storage: RingStorage<T>, minimumCapacity: number = MIN_CAPACITY): void {
  const requested = Number.isFinite(minimumCapacity) ? Math.trunc(minimumCapacity) : MIN_CAPACITY;
  const target = Math.max(fittedCapacity(storage.size), requested);
  if (target === storage.capacity && storage.offset === 0) {
    return;
  }
  relayout(storage, target, target > fittedCapacity(storage.size) ? 'resize' : 'compact');
}
