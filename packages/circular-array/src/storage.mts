/**
 * Ring storage backing the circular array
 *
 * Holds elements in a fixed-size slot array and maps logical positions
 * (0 = front) onto physical slots with modular arithmetic. Capacity never
 * changes here except through `relayout` and `reset`, which replace the slot
 * array in a single swap.
 */

import { CorruptStorageError } from './errors.mjs';
import { isOccupied, occupied, VACANT, vacantSlots } from './slot.mjs';

import type { Slot } from './slot.mjs';

export class RingStorage<T> {
  private slots: Slot<T>[];
  private start = 0;
  private count = 0;

  constructor(items: readonly T[], capacity: number) {
    this.slots = RingStorage.layout(items, capacity);
    this.count = items.length;
  }

  get capacity(): number {
    return this.slots.length;
  }

  get size(): number {
    return this.count;
  }

  /**
   * Physical offset of the logical front element
   */
  get offset(): number {
    return this.start;
  }

  isFull(): boolean {
    return this.count === this.slots.length;
  }

  /**
   * Maps a logical position in `[0, size)` to its physical slot
   */
  physical(index: number): number {
    return (this.start + index) % this.slots.length;
  }

  /**
   * O(1) read of a logical position in `[0, size)`
   */
  read(index: number): T {
    return this.valueAt(this.physical(index));
  }

  /**
   * O(1) overwrite of a logical position in `[0, size)`
   */
  write(index: number, value: T): void {
    this.slots[this.physical(index)] = occupied(value);
  }

  /**
   * Places a value before the front. The caller guarantees a free slot.
   */
  prepend(value: T): void {
    const capacity = this.slots.length;
    this.start = (this.start - 1 + capacity) % capacity;
    this.slots[this.start] = occupied(value);
    this.count++;
  }

  /**
   * Places a value after the rear. The caller guarantees a free slot.
   */
  append(value: T): void {
    this.slots[this.physical(this.count)] = occupied(value);
    this.count++;
  }

  /**
   * Vacates the front slot and returns its element. The caller guarantees size > 0.
   */
  removeFirst(): T {
    const value = this.valueAt(this.start);
    this.slots[this.start] = VACANT;
    this.start = (this.start + 1) % this.slots.length;
    this.count--;
    if (this.count === 0) {
      this.start = 0;
    }
    return value;
  }

  /**
   * Vacates the rear slot and returns its element. The caller guarantees size > 0.
   */
  removeLast(): T {
    const last = this.physical(this.count - 1);
    const value = this.valueAt(last);
    this.slots[last] = VACANT;
    this.count--;
    if (this.count === 0) {
      this.start = 0;
    }
    return value;
  }

  /**
   * Copies the logical window, front to rear
   */
  toArray(): T[] {
    const result = new Array<T>(this.count);
    for (let i = 0; i < this.count; i++) {
      result[i] = this.read(i);
    }
    return result;
  }

  /**
   * Moves the logical window into a new slot array of `capacity` cells,
   * starting at physical 0. `capacity` must be at least `size`.
   */
  relayout(capacity: number): void {
    const slots = RingStorage.layout(this.toArray(), capacity);
    this.slots = slots;
    this.start = 0;
  }

  /**
   * Replaces the whole contents with `items`
   */
  reset(items: readonly T[], capacity: number): void {
    const slots = RingStorage.layout(items, capacity);
    this.slots = slots;
    this.start = 0;
    this.count = items.length;
  }

  /**
   * Vacates every slot, keeping the capacity
   */
  clear(): void {
    this.slots = vacantSlots<T>(this.slots.length);
    this.start = 0;
    this.count = 0;
  }

  private valueAt(physicalIndex: number): T {
    const slot = this.slots[physicalIndex];
    if (slot === undefined || !isOccupied(slot)) {
      throw new CorruptStorageError(physicalIndex);
    }
    return slot.value;
  }

  private static layout<T>(items: readonly T[], capacity: number): Slot<T>[] {
    const slots = vacantSlots<T>(capacity);
    items.forEach((item, i) => {
      slots[i] = occupied(item);
    });
    return slots;
  }
}
