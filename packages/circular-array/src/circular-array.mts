/**
 * Auto-resizing circular array
 *
 * A double-ended sequence over contiguous storage with wraparound:
 * - O(1) pops at either end, O(1) amortized pushes at either end
 * - O(1) indexing with negative positions, full slicing
 * - storage doubles when full and is only shrunk on request
 * - iterators work on a snapshot, so the array may be mutated while they run
 * - equality compares identity before value
 */

import { inspect } from 'node:util';

import { compact, ensureRoom, fittedCapacity, MIN_CAPACITY } from './capacity.mjs';
import { elementsEqual } from './equality.mjs';
import { EmptyContainerError, IndexOutOfRangeError, SliceAssignmentError } from './errors.mjs';
import { formatDisplay, formatRepr } from './format.mjs';
import { resolveIndex, resolveSlice, sliceIndices } from './indexing.mjs';
import { RingStorage } from './storage.mjs';

export class CircularArray<T> implements Iterable<T> {
  private readonly storage: RingStorage<T>;

  /**
   * Copies `items` in order. Capacity is the item count plus a small slack,
   * and never below 2.
   */
  constructor(items: Iterable<T> = []) {
    const initial = Array.from(items);
    this.storage = new RingStorage(initial, fittedCapacity(initial.length));
  }

  /**
   * Number of elements
   */
  get length(): number {
    return this.storage.size;
  }

  /**
   * Current storage capacity
   */
  getCapacity(): number {
    return this.storage.capacity;
  }

  /**
   * Ratio of elements to storage capacity
   */
  fractionFilled(): number {
    return this.storage.size / this.storage.capacity;
  }

  /**
   * True when there are no elements. Stands in for truthiness, which objects cannot override.
   */
  isEmpty(): boolean {
    return this.storage.size === 0;
  }

  /**
   * Pushes each item onto the front in argument order, so
   * `pushFront(a, b)` leaves `b` frontmost.
   * O(1) amortized per item
   */
  pushFront(...items: T[]): void {
    for (const item of items) {
      ensureRoom(this.storage);
      this.storage.prepend(item);
    }
  }

  /**
   * Pushes each item onto the rear in argument order.
   * O(1) amortized per item
   */
  pushRear(...items: T[]): void {
    for (const item of items) {
      ensureRoom(this.storage);
      this.storage.append(item);
    }
  }

  /**
   * Removes and returns the front element
   *
   * @throws {EmptyContainerError} when the array is empty
   */
  popFront(): T {
    if (this.storage.size === 0) {
      throw new EmptyContainerError('popFront');
    }
    return this.storage.removeFirst();
  }

  /**
   * Removes and returns the rear element
   *
   * @throws {EmptyContainerError} when the array is empty
   */
  popRear(): T {
    if (this.storage.size === 0) {
      throw new EmptyContainerError('popRear');
    }
    return this.storage.removeLast();
  }

  /**
   * Removes and returns the front element, or `defaultValue` when empty
   */
  popFrontOr<D = T>(defaultValue: D): T | D {
    return this.storage.size === 0 ? defaultValue : this.storage.removeFirst();
  }

  /**
   * Removes and returns the rear element, or `defaultValue` when empty
   */
  popRearOr<D = T>(defaultValue: D): T | D {
    return this.storage.size === 0 ? defaultValue : this.storage.removeLast();
  }

  /**
   * Removes up to `max` elements from the front, returned front-most first
   */
  popFrontMany(max: number): readonly T[] {
    const popped: T[] = [];
    while (popped.length < max && this.storage.size > 0) {
      popped.push(this.storage.removeFirst());
    }
    return popped;
  }

  /**
   * Removes up to `max` elements from the rear, returned rear-most first
   */
  popRearMany(max: number): readonly T[] {
    const popped: T[] = [];
    while (popped.length < max && this.storage.size > 0) {
      popped.push(this.storage.removeLast());
    }
    return popped;
  }

  /**
   * Moves the front element to the rear, `n` times
   */
  rotateLeft(n = 1): void {
    const size = this.storage.size;
    if (size < 2 || n < 1) {
      return;
    }
    for (let i = Math.trunc(n) % size; i > 0; i--) {
      this.storage.append(this.storage.removeFirst());
    }
  }

  /**
   * Moves the rear element to the front, `n` times
   */
  rotateRight(n = 1): void {
    const size = this.storage.size;
    if (size < 2 || n < 1) {
      return;
    }
    for (let i = Math.trunc(n) % size; i > 0; i--) {
      this.storage.prepend(this.storage.removeLast());
    }
  }

  /**
   * Element at `index`; negative indices count from the rear
   *
   * @throws {IndexOutOfRangeError} when `index` is not in `[-length, length)`
   */
  get(index: number): T {
    const position = resolveIndex(index, this.storage.size);
    if (position === undefined) {
      throw new IndexOutOfRangeError(index, this.storage.size, 'get');
    }
    return this.storage.read(position);
  }

  /**
   * Replaces the element at `index`; negative indices count from the rear
   *
   * @throws {IndexOutOfRangeError} when `index` is not in `[-length, length)`
   */
  set(index: number, value: T): void {
    const position = resolveIndex(index, this.storage.size);
    if (position === undefined) {
      throw new IndexOutOfRangeError(index, this.storage.size, 'set');
    }
    this.storage.write(position, value);
  }

  /**
   * Removes the element at `index`, closing the gap
   *
   * @throws {IndexOutOfRangeError} when `index` is not in `[-length, length)`
   */
  delete(index: number): void {
    const position = resolveIndex(index, this.storage.size);
    if (position === undefined) {
      throw new IndexOutOfRangeError(index, this.storage.size, 'delete');
    }
    const remaining = this.storage.toArray();
    remaining.splice(position, 1);
    this.rebuild(remaining);
  }

  /**
   * Copies `start:stop:step` into a new array. Bounds are clamped, never rejected.
   *
   * @throws {InvalidSliceStepError} when `step` is zero
   */
  slice(start?: number, stop?: number, step?: number): CircularArray<T> {
    const resolved = resolveSlice(this.storage.size, start, stop, step);
    return new CircularArray(sliceIndices(resolved).map((position) => this.storage.read(position)));
  }

  /**
   * Removes every element selected by `start:stop:step`
   *
   * @throws {InvalidSliceStepError} when `step` is zero
   */
  deleteSlice(start?: number, stop?: number, step?: number): void {
    const resolved = resolveSlice(this.storage.size, start, stop, step);
    if (resolved.length === 0) {
      return;
    }
    const doomed = new Set(sliceIndices(resolved));
    this.rebuild(this.storage.toArray().filter((_, position) => !doomed.has(position)));
  }

  /**
   * Assigns `values` to `start:stop:step`. With a step of 1 the slice may
   * grow or shrink the array; any other step needs exactly as many values as
   * positions selected.
   *
   * @throws {InvalidSliceStepError} when `step` is zero
   * @throws {SliceAssignmentError} when an extended slice gets a different number of values
   */
  replaceSlice(values: Iterable<T>, start?: number, stop?: number, step?: number): void {
    const incoming = Array.from(values);
    const resolved = resolveSlice(this.storage.size, start, stop, step);
    const current = this.storage.toArray();

    if (resolved.step === 1) {
      const end = Math.max(resolved.start, resolved.stop);
      this.rebuild(current.slice(0, resolved.start).concat(incoming, current.slice(end)));
      return;
    }

    if (incoming.length !== resolved.length) {
      throw new SliceAssignmentError(resolved.length, incoming.length);
    }
    sliceIndices(resolved).forEach((position, k) => {
      this.storage.write(position, incoming[k]);
    });
  }

  /**
   * Empties the array, keeping its capacity
   */
  clear(): void {
    this.storage.clear();
  }

  /**
   * Shrinks storage to the element count plus a small slack
   */
  compact(): void {
    compact(this.storage);
  }

  /**
   * Compacts, then grows storage to at least `minimumCapacity` if needed
   */
  resize(minimumCapacity = MIN_CAPACITY): void {
    compact(this.storage, minimumCapacity);
  }

  /**
   * Elements front to rear, copied when the iterator is created
   */
  [Symbol.iterator](): IterableIterator<T> {
    return this.storage.toArray()[Symbol.iterator]();
  }

  /**
   * Elements rear to front, copied when the iterator is created
   */
  reversed(): IterableIterator<T> {
    return this.storage.toArray().reverse()[Symbol.iterator]();
  }

  toArray(): T[] {
    return this.storage.toArray();
  }

  map<U>(f: (item: T) => U): CircularArray<U> {
    return new CircularArray(this.storage.toArray().map((item) => f(item)));
  }

  /**
   * Left fold from `initial`; `initial` may be any value, `undefined` included
   */
  foldLeft<L>(f: (accumulator: L, item: T) => L, initial: L): L {
    let accumulator = initial;
    for (const item of this.storage.toArray()) {
      accumulator = f(accumulator, item);
    }
    return accumulator;
  }

  /**
   * Right fold from `initial`, visiting the rear first
   */
  foldRight<R>(f: (item: T, accumulator: R) => R, initial: R): R {
    let accumulator = initial;
    for (const item of this.storage.toArray().reverse()) {
      accumulator = f(item, accumulator);
    }
    return accumulator;
  }

  /**
   * Left fold seeded with the front element
   *
   * @throws {EmptyContainerError} when the array is empty
   */
  reduceLeft(f: (accumulator: T, item: T) => T): T {
    if (this.storage.size === 0) {
      throw new EmptyContainerError('reduceLeft');
    }
    const [first, ...rest] = this.storage.toArray();
    return rest.reduce(f, first);
  }

  /**
   * Right fold seeded with the rear element
   *
   * @throws {EmptyContainerError} when the array is empty
   */
  reduceRight(f: (item: T, accumulator: T) => T): T {
    if (this.storage.size === 0) {
      throw new EmptyContainerError('reduceRight');
    }
    const items = this.storage.toArray();
    const last = items[items.length - 1];
    return items
      .slice(0, -1)
      .reduceRight((accumulator, item) => f(item, accumulator), last);
  }

  /**
   * Same length and pairwise equal elements, comparing identity before value
   */
  equals(other: unknown): boolean {
    if (this === other) {
      return true;
    }
    if (!(other instanceof CircularArray)) {
      return false;
    }
    const that: CircularArray<unknown> = other;
    if (this.storage.size !== that.storage.size) {
      return false;
    }
    for (let i = 0; i < this.storage.size; i++) {
      if (!elementsEqual(this.storage.read(i), that.storage.read(i))) {
        return false;
      }
    }
    return true;
  }

  /**
   * Constructor-style form, e.g. `circularArray(1, 'a')`
   */
  toRepr(): string {
    return formatRepr(this.storage.toArray());
  }

  /**
   * Display form, e.g. `(|1, a|)`
   */
  toString(): string {
    return formatDisplay(this.storage.toArray());
  }

  [inspect.custom](): string {
    return this.toRepr();
  }

  private rebuild(items: readonly T[]): void {
    this.storage.reset(items, fittedCapacity(items.length));
  }
}

/**
 * Builds a circular array from its arguments, front to rear
 */
export function circularArray<T>(...items: T[]): CircularArray<T> {
  return new CircularArray(items);
}
