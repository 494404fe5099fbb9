/**
 * @module slot
 * @description Tagged storage cells for the ring buffer. A cell is either
 * Occupied (holding a user element, which may itself be `null` or `undefined`)
 * or Vacant, so emptiness is never encoded with an in-domain value.
 */

/**
 * A single storage cell.
 *
 * @template T - The element type
 */
export type Slot<T> = Occupied<T> | Vacant;

/**
 * A cell holding a live element.
 */
export interface Occupied<T> {
  readonly _tag: 'Occupied';
  readonly value: T;
}

/**
 * A cell outside the logical window.
 */
export interface Vacant {
  readonly _tag: 'Vacant';
}

/**
 * The one Vacant cell, shared by every buffer.
 */
export const VACANT: Vacant = Object.freeze({ _tag: 'Vacant' });

export const occupied = <T,>(value: T): Slot<T> => ({
  _tag: 'Occupied',
  value,
});

/**
 * Type guard to check if a cell holds an element.
 */
export const isOccupied = <T,>(slot: Slot<T>): slot is Occupied<T> =>
  slot._tag === 'Occupied';

/**
 * Allocates `capacity` vacant cells.
 */
export const vacantSlots = <T,>(capacity: number): Slot<T>[] =>
  new Array<Slot<T>>(capacity).fill(VACANT);
