/**
 * Element comparison used by `CircularArray.equals`
 */

/**
 * An element that defines its own value equality
 */
export interface Equatable {
  equals(other: unknown): boolean;
}

export const isEquatable = (value: unknown): value is Equatable =>
  typeof value === 'object' &&
  value !== null &&
  'equals' in value &&
  typeof value.equals === 'function';

/**
 * Identity first (`Object.is`, so `NaN` matches itself), then value equality:
 * the left element's own `equals` when it has one, `===` otherwise.
 */
export function elementsEqual(left: unknown, right: unknown): boolean {
  if (Object.is(left, right)) {
    return true;
  }
  if (isEquatable(left)) {
    return left.equals(right);
  }
  return left === right;
}
