import { inspect } from 'node:util';

/** Name used by the constructor-style rendering */
export const FACTORY_NAME = 'circularArray';

/**
 * Constructor-style rendering, e.g. `circularArray(1, 'a')`
 */
export const formatRepr = (items: readonly unknown[]): string =>
  `${FACTORY_NAME}(${items.map((item) => inspect(item)).join(', ')})`;

/**
 * Display rendering, e.g. `(|1, a|)`
 */
export const formatDisplay = (items: readonly unknown[]): string =>
  `(|${items.map((item) => String(item)).join(', ')}|)`;
