/**
 * Helpers that work on either container shape
 */

import { compact, isPlainObject } from 'lodash';
import { pipe } from './composition';
import { Container, Nested, Sequence } from './types';

/**
 * Slice counts are whole and never negative
 */
export const clampCount = (n: number): number => Math.max(0, Math.floor(n));

/**
 * Arrays and plain objects count as containers; everything else is a leaf
 */
export const isContainer = (value: unknown): value is Container<unknown> =>
  Array.isArray(value) || isPlainObject(value);

export const isSequence = <V>(container: Container<V>): container is Sequence<V> => Array.isArray(container);

/**
 * Values of either container shape, in iteration order
 */
export const entriesOf = <V>(container: Container<V>): V[] =>
  isSequence(container) ? [...container] : Object.values(container);

const flattenInto = (container: Container<unknown>, all: unknown[]): unknown[] => {
  for (const value of entriesOf(container)) {
    if (isContainer(value)) {
      flattenInto(value, all);
    } else {
      all.push(value);
    }
  }
  return all;
};

/**
 * Concatenate nested containers into one flat sequence, at any depth
 *
 * ```ts
 * flatten([1, [2, [3, { a: 4 }]]]); // [1, 2, 3, 4]
 * ```
 */
export function flatten<T>(container: Nested<T>): T[];
export function flatten(container: Container<unknown>): unknown[] {
  return flattenInto(container, []);
}

/**
 * Truthy values of a container, re-indexed in iteration order.
 *
 * This is lossy: `0`, `false` and `''` are dropped along with `null` and
 * `undefined`. Filter with a predicate when those are real data.
 */
export const dropNils = <V>(container: Container<V>): V[] => compact(entriesOf(container));

/**
 * Build a table from numbers in two steps: `indexGen` decides the keys,
 * `valGen` the values
 *
 * ```ts
 * tableFromNumbers([1, 2], seq.buildKeys.with((i: number, _: number) => `slot${i}`), dict.map.with(double));
 * // { slot0: 2, slot1: 4 }
 * ```
 */
export const tableFromNumbers = <A, B, C>(numbers: A, indexGen: (numbers: A) => B, valGen: (indexed: B) => C): C =>
  pipe(indexGen, valGen)(numbers);
