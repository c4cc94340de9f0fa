/**
 * Ordered-sequence operations
 *
 * Every function receives `(value, index)` and returns a new array. Each
 * operation also carries a `with` builder for pipelines:
 *
 * ```ts
 * pipe(seq.map.with(double), seq.filter.with(isEven), seq.reduce.with(0, add))
 * ```
 *
 * Use this family whenever order matters; the mapping family follows object
 * key order, which puts integer-like keys first.
 */

import * as O from 'fp-ts/Option';
import { pipeable } from './pipeable';
import { clampCount } from './tables';
import { AnyResult, Mapper, Predicate, Reducer, Sequence } from './types';

// ---------- Transforms ----------

const mapItems = <A, B>(items: Sequence<A>, fn: Mapper<A, B, number>): B[] =>
  items.map((value, index) => fn(value, index));

/**
 * Apply `fn` to every item. The result has the same length as the input.
 */
export const map = pipeable(
  mapItems,
  <A, B>(fn: Mapper<A, B, number>) => (items: Sequence<A>): B[] => mapItems(items, fn)
);

const filterItems = <A>(items: Sequence<A>, fn: Predicate<A, number>): A[] =>
  items.filter((value, index) => fn(value, index));

/**
 * Keep the items `fn` accepts, in their original order
 */
export const filter = pipeable(
  filterItems,
  <A>(fn: Predicate<A, number>) => (items: Sequence<A>): A[] => filterItems(items, fn)
);

const rejectItems = <A>(items: Sequence<A>, fn: Predicate<A, number>): A[] =>
  filterItems(items, (value, index) => !fn(value, index));

/**
 * Drop the items `fn` accepts
 */
export const reject = pipeable(
  rejectItems,
  <A>(fn: Predicate<A, number>) => (items: Sequence<A>): A[] => rejectItems(items, fn)
);

const firstInItems = <A>(items: Sequence<A>, fn: Predicate<A, number>): O.Option<A> => {
  for (const [index, value] of items.entries()) {
    if (fn(value, index)) return O.some(value);
  }
  return O.none;
};

/**
 * First item `fn` accepts. Stops at the first match.
 */
export const firstIn = pipeable(
  firstInItems,
  <A>(fn: Predicate<A, number>) => (items: Sequence<A>): O.Option<A> => firstInItems(items, fn)
);

const reduceItems = <A, V>(items: Sequence<V>, initial: A, fn: Reducer<A, V>): A =>
  items.reduce((accumulator, value) => fn(accumulator, value), initial);

/**
 * Left fold in order
 */
export const reduce = pipeable(
  reduceItems,
  <A, V>(initial: A, fn: Reducer<A, V>) => (items: Sequence<V>): A => reduceItems(items, initial, fn)
);

// ---------- Slicing ----------

const takeItems = <A>(items: Sequence<A>, n: number): A[] => items.slice(0, clampCount(n));

/**
 * First `n` items
 */
export const take = pipeable(
  takeItems,
  (n: number) => <A>(items: Sequence<A>): A[] => takeItems(items, n)
);

const skipItems = <A>(items: Sequence<A>, n: number): A[] => items.slice(clampCount(n));

/**
 * Everything after the first `n` items
 */
export const skip = pipeable(
  skipItems,
  (n: number) => <A>(items: Sequence<A>): A[] => skipItems(items, n)
);

// ---------- Queries & effects ----------

const anyItems = <A>(items: Sequence<A>, fn: Predicate<A, number>): AnyResult<A, number> => {
  for (const [index, value] of items.entries()) {
    if (fn(value, index)) return { found: true, value, key: index };
  }
  return { found: false };
};

/**
 * Whether any item satisfies `fn`, with the first such item and its index
 */
export const any = pipeable(
  anyItems,
  <A>(fn: Predicate<A, number>) => (items: Sequence<A>): AnyResult<A, number> => anyItems(items, fn)
);

const forEachItem = <A>(items: Sequence<A>, fn: (value: A, index: number) => void): Sequence<A> => {
  items.forEach((value, index) => fn(value, index));
  return items;
};

/**
 * Run `fn` on every item for its side effects. Returns the same array.
 */
export const forEach = pipeable(
  forEachItem,
  <A>(fn: (value: A, index: number) => void) => (items: Sequence<A>): Sequence<A> => forEachItem(items, fn)
);

const buildKeysOf = <A>(items: Sequence<A>, fn: (index: number, value: A) => string): Record<string, A> => {
  const result: Record<string, A> = {};
  items.forEach((value, index) => {
    result[fn(index, value)] = value;
  });
  return result;
};

/**
 * Re-key items into a mapping
 *
 * ```ts
 * buildKeys(['a', 'b'], i => `meter${i + 1}`); // { meter1: 'a', meter2: 'b' }
 * ```
 */
export const buildKeys = pipeable(
  buildKeysOf,
  <A>(fn: (index: number, value: A) => string) => (items: Sequence<A>): Record<string, A> => buildKeysOf(items, fn)
);

// ---------- Construction ----------

/**
 * Inclusive range of numbers. `range(3)` is `[1, 2, 3]`.
 */
export const range = (start: number, end?: number, step: number = 1): number[] => {
  const [from, to]: [number, number] = end === undefined ? [1, start] : [start, end];
  const result: number[] = [];
  if (step === 0) return result;

  for (let i = from; step > 0 ? i <= to : i >= to; i += step) {
    result.push(i);
  }
  return result;
};

export const reverse = <A>(items: Sequence<A>): A[] => [...items].reverse();

const isSequence = <A>(value: A | Sequence<A>): value is Sequence<A> => Array.isArray(value);

/**
 * Wrap a lone value in a sequence; sequences pass through
 */
export const toSequence = <A>(value: A | Sequence<A>): Sequence<A> =>
  isSequence(value) ? value : [value];
