/**
 * Keyed-mapping operations
 *
 * Same vocabulary as the sequence family, with `(value, key)` callbacks and
 * keys preserved in results. `take` and `skip` walk own-key order, so pick the
 * sequence family when position matters.
 */

import * as O from 'fp-ts/Option';
import { pipeable } from './pipeable';
import { clampCount } from './tables';
import { AnyResult, Mapper, Mapping, Predicate, Reducer } from './types';

// ---------- Transforms ----------

const mapEntries = <A, B>(mapping: Mapping<A>, fn: Mapper<A, B, string>): Record<string, B> => {
  const result: Record<string, B> = {};
  for (const [key, value] of Object.entries(mapping)) {
    result[key] = fn(value, key);
  }
  return result;
};

/**
 * Apply `fn` to every value, keeping keys
 */
export const map = pipeable(
  mapEntries,
  <A, B>(fn: Mapper<A, B, string>) => (mapping: Mapping<A>): Record<string, B> => mapEntries(mapping, fn)
);

const filterEntries = <A>(mapping: Mapping<A>, fn: Predicate<A, string>): Record<string, A> => {
  const result: Record<string, A> = {};
  for (const [key, value] of Object.entries(mapping)) {
    if (fn(value, key)) result[key] = value;
  }
  return result;
};

/**
 * Keep the entries `fn` accepts under their original keys
 */
export const filter = pipeable(
  filterEntries,
  <A>(fn: Predicate<A, string>) => (mapping: Mapping<A>): Record<string, A> => filterEntries(mapping, fn)
);

const rejectEntries = <A>(mapping: Mapping<A>, fn: Predicate<A, string>): Record<string, A> =>
  filterEntries(mapping, (value, key) => !fn(value, key));

/**
 * Complement of `filter`: together they partition the keys of `mapping`
 */
export const reject = pipeable(
  rejectEntries,
  <A>(fn: Predicate<A, string>) => (mapping: Mapping<A>): Record<string, A> => rejectEntries(mapping, fn)
);

const firstInEntries = <A>(mapping: Mapping<A>, fn: Predicate<A, string>): O.Option<A> => {
  for (const [key, value] of Object.entries(mapping)) {
    if (fn(value, key)) return O.some(value);
  }
  return O.none;
};

export const firstIn = pipeable(
  firstInEntries,
  <A>(fn: Predicate<A, string>) => (mapping: Mapping<A>): O.Option<A> => firstInEntries(mapping, fn)
);

const reduceEntries = <A, V>(mapping: Mapping<V>, initial: A, fn: Reducer<A, V>): A =>
  Object.values(mapping).reduce((accumulator, value) => fn(accumulator, value), initial);

export const reduce = pipeable(
  reduceEntries,
  <A, V>(initial: A, fn: Reducer<A, V>) => (mapping: Mapping<V>): A => reduceEntries(mapping, initial, fn)
);

// ---------- Slicing ----------

const takeEntries = <A>(mapping: Mapping<A>, n: number): Record<string, A> => {
  const result: Record<string, A> = {};
  const count = clampCount(n);
  let taken = 0;
  for (const [key, value] of Object.entries(mapping)) {
    if (taken >= count) break;
    result[key] = value;
    taken++;
  }
  return result;
};

/**
 * First `n` entries in key order, keys kept
 */
export const take = pipeable(
  takeEntries,
  (n: number) => <A>(mapping: Mapping<A>): Record<string, A> => takeEntries(mapping, n)
);

const skipEntries = <A>(mapping: Mapping<A>, n: number): Record<string, A> => {
  const result: Record<string, A> = {};
  const count = clampCount(n);
  let seen = 0;
  for (const [key, value] of Object.entries(mapping)) {
    if (seen >= count) result[key] = value;
    seen++;
  }
  return result;
};

/**
 * Entries after the first `n`, keys kept
 */
export const skip = pipeable(
  skipEntries,
  (n: number) => <A>(mapping: Mapping<A>): Record<string, A> => skipEntries(mapping, n)
);

// ---------- Queries & effects ----------

const anyEntry = <A>(mapping: Mapping<A>, fn: Predicate<A, string>): AnyResult<A, string> => {
  for (const [key, value] of Object.entries(mapping)) {
    if (fn(value, key)) return { found: true, value, key };
  }
  return { found: false };
};

export const any = pipeable(
  anyEntry,
  <A>(fn: Predicate<A, string>) => (mapping: Mapping<A>): AnyResult<A, string> => anyEntry(mapping, fn)
);

const forEachEntry = <A>(mapping: Mapping<A>, fn: (value: A, key: string) => void): Mapping<A> => {
  for (const [key, value] of Object.entries(mapping)) {
    fn(value, key);
  }
  return mapping;
};

/**
 * Side effects only; returns `mapping` itself
 */
export const forEach = pipeable(
  forEachEntry,
  <A>(fn: (value: A, key: string) => void) => (mapping: Mapping<A>): Mapping<A> => forEachEntry(mapping, fn)
);

const buildKeysOf = <A>(mapping: Mapping<A>, fn: (key: string, value: A) => string): Record<string, A> => {
  const result: Record<string, A> = {};
  for (const [key, value] of Object.entries(mapping)) {
    result[fn(key, value)] = value;
  }
  return result;
};

/**
 * Rename keys with `fn`; later entries win on collisions
 */
export const buildKeys = pipeable(
  buildKeysOf,
  <A>(fn: (key: string, value: A) => string) => (mapping: Mapping<A>): Record<string, A> => buildKeysOf(mapping, fn)
);

// ---------- Inspection ----------

export const keys = <A>(mapping: Mapping<A>): string[] => Object.keys(mapping);

export const values = <A>(mapping: Mapping<A>): A[] => Object.values(mapping);

/**
 * Number of entries
 */
export const size = <A>(mapping: Mapping<A>): number => Object.keys(mapping).length;

export const isEmpty = <A>(mapping: Mapping<A>): boolean => size(mapping) === 0;

/**
 * Value of the first entry. Handy for reducing `{ key: value }` singletons.
 */
export const extractValue = <A>(mapping: Mapping<A>): O.Option<A> =>
  firstInEntries(mapping, () => true);
