/**
 * Deep copy and the two merge policies
 *
 * - `assign` is an allow-list merge: only keys the target already has change
 * - `joinTables` is a full union that resolves clashes with a callback
 */

import { isPlainObject } from 'lodash';
import { pipe } from './composition';
import { Mapping, Transform } from './types';

type Composite = object;

const isComposite = (value: unknown): value is Composite =>
  typeof value === 'object' && value !== null;

const isPresent = (value: unknown): boolean => value !== undefined && value !== null;

// Dates, maps, sets and class instances are replaced whole by `assign`
const isMergeable = (value: unknown): value is Composite =>
  Array.isArray(value) || isPlainObject(value);

// ---------- Deep copy ----------

const copyValue = (value: unknown, seen: WeakMap<Composite, unknown>): unknown => {
  if (!isComposite(value)) return value;

  const cached = seen.get(value);
  if (cached !== undefined) return cached;

  if (value instanceof Date) {
    const copy = new Date(value.getTime());
    seen.set(value, copy);
    return copy;
  }

  if (value instanceof RegExp) {
    const copy = new RegExp(value.source, value.flags);
    copy.lastIndex = value.lastIndex;
    seen.set(value, copy);
    return copy;
  }

  if (value instanceof Map) {
    const copy = new Map<unknown, unknown>();
    seen.set(value, copy);
    for (const [key, entry] of value) {
      copy.set(copyValue(key, seen), copyValue(entry, seen));
    }
    return copy;
  }

  if (value instanceof Set) {
    const copy = new Set<unknown>();
    seen.set(value, copy);
    for (const entry of value) {
      copy.add(copyValue(entry, seen));
    }
    return copy;
  }

  if (Array.isArray(value)) {
    const copy: unknown[] = [];
    seen.set(value, copy);
    for (const entry of value) {
      copy.push(copyValue(entry, seen));
    }
    return copy;
  }

  // Plain objects and class instances: own enumerable keys, prototype kept
  const copy: Composite = isPlainObject(value) ? {} : Object.create(Object.getPrototypeOf(value));
  seen.set(value, copy);
  for (const key of Object.keys(value)) {
    Reflect.set(copy, key, copyValue(Reflect.get(value, key), seen));
  }
  return copy;
};

/**
 * Recursively clone a value. Scalars and functions come back as they are.
 * Shared and cyclic references are cloned once, so the copy has the same
 * shape as the original, cycles included.
 */
export function deepCopy<T>(value: T): T;
export function deepCopy(value: unknown): unknown {
  return copyValue(value, new WeakMap());
}

// ---------- Merges ----------

/**
 * Overwrite fields of `target` with the non-nullish fields of `source`.
 * Nested arrays and plain objects are merged field by field rather than
 * replaced; any other object is a leaf. Keys missing from `target` are never
 * added. Mutates and returns `target`.
 *
 * ```ts
 * assign({ a: 1, b: 2 }, { a: 5, c: 9 }); // { a: 5, b: 2 }
 * ```
 */
export const assign = <T extends object>(target: T, source: object): T => {
  for (const key of Object.keys(target)) {
    const incoming: unknown = Reflect.get(source, key);
    if (!isPresent(incoming)) continue;

    const current: unknown = Reflect.get(target, key);
    if (isMergeable(current) && isMergeable(incoming)) {
      assign(current, incoming);
    } else {
      Reflect.set(target, key, incoming);
    }
  }
  return target;
};

/**
 * Union of two mappings. Keys found in both are resolved by `onExistingKey`.
 *
 * ```ts
 * joinTables({ a: 1, b: 3 }, { a: 3, c: 4 }, (x, y) => (x + y) / 2); // { a: 2, b: 3, c: 4 }
 * ```
 */
export const joinTables = <V>(
  first: Mapping<V>,
  second: Mapping<V>,
  onExistingKey: (existing: V, incoming: V, key: string) => V
): Record<string, V> => {
  const result: Record<string, V> = deepCopy({ ...first });
  for (const [key, incoming] of Object.entries(second)) {
    const existing = result[key];
    result[key] = Object.hasOwn(result, key) && existing !== undefined
      ? onExistingKey(existing, incoming, key)
      : incoming;
  }
  return result;
};

// ---------- Copy, transform, merge back ----------

/**
 * Run `transforms` over a private deep copy of `record`, then `assign` the
 * result back onto `record`. Fields merge by the shape of `record`, and the
 * original reference is returned.
 */
export const processRecord = <T extends object>(record: T, transforms: ReadonlyArray<Transform<T>>): T => {
  const processed = pipe(transforms)(deepCopy(record));
  return assign(record, processed);
};

export const processTable = processRecord;
