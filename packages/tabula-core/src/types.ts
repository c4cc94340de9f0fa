/**
 * Tabula - Type System
 * Two container shapes and the functions that flow through them
 */

// ---------- Containers ----------

/**
 * Ordered list. Positions are 0-based and insertion order is kept.
 */
export type Sequence<T> = readonly T[];

/**
 * Key-value association with unique string keys
 */
export type Mapping<V> = Readonly<Record<string, V>>;

/**
 * Either container shape
 */
export type Container<V> = Sequence<V> | Mapping<V>;

/**
 * Arbitrarily nested containers with leaves of type T
 */
export type Nested<T> = ReadonlyArray<T | Nested<T>> | { readonly [key: string]: T | Nested<T> };

// ---------- Functions ----------

/**
 * Per-entry transform. `K` is `number` for sequences and `string` for mappings.
 */
export type Mapper<V, R, K> = (value: V, key: K) => R;

/**
 * Per-entry test
 */
export type Predicate<V, K> = (value: V, key: K) => boolean;

/**
 * Left fold step
 */
export type Reducer<A, V> = (accumulator: A, value: V) => A;

/**
 * Same-type transform, the unit of a pipeline
 */
export type Transform<T> = (value: T) => T;

// ---------- Results ----------

/**
 * Outcome of `any`: the matching value and its key, or nothing
 */
export type AnyResult<V, K> =
  | { readonly found: true; readonly value: V; readonly key: K }
  | { readonly found: false };

// ---------- Configuration & Event Types ----------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface TabulaConfig {
  readonly enableLogging?: boolean;
  readonly logLevel?: LogLevel;
  readonly floatPrecision?: number;
  readonly maxEvents?: number;
}

export interface Event {
  readonly id: string;
  readonly name: string;
  readonly timestamp: Date;
  readonly data?: unknown;
}
