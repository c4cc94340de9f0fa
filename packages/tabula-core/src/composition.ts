/**
 * Composition Operators
 * Left-to-right pipelines over plain synchronous functions
 */

import { logEvent } from './ledger';
import { logger } from './logger';
import { pipeable } from './pipeable';
import { Transform } from './types';

type Unary = (value: unknown) => unknown;

const isUnary = (value: unknown): value is Unary => typeof value === 'function';

/**
 * `pipe(f, g)` and `pipe([f, g])` mean the same thing
 */
const toFunctionList = (args: readonly unknown[]): Unary[] => {
  const [first] = args;
  const list: readonly unknown[] = args.length === 1 && Array.isArray(first) ? first : args;
  return list.filter(isUnary);
};

/**
 * Identity morphism
 */
export const identity = <A>(a: A): A => a;

/**
 * Compose functions left to right: `pipe(f, g)(x) === g(f(x))`.
 * Accepts the functions as arguments or as one list.
 */
export function pipe<A>(fns: ReadonlyArray<Transform<A>>): Transform<A>;
export function pipe<A>(): Transform<A>;
export function pipe<A, B>(ab: (a: A) => B): (a: A) => B;
export function pipe<A, B, C>(ab: (a: A) => B, bc: (b: B) => C): (a: A) => C;
export function pipe<A, B, C, D>(ab: (a: A) => B, bc: (b: B) => C, cd: (c: C) => D): (a: A) => D;
export function pipe<A, B, C, D, E>(
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E
): (a: A) => E;
export function pipe<A, B, C, D, E, F>(
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E,
  ef: (e: E) => F
): (a: A) => F;
export function pipe<A, B, C, D, E, F, G>(
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E,
  ef: (e: E) => F,
  fg: (f: F) => G
): (a: A) => G;
export function pipe<A>(...fns: Array<Transform<A>>): Transform<A>;
export function pipe(...args: unknown[]): unknown {
  const fns = toFunctionList(args);
  return (value: unknown) => fns.reduce((accumulator, fn) => fn(accumulator), value);
}

/**
 * Same as `pipe`; reads left to right as well
 */
export const compose = pipe;

/**
 * Run every function on the same input for its effects and return the input.
 * Unlike `pipe`, outputs are discarded.
 */
export function sequence<A>(fns: ReadonlyArray<(value: A) => unknown>): Transform<A>;
export function sequence<A>(...fns: Array<(value: A) => unknown>): Transform<A>;
export function sequence(...args: unknown[]): unknown {
  const fns = toFunctionList(args);
  return (value: unknown) => {
    for (const fn of fns) fn(value);
    return value;
  };
}

/**
 * Pipeline stage that logs `message` at debug level and passes its input through
 */
export const logPipe = (message: string) => <A>(value: A): A => {
  logger.debug(message);
  logEvent('pipe', { message, value });
  return value;
};

const tapValue = <A>(value: A, fn: (value: A) => void): A => {
  fn(value);
  return value;
};

/**
 * Act on a whole value and return it unchanged
 */
export const tap = pipeable(
  tapValue,
  <A>(fn: (value: A) => void) => (value: A): A => tapValue(value, fn)
);
