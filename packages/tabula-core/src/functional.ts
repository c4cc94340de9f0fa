/**
 * Small function combinators: partial application, decorators,
 * single-shot and null-propagating wrappers, and expression-style branching
 */

import * as O from 'fp-ts/Option';

// ---------- Partial application ----------

/**
 * Fix the first argument of `fn`
 */
export const curry = <H, T extends unknown[], R>(fn: (head: H, ...rest: T) => R, head: H) =>
  (...rest: T): R => fn(head, ...rest);

/**
 * Fix the last argument of `fn`
 */
export const curryLast = <T extends unknown[], L, R>(fn: (...args: [...T, L]) => R, last: L) =>
  (...rest: T): R => fn(...rest, last);

/**
 * Swap the two arguments of a binary function
 */
export const flip = <A, B, R>(fn: (a: A, b: B) => R) => (b: B, a: A): R => fn(a, b);

/**
 * Keep only the first argument, whatever the caller passes
 */
export const unary = <A, R>(fn: (a: A, ...rest: never[]) => R) => (a: A): R => fn(a);

/**
 * K combinator: ignore the argument and return `value`
 */
export const constant = <A>(value: A) => (_ignored?: unknown): A => value;

export const not = <A extends unknown[]>(fn: (...args: A) => boolean) => (...args: A): boolean => !fn(...args);

// ---------- Decorators ----------

/**
 * Decorate `fn`. The wrapper receives the original function plus the call's
 * arguments and decides whether and how to invoke it.
 */
export const wrap = <A extends unknown[], R, W>(
  fn: (...args: A) => R,
  wrapper: (fn: (...args: A) => R, ...args: A) => W
) => (...args: A): W => wrapper(fn, ...args);

/**
 * Single-call guard. Each instance owns its own flag.
 */
export class OnceGuard<A extends unknown[], R> {
  private done = false;

  constructor(private readonly fn: (...args: A) => R) {}

  call(...args: A): O.Option<R> {
    if (this.done) return O.none;
    this.done = true;
    return O.some(this.fn(...args));
  }

  get called(): boolean {
    return this.done;
  }
}

/**
 * Run `fn` on the first call only; later calls return nothing
 *
 * ```ts
 * const greet = once(() => 'hello');
 * greet(); // some('hello')
 * greet(); // none
 * ```
 */
export const once = <A extends unknown[], R>(fn: (...args: A) => R) => {
  const guard = new OnceGuard(fn);
  return (...args: A): O.Option<R> => guard.call(...args);
};

/**
 * Null-propagating wrapper: `null` or `undefined` in, nothing out
 */
export const maybe = <A, B>(fn: (a: A) => B) => (arg: A | null | undefined): O.Option<B> =>
  O.map(fn)(O.fromNullable(arg));

// ---------- Expression-style branching ----------

/**
 * `onValue` for present values, `onNothing` for `null`/`undefined`.
 * Both branches are lazy.
 */
export const alt = <A, B>(onValue: (a: A) => B, onNothing: () => B) => (arg: A | null | undefined): B =>
  arg === null || arg === undefined ? onNothing() : onValue(arg);

/**
 * Pick a branch once from `test`, then forward every call to it
 */
export const branch = <A extends unknown[], R>(
  test: boolean,
  onTrue: (...args: A) => R,
  onFalse: (...args: A) => R
) => (...args: A): R => (test ? onTrue(...args) : onFalse(...args));

/**
 * Eager conditional expression
 */
export const ifThen = <T>(condition: boolean, whenTrue: T, whenFalse: T): T =>
  condition ? whenTrue : whenFalse;

/**
 * Look `value` up in `cases`, falling back to `otherwise`
 *
 * ```ts
 * match('value', { meh: 1, value: 2 }, 0); // 2
 * ```
 */
export const match = <R>(value: string, cases: Readonly<Record<string, R>>, otherwise: R): R => {
  const found = Object.hasOwn(cases, value) ? cases[value] : undefined;
  return found === undefined ? otherwise : found;
};

/**
 * Number names from 1 upward
 *
 * ```ts
 * createEnum(['one', 'two']); // { one: 1, two: 2 }
 * ```
 */
export const createEnum = (names: readonly string[]): Readonly<Record<string, number>> => {
  const result: Record<string, number> = {};
  names.forEach((name, index) => {
    result[name] = index + 1;
  });
  return result;
};
