/**
 * Pipeable functions
 *
 * A pipeable can be called directly with all of its arguments, or partially
 * applied through one of two explicit builders:
 *
 * - `partial(...head)` fixes leading arguments and waits for the rest
 * - `with(...tail)` fixes every argument but the first, which is the shape a
 *   pipeline stage needs: `map.with(double)` waits for the container
 *
 * ```ts
 * const add3 = makePipeable((a: number, b: number, c: number) => a + b + c);
 * add3(1, 2, 3);            // 6
 * add3.partial(1)(2, 3);    // 6
 * add3.partial(1).partial(2)(3); // 6
 * add3.with(2, 3)(1);       // 6
 * ```
 */

// ---------- Tuple helpers ----------

/**
 * Every leading slice of a parameter list, the empty one included
 */
export type Prefix<A extends unknown[]> = A extends [infer H, ...infer T extends unknown[]]
  ? [] | [H, ...Prefix<T>]
  : [];

/**
 * Parameters left once `P` has been supplied
 */
export type Drop<A extends unknown[], P extends unknown[]> = P extends [unknown, ...infer PT extends unknown[]]
  ? A extends [unknown, ...infer AT extends unknown[]]
    ? Drop<AT, PT>
    : []
  : A;

export type Head<A extends unknown[]> = A extends [infer H, ...unknown[]] ? H : never;

export type Tail<A extends unknown[]> = A extends [unknown, ...infer T extends unknown[]] ? T : [];

// ---------- Pipeable ----------

export interface Pipeable<A extends unknown[], R> {
  (...args: A): R;
  partial<P extends Prefix<A>>(...head: P): Pipeable<Drop<A, P>, R>;
  with(...tail: Tail<A>): (first: Head<A>) => R;
}

/**
 * Make any fixed-arity function pipeable. Nothing runs until the full
 * argument list has been supplied.
 */
export const makePipeable = <A extends unknown[], R>(fn: (...args: A) => R): Pipeable<A, R> => {
  const invoke = (args: unknown[]): R => fn(...(args as A));

  return Object.assign((...args: A): R => fn(...args), {
    partial: <P extends Prefix<A>>(...head: P): Pipeable<Drop<A, P>, R> =>
      makePipeable((...rest: Drop<A, P>) => invoke([...head, ...rest])),
    with: (...tail: Tail<A>) => (first: Head<A>): R => invoke([first, ...tail])
  });
};

/**
 * Attach a hand-typed pipeline builder to a generic operation.
 * Generic operations lose their type parameters when passed through
 * `makePipeable`, so the collection helpers spell out their own `with`.
 */
export const pipeable = <D extends (...args: never[]) => unknown, B>(
  direct: D,
  builder: B
): D & { readonly with: B } => Object.assign(direct, { with: builder });

/**
 * Curries a function with every argument but the first
 *
 * ```ts
 * curryAll(Math.max)(5, 9)(7); // 9
 * ```
 */
export const curryAll = <F, T extends unknown[], R>(fn: (first: F, ...tail: T) => R) =>
  (...tail: T) => (first: F): R => fn(first, ...tail);
