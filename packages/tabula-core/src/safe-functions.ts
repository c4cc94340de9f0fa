/**
 * Safe Function Builder
 * Turns throwing functions into ones that return Either or Option
 */

import * as E from 'fp-ts/Either';
import * as O from 'fp-ts/Option';

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

/**
 * Create a safe function that wraps a potentially throwing function
 */
export const safe = <A extends unknown[], R>(
  fn: (...args: A) => R,
  errorMapper?: (error: unknown) => Error
): (...args: A) => E.Either<Error, R> => {
  return (...args: A): E.Either<Error, R> => {
    try {
      return E.right(fn(...args));
    } catch (error) {
      return E.left(errorMapper ? errorMapper(error) : toError(error));
    }
  };
};

/**
 * Like `safe`, but a failure is simply nothing
 */
export const attempt = <A extends unknown[], R>(
  fn: (...args: A) => R
): (...args: A) => O.Option<R> => {
  const guarded = safe(fn);
  return (...args: A): O.Option<R> => O.fromEither(guarded(...args));
};
