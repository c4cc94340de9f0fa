/**
 * String formatting helpers
 */

import * as O from 'fp-ts/Option';

const FILE_NAME = /^.+\/(.+)$/s;

/**
 * File name (with extension) from a path using either slash style.
 * Everything after the last slash that still leaves a name, so
 * `a/b/` gives `b/`.
 */
export const getFileName = (path: string): O.Option<string> => {
  const found = FILE_NAME.exec(path.replace(/\\/g, '/'));
  return O.fromNullable(found?.[1]);
};

// ---------- Trimming ----------

/**
 * Strip leading whitespace
 */
export const triml = (s: string): string => s.replace(/^\s+/, '');

/**
 * Strip trailing whitespace
 */
export const trimr = (s: string): string => s.replace(/\s+$/, '');

export const trim = (s: string): string => trimr(triml(s));

// ---------- Quoting & joining ----------

export const enclose = (s: string, open: string, close: string = open): string => `${open}${s}${close}`;

export const encloseSingleQuote = (s: string): string => enclose(s, "'");

export const encloseDoubleQuote = (s: string): string => enclose(s, '"');

/**
 * Reducer that joins strings with `separator`, for use with `reduce(items, '', ...)`
 */
export const joinWith = (separator: string) => (accumulator: string, s: string): string =>
  accumulator === '' ? s : `${accumulator}${separator}${s}`;

export const reduceComma = joinWith(',');

export const reduceCommaPretty = joinWith(', ');

/**
 * `0.256` becomes `"25.60%"`
 */
export const floatToPercentStr = (x: number): string => `${(x * 100).toFixed(2)}%`;

export const intToHexLower = (n: number): string => Math.trunc(n).toString(16);

export const intToHexUpper = (n: number): string => intToHexLower(n).toUpperCase();

/**
 * Six-digit upper-case hex, as colors are written
 */
export const printColor = (color: number): string => intToHexUpper(color).padStart(6, '0');

/**
 * Integer padded with zeros to at least `digits` digits; the sign is kept in front
 */
export const padZeros = (x: number, digits: number = 0): string => {
  const n = Math.trunc(x);
  const padded = Math.abs(n).toString().padStart(digits, '0');
  return n < 0 ? `-${padded}` : padded;
};

/**
 * Prefixer: `appendStr('HP: ')(10)` is `"HP: 10"`
 */
export const appendStr = (prefix: string) => (value: unknown): string => `${prefix}${String(value)}`;
