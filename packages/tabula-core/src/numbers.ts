/**
 * Numeric helpers for actor-value scripts: comparisons, clamps,
 * defaults, predicate-gated modifiers and fitted curves
 */

import { z } from 'zod';
import { pipe } from './composition';
import { getConfig } from './config';

// ---------- Comparison ----------

export const equals = <T>(x: T, y: T): boolean => x === y;

export const lessThan = (x: number, y: number): boolean => x < y;

/**
 * Inclusive on both ends
 */
export const inRange = (x: number, lo: number, hi: number): boolean => x >= lo && x <= hi;

/**
 * Equality within `precision`, which defaults to the configured `floatPrecision`
 */
export const floatEquals = (a: number, b: number, precision?: number): boolean => {
  const tolerance = precision ?? getConfig().floatPrecision ?? 0.001;
  return inRange(a, b - tolerance, b + tolerance);
};

/**
 * Host booleans arrive as `0`/`1`
 */
export const fromHostBool = (value: number | null | undefined): boolean => value === 1;

// ---------- Clamps ----------

export const forceMin = (min: number) => (x: number): number => Math.max(min, x);

export const forceMax = (cap: number) => (x: number): number => Math.min(x, cap);

/**
 * Keep a value inside `[min, max]`
 */
export const forceRange = (min: number, max: number): ((x: number) => number) =>
  pipe(forceMax(max), forceMin(min));

export const forcePositive = forceMin(0);

export const forcePercent = forceRange(0, 1);

// ---------- Defaults ----------

/**
 * Replace `null`/`undefined` with `fallback`
 */
export const defaultVal = <T>(fallback: T) => (x: T | null | undefined): T =>
  x === null || x === undefined ? fallback : x;

export const defaultMult = defaultVal(1);

export const defaultBase = defaultVal(0);

// ---------- Predicate-gated modifiers ----------

/**
 * `callback(x)` when `predicate` holds, otherwise `0`.
 * Meant for values that get added to others; `0` is data here, not absence.
 */
export const boolBase = (callback: (x: number) => number, predicate: boolean) => (x: number): number =>
  predicate ? callback(x) : 0;

/**
 * `callback(x)` when `predicate` holds, otherwise `x` untouched
 */
export const boolMultiplier = (callback: (x: number) => number, predicate: boolean) => (x: number): number =>
  predicate ? callback(x) : x;

export const boolMult = (predicate: boolean, value: number, mult: number): number =>
  predicate ? value * mult : value;

// ---------- Math ----------

/**
 * Nearest integer, halves rounded up
 */
export const round = (n: number): number => Math.floor(n + 0.5);

export const CurvePointSchema = z.object({
  x: z.number(),
  y: z.number()
});

export type CurvePoint = z.infer<typeof CurvePointSchema>;

const CurveSchema = z
  .tuple([CurvePointSchema, CurvePointSchema])
  .refine(([p1, p2]) => p1.x !== p2.x, { message: 'Curve points need distinct x values' });

/**
 * Exponential curve of the given `shape` through two points.
 * Throws a ZodError when the points are malformed.
 *
 * ```ts
 * const f = expCurve(-2.3, { x: 0, y: 3 }, { x: 1, y: 0.5 });
 * f(0); // 3
 * ```
 */
export const expCurve = (shape: number, p1: CurvePoint, p2: CurvePoint): ((x: number) => number) => {
  const [from, to] = CurveSchema.parse([p1, p2]);
  const ebx1 = Math.exp(shape * from.x);
  const a = (to.y - from.y) / (Math.exp(shape * to.x) - ebx1);
  const c = from.y - a * ebx1;
  return (x: number) => a * Math.exp(shape * x) + c;
};

/**
 * Straight line through two points
 *
 * ```ts
 * const f = linCurve({ x: 24, y: 2 }, { x: 96, y: 16 });
 * f(24); // 2
 * f(96); // 16
 * ```
 */
export const linCurve = (p1: CurvePoint, p2: CurvePoint): ((x: number) => number) => {
  const [from, to] = CurveSchema.parse([p1, p2]);
  const slope = (to.y - from.y) / (to.x - from.x);
  return (x: number) => slope * (x - from.x) + from.y;
};
