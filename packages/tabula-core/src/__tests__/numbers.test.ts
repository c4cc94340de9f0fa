import { ZodError } from 'zod';
import {
  boolBase,
  boolMult,
  boolMultiplier,
  defaultBase,
  defaultMult,
  defaultVal,
  equals,
  expCurve,
  floatEquals,
  forceMax,
  forceMin,
  forcePercent,
  forcePositive,
  forceRange,
  fromHostBool,
  inRange,
  lessThan,
  linCurve,
  round
} from '../numbers';
import { configure, resetConfig } from '../config';

describe('Numeric Helpers', () => {
  describe('comparison', () => {
    it('should compare values', () => {
      expect(equals(2, 2)).toBe(true);
      expect(equals('a', 'b')).toBe(false);
      expect(lessThan(1, 2)).toBe(true);
      expect(lessThan(2, 2)).toBe(false);
    });

    it('should include both range ends', () => {
      expect(inRange(0, 0, 1)).toBe(true);
      expect(inRange(1, 0, 1)).toBe(true);
      expect(inRange(1.01, 0, 1)).toBe(false);
    });

    it('should read host booleans', () => {
      expect(fromHostBool(1)).toBe(true);
      expect(fromHostBool(0)).toBe(false);
      expect(fromHostBool(null)).toBe(false);
    });
  });

  describe('floatEquals', () => {
    afterEach(() => {
      resetConfig();
    });

    it('should use the configured precision by default', () => {
      expect(floatEquals(1, 1.0005)).toBe(true);
      expect(floatEquals(1, 1.01)).toBe(false);
    });

    it('should honour an explicit precision', () => {
      expect(floatEquals(1, 1.01, 0.1)).toBe(true);
    });

    it('should follow configuration changes', () => {
      configure({ floatPrecision: 0.1 });
      expect(floatEquals(1, 1.05)).toBe(true);
    });
  });

  describe('clamps', () => {
    it('should enforce bounds', () => {
      expect(forceMin(5)(3)).toBe(5);
      expect(forceMin(5)(7)).toBe(7);
      expect(forceMax(5)(7)).toBe(5);
      expect(forcePositive(-2)).toBe(0);
    });

    it('should keep values inside a range', () => {
      const clamp = forceRange(10, 20);
      expect(clamp(5)).toBe(10);
      expect(clamp(15)).toBe(15);
      expect(clamp(25)).toBe(20);
    });

    it('should clamp percentages to [0, 1]', () => {
      expect(forcePercent(1.5)).toBe(1);
      expect(forcePercent(-0.5)).toBe(0);
      expect(forcePercent(0.3)).toBe(0.3);
    });
  });

  describe('defaults', () => {
    it('should replace only null and undefined', () => {
      expect(defaultVal('x')(null)).toBe('x');
      expect(defaultVal('x')('')).toBe('');
      expect(defaultMult(undefined)).toBe(1);
      expect(defaultBase(null)).toBe(0);
      expect(defaultBase(0)).toBe(0);
      expect(defaultMult(3)).toBe(3);
    });
  });

  describe('predicate-gated modifiers', () => {
    const double = (x: number) => x * 2;

    it('should add nothing when the predicate fails', () => {
      expect(boolBase(double, true)(4)).toBe(8);
      expect(boolBase(double, false)(4)).toBe(0);
    });

    it('should leave the value untouched when the predicate fails', () => {
      expect(boolMultiplier(double, true)(4)).toBe(8);
      expect(boolMultiplier(double, false)(4)).toBe(4);
    });

    it('should multiply conditionally', () => {
      expect(boolMult(true, 3, 2)).toBe(6);
      expect(boolMult(false, 3, 2)).toBe(3);
    });
  });

  describe('round', () => {
    it('should round halves up', () => {
      expect(round(2.5)).toBe(3);
      expect(round(2.49)).toBe(2);
      expect(round(-2.5)).toBe(-2);
    });
  });

  describe('curves', () => {
    it('should pass an exponential curve through both points', () => {
      const f = expCurve(-2.3, { x: 0, y: 3 }, { x: 1, y: 0.5 });
      expect(f(0)).toBeCloseTo(3);
      expect(f(1)).toBeCloseTo(0.5);
      expect(f(0.5)).toBeLessThan(3);
      expect(f(0.5)).toBeGreaterThan(0.5);
    });

    it('should pass a line through both points', () => {
      const f = linCurve({ x: 24, y: 2 }, { x: 96, y: 16 });
      expect(f(24)).toBeCloseTo(2);
      expect(f(96)).toBeCloseTo(16);
      expect(f(60)).toBeCloseTo(9);
    });

    it('should reject points sharing an x value', () => {
      expect(() => linCurve({ x: 1, y: 2 }, { x: 1, y: 3 })).toThrow(ZodError);
      expect(() => expCurve(1, { x: 0, y: 2 }, { x: 0, y: 3 })).toThrow(ZodError);
    });
  });
});
