import * as E from 'fp-ts/Either';
import * as O from 'fp-ts/Option';
import { attempt, safe } from '../safe-functions';

const parsePositive = (raw: string): number => {
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`not a positive number: ${raw}`);
  }
  return value;
};

describe('Safe Functions', () => {
  describe('safe', () => {
    const safeParse = safe(parsePositive);

    it('should wrap results in Right', () => {
      expect(safeParse('4')).toEqual(E.right(4));
    });

    it('should capture thrown errors in Left', () => {
      const result = safeParse('-1');

      expect(E.isLeft(result)).toBe(true);
      if (E.isLeft(result)) {
        expect(result.left.message).toBe('not a positive number: -1');
      }
    });

    it('should turn non-Error throws into errors', () => {
      const result = safe(() => {
        throw 'boom';
      })();

      expect(E.isLeft(result) && result.left.message).toBe('boom');
    });

    it('should apply the error mapper', () => {
      const mapped = safe(parsePositive, () => new Error('bad input'))('x');
      expect(E.isLeft(mapped) && mapped.left.message).toBe('bad input');
    });
  });

  describe('attempt', () => {
    it('should return some on success and none on failure', () => {
      const tryParse = attempt(parsePositive);

      expect(tryParse('2.5')).toEqual(O.some(2.5));
      expect(tryParse('zero')).toEqual(O.none);
    });
  });
});
