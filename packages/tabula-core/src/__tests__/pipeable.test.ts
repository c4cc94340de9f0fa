import { makePipeable, pipeable, curryAll } from '../pipeable';
import { pipe } from '../composition';

describe('Pipeable Functions', () => {
  const add3 = (a: number, b: number, c: number) => a + b + c;

  describe('makePipeable', () => {
    it('should behave like the original function when fully applied', () => {
      const piped = makePipeable(add3);
      expect(piped(1, 2, 3)).toBe(6);
    });

    it('should return a function when partially applied with one of three arguments', () => {
      const piped = makePipeable(add3);
      const rest = piped.partial(1);

      expect(typeof rest).toBe('function');
      expect(rest(2, 3)).toBe(add3(1, 2, 3));
    });

    it('should put captured arguments first', () => {
      const describe3 = makePipeable((a: string, b: string, c: string) => `${a}-${b}-${c}`);
      expect(describe3.partial('x', 'y')('z')).toBe('x-y-z');
    });

    it('should not execute until every argument is supplied', () => {
      const spy = jest.fn((a: number, b: number) => a * b);
      const piped = makePipeable(spy);

      const none = piped.partial();
      const one = none.partial(3);
      expect(spy).not.toHaveBeenCalled();

      expect(one(4)).toBe(12);
      expect(spy).toHaveBeenCalledTimes(1);
      expect(spy).toHaveBeenCalledWith(3, 4);
    });

    it('should chain partial applications', () => {
      const piped = makePipeable(add3);
      expect(piped.partial(1).partial(2).partial(3)()).toBe(6);
    });

    it('should capture trailing arguments with `with`', () => {
      const subtract = makePipeable((a: number, b: number) => a - b);
      const minus5 = subtract.with(5);

      expect(minus5(20)).toBe(15);
      expect(subtract.with(50)(30)).toBe(subtract(30, 50));
    });

    it('should build pipeline stages', () => {
      const add = makePipeable((x: number, y: number) => x + y);
      expect(pipe(add.with(20), add.with(50))(30)).toBe(100);
      expect(add(2, 3)).toBe(5);
    });
  });

  describe('pipeable', () => {
    it('should attach a builder that mirrors the direct call', () => {
      const scale = (items: readonly number[], factor: number) => items.map(x => x * factor);
      const scaled = pipeable(scale, (factor: number) => (items: readonly number[]) => scale(items, factor));

      expect(scaled([1, 2], 3)).toEqual([3, 6]);
      expect(scaled.with(3)([1, 2])).toEqual(scaled([1, 2], 3));
    });
  });

  describe('curryAll', () => {
    it('should place the later argument first', () => {
      const join = (a: string, b: string, c: string) => [a, b, c].join('');
      expect(curryAll(join)('b', 'c')('a')).toBe('abc');
    });
  });
});
