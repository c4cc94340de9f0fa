import { compose, identity, logPipe, pipe, sequence, tap } from '../composition';
import { configure, resetConfig } from '../config';
import { clearEvents, disableLedger, enableLedger, getEventsByName } from '../ledger';

const inc = (x: number) => x + 1;
const double = (x: number) => x * 2;

describe('Composition Functions', () => {
  describe('pipe', () => {
    it('should apply functions left to right', () => {
      expect(pipe(inc, double)(5)).toBe(double(inc(5)));
      expect(pipe(double, inc)(5)).toBe(inc(double(5)));
    });

    it('should accept a single list of functions', () => {
      const fns = [inc, double, inc];
      expect(pipe(fns)(5)).toBe(13);
      expect(pipe(fns)(5)).toBe(pipe(inc, double, inc)(5));
    });

    it('should change types between stages', () => {
      const describeLength = pipe(
        (s: string) => s.trim(),
        s => s.length,
        n => `length ${n}`
      );
      expect(describeLength('  abc ')).toBe('length 3');
    });

    it('should be the identity with no functions', () => {
      const value = { a: 1 };
      expect(pipe()(value)).toBe(value);
      expect(pipe([])(value)).toBe(value);
    });

    it('should expose compose as the same left-to-right pipeline', () => {
      expect(compose(inc, double)(1)).toBe(4);
    });
  });

  describe('sequence', () => {
    it('should run every function on the same input and return it', () => {
      const seen: number[] = [];
      const record = (offset: number) => (x: number) => {
        seen.push(x + offset);
        return x * 100;
      };

      const run = sequence(record(0), record(1), record(2));
      expect(run(10)).toBe(10);
      expect(seen).toEqual([10, 11, 12]);
    });

    it('should accept a list', () => {
      const calls: string[] = [];
      const run = sequence([(s: string) => calls.push(`a:${s}`), (s: string) => calls.push(`b:${s}`)]);

      expect(run('x')).toBe('x');
      expect(calls).toEqual(['a:x', 'b:x']);
    });
  });

  describe('identity', () => {
    it('should return the same value', () => {
      const value = { test: 'value' };
      expect(identity(value)).toBe(value);
    });
  });

  describe('tap', () => {
    it('should act on the value and return it unchanged', () => {
      const effect = jest.fn();
      const value = [1, 2];

      expect(tap(value, effect)).toBe(value);
      expect(tap.with(effect)(value)).toBe(value);
      expect(effect).toHaveBeenCalledTimes(2);
      expect(effect).toHaveBeenCalledWith(value);
    });
  });

  describe('logPipe', () => {
    afterEach(() => {
      resetConfig();
      disableLedger();
      jest.restoreAllMocks();
    });

    it('should log the message and pass the value through', () => {
      configure({ enableLogging: true, logLevel: 'debug' });
      const consoleSpy = jest.spyOn(console, 'debug').mockImplementation();

      const result = pipe(inc, logPipe('after inc'), double)(1);

      expect(result).toBe(4);
      expect(consoleSpy).toHaveBeenCalledWith('[tabula] after inc');
    });

    it('should stay quiet when logging is disabled', () => {
      configure({ enableLogging: false });
      const consoleSpy = jest.spyOn(console, 'debug').mockImplementation();

      expect(logPipe('hidden')(7)).toBe(7);
      expect(consoleSpy).not.toHaveBeenCalled();
    });

    it('should stay quiet below the configured level', () => {
      configure({ enableLogging: true, logLevel: 'warn' });
      const consoleSpy = jest.spyOn(console, 'debug').mockImplementation();

      logPipe('too chatty')(1);
      expect(consoleSpy).not.toHaveBeenCalled();
    });

    it('should record a ledger event when the ledger is on', () => {
      enableLedger();
      clearEvents();

      logPipe('traced')({ hp: 10 });

      const events = getEventsByName('pipe');
      expect(events).toHaveLength(1);
      expect(events[0]?.data).toEqual({ message: 'traced', value: { hp: 10 } });
    });
  });
});
