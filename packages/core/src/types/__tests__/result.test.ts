import { describe, it, expect } from 'vitest';
import {
  Err,
  Ok,
  collectResults,
  err,
  isErr,
  isOk,
  mapResult,
  ok,
  type Result,
} from '../result.js';

describe('Result Pattern', () => {
  describe('Ok class', () => {
    it('should carry its value', () => {
      const result = new Ok(42);
      expect(result.value).toBe(42);
      expect(result._tag).toBe('Ok');
      expect(result.isOk()).toBe(true);
      expect(result.isErr()).toBe(false);
    });

    it('should map and flatMap', () => {
      expect(ok(10).map((x) => x * 2).value).toBe(20);
      const failed = ok(5).flatMap(() => err('failed'));
      expect(isErr(failed) && failed.error).toBe('failed');
    });

    it('should unwrap to the value', () => {
      expect(ok('actual').unwrap()).toBe('actual');
      expect(ok('actual').unwrapOr('default')).toBe('actual');
    });
  });

  describe('Err class', () => {
    it('should carry its error', () => {
      const result = new Err('failure');
      expect(result.error).toBe('failure');
      expect(result._tag).toBe('Err');
      expect(result.isErr()).toBe(true);
    });

    it('should throw Error instances from unwrap', () => {
      const cause = new Error('boom');
      expect(() => err(cause).unwrap()).toThrow(cause);
      expect(() => err('plain').unwrap()).toThrow('Called unwrap on an Err value: plain');
      expect(err('plain').unwrapOr(3)).toBe(3);
    });
  });

  describe('helpers', () => {
    const parse = (text: string): Result<number, string> =>
      /^\d+$/.test(text) ? ok(Number(text)) : err(`bad: ${text}`);

    it('mapResult transforms only successes', () => {
      const doubled = mapResult(parse('4'), (n) => n * 2);
      expect(isOk(doubled) && doubled.value).toBe(8);
      const failed = mapResult(parse('x'), (n) => n * 2);
      expect(isErr(failed) && failed.error).toBe('bad: x');
    });

    it('collectResults stops at the first error', () => {
      const seen: string[] = [];
      const all = collectResults(['1', '2'], (text) => parse(text));
      expect(isOk(all) && all.value).toEqual([1, 2]);

      const partial = collectResults(['1', 'x', 'y'], (text) => {
        seen.push(text);
        return parse(text);
      });
      expect(isErr(partial) && partial.error).toBe('bad: x');
      expect(seen).toEqual(['1', 'x']);
    });
  });
});
