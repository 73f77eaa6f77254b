import { describe, it, expect } from 'vitest';
import {
  mergeFraction,
  parseStatToken,
  toFraction,
  toInt,
} from '../../../src/services/seasonStats/statNormalizer';
import { MalformedStatError } from '../../../src/errors';

describe('statNormalizer', () => {
  describe('parseStatToken', () => {
    it.each([
      [12, 12],
      [12.9, 12],
      [-3.7, -3],
      ['42', 42],
      [' 42 ', 42],
      ['1,234', 1234],
      ['12.9', 12],
      ['+5', 5],
      ['.5', 0],
      ['1e3', 1000],
    ])('parses %j as %d', (token, expected) => {
      expect(parseStatToken(token)).toBe(expected);
    });

    it('normalizes negative zero', () => {
      expect(Object.is(parseStatToken(-0.4), 0)).toBe(true);
    });

    it.each(['22/31', '3-18', '-3', '', '--', 'abc', '12abc'])('rejects %j', (token) => {
      expect(() => parseStatToken(token)).toThrow(MalformedStatError);
    });

    it.each([Number.NaN, Number.POSITIVE_INFINITY, null, undefined, true, {}])('rejects non-numeric %j', (token) => {
      expect(() => parseStatToken(token)).toThrow(MalformedStatError);
    });

    it('carries the offending token on the error', () => {
      try {
        parseStatToken('2-14');
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(MalformedStatError);
        expect(err).toMatchObject({ token: '2-14', code: 'MALFORMED_STAT', statusCode: 422 });
      }
    });
  });

  describe('toInt', () => {
    it('returns null for absent tokens', () => {
      expect(toInt(null)).toBeNull();
      expect(toInt(undefined)).toBeNull();
    });

    it('returns null instead of throwing for malformed tokens', () => {
      expect(toInt('22/31')).toBeNull();
      expect(toInt('--')).toBeNull();
      expect(toInt('n/a')).toBeNull();
    });

    it('converts well-formed tokens', () => {
      expect(toInt('7')).toBe(7);
      expect(toInt('2,001')).toBe(2001);
    });
  });

  describe('toFraction', () => {
    it('splits on a slash', () => {
      expect(toFraction('22/31')).toEqual([22, 31]);
    });

    it('splits on a dash that follows a digit', () => {
      expect(toFraction('3-18')).toEqual([3, 18]);
    });

    it('treats a bare number as the left side', () => {
      expect(toFraction('7')).toEqual([7, null]);
      expect(toFraction(7)).toEqual([7, null]);
    });

    it('does not read a leading dash as a separator', () => {
      expect(toFraction('-5')).toEqual([null, null]);
    });

    it('keeps the readable half of a damaged composite', () => {
      expect(toFraction('/9')).toEqual([null, 9]);
    });

    it('returns an empty pair for null', () => {
      expect(toFraction(null)).toEqual([null, null]);
    });
  });

  describe('mergeFraction', () => {
    it.each([
      [null, '7/9', '7/9'],
      ['7', '3', '10'],
      ['10/15', '5/8', '15/23'],
      ['10/15', '7', '17/15'],
      [null, null, null],
    ])('mergeFraction(%j, %j) is %j', (existing, incoming, expected) => {
      expect(mergeFraction(existing, incoming)).toBe(expected);
    });

    it('accepts dash-separated input and writes a slash', () => {
      expect(mergeFraction('22-31', '3/4')).toBe('25/35');
    });

    it('ignores unreadable input', () => {
      expect(mergeFraction(undefined, 'abc')).toBeNull();
      expect(mergeFraction('5', 'x/y')).toBe('5');
    });
  });
});
