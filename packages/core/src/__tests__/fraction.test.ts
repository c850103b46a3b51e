/**
 * Tests for symbolic pi fractions
 */

import { describe, it, expect } from 'vitest';
import {
  piFraction,
  ZERO_PI,
  PI,
  isZero,
  equals,
  negate,
  add,
  toRadians,
  format,
  parse,
} from '../fraction';

describe('piFraction', () => {
  it('reduces to lowest terms', () => {
    expect(piFraction(2, 16)).toEqual({ num: 1, den: 8 });
    expect(piFraction(6, 16)).toEqual({ num: 3, den: 8 });
  });

  it('keeps the sign on the numerator', () => {
    expect(piFraction(3, -8)).toEqual({ num: -3, den: 8 });
    expect(piFraction(-1, -2)).toEqual({ num: 1, den: 2 });
  });

  it('defaults to a whole multiple of pi', () => {
    expect(piFraction(2)).toEqual({ num: 2, den: 1 });
  });

  it('normalizes zero', () => {
    expect(piFraction(0, 7)).toEqual(ZERO_PI);
    expect(isZero(piFraction(0, -3))).toBe(true);
  });

  it('rejects zero denominators and fractional parts', () => {
    expect(() => piFraction(1, 0)).toThrow(RangeError);
    expect(() => piFraction(0.5, 2)).toThrow('pi fraction needs integer parts, got 0.5/2');
  });
});

describe('Arithmetic', () => {
  it('compares exactly', () => {
    expect(equals(piFraction(2, 4), piFraction(1, 2))).toBe(true);
    expect(equals(piFraction(1, 4), piFraction(1, 2))).toBe(false);
  });

  it('negates', () => {
    expect(negate(piFraction(1, 2))).toEqual({ num: -1, den: 2 });
    expect(negate(ZERO_PI)).toEqual(ZERO_PI);
  });

  it('adds', () => {
    expect(add(piFraction(1, 4), piFraction(1, 4))).toEqual({ num: 1, den: 2 });
    expect(add(piFraction(1, 8), piFraction(1, 4))).toEqual({ num: 3, den: 8 });
    expect(add(piFraction(1, 2), piFraction(-1, 2))).toEqual(ZERO_PI);
  });

  it('converts to radians', () => {
    expect(toRadians(piFraction(1, 2))).toBeCloseTo(Math.PI / 2, 12);
    expect(toRadians(piFraction(-3, 8))).toBeCloseTo((-3 * Math.PI) / 8, 12);
    expect(toRadians(ZERO_PI)).toBe(0);
  });
});

describe('Formatting and parsing', () => {
  it('formats common angles', () => {
    expect(format(ZERO_PI)).toBe('0');
    expect(format(PI)).toBe('pi');
    expect(format(piFraction(-1))).toBe('-pi');
    expect(format(piFraction(2))).toBe('2pi');
    expect(format(piFraction(1, 8))).toBe('pi/8');
    expect(format(piFraction(3, 8))).toBe('3pi/8');
    expect(format(piFraction(-1, 2))).toBe('-pi/2');
  });

  it('parses formatted angles', () => {
    expect(parse('0')).toEqual(ZERO_PI);
    expect(parse('pi')).toEqual(PI);
    expect(parse('3pi/8')).toEqual({ num: 3, den: 8 });
    expect(parse(' -pi / 2 ')).toEqual({ num: -1, den: 2 });
    expect(parse('2pi/4')).toEqual({ num: 1, den: 2 });
  });

  it('round-trips through text', () => {
    for (const angle of [piFraction(5, 8), piFraction(-7, 4), piFraction(3)]) {
      expect(parse(format(angle))).toEqual(angle);
    }
  });

  it('rejects malformed text', () => {
    expect(() => parse('pi/0')).toThrow(RangeError);
    expect(() => parse('1.5pi')).toThrow('Invalid pi fraction: 1.5pi');
    expect(() => parse('tau')).toThrow(RangeError);
  });
});
