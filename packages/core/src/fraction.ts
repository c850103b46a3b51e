/**
 * Symbolic angle utilities.
 *
 * Wave-plate angles and phase shifts are exact rational multiples of π,
 * stored as a numerator/denominator pair.
 */

/**
 * A rational multiple of π, always stored in lowest terms with den > 0
 */
export interface PiFraction {
  readonly num: number;
  readonly den: number;
}

function gcd(a: number, b: number): number {
  let x = Math.abs(a);
  let y = Math.abs(b);
  while (y !== 0) {
    [x, y] = [y, x % y];
  }
  return x;
}

/**
 * Create a normalized fraction of π (num/den · π)
 */
export function piFraction(num: number, den: number = 1): PiFraction {
  if (!Number.isInteger(num) || !Number.isInteger(den)) {
    throw new RangeError(`pi fraction needs integer parts, got ${num}/${den}`);
  }
  if (den === 0) {
    throw new RangeError('pi fraction denominator must be non-zero');
  }
  if (num === 0) {
    return ZERO_PI;
  }
  const sign = den < 0 ? -1 : 1;
  const divisor = gcd(num, den);
  return { num: (sign * num) / divisor, den: (sign * den) / divisor };
}

/**
 * Zero angle
 */
export const ZERO_PI: PiFraction = { num: 0, den: 1 };

/**
 * π
 */
export const PI: PiFraction = { num: 1, den: 1 };

export function isZero(f: PiFraction): boolean {
  return f.num === 0;
}

export function equals(a: PiFraction, b: PiFraction): boolean {
  return a.num === b.num && a.den === b.den;
}

export function negate(f: PiFraction): PiFraction {
  return isZero(f) ? ZERO_PI : { num: -f.num, den: f.den };
}

/**
 * a + b
 */
export function add(a: PiFraction, b: PiFraction): PiFraction {
  return piFraction(a.num * b.den + b.num * a.den, a.den * b.den);
}

/**
 * Numeric value in radians
 */
export function toRadians(f: PiFraction): number {
  return (f.num * Math.PI) / f.den;
}

/**
 * Format as `0`, `pi`, `-pi`, `pi/8`, `3pi/8`, `-pi/2`, `2pi`
 */
export function format(f: PiFraction): string {
  if (f.num === 0) {
    return '0';
  }
  const sign = f.num < 0 ? '-' : '';
  const magnitude = Math.abs(f.num);
  const head = magnitude === 1 ? 'pi' : `${magnitude}pi`;
  return f.den === 1 ? `${sign}${head}` : `${sign}${head}/${f.den}`;
}

const PI_PATTERN = /^(-)?(\d*)pi(?:\/(\d+))?$/;

/**
 * Parse the textual forms produced by {@link format}
 */
export function parse(text: string): PiFraction {
  const trimmed = text.replace(/\s+/g, '');
  if (trimmed === '0') {
    return ZERO_PI;
  }
  const match = PI_PATTERN.exec(trimmed);
  if (!match) {
    throw new RangeError(`Invalid pi fraction: ${text}`);
  }
  const [, minus, numerator, denominator] = match;
  const magnitude = numerator ? parseInt(numerator, 10) : 1;
  const den = denominator ? parseInt(denominator, 10) : 1;
  return piFraction(minus ? -magnitude : magnitude, den);
}
