/**
 * Path-space enumeration
 *
 * Path-encoded qubits are bits of a fixed-length path label. Under the
 * `pol_path` encoding qubit 1 lives in polarization and qubits 2..N map to
 * bits 0..N-2 of an (N-1)-bit label; under `path_only` qubit k maps to bit
 * k-1 of an N-bit label.
 *
 * Enumeration order is lexicographic with bit 0 most significant. Element
 * order inside a compiled gate, and therefore every stage listing, follows
 * from it.
 */

import { OperandOutOfRangeError } from './errors';

export type Bit = 0 | 1;

/**
 * One spatial path, one bit per path-encoded qubit
 */
export type PathLabel = readonly Bit[];

/**
 * Two labels differing in a single bit; the first holds 0 at that bit
 */
export type PathPair = readonly [PathLabel, PathLabel];

/**
 * How register qubits map onto physical degrees of freedom
 */
export type QubitEncoding = 'pol_path' | 'path_only';

export const QUBIT_ENCODINGS: readonly QubitEncoding[] = ['pol_path', 'path_only'];

export function isQubitEncoding(value: string): value is QubitEncoding {
  return value === 'pol_path' || value === 'path_only';
}

/**
 * All 2^n labels of length n
 */
export function allBitstrings(n: number): PathLabel[] {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`Bitstring length must be a non-negative integer, got ${n}`);
  }
  const count = 2 ** n;
  const labels: PathLabel[] = [];
  for (let value = 0; value < count; value++) {
    const bits: Bit[] = [];
    for (let pos = n - 1; pos >= 0; pos--) {
      bits.push(Math.floor(value / 2 ** pos) % 2 === 1 ? 1 : 0);
    }
    labels.push(bits);
  }
  return labels;
}

/**
 * Copy of `label` with one bit inverted
 */
export function flipBit(label: PathLabel, bit: number): PathLabel {
  return label.map((b, idx): Bit => (idx === bit ? (b === 0 ? 1 : 0) : b));
}

/**
 * Perfect matching of all labels of `length` on `bit`
 */
export function pairedPathsAt(length: number, bit: number): PathPair[] {
  validateBit(length, bit);
  return allBitstrings(length)
    .filter((label) => label[bit] === 0)
    .map((label): PathPair => [label, flipBit(label, bit)]);
}

/**
 * Labels of `length` whose `bit` equals `value`
 */
export function pathsWithBitAt(length: number, bit: number, value: Bit): PathLabel[] {
  validateBit(length, bit);
  return allBitstrings(length).filter((label) => label[bit] === value);
}

/**
 * Pairs of (N-1)-bit labels differing only in the bit of path qubit k
 * (pol_path convention, k in [2, N])
 */
export function pairedPathsForQubit(numQubits: number, k: number): PathPair[] {
  validatePathQubit(numQubits, k);
  return pairedPathsAt(numQubits - 1, k - 2);
}

/**
 * (N-1)-bit labels whose bit for path qubit k equals `value`
 * (pol_path convention, k in [2, N])
 */
export function pathsWithBit(numQubits: number, k: number, value: Bit): PathLabel[] {
  validatePathQubit(numQubits, k);
  return pathsWithBitAt(numQubits - 1, k - 2, value);
}

export function pathLabelLength(numQubits: number, encoding: QubitEncoding): number {
  return encoding === 'pol_path' ? numQubits - 1 : numQubits;
}

/**
 * Label bit carrying qubit k, or null for the polarization qubit
 */
export function pathBitIndex(
  numQubits: number,
  k: number,
  encoding: QubitEncoding
): number | null {
  if (!Number.isInteger(k) || k < 1 || k > numQubits) {
    throw new OperandOutOfRangeError(k, numQubits);
  }
  if (encoding === 'path_only') {
    return k - 1;
  }
  return k === 1 ? null : k - 2;
}

export function formatPathLabel(label: PathLabel): string {
  return label.length === 0 ? 'ε' : label.join('');
}

function validatePathQubit(numQubits: number, k: number): void {
  if (!Number.isInteger(k) || k < 2 || k > numQubits) {
    throw new OperandOutOfRangeError(
      k,
      numQubits,
      `Path qubit ${k} out of range [2, ${numQubits}]`
    );
  }
}

function validateBit(length: number, bit: number): void {
  if (!Number.isInteger(bit) || bit < 0 || bit >= length) {
    throw new RangeError(`Bit ${bit} out of range for ${length}-bit path labels`);
  }
}
