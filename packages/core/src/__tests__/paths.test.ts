/**
 * Tests for path-space enumeration
 */

import { describe, it, expect } from 'vitest';
import {
  allBitstrings,
  flipBit,
  formatPathLabel,
  pairedPathsAt,
  pairedPathsForQubit,
  pathBitIndex,
  pathLabelLength,
  pathsWithBit,
  pathsWithBitAt,
  isQubitEncoding,
} from '../paths';
import { OperandOutOfRangeError } from '../errors';

const asStrings = (labels: readonly (readonly number[])[]): string[] =>
  labels.map((label) => label.join(''));

describe('allBitstrings', () => {
  it('returns one empty label for length 0', () => {
    expect(allBitstrings(0)).toEqual([[]]);
  });

  it('enumerates lexicographically with bit 0 most significant', () => {
    expect(allBitstrings(2)).toEqual([
      [0, 0],
      [0, 1],
      [1, 0],
      [1, 1],
    ]);
  });

  it('produces 2^n distinct labels of length n', () => {
    for (let n = 0; n <= 8; n++) {
      const labels = allBitstrings(n);
      expect(labels).toHaveLength(2 ** n);
      expect(labels.every((label) => label.length === n)).toBe(true);
      expect(new Set(asStrings(labels)).size).toBe(2 ** n);
    }
  });

  it('is identical across repeated calls', () => {
    expect(allBitstrings(5)).toEqual(allBitstrings(5));
  });

  it('rejects negative or fractional lengths', () => {
    expect(() => allBitstrings(-1)).toThrow(RangeError);
    expect(() => allBitstrings(1.5)).toThrow(RangeError);
  });
});

describe('flipBit', () => {
  it('inverts exactly one bit without touching the input', () => {
    const label = [0, 1, 0] as const;
    expect(flipBit(label, 0)).toEqual([1, 1, 0]);
    expect(flipBit(label, 1)).toEqual([0, 0, 0]);
    expect(label).toEqual([0, 1, 0]);
  });
});

describe('pairedPathsForQubit', () => {
  it('pairs labels on the bit of path qubit k', () => {
    const pairs = pairedPathsForQubit(4, 3);
    expect(pairs.map(([a, b]) => `${a.join('')}-${b.join('')}`)).toEqual([
      '000-010',
      '001-011',
      '100-110',
      '101-111',
    ]);
  });

  it('forms a perfect matching for every valid qubit', () => {
    for (let numQubits = 2; numQubits <= 6; numQubits++) {
      for (let k = 2; k <= numQubits; k++) {
        const pairs = pairedPathsForQubit(numQubits, k);
        expect(pairs).toHaveLength(2 ** (numQubits - 2));

        const seen = asStrings(pairs.flat());
        expect(new Set(seen).size).toBe(2 ** (numQubits - 1));
        expect(seen.sort()).toEqual(asStrings(allBitstrings(numQubits - 1)).sort());

        for (const [zero, one] of pairs) {
          expect(zero[k - 2]).toBe(0);
          expect(one).toEqual(flipBit(zero, k - 2));
        }
      }
    }
  });

  it('pairs the two one-bit labels when N = 2', () => {
    expect(pairedPathsForQubit(2, 2)).toEqual([[[0], [1]]]);
  });

  it('rejects the polarization qubit and operands beyond N', () => {
    expect(() => pairedPathsForQubit(3, 1)).toThrow(OperandOutOfRangeError);
    expect(() => pairedPathsForQubit(3, 4)).toThrow('Path qubit 4 out of range [2, 3]');
  });
});

describe('pathsWithBit', () => {
  it('selects labels by the bit of path qubit k', () => {
    expect(asStrings(pathsWithBit(4, 2, 1))).toEqual(['100', '101', '110', '111']);
    expect(asStrings(pathsWithBit(4, 4, 0))).toEqual(['000', '010', '100', '110']);
  });

  it('returns 2^(N-2) labels', () => {
    expect(pathsWithBit(5, 3, 0)).toHaveLength(8);
    expect(pathsWithBit(5, 3, 1)).toHaveLength(8);
  });
});

describe('Index-level helpers', () => {
  it('pairs full-length labels', () => {
    expect(asStrings(pairedPathsAt(2, 0).flat())).toEqual(['00', '10', '01', '11']);
  });

  it('rejects bits outside the label', () => {
    expect(() => pairedPathsAt(2, 2)).toThrow(RangeError);
    expect(() => pathsWithBitAt(2, -1, 0)).toThrow(RangeError);
  });
});

describe('Encoding layout', () => {
  it('maps qubits to label bits under pol_path', () => {
    expect(pathLabelLength(4, 'pol_path')).toBe(3);
    expect(pathBitIndex(4, 1, 'pol_path')).toBeNull();
    expect(pathBitIndex(4, 2, 'pol_path')).toBe(0);
    expect(pathBitIndex(4, 4, 'pol_path')).toBe(2);
  });

  it('maps qubits to label bits under path_only', () => {
    expect(pathLabelLength(4, 'path_only')).toBe(4);
    expect(pathBitIndex(4, 1, 'path_only')).toBe(0);
    expect(pathBitIndex(4, 4, 'path_only')).toBe(3);
  });

  it('rejects qubits outside the register', () => {
    expect(() => pathBitIndex(3, 0, 'pol_path')).toThrow(OperandOutOfRangeError);
    expect(() => pathBitIndex(3, 4, 'path_only')).toThrow('Qubit 4 out of range [1, 3]');
  });

  it('recognizes encoding names', () => {
    expect(isQubitEncoding('pol_path')).toBe(true);
    expect(isQubitEncoding('path_only')).toBe(true);
    expect(isQubitEncoding('dual_rail')).toBe(false);
  });

  it('formats labels as bit strings', () => {
    expect(formatPathLabel([1, 0, 1])).toBe('101');
    expect(formatPathLabel([])).toBe('ε');
  });
});
