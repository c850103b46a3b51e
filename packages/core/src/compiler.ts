/**
 * Gate Compiler
 *
 * Turns one abstract gate into the optical elements that implement it on a
 * polarization/path encoded register. Compilation is a pure function of its
 * inputs: every call returns a fresh element list with stage 0, and stage
 * assignment is left to the owning circuit.
 */

import {
  InvalidEncodingError,
  OperandOutOfRangeError,
  UnsupportedCnotError,
  UnsupportedGateError,
} from './errors';
import {
  acrossPair,
  atIndex,
  atPath,
  type OpticalElement,
} from './elements';
import { piFraction, negate, ZERO_PI, type PiFraction } from './fraction';
import {
  allBitstrings,
  flipBit,
  isQubitEncoding,
  pairedPathsAt,
  pathBitIndex,
  pathLabelLength,
  pathsWithBitAt,
  type QubitEncoding,
} from './paths';

// ============================================================================
// Gate and Role Types
// ============================================================================

export type GateName = 'Rx' | 'Ry' | 'CNOT';

export const GATE_NAMES: readonly GateName[] = ['Rx', 'Ry', 'CNOT'];

export function isGateName(value: string): value is GateName {
  return value === 'Rx' || value === 'Ry' || value === 'CNOT';
}

/**
 * Largest register the compiler accepts; path enumeration is 2^N
 */
export const MAX_QUBITS = 16;

/**
 * Physical degree of freedom a qubit occupies
 */
export type QubitRole =
  | { dof: 'polarization' }
  | { dof: 'path'; bit: number; length: number };

// ============================================================================
// Decomposition Constants
// ============================================================================

/** Wave-plate angle realizing Rx on the polarization qubit between QWP(0) plates */
export const RX_POLARIZATION_HWP = piFraction(1, 8);

export const RY_POLARIZATION_QWP = piFraction(1, 4);
export const RY_POLARIZATION_HWP = piFraction(3, 8);

/** Phase advance before the Ry beam splitter; compensated by its negation after */
export const RY_PATH_PHASE = piFraction(-1, 2);
export const RY_PATH_SPLITTER_PHASE = piFraction(1, 2);

/** Half-wave plate flipping polarization on control-set paths */
export const CNOT_POLARIZATION_FLIP = piFraction(1, 2);

// ============================================================================
// Compiler
// ============================================================================

/**
 * Compile a gate to optical elements.
 *
 * @param gate - `Rx`, `Ry` or `CNOT`
 * @param numQubits - register size N
 * @param i - rotated qubit, or CNOT control (1-based)
 * @param j - CNOT target (1-based)
 * @param encoding - `pol_path` (default) or `path_only`
 *
 * @example
 * ```typescript
 * compileGate('CNOT', 4, 1, 3);
 * // 4 PolarizingBeamSplitter elements across pairs differing in bit 1
 * ```
 */
export function compileGate(
  gate: string,
  numQubits: number,
  i: number,
  j?: number,
  encoding: string = 'pol_path'
): OpticalElement[] {
  if (!isQubitEncoding(encoding)) {
    throw new InvalidEncodingError(encoding);
  }
  validateRegisterSize(numQubits);
  if (!isGateName(gate)) {
    throw new UnsupportedGateError(gate);
  }

  validateOperand(i, numQubits);
  const role = classifyQubit(numQubits, i, encoding);

  switch (gate) {
    case 'Rx':
      return compileRx(role, numQubits);
    case 'Ry':
      return compileRy(role, numQubits);
    case 'CNOT': {
      if (j === undefined) {
        throw new OperandOutOfRangeError(j, numQubits, 'CNOT requires a target qubit');
      }
      validateOperand(j, numQubits);
      if (i === j) {
        throw new OperandOutOfRangeError(
          j,
          numQubits,
          `CNOT control and target must differ, both are ${i}`
        );
      }
      return compileCnot(role, classifyQubit(numQubits, j, encoding), i, j);
    }
  }
}

/**
 * Classify qubit k (1-based) by the degree of freedom encoding it
 */
export function classifyQubit(numQubits: number, k: number, encoding: QubitEncoding): QubitRole {
  const bit = pathBitIndex(numQubits, k, encoding);
  if (bit === null) {
    return { dof: 'polarization' };
  }
  return { dof: 'path', bit, length: pathLabelLength(numQubits, encoding) };
}

export function validateRegisterSize(numQubits: number): void {
  if (!Number.isInteger(numQubits) || numQubits < 2 || numQubits > MAX_QUBITS) {
    throw new RangeError(`numQubits must be an integer between 2 and ${MAX_QUBITS}`);
  }
}

function validateOperand(k: number, numQubits: number): void {
  if (!Number.isInteger(k) || k < 1 || k > numQubits) {
    throw new OperandOutOfRangeError(k, numQubits);
  }
}

// ============================================================================
// Single-Qubit Rotations
// ============================================================================

function compileRx(role: QubitRole, numQubits: number): OpticalElement[] {
  switch (role.dof) {
    case 'polarization':
      return waveplateSandwich(numQubits, ZERO_PI, RX_POLARIZATION_HWP);
    case 'path':
      return pairedPathsAt(role.length, role.bit).map(
        (pair): OpticalElement => ({ kind: 'BeamSplitter', location: acrossPair(pair), stage: 0 })
      );
  }
}

function compileRy(role: QubitRole, numQubits: number): OpticalElement[] {
  switch (role.dof) {
    case 'polarization':
      return waveplateSandwich(numQubits, RY_POLARIZATION_QWP, RY_POLARIZATION_HWP);
    case 'path':
      return pairedPathsAt(role.length, role.bit).flatMap((pair): OpticalElement[] => [
        { kind: 'PhasePlate', phase: RY_PATH_PHASE, location: atPath(pair[0]), stage: 0 },
        {
          kind: 'BeamSplitter',
          phase: RY_PATH_SPLITTER_PHASE,
          location: acrossPair(pair),
          stage: 0,
        },
        { kind: 'PhasePlate', phase: negate(RY_PATH_PHASE), location: atPath(pair[0]), stage: 0 },
      ]);
  }
}

/**
 * QWP, HWP, QWP on every parallel path carrying the polarization qubit
 */
function waveplateSandwich(
  numQubits: number,
  quarter: PiFraction,
  half: PiFraction
): OpticalElement[] {
  const elements: OpticalElement[] = [];
  const nPaths = 2 ** (numQubits - 1);
  for (let p = 0; p < nPaths; p++) {
    const location = atIndex(p);
    elements.push(
      { kind: 'QuarterWavePlate', angle: quarter, location, stage: 0 },
      { kind: 'HalfWavePlate', angle: half, location, stage: 0 },
      { kind: 'QuarterWavePlate', angle: quarter, location, stage: 0 }
    );
  }
  return elements;
}

// ============================================================================
// CNOT
// ============================================================================

function compileCnot(
  control: QubitRole,
  target: QubitRole,
  i: number,
  j: number
): OpticalElement[] {
  if (control.dof === 'polarization') {
    if (target.dof === 'polarization') {
      throw new UnsupportedCnotError(i, j);
    }
    return pairedPathsAt(target.length, target.bit).map(
      (pair): OpticalElement => ({
        kind: 'PolarizingBeamSplitter',
        location: acrossPair(pair),
        stage: 0,
      })
    );
  }

  if (target.dof === 'polarization') {
    return pathsWithBitAt(control.length, control.bit, 1).map(
      (label): OpticalElement => ({
        kind: 'HalfWavePlate',
        angle: CNOT_POLARIZATION_FLIP,
        location: atPath(label),
        stage: 0,
      })
    );
  }

  return allBitstrings(control.length)
    .filter((label) => label[control.bit] === 1 && label[target.bit] === 0)
    .map(
      (label): OpticalElement => ({
        kind: 'PathSwap',
        location: acrossPair([label, flipBit(label, target.bit)]),
        stage: 0,
      })
    );
}
