/**
 * @linoptics/core
 *
 * Compiles Rx, Ry and CNOT gates on an N-qubit register into linear-optical
 * hardware placements (wave plates, beam splitters, phase plates, polarizing
 * beam splitters, path swaps) on a polarization/path encoded network.
 *
 * @example
 * ```typescript
 * import { OpticalCircuit, compileGate } from '@linoptics/core';
 *
 * // Compile a single gate
 * const elements = compileGate('CNOT', 4, 1, 3);
 *
 * // Or build a staged circuit and combine circuits
 * const prep = new OpticalCircuit(4).ry(1);
 * const entangle = new OpticalCircuit(4).cnot(1, 3).rx(2);
 * const full = prep.compose(entangle);
 * console.log(full.summary());
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Circuit
// ============================================================================

export { OpticalCircuit, compose, bellCircuit, ghzCircuit } from './circuit';
export type { OpticalCircuitStats, OpticalCircuitJSON, StageGroup } from './circuit';

// ============================================================================
// Gate Compiler
// ============================================================================

export {
  compileGate,
  classifyQubit,
  isGateName,
  validateRegisterSize,
  GATE_NAMES,
  MAX_QUBITS,
  RX_POLARIZATION_HWP,
  RY_POLARIZATION_QWP,
  RY_POLARIZATION_HWP,
  RY_PATH_PHASE,
  RY_PATH_SPLITTER_PHASE,
  CNOT_POLARIZATION_FLIP,
} from './compiler';
export type { GateName, QubitRole } from './compiler';

// ============================================================================
// Optical Elements
// ============================================================================

export {
  atPath,
  acrossPair,
  atIndex,
  withStage,
  elementParameters,
  formatLocation,
  formatParameters,
  ELEMENT_KINDS,
} from './elements';
export type {
  ElementKind,
  OpticalElement,
  HalfWavePlate,
  QuarterWavePlate,
  BeamSplitter,
  PhasePlate,
  PolarizingBeamSplitter,
  PathSwap,
  Location,
  PathLocation,
  PairLocation,
  IndexLocation,
} from './elements';

// ============================================================================
// Path Space
// ============================================================================

export {
  allBitstrings,
  pairedPathsForQubit,
  pathsWithBit,
  pairedPathsAt,
  pathsWithBitAt,
  flipBit,
  pathLabelLength,
  pathBitIndex,
  formatPathLabel,
  isQubitEncoding,
  QUBIT_ENCODINGS,
} from './paths';
export type { Bit, PathLabel, PathPair, QubitEncoding } from './paths';

// ============================================================================
// Symbolic Angles
// ============================================================================

export {
  piFraction,
  ZERO_PI,
  PI,
  isZero,
  equals as piEquals,
  negate as piNegate,
  add as piAdd,
  toRadians,
  format as formatPiFraction,
  parse as parsePiFraction,
} from './fraction';
export type { PiFraction } from './fraction';

// ============================================================================
// Errors
// ============================================================================

export {
  OpticsError,
  UnsupportedGateError,
  UnsupportedCnotError,
  InvalidEncodingError,
  IncompatibleCircuitsError,
  OperandOutOfRangeError,
} from './errors';

// ============================================================================
// Version Info
// ============================================================================

export const VERSION = '0.1.0';
