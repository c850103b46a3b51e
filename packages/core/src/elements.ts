/**
 * Optical Element Definitions
 *
 * Each element kind carries exactly the parameters it needs.
 */

import { format as formatPi, type PiFraction } from './fraction';
import { formatPathLabel, type PathLabel, type PathPair } from './paths';

// ============================================================================
// Locations
// ============================================================================

/**
 * A single path label
 */
export interface PathLocation {
  type: 'path';
  label: PathLabel;
}

/**
 * Two path labels differing in one bit
 */
export interface PairLocation {
  type: 'pair';
  labels: PathPair;
}

/**
 * One of the 2^(N-1) parallel paths carrying the polarization qubit,
 * numbered in path enumeration order
 */
export interface IndexLocation {
  type: 'index';
  index: number;
}

export type Location = PathLocation | PairLocation | IndexLocation;

export function atPath(label: PathLabel): PathLocation {
  return { type: 'path', label };
}

export function acrossPair(labels: PathPair): PairLocation {
  return { type: 'pair', labels };
}

export function atIndex(index: number): IndexLocation {
  return { type: 'index', index };
}

// ============================================================================
// Element Variants
// ============================================================================

export type ElementKind =
  | 'HalfWavePlate'
  | 'QuarterWavePlate'
  | 'BeamSplitter'
  | 'PhasePlate'
  | 'PolarizingBeamSplitter'
  | 'PathSwap';

export const ELEMENT_KINDS: readonly ElementKind[] = [
  'HalfWavePlate',
  'QuarterWavePlate',
  'BeamSplitter',
  'PhasePlate',
  'PolarizingBeamSplitter',
  'PathSwap',
];

export interface HalfWavePlate {
  readonly kind: 'HalfWavePlate';
  readonly angle: PiFraction;
  readonly location: PathLocation | IndexLocation;
  readonly stage: number;
}

export interface QuarterWavePlate {
  readonly kind: 'QuarterWavePlate';
  readonly angle: PiFraction;
  readonly location: IndexLocation;
  readonly stage: number;
}

export interface BeamSplitter {
  readonly kind: 'BeamSplitter';
  readonly phase?: PiFraction;
  readonly location: PairLocation;
  readonly stage: number;
}

export interface PhasePlate {
  readonly kind: 'PhasePlate';
  readonly phase: PiFraction;
  readonly location: PathLocation;
  readonly stage: number;
}

export interface PolarizingBeamSplitter {
  readonly kind: 'PolarizingBeamSplitter';
  readonly location: PairLocation;
  readonly stage: number;
}

export interface PathSwap {
  readonly kind: 'PathSwap';
  readonly location: PairLocation;
  readonly stage: number;
}

/**
 * A placed hardware component
 */
export type OpticalElement =
  | HalfWavePlate
  | QuarterWavePlate
  | BeamSplitter
  | PhasePlate
  | PolarizingBeamSplitter
  | PathSwap;

/**
 * Copy of `element` at another stage
 */
export function withStage<E extends OpticalElement>(element: E, stage: number): E {
  return { ...element, stage };
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Symbolic parameters of an element, in display order
 */
export function elementParameters(element: OpticalElement): Array<[string, PiFraction]> {
  switch (element.kind) {
    case 'HalfWavePlate':
    case 'QuarterWavePlate':
      return [['angle', element.angle]];
    case 'PhasePlate':
      return [['phase', element.phase]];
    case 'BeamSplitter':
      return element.phase ? [['phase', element.phase]] : [];
    case 'PolarizingBeamSplitter':
    case 'PathSwap':
      return [];
  }
}

export function formatLocation(location: Location): string {
  switch (location.type) {
    case 'path':
      return formatPathLabel(location.label);
    case 'pair':
      return `${formatPathLabel(location.labels[0])}<->${formatPathLabel(location.labels[1])}`;
    case 'index':
      return `path_${location.index}`;
  }
}

export function formatParameters(element: OpticalElement): string {
  const parts = elementParameters(element).map(([key, value]) => `${key}=${formatPi(value)}`);
  return `{${parts.join(', ')}}`;
}
