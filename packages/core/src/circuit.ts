/**
 * Optical Circuit Builder
 *
 * Accumulates compiled optical elements gate by gate and tracks the stage
 * (time-step) each gate occupies. Circuits can be combined algebraically;
 * composition keeps each operand's internal order and places the second
 * operand's stages after the first's.
 */

import { compileGate, validateRegisterSize } from './compiler';
import {
  formatLocation,
  formatParameters,
  withStage,
  type ElementKind,
  type OpticalElement,
} from './elements';
import { IncompatibleCircuitsError, InvalidEncodingError } from './errors';
import { isQubitEncoding, pathLabelLength, type QubitEncoding } from './paths';

// ============================================================================
// Types
// ============================================================================

/**
 * Statistics about a circuit
 */
export interface OpticalCircuitStats {
  numQubits: number;
  encoding: QubitEncoding;
  depth: number;
  totalElements: number;
  pathCount: number;
  elementBreakdown: Record<ElementKind, number>;
}

/**
 * Serialized circuit
 */
export interface OpticalCircuitJSON {
  numQubits: number;
  encoding: QubitEncoding;
  name?: string;
  stage: number;
  elements: OpticalElement[];
}

/**
 * Elements sharing one stage
 */
export interface StageGroup {
  stage: number;
  elements: readonly OpticalElement[];
}

// ============================================================================
// OpticalCircuit Class
// ============================================================================

/**
 * Optical circuit builder
 *
 * @example
 * ```typescript
 * const circuit = new OpticalCircuit(4)
 *   .cnot(1, 3)
 *   .rx(2);
 *
 * circuit.stage;     // 2
 * circuit.summary(); // stage-ordered listing
 * ```
 */
export class OpticalCircuit {
  private _numQubits: number;
  private _encoding: QubitEncoding;
  private _name?: string;
  private _elements: OpticalElement[] = [];
  private _stage = 0;

  /**
   * @param numQubits Register size N (2 to 16)
   * @param encoding `pol_path` (default) or `path_only`
   * @param name Optional name shown in the summary header
   */
  constructor(numQubits: number, encoding: string = 'pol_path', name?: string) {
    if (!isQubitEncoding(encoding)) {
      throw new InvalidEncodingError(encoding);
    }
    validateRegisterSize(numQubits);
    this._numQubits = numQubits;
    this._encoding = encoding;
    this._name = name;
  }

  // =========================================================================
  // Properties
  // =========================================================================

  get numQubits(): number {
    return this._numQubits;
  }

  get encoding(): QubitEncoding {
    return this._encoding;
  }

  get name(): string | undefined {
    return this._name;
  }

  /**
   * Compiled elements in insertion order
   */
  get elements(): readonly OpticalElement[] {
    return this._elements;
  }

  /**
   * Index of the next stage to allocate
   */
  get stage(): number {
    return this._stage;
  }

  /**
   * Number of elements in the circuit
   */
  get length(): number {
    return this._elements.length;
  }

  /**
   * Number of distinct path labels in the network
   */
  get pathCount(): number {
    return 2 ** pathLabelLength(this._numQubits, this._encoding);
  }

  // =========================================================================
  // Gates
  // =========================================================================

  /**
   * Compile a gate and append its elements as one new stage.
   * A failed compilation leaves the circuit untouched.
   */
  addGate(gate: string, i: number, j?: number): this {
    const compiled = compileGate(gate, this._numQubits, i, j, this._encoding);
    const stage = this._stage;
    this._elements.push(...compiled.map((element) => withStage(element, stage)));
    this._stage = stage + 1;
    return this;
  }

  rx(qubit: number): this {
    return this.addGate('Rx', qubit);
  }

  ry(qubit: number): this {
    return this.addGate('Ry', qubit);
  }

  cnot(control: number, target: number): this {
    return this.addGate('CNOT', control, target);
  }

  // =========================================================================
  // Composition
  // =========================================================================

  /**
   * New circuit running this circuit, then `other`.
   * Configuration and name come from this circuit; `other` may use a
   * different encoding, its elements are kept as they are.
   */
  compose(other: OpticalCircuit): OpticalCircuit {
    if (this._numQubits !== other._numQubits) {
      throw new IncompatibleCircuitsError(this._numQubits, other._numQubits);
    }

    const offset = this._stage;
    const result = new OpticalCircuit(this._numQubits, this._encoding, this._name);
    result._elements = [
      ...this._elements,
      ...other._elements.map((element) => withStage(element, element.stage + offset)),
    ];
    result._stage = offset + other._stage;
    return result;
  }

  /**
   * New circuit equal to this circuit composed with itself n times
   */
  repeat(n: number): OpticalCircuit {
    if (!Number.isInteger(n) || n < 1) {
      throw new RangeError('Repeat count must be at least 1');
    }

    let result = this.compose(new OpticalCircuit(this._numQubits, this._encoding));
    for (let k = 1; k < n; k++) {
      result = result.compose(this);
    }
    return result;
  }

  // =========================================================================
  // Stage Access
  // =========================================================================

  elementsAtStage(stage: number): OpticalElement[] {
    return this._elements.filter((element) => element.stage === stage);
  }

  /**
   * Elements grouped by stage, ascending; empty stages are omitted
   */
  stages(): StageGroup[] {
    const groups = new Map<number, OpticalElement[]>();
    for (const element of this.sortedElements()) {
      const group = groups.get(element.stage);
      if (group) {
        group.push(element);
      } else {
        groups.set(element.stage, [element]);
      }
    }
    return [...groups].map(([stage, elements]) => ({ stage, elements }));
  }

  // =========================================================================
  // Statistics
  // =========================================================================

  getStats(): OpticalCircuitStats {
    const elementBreakdown: Record<ElementKind, number> = {
      HalfWavePlate: 0,
      QuarterWavePlate: 0,
      BeamSplitter: 0,
      PhasePlate: 0,
      PolarizingBeamSplitter: 0,
      PathSwap: 0,
    };

    for (const element of this._elements) {
      elementBreakdown[element.kind]++;
    }

    return {
      numQubits: this._numQubits,
      encoding: this._encoding,
      depth: this._stage,
      totalElements: this._elements.length,
      pathCount: this.pathCount,
      elementBreakdown,
    };
  }

  // =========================================================================
  // Display and Serialization
  // =========================================================================

  /**
   * Stage-ordered human-readable listing
   */
  summary(): string {
    const title = this._name ? `Optical Circuit: ${this._name}` : 'Optical Circuit';
    const header = `===== ${title} =====`;
    const lines = [header];

    for (const element of this.sortedElements()) {
      lines.push(
        `Stage ${element.stage}: ${element.kind.padEnd(22)} | loc=${formatLocation(
          element.location
        )} | ${formatParameters(element)}`
      );
    }

    lines.push('='.repeat(header.length));
    return lines.join('\n');
  }

  toJSON(): OpticalCircuitJSON {
    return {
      numQubits: this._numQubits,
      encoding: this._encoding,
      name: this._name,
      stage: this._stage,
      elements: [...this._elements],
    };
  }

  static fromJSON(json: OpticalCircuitJSON): OpticalCircuit {
    const circuit = new OpticalCircuit(json.numQubits, json.encoding, json.name);
    if (!Number.isInteger(json.stage) || json.stage < 0) {
      throw new RangeError(`Stage counter must be a non-negative integer, got ${json.stage}`);
    }

    let previous = 0;
    for (const element of json.elements) {
      if (!Number.isInteger(element.stage) || element.stage < 0 || element.stage >= json.stage) {
        throw new RangeError(
          `Element stage ${element.stage} outside [0, ${json.stage - 1}]`
        );
      }
      if (element.stage < previous) {
        throw new RangeError(
          `Element stage ${element.stage} follows stage ${previous}; stages must not decrease`
        );
      }
      previous = element.stage;
    }
    circuit._elements = [...json.elements];
    circuit._stage = json.stage;
    return circuit;
  }

  // =========================================================================
  // Private Helpers
  // =========================================================================

  /**
   * Stable sort: ascending stage, insertion order within a stage
   */
  private sortedElements(): OpticalElement[] {
    return [...this._elements].sort((a, b) => a.stage - b.stage);
  }
}

/**
 * Compose two circuits: `a` then `b`
 */
export function compose(a: OpticalCircuit, b: OpticalCircuit): OpticalCircuit {
  return a.compose(b);
}

// ============================================================================
// Common Circuits
// ============================================================================

/**
 * Bell pair preparation: Ry on qubit 1, then CNOT(1, 2)
 */
export function bellCircuit(encoding: QubitEncoding = 'pol_path'): OpticalCircuit {
  return new OpticalCircuit(2, encoding, 'Bell').ry(1).cnot(1, 2);
}

/**
 * GHZ preparation: Ry on qubit 1, then a CNOT chain down the register
 */
export function ghzCircuit(
  numQubits: number,
  encoding: QubitEncoding = 'pol_path'
): OpticalCircuit {
  const circuit = new OpticalCircuit(numQubits, encoding, 'GHZ').ry(1);
  for (let k = 2; k <= numQubits; k++) {
    circuit.cnot(k - 1, k);
  }
  return circuit;
}
