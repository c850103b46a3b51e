/**
 * useOpticalCircuit Hook
 *
 * React hook for building and managing optical circuits.
 */

import { useState, useCallback, useMemo } from 'react';
import {
  OpticalCircuit,
  type OpticalCircuitJSON,
  type OpticalCircuitStats,
  type QubitEncoding,
} from '@linoptics/core';

export interface UseOpticalCircuitOptions {
  /**
   * Number of qubits (required)
   */
  numQubits: number;

  /**
   * Qubit encoding (default: pol_path)
   */
  encoding?: QubitEncoding;

  /**
   * Circuit name (optional)
   */
  name?: string;

  /**
   * Initial circuit JSON (optional)
   */
  initialCircuit?: OpticalCircuitJSON;
}

export interface UseOpticalCircuitReturn {
  /**
   * The circuit instance
   */
  circuit: OpticalCircuit;

  /**
   * Circuit statistics
   */
  stats: OpticalCircuitStats;

  /**
   * Next stage to be allocated
   */
  stage: number;

  /**
   * Number of elements in the circuit
   */
  elementCount: number;

  /**
   * Compile a gate onto the circuit; throws without changing state on failure
   */
  addGate: (gate: string, i: number, j?: number) => void;

  /**
   * Drop the elements of the last stage
   */
  undoLastStage: () => void;

  /**
   * Clear all elements
   */
  clear: () => void;

  /**
   * Replace the circuit with itself followed by `other`
   */
  compose: (other: OpticalCircuit) => void;

  /**
   * Stage-ordered listing
   */
  summary: () => string;

  /**
   * Export as JSON
   */
  toJSON: () => OpticalCircuitJSON;

  /**
   * Import from JSON
   */
  fromJSON: (json: OpticalCircuitJSON) => void;

  /**
   * Start over with a different number of qubits
   */
  resize: (numQubits: number) => void;
}

/**
 * React hook for optical circuit building
 *
 * @example
 * ```tsx
 * function NetworkBuilder() {
 *   const { circuit, stats, addGate, undoLastStage, clear } =
 *     useOpticalCircuit({ numQubits: 3 });
 *
 *   return (
 *     <div>
 *       <div>Stages: {stats.depth}</div>
 *       <button onClick={() => addGate('Ry', 1)}>Add Ry(1)</button>
 *       <button onClick={() => addGate('CNOT', 1, 2)}>Add CNOT</button>
 *       <button onClick={undoLastStage}>Undo</button>
 *       <button onClick={clear}>Clear</button>
 *       <OpticalNetworkTable circuit={circuit} />
 *     </div>
 *   );
 * }
 * ```
 */
export function useOpticalCircuit(options: UseOpticalCircuitOptions): UseOpticalCircuitReturn {
  const { numQubits: initialQubits, encoding = 'pol_path', name, initialCircuit } = options;

  const [circuit, setCircuit] = useState<OpticalCircuit>(() => {
    if (initialCircuit) {
      return OpticalCircuit.fromJSON(initialCircuit);
    }
    return new OpticalCircuit(initialQubits, encoding, name);
  });

  // addGate mutates the circuit in place; bump to re-render
  const [version, setVersion] = useState(0);

  const stats = useMemo(() => circuit.getStats(), [circuit, version]);

  const addGate = useCallback(
    (gate: string, i: number, j?: number) => {
      circuit.addGate(gate, i, j);
      setVersion((v) => v + 1);
    },
    [circuit]
  );

  const undoLastStage = useCallback(() => {
    if (circuit.stage === 0) return;

    const json = circuit.toJSON();
    const lastStage = json.stage - 1;
    json.elements = json.elements.filter((element) => element.stage !== lastStage);
    json.stage = lastStage;
    setCircuit(OpticalCircuit.fromJSON(json));
  }, [circuit]);

  const clear = useCallback(() => {
    setCircuit(new OpticalCircuit(circuit.numQubits, circuit.encoding, circuit.name));
  }, [circuit.numQubits, circuit.encoding, circuit.name]);

  const compose = useCallback(
    (other: OpticalCircuit) => {
      setCircuit(circuit.compose(other));
    },
    [circuit]
  );

  const summary = useCallback(() => circuit.summary(), [circuit, version]);

  const toJSON = useCallback(() => circuit.toJSON(), [circuit, version]);

  const fromJSON = useCallback((json: OpticalCircuitJSON) => {
    setCircuit(OpticalCircuit.fromJSON(json));
  }, []);

  const resize = useCallback(
    (numQubits: number) => {
      setCircuit(new OpticalCircuit(numQubits, circuit.encoding, circuit.name));
    },
    [circuit.encoding, circuit.name]
  );

  return {
    circuit,
    stats,
    stage: stats.depth,
    elementCount: stats.totalElements,
    addGate,
    undoLastStage,
    clear,
    compose,
    summary,
    toJSON,
    fromJSON,
    resize,
  };
}
