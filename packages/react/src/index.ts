/**
 * @linoptics/react
 *
 * React hooks and components for optical circuit compilation.
 *
 * @example
 * ```tsx
 * import { useOpticalCircuit, OpticalNetworkTable } from '@linoptics/react';
 *
 * function BellNetwork() {
 *   const { circuit, addGate, stage } = useOpticalCircuit({ numQubits: 2 });
 *
 *   const handleBell = () => {
 *     addGate('Ry', 1);
 *     addGate('CNOT', 1, 2);
 *   };
 *
 *   return (
 *     <div>
 *       <button onClick={handleBell}>Prepare Bell pair</button>
 *       <span>{stage} stages</span>
 *       <OpticalNetworkTable circuit={circuit} />
 *     </div>
 *   );
 * }
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Hooks
// ============================================================================

export { useOpticalCircuit } from './hooks';

export type {
  UseOpticalCircuitOptions,
  UseOpticalCircuitReturn,
} from './hooks';

// ============================================================================
// Components
// ============================================================================

export { OpticalNetworkTable } from './components';

export type { OpticalNetworkTableProps } from './components';

// ============================================================================
// Re-exports from Core
// ============================================================================

export {
  OpticalCircuit,
  compileGate,
  type OpticalElement,
  type OpticalCircuitJSON,
  type QubitEncoding,
} from '@linoptics/core';

// ============================================================================
// Version Info
// ============================================================================

export const VERSION = '0.1.0';
