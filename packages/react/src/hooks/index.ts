/**
 * React Hooks for Optical Circuits
 */

export { useOpticalCircuit } from './useOpticalCircuit';
export type {
  UseOpticalCircuitOptions,
  UseOpticalCircuitReturn,
} from './useOpticalCircuit';
