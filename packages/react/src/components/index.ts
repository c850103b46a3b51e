/**
 * React Components for Optical Circuits
 */

export { OpticalNetworkTable } from './OpticalNetworkTable';
export type { OpticalNetworkTableProps } from './OpticalNetworkTable';
