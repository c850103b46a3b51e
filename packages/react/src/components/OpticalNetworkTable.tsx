/**
 * OpticalNetworkTable React Component
 *
 * Lists the elements of an optical circuit stage by stage.
 */

import React, { useMemo } from 'react';
import {
  OpticalCircuit,
  formatLocation,
  formatParameters,
  type OpticalCircuitJSON,
} from '@linoptics/core';

export interface OpticalNetworkTableProps {
  /**
   * The circuit to display
   */
  circuit?: OpticalCircuit;

  /**
   * Circuit as JSON (alternative to circuit prop)
   */
  circuitJson?: OpticalCircuitJSON;

  /**
   * Table caption (default: circuit name, if any)
   */
  caption?: string;

  /**
   * Additional CSS class name
   */
  className?: string;

  /**
   * Inline styles
   */
  style?: React.CSSProperties;

  /**
   * Callback when a row is clicked, with the element's index in insertion order
   */
  onElementClick?: (elementIndex: number) => void;
}

/**
 * OpticalNetworkTable React Component
 *
 * @example
 * ```tsx
 * import { OpticalNetworkTable, useOpticalCircuit } from '@linoptics/react';
 *
 * function App() {
 *   const { circuit, addGate } = useOpticalCircuit({ numQubits: 3 });
 *
 *   return (
 *     <div>
 *       <OpticalNetworkTable circuit={circuit} />
 *       <button onClick={() => addGate('Rx', 2)}>Add Rx(2)</button>
 *     </div>
 *   );
 * }
 * ```
 */
export function OpticalNetworkTable({
  circuit,
  circuitJson,
  caption,
  className,
  style,
  onElementClick,
}: OpticalNetworkTableProps): React.ReactElement {
  const source = useMemo(
    () => circuit ?? (circuitJson ? OpticalCircuit.fromJSON(circuitJson) : null),
    [circuit, circuitJson]
  );

  // Stable sort keeps insertion order inside a stage
  const rows = (source?.elements ?? [])
    .map((element, index) => ({ element, index }))
    .sort((a, b) => a.element.stage - b.element.stage);

  const title = caption ?? source?.name;

  return (
    <table className={className} style={{ borderCollapse: 'collapse', ...style }}>
      {title && <caption>{title}</caption>}
      <thead>
        <tr>
          <th>Stage</th>
          <th>Element</th>
          <th>Location</th>
          <th>Parameters</th>
        </tr>
      </thead>
      <tbody>
        {rows.length === 0 ? (
          <tr>
            <td colSpan={4}>No optical elements</td>
          </tr>
        ) : (
          rows.map(({ element, index }) => (
            <tr
              key={index}
              data-stage={element.stage}
              onClick={onElementClick ? () => onElementClick(index) : undefined}
            >
              <td>{element.stage}</td>
              <td>{element.kind}</td>
              <td>{formatLocation(element.location)}</td>
              <td>{formatParameters(element)}</td>
            </tr>
          ))
        )}
      </tbody>
    </table>
  );
}
