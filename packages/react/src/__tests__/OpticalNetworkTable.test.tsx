/**
 * Tests for OpticalNetworkTable
 */

import React from 'react';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { cleanup, fireEvent, render } from '@testing-library/react';
import { OpticalCircuit, bellCircuit } from '@linoptics/core';
import { OpticalNetworkTable } from '../components';

afterEach(() => {
  cleanup();
});

const cellTexts = (row: Element): string[] =>
  Array.from(row.querySelectorAll('td'), (cell) => cell.textContent ?? '');

describe('OpticalNetworkTable', () => {
  it('renders one row per element', () => {
    const circuit = new OpticalCircuit(2).cnot(1, 2).rx(2);
    const { container } = render(<OpticalNetworkTable circuit={circuit} />);
    const rows = container.querySelectorAll('tbody tr');

    expect(Array.from(container.querySelectorAll('th'), (th) => th.textContent)).toEqual([
      'Stage',
      'Element',
      'Location',
      'Parameters',
    ]);
    expect(rows).toHaveLength(2);
    expect(cellTexts(rows[0])).toEqual(['0', 'PolarizingBeamSplitter', '0<->1', '{}']);
    expect(cellTexts(rows[1])).toEqual(['1', 'BeamSplitter', '0<->1', '{}']);
  });

  it('shows symbolic parameters and the circuit name', () => {
    const { container } = render(<OpticalNetworkTable circuit={bellCircuit()} />);
    const rows = container.querySelectorAll('tbody tr');

    expect(container.querySelector('caption')?.textContent).toBe('Bell');
    expect(rows).toHaveLength(7);
    expect(cellTexts(rows[1])).toEqual(['0', 'HalfWavePlate', 'path_0', '{angle=3pi/8}']);
  });

  it('prefers an explicit caption', () => {
    const { container } = render(
      <OpticalNetworkTable circuit={bellCircuit()} caption="Entangler" />
    );
    expect(container.querySelector('caption')?.textContent).toBe('Entangler');
  });

  it('renders a placeholder row for an empty circuit', () => {
    const { container } = render(<OpticalNetworkTable circuit={new OpticalCircuit(3)} />);
    const rows = container.querySelectorAll('tbody tr');

    expect(rows).toHaveLength(1);
    expect(rows[0].textContent).toBe('No optical elements');
    expect(container.querySelector('caption')).toBeNull();
  });

  it('renders rows from circuit JSON', () => {
    const json = new OpticalCircuit(3).cnot(2, 3).rx(3).toJSON();
    const { container } = render(<OpticalNetworkTable circuitJson={json} />);
    const rows = container.querySelectorAll('tbody tr');

    expect(rows).toHaveLength(3);
    expect(cellTexts(rows[0])).toEqual(['0', 'PathSwap', '10<->11', '{}']);
    expect(cellTexts(rows[1])).toEqual(['1', 'BeamSplitter', '00<->01', '{}']);
    expect(cellTexts(rows[2])).toEqual(['1', 'BeamSplitter', '10<->11', '{}']);
  });

  it('reports clicks with the element index in insertion order', () => {
    const onElementClick = vi.fn();
    const circuit = new OpticalCircuit(3).cnot(2, 3).rx(2);
    const { container } = render(
      <OpticalNetworkTable circuit={circuit} onElementClick={onElementClick} />
    );

    fireEvent.click(container.querySelectorAll('tbody tr')[2]);
    expect(onElementClick).toHaveBeenCalledWith(2);
  });
});
