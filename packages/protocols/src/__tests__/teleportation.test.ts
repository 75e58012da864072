/**
 * Tests for quantum teleportation
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError, totalShots } from '@qubit-lab/core';
import { runTeleportation, teleportationCircuit } from '../teleportation';

describe('Teleportation Circuit', () => {
  it('measures the sender qubits mid-circuit and corrects classically', () => {
    const circuit = teleportationCircuit();
    expect(circuit.isDynamic).toBe(true);
    const stats = circuit.getStats();
    expect(stats.measurements).toBe(2);
    expect(stats.conditionalGates).toBe(2);
    expect(circuit.gates.at(-2)).toEqual({
      type: 'x',
      qubit: 2,
      condition: { classicalBit: 1, value: 1 },
    });
    expect(circuit.gates.at(-1)).toEqual({
      type: 'z',
      qubit: 2,
      condition: { classicalBit: 0, value: 1 },
    });
  });

  it('rejects multi-qubit message tokens', () => {
    expect(() => teleportationCircuit(['CNOT'])).toThrow(ConfigurationError);
  });
});

describe('runTeleportation', () => {
  it('teleports X|0⟩ = |1⟩ on every shot', () => {
    const result = runTeleportation({ seed: 10 });
    expect(result.message).toEqual(['X']);
    expect(result.counts).toEqual({ '1': 1000 });
    expect(result.expectedProbabilityOne).toBe(1);
    expect(result.measuredProbabilityOne).toBe(1);
    expect(result.success).toBe(true);
    expect(result.minFidelity).toBeCloseTo(1, 9);
  });

  it('sees all four sender outcomes', () => {
    const result = runTeleportation({ seed: 11, shots: 400 });
    expect(Object.keys(result.senderCounts)).toEqual(['00', '01', '10', '11']);
    expect(totalShots(result.senderCounts)).toBe(400);
  });

  it('preserves a superposition', () => {
    const result = runTeleportation({ message: ['H'], seed: 12 });
    expect(result.expectedProbabilityOne).toBeCloseTo(0.5, 12);
    expect(result.measuredProbabilityOne).toBeGreaterThan(0.4);
    expect(result.measuredProbabilityOne).toBeLessThan(0.6);
    expect(result.success).toBe(true);
  });

  it('teleports an arbitrary state with fidelity 1', () => {
    const result = runTeleportation({ message: ['RY(1.2)', 'RZ(0.4)', 'T'], seed: 13, shots: 50 });
    expect(result.expectedProbabilityOne).toBeCloseTo(Math.sin(0.6) ** 2, 12);
    expect(result.minFidelity).toBeGreaterThan(1 - 1e-9);
    expect(result.success).toBe(true);
  });

  it('keeps |0⟩ for an empty message', () => {
    expect(runTeleportation({ message: [], seed: 14, shots: 20 }).counts).toEqual({ '0': 20 });
  });
});
