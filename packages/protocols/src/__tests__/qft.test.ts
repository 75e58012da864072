/**
 * Tests for the Quantum Fourier Transform
 */

import { describe, it, expect } from 'vitest';
import { AmplitudeRegister, Circuit, InvalidArgumentError, vectorsEqual } from '@qubit-lab/core';
import { appendQft, inverseQftCircuit, qftCircuit, runQft } from '../qft';

describe('QFT Construction', () => {
  it('builds the 2-qubit QFT', () => {
    expect(qftCircuit(2).gates).toEqual([
      { type: 'h', qubit: 1 },
      { type: 'cphase', control: 0, target: 1, theta: Math.PI / 2 },
      { type: 'h', qubit: 0 },
      { type: 'swap', control: 0, target: 1 },
    ]);
  });

  it('uses π/2^distance for the controlled phases', () => {
    const phases = qftCircuit(3).gates.flatMap((g) => (g.type === 'cphase' ? [g.theta] : []));
    expect(phases).toEqual([Math.PI / 2, Math.PI / 4, Math.PI / 2]);
  });

  it('acts on a qubit subset when appended', () => {
    const circuit = appendQft(new Circuit(3), [1, 2]);
    expect(circuit.gates[0]).toEqual({ type: 'h', qubit: 2 });
    expect(circuit.gates[3]).toEqual({ type: 'swap', control: 1, target: 2 });
  });

  it('inverse QFT reverses the gates with negated phases', () => {
    const inverse = inverseQftCircuit(2);
    expect(inverse.gates).toEqual([
      { type: 'swap', control: 0, target: 1 },
      { type: 'h', qubit: 0 },
      { type: 'cphase', control: 0, target: 1, theta: -Math.PI / 2 },
      { type: 'h', qubit: 1 },
    ]);
  });
});

describe('QFT Semantics', () => {
  it('maps |y⟩ to Σ e^(2πi·xy/N)|x⟩ / √N', () => {
    const n = 3;
    const N = 2 ** n;
    for (const y of [0, 1, 5]) {
      const { amplitudes } = runQft(n, { input: y });
      amplitudes.forEach((a, x) => {
        const angle = (2 * Math.PI * x * y) / N;
        expect(a.real).toBeCloseTo(Math.cos(angle) / Math.sqrt(N), 12);
        expect(a.imag).toBeCloseTo(Math.sin(angle) / Math.sqrt(N), 12);
      });
    }
  });

  it('QFT followed by inverse QFT is the identity for n ≤ 6', () => {
    for (let n = 1; n <= 6; n++) {
      const prepare = new Circuit(n);
      for (let q = 0; q < n; q++) {
        prepare.ry(q, 0.3 + 0.2 * q).rz(q, 0.7 * q);
      }
      for (let q = 0; q + 1 < n; q++) {
        prepare.cnot(q, q + 1);
      }

      const original = prepare.apply(AmplitudeRegister.create({ numQubits: n }));
      const roundTrip = original.clone();
      qftCircuit(n).apply(roundTrip);
      inverseQftCircuit(n).apply(roundTrip);

      expect(vectorsEqual(roundTrip.getAmplitudes(), original.getAmplitudes(), 1e-9)).toBe(true);
    }
  });
});

describe('runQft', () => {
  it('reports gate statistics and QASM', () => {
    const result = runQft(3);
    expect(result.stats.totalGates).toBe(7);
    expect(result.stats.gateBreakdown).toEqual({ h: 3, cphase: 3, swap: 1 });
    expect(result.inverseStats.totalGates).toBe(7);
    expect(result.qasm.split('\n')[5]).toBe('h q[2];');
    expect(result.input).toBe(0);
  });

  it('rejects inputs outside the register', () => {
    expect(() => runQft(2, { input: 4 })).toThrow(InvalidArgumentError);
    expect(() => runQft(2, { input: -1 })).toThrow('input must be a basis state in [0, 3], got -1');
    expect(() => runQft(0)).toThrow(InvalidArgumentError);
  });
});
