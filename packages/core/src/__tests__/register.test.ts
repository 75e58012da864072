/**
 * Tests for AmplitudeRegister
 */

import { describe, it, expect } from 'vitest';
import { AmplitudeRegister, MAX_QUBITS } from '../register';
import { IndexError, InvalidArgumentError } from '../errors';
import { complex } from '../complex';

function basisIndex(register: AmplitudeRegister): number {
  return Array.from(register.getProbabilities()).findIndex((p) => Math.abs(p - 1) < 1e-12);
}

describe('Register Creation', () => {
  it('starts in |0...0⟩', () => {
    const reg = AmplitudeRegister.create({ numQubits: 2 });
    expect(reg.numQubits).toBe(2);
    expect(reg.stateDim).toBe(4);
    expect(Array.from(reg.getProbabilities())).toEqual([1, 0, 0, 0]);
  });

  it('accepts a normalized initial state', () => {
    const s = Math.SQRT1_2;
    const reg = AmplitudeRegister.create({
      numQubits: 1,
      amplitudes: [complex(s), complex(0, s)],
    });
    expect(reg.amplitude(1)).toEqual({ real: 0, imag: s });
  });

  it('rejects bad qubit counts', () => {
    expect(() => AmplitudeRegister.create({ numQubits: 0 })).toThrow(InvalidArgumentError);
    expect(() => AmplitudeRegister.create({ numQubits: MAX_QUBITS + 1 })).toThrow(
      `numQubits must be an integer between 1 and ${MAX_QUBITS}, got ${MAX_QUBITS + 1}`
    );
    expect(() => AmplitudeRegister.create({ numQubits: 1.5 })).toThrow(InvalidArgumentError);
  });

  it('rejects unnormalized or wrongly sized amplitudes', () => {
    expect(() =>
      AmplitudeRegister.create({ numQubits: 1, amplitudes: [complex(1), complex(1)] })
    ).toThrow(InvalidArgumentError);
    expect(() => AmplitudeRegister.create({ numQubits: 2, amplitudes: [complex(1)] })).toThrow(
      'Expected 4 amplitudes, got 1'
    );
    expect(() =>
      AmplitudeRegister.create({ numQubits: 1, amplitudes: [complex(Number.NaN), complex(0)] })
    ).toThrow('Amplitudes must be finite');
  });

  it('clones independently', () => {
    const reg = AmplitudeRegister.create({ numQubits: 1 });
    const copy = reg.clone();
    reg.x(0);
    expect(copy.probability(0)).toBe(1);
    expect(reg.probability(1)).toBe(1);
  });

  it('resets to |0...0⟩', () => {
    const reg = AmplitudeRegister.create({ numQubits: 2 }).x(0).x(1);
    reg.reset();
    expect(reg.probability(0)).toBe(1);
  });
});

describe('Bit Ordering', () => {
  it('qubit i is bit i of the basis index', () => {
    expect(basisIndex(AmplitudeRegister.create({ numQubits: 3 }).x(0))).toBe(1);
    expect(basisIndex(AmplitudeRegister.create({ numQubits: 3 }).x(2))).toBe(4);
    expect(basisIndex(AmplitudeRegister.create({ numQubits: 3 }).x(1).x(2))).toBe(6);
  });
});

describe('Gate Application', () => {
  it('H creates an equal superposition', () => {
    const probs = AmplitudeRegister.create({ numQubits: 1 }).h(0).getProbabilities();
    expect(probs[0]).toBeCloseTo(0.5, 12);
    expect(probs[1]).toBeCloseTo(0.5, 12);
  });

  it('H then CNOT gives a Bell state', () => {
    const probs = AmplitudeRegister.create({ numQubits: 2 }).h(0).cnot(0, 1).getProbabilities();
    expect(probs[0]).toBeCloseTo(0.5, 12);
    expect(probs[1]).toBe(0);
    expect(probs[2]).toBe(0);
    expect(probs[3]).toBeCloseTo(0.5, 12);
  });

  it('Y maps |0⟩ to i|1⟩', () => {
    const reg = AmplitudeRegister.create({ numQubits: 1 }).y(0);
    expect(reg.amplitude(1)).toEqual({ real: 0, imag: 1 });
  });

  it('SWAP exchanges bit positions', () => {
    const reg = AmplitudeRegister.create({ numQubits: 3 }).x(0).swap(0, 2);
    expect(basisIndex(reg)).toBe(4);
  });

  it('SWAP rejects a repeated qubit', () => {
    const reg = AmplitudeRegister.create({ numQubits: 2 });
    expect(() => reg.swap(1, 1)).toThrow(InvalidArgumentError);
    expect(() => reg.swap(1, 1)).toThrow('Gate qubits must be different, got [1, 1]');
  });

  it('MCX flips the target only when every control is set', () => {
    expect(basisIndex(AmplitudeRegister.create({ numQubits: 3 }).x(0).mcx([0, 1], 2))).toBe(1);
    expect(basisIndex(AmplitudeRegister.create({ numQubits: 3 }).x(0).x(1).mcx([0, 1], 2))).toBe(7);
  });

  it('MCZ negates only the all-ones amplitude', () => {
    const reg = AmplitudeRegister.create({ numQubits: 2 }).h(0).h(1).mcz([0], 1);
    const amps = reg.getAmplitudes();
    expect(amps[0].real).toBeCloseTo(0.5, 12);
    expect(amps[1].real).toBeCloseTo(0.5, 12);
    expect(amps[2].real).toBeCloseTo(0.5, 12);
    expect(amps[3].real).toBeCloseTo(-0.5, 12);
  });

  it('controlled phase multiplies |11⟩ by e^(iθ)', () => {
    const reg = AmplitudeRegister.create({ numQubits: 2 }).x(0).x(1).cphase(0, 1, Math.PI / 2);
    const a = reg.amplitude(3);
    expect(a.real).toBeCloseTo(0, 12);
    expect(a.imag).toBeCloseTo(1, 12);
  });

  it('rejects out-of-range qubits', () => {
    const reg = AmplitudeRegister.create({ numQubits: 3 });
    expect(() => reg.h(3)).toThrow(IndexError);
    expect(() => reg.h(-1)).toThrow('Qubit index -1 out of range [0, 2]');
    expect(() => reg.cnot(0, 5)).toThrow(IndexError);
  });

  it('rejects repeated qubits', () => {
    const reg = AmplitudeRegister.create({ numQubits: 3 });
    expect(() => reg.cnot(1, 1)).toThrow(InvalidArgumentError);
    expect(() => reg.mcx([0, 0], 2)).toThrow('Gate qubits must be different, got [0, 0, 2]');
  });

  it('rejects non-finite angles', () => {
    const reg = AmplitudeRegister.create({ numQubits: 1 });
    expect(() => reg.rz(0, Number.NaN)).toThrow(InvalidArgumentError);
  });
});

describe('Probabilities', () => {
  it('computes single-qubit marginals', () => {
    const reg = AmplitudeRegister.create({ numQubits: 2 }).x(1).h(0);
    expect(reg.probabilityOne(1)).toBe(1);
    expect(reg.probabilityZero(1)).toBe(0);
    expect(reg.probabilityOne(0)).toBeCloseTo(0.5, 12);
  });

  it('orders marginal outcomes by the listed qubits', () => {
    const reg = AmplitudeRegister.create({ numQubits: 3 }).x(1);
    expect(Array.from(reg.marginalProbabilities([1]))).toEqual([0, 1]);
    // bit 0 ← q2 = 0, bit 1 ← q1 = 1
    expect(Array.from(reg.marginalProbabilities([2, 1]))).toEqual([0, 0, 1, 0]);
  });

  it('rejects out-of-range basis states', () => {
    const reg = AmplitudeRegister.create({ numQubits: 1 });
    expect(() => reg.probability(2)).toThrow('Basis state index 2 out of range [0, 1]');
  });
});

describe('Measurement', () => {
  it('collapses a Bell pair consistently', () => {
    const reg = AmplitudeRegister.create({ numQubits: 2 }).h(0).cnot(0, 1);
    // 0.1 < P(0) = 0.5
    expect(reg.measure(0, () => 0.1)).toBe(0);
    expect(reg.probability(0)).toBeCloseTo(1, 12);
    expect(reg.measure(1, () => 0.99)).toBe(0);
  });

  it('picks |1⟩ when the draw exceeds P(0)', () => {
    const reg = AmplitudeRegister.create({ numQubits: 2 }).h(0).cnot(0, 1);
    expect(reg.measure(0, () => 0.7)).toBe(1);
    expect(reg.probability(3)).toBeCloseTo(1, 12);
    reg.assertNormalized();
  });

  it('refuses to collapse onto an impossible outcome', () => {
    const reg = AmplitudeRegister.create({ numQubits: 1 });
    expect(() => reg.collapse(0, 1)).toThrow(InvalidArgumentError);
  });
});

describe('State Properties', () => {
  it('reduced density matrix of |+⟩ has all entries 1/2', () => {
    const rho = AmplitudeRegister.create({ numQubits: 1 }).h(0).reducedDensityMatrix(0);
    for (const entry of rho) {
      expect(entry.real).toBeCloseTo(0.5, 12);
      expect(entry.imag).toBeCloseTo(0, 12);
    }
  });

  it('entanglement entropy is 1 for a Bell pair and 0 for a product state', () => {
    const bell = AmplitudeRegister.create({ numQubits: 2 }).h(0).cnot(0, 1);
    expect(bell.entanglementEntropy(0)).toBeCloseTo(1, 10);
    const product = AmplitudeRegister.create({ numQubits: 2 }).h(0).x(1);
    expect(product.entanglementEntropy(0)).toBeCloseTo(0, 10);
  });

  it('computes fidelity |⟨ψ|φ⟩|²', () => {
    const zero = AmplitudeRegister.create({ numQubits: 1 });
    const plus = AmplitudeRegister.create({ numQubits: 1 }).h(0);
    const one = AmplitudeRegister.create({ numQubits: 1 }).x(0);
    expect(zero.fidelity(zero.clone())).toBe(1);
    expect(zero.fidelity(plus)).toBeCloseTo(0.5, 12);
    expect(zero.fidelity(one)).toBe(0);
    expect(() => zero.fidelity(AmplitudeRegister.create({ numQubits: 2 }))).toThrow(
      InvalidArgumentError
    );
  });
});
