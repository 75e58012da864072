/**
 * Quantum Fourier Transform
 *
 * QFT|y⟩ = 1/√N Σ_x e^(2πi·xy/N) |x⟩ with N = 2^n and qubit i as bit i of
 * both x and y.
 */

import {
  AmplitudeRegister,
  Circuit,
  InvalidArgumentError,
  assertQubitCount,
  type CircuitStats,
  type Complex,
} from '@qubit-lab/core';

export interface QftOptions {
  /**
   * Basis state to transform (defaults to |0...0⟩)
   */
  input?: number;
}

export interface QftResult {
  numQubits: number;
  input: number;
  stats: CircuitStats;
  qasm: string;
  /**
   * Amplitudes of QFT|input⟩
   */
  amplitudes: Complex[];
  inverseStats: CircuitStats;
}

/**
 * Append the QFT on `qubits` (qubits[0] least significant): Hadamard on the
 * highest untransformed qubit, controlled phases π/2^distance from each
 * lower qubit, repeat downwards, then reverse the qubit order with SWAPs.
 */
export function appendQft(circuit: Circuit, qubits: readonly number[]): Circuit {
  for (let j = qubits.length - 1; j >= 0; j--) {
    circuit.h(qubits[j]);
    for (let k = j - 1; k >= 0; k--) {
      circuit.cphase(qubits[k], qubits[j], Math.PI / 2 ** (j - k));
    }
  }
  for (let i = 0; i < Math.floor(qubits.length / 2); i++) {
    circuit.swap(qubits[i], qubits[qubits.length - 1 - i]);
  }
  return circuit;
}

export function qftCircuit(numQubits: number): Circuit {
  const circuit = new Circuit(numQubits, 'QFT');
  return appendQft(circuit, range(numQubits));
}

export function inverseQftCircuit(numQubits: number): Circuit {
  return qftCircuit(numQubits).inverse();
}

/**
 * Build the QFT, report its shape and transform one basis state
 */
export function runQft(numQubits: number, options: QftOptions = {}): QftResult {
  assertQubitCount(numQubits);
  const input = options.input ?? 0;
  if (!Number.isInteger(input) || input < 0 || input >= 2 ** numQubits) {
    throw new InvalidArgumentError(
      `input must be a basis state in [0, ${2 ** numQubits - 1}], got ${input}`,
      'input'
    );
  }

  const circuit = qftCircuit(numQubits).freeze();
  const register = AmplitudeRegister.create({ numQubits });
  for (let q = 0; q < numQubits; q++) {
    if ((input >> q) & 1) {
      register.x(q);
    }
  }
  circuit.apply(register);

  return {
    numQubits,
    input,
    stats: circuit.getStats(),
    qasm: circuit.toQASM(),
    amplitudes: register.getAmplitudes(),
    inverseStats: circuit.inverse().getStats(),
  };
}

export function range(n: number, start: number = 0): number[] {
  return Array.from({ length: n }, (_, i) => start + i);
}
