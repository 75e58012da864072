/**
 * Grover search for a single marked basis state.
 */

import {
  Circuit,
  InvalidArgumentError,
  Simulator,
  assertQubitCount,
  magnitudeSquared,
  toBitString,
  type Counts,
} from '@qubit-lab/core';
import { assertPositiveInteger } from './encoding';
import { range } from './qft';
import type { ProtocolOptions, ShotOptions } from './types';

export const DEFAULT_GROVER_SHOTS = 1024;

export interface GroverOptions extends ProtocolOptions, ShotOptions {
  /**
   * Override the optimal iteration count
   */
  iterations?: number;
}

export interface GroverResult {
  numQubits: number;
  markedItem: number;
  markedBitString: string;
  iterations: number;
  foundItem: number;
  foundBitString: string;
  /**
   * Fraction of shots that returned the marked item
   */
  probability: number;
  /**
   * |amplitude of the marked item|² before readout
   */
  theoreticalProbability: number;
  success: boolean;
  counts: Counts;
  shots: number;
}

/**
 * ⌊π/4 · √(2^n)⌋
 */
export function optimalIterations(numQubits: number): number {
  return Math.floor((Math.PI / 4) * Math.sqrt(2 ** numQubits));
}

/**
 * Phase-flip the marked state: X on its zero bits, multi-controlled Z, X again
 */
export function appendOracle(circuit: Circuit, numQubits: number, marked: number): Circuit {
  const zeroBits = range(numQubits).filter((q) => ((marked >> q) & 1) === 0);
  for (const q of zeroBits) circuit.x(q);
  circuit.mcz(range(numQubits - 1), numQubits - 1);
  for (const q of zeroBits) circuit.x(q);
  return circuit;
}

/**
 * Inversion about the mean: H⊗ⁿ X⊗ⁿ MCZ X⊗ⁿ H⊗ⁿ
 */
export function appendDiffusion(circuit: Circuit, numQubits: number): Circuit {
  const all = range(numQubits);
  for (const q of all) circuit.h(q);
  for (const q of all) circuit.x(q);
  circuit.mcz(range(numQubits - 1), numQubits - 1);
  for (const q of all) circuit.x(q);
  for (const q of all) circuit.h(q);
  return circuit;
}

export function groverCircuit(
  numQubits: number,
  marked: number,
  iterations: number = optimalIterations(numQubits)
): Circuit {
  assertQubitCount(numQubits);
  assertMarked(numQubits, marked);
  if (!Number.isInteger(iterations) || iterations < 0) {
    throw new InvalidArgumentError(
      `iterations must be a non-negative integer, got ${iterations}`,
      'iterations'
    );
  }

  const circuit = new Circuit(numQubits, `Grover(${marked})`);
  for (let q = 0; q < numQubits; q++) {
    circuit.h(q);
  }
  for (let i = 0; i < iterations; i++) {
    appendOracle(circuit, numQubits, marked);
    appendDiffusion(circuit, numQubits);
  }
  return circuit;
}

export function runGrover(
  numQubits: number,
  marked: number,
  options: GroverOptions = {}
): GroverResult {
  const shots = options.shots ?? DEFAULT_GROVER_SHOTS;
  assertPositiveInteger(shots, 'shots');
  const iterations = options.iterations ?? optimalIterations(numQubits);
  const circuit = groverCircuit(numQubits, marked, iterations).freeze();

  const simulator = options.simulator ?? new Simulator();
  const result = simulator.run(circuit, { shots, rng: options.rng, seed: options.seed });

  const markedBitString = toBitString(marked, numQubits);
  const foundBitString = result.mostLikely;
  const foundItem = parseInt(foundBitString, 2);

  return {
    numQubits,
    markedItem: marked,
    markedBitString,
    iterations,
    foundItem,
    foundBitString,
    probability: (result.counts[markedBitString] ?? 0) / shots,
    theoreticalProbability: magnitudeSquared(result.finalAmplitudes[marked]),
    success: foundItem === marked,
    counts: result.counts,
    shots,
  };
}

function assertMarked(numQubits: number, marked: number): void {
  if (!Number.isInteger(marked) || marked < 0 || marked >= 2 ** numQubits) {
    throw new InvalidArgumentError(
      `Marked item must be in [0, ${2 ** numQubits - 1}], got ${marked}`,
      'marked'
    );
  }
}
