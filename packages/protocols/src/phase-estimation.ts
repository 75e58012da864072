/**
 * Quantum phase estimation of U = P(2π·phase) on its eigenstate |1⟩.
 *
 * Counting qubits 0..n-1, eigenstate qubit n. Counting qubit i controls U
 * applied 2^i times; the inverse QFT then leaves phase·2^n in the counting
 * register.
 */

import {
  Circuit,
  InvalidArgumentError,
  Simulator,
  toProbabilities,
  type Counts,
} from '@qubit-lab/core';
import { assertPositiveInteger } from './encoding';
import { inverseQftCircuit, range } from './qft';
import type { ProtocolOptions, ShotOptions } from './types';

export const DEFAULT_PHASE = 0.5;
export const DEFAULT_PHASE_ESTIMATION_SHOTS = 100;

/**
 * Counting qubit n-1 alone contributes 2^(n-1) controlled-U gates
 */
export const MAX_COUNTING_QUBITS = 12;

export interface PhaseEstimationOptions extends ProtocolOptions, ShotOptions {
  /**
   * Eigenphase in [0, 1). The default 0.5 makes U a controlled-Z.
   */
  phase?: number;
}

export interface PhaseEstimationResult {
  countingQubits: number;
  phase: number;
  estimatedPhase: number;
  bitString: string;
  /**
   * Frequency of the most common outcome
   */
  confidence: number;
  /**
   * |estimatedPhase - phase|
   */
  error: number;
  counts: Counts;
  probabilities: Record<string, number>;
  shots: number;
}

export function phaseEstimationCircuit(countingQubits: number, phase: number): Circuit {
  if (!Number.isInteger(countingQubits) || countingQubits < 1 || countingQubits > MAX_COUNTING_QUBITS) {
    throw new InvalidArgumentError(
      `countingQubits must be an integer between 1 and ${MAX_COUNTING_QUBITS}, got ${countingQubits}`,
      'countingQubits'
    );
  }
  if (!Number.isFinite(phase) || phase < 0 || phase >= 1) {
    throw new InvalidArgumentError(`phase must be in [0, 1), got ${phase}`, 'phase');
  }

  const eigen = countingQubits;
  const angle = 2 * Math.PI * phase;
  const circuit = new Circuit(countingQubits + 1, 'PhaseEstimation').x(eigen);

  for (let q = 0; q < countingQubits; q++) {
    circuit.h(q);
  }
  for (let q = 0; q < countingQubits; q++) {
    for (let rep = 0; rep < 2 ** q; rep++) {
      circuit.cphase(q, eigen, angle);
    }
  }
  return circuit.append(inverseQftCircuit(countingQubits), 0);
}

export function runPhaseEstimation(
  countingQubits: number,
  options: PhaseEstimationOptions = {}
): PhaseEstimationResult {
  const phase = options.phase ?? DEFAULT_PHASE;
  const shots = options.shots ?? DEFAULT_PHASE_ESTIMATION_SHOTS;
  assertPositiveInteger(shots, 'shots');
  const circuit = phaseEstimationCircuit(countingQubits, phase).freeze();

  const simulator = options.simulator ?? new Simulator();
  const result = simulator.run(circuit, {
    shots,
    measuredQubits: range(countingQubits),
    rng: options.rng,
    seed: options.seed,
  });

  const estimatedPhase = parseInt(result.mostLikely, 2) / 2 ** countingQubits;

  return {
    countingQubits,
    phase,
    estimatedPhase,
    bitString: result.mostLikely,
    confidence: result.counts[result.mostLikely] / shots,
    error: Math.abs(estimatedPhase - phase),
    counts: result.counts,
    probabilities: toProbabilities(result.counts),
    shots,
  };
}
