import {
  AmplitudeRegister,
  Simulator,
  bellCircuit,
  classicalFidelity,
  type Counts,
} from '@qubit-lab/core';
import { assertPositiveInteger } from './encoding';
import type { ProtocolOptions, ShotOptions } from './types';

export const DEFAULT_BELL_SHOTS = 1024;

/**
 * Ideal readout distribution of (|00⟩ + |11⟩)/√2
 */
export const IDEAL_BELL_DISTRIBUTION: Readonly<Record<string, number>> = Object.freeze({
  '00': 0.5,
  '11': 0.5,
});

export interface BellStateResult {
  counts: Counts;
  probabilities: Record<string, number>;
  /**
   * Von Neumann entropy of qubit 0 (1 for a maximally entangled pair)
   */
  entanglementEntropy: number;
  /**
   * Classical fidelity of the measured distribution against the ideal one
   */
  fidelity: number;
  shots: number;
}

export function runBellState(options: ProtocolOptions & ShotOptions = {}): BellStateResult {
  const shots = options.shots ?? DEFAULT_BELL_SHOTS;
  assertPositiveInteger(shots, 'shots');
  const simulator = options.simulator ?? new Simulator();
  const circuit = bellCircuit().freeze();
  const result = simulator.run(circuit, { shots, rng: options.rng, seed: options.seed });
  const register = AmplitudeRegister.create({
    numQubits: circuit.numQubits,
    amplitudes: result.finalAmplitudes,
  });

  return {
    counts: result.counts,
    probabilities: result.probabilities,
    entanglementEntropy: register.entanglementEntropy(0),
    fidelity: classicalFidelity(IDEAL_BELL_DISTRIBUTION, result.counts),
    shots,
  };
}
