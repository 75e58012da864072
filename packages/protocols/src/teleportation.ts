/**
 * Quantum teleportation of a single-qubit message from qubit 0 to qubit 2.
 */

import {
  AmplitudeRegister,
  Circuit,
  Simulator,
  countSamples,
  mergeCounts,
  resolveRng,
  type Counts,
  type Matrix2,
} from '@qubit-lab/core';
import { assertPositiveInteger } from './encoding';
import type { ProtocolOptions, ShotOptions } from './types';

export const DEFAULT_MESSAGE: readonly string[] = ['X'];
export const DEFAULT_TELEPORTATION_SHOTS = 1000;
export const FIDELITY_TOLERANCE = 1e-9;

export interface TeleportationOptions extends ProtocolOptions, ShotOptions {
  /**
   * Gate tokens preparing the message on a single qubit
   */
  message?: readonly string[];
}

export interface TeleportationResult {
  message: string[];
  /**
   * Receiver measurements: '0' or '1'
   */
  counts: Counts;
  /**
   * Sender's Bell measurement as 'c1c0'
   */
  senderCounts: Counts;
  expectedProbabilityOne: number;
  measuredProbabilityOne: number;
  minFidelity: number;
  success: boolean;
  shots: number;
}

/**
 * Message on qubit 0, Bell pair on 1-2, Bell-basis measurement into c0/c1,
 * then X on qubit 2 if c1 and Z on qubit 2 if c0
 */
export function teleportationCircuit(message: readonly string[] = DEFAULT_MESSAGE): Circuit {
  const prepare = Circuit.fromTokens('message', 1, message);
  return new Circuit(3, 'Teleportation')
    .append(prepare, 0)
    .barrier()
    .h(1)
    .cnot(1, 2)
    .barrier()
    .cnot(0, 1)
    .h(0)
    .measure(0, 0)
    .measure(1, 1)
    .onClassical(1, 1, (c) => c.x(2))
    .onClassical(0, 1, (c) => c.z(2));
}

export function runTeleportation(options: TeleportationOptions = {}): TeleportationResult {
  const message = [...(options.message ?? DEFAULT_MESSAGE)];
  const shots = options.shots ?? DEFAULT_TELEPORTATION_SHOTS;
  assertPositiveInteger(shots, 'shots');

  const expected = Circuit.fromTokens('message', 1, message).apply(
    AmplitudeRegister.create({ numQubits: 1 })
  );
  const circuit = teleportationCircuit(message).freeze();
  const simulator = options.simulator ?? new Simulator();
  const rng = resolveRng(options);

  const received: string[] = [];
  const sender: string[] = [];
  let minFidelity = 1;

  for (let shot = 0; shot < shots; shot++) {
    const { register, classicalBits } = simulator.evolve(circuit, { rng });
    minFidelity = Math.min(minFidelity, stateFidelity(expected, register.reducedDensityMatrix(2)));
    sender.push(`${classicalBits[1]}${classicalBits[0]}`);
    received.push(String(register.measure(2, rng)));
  }

  const counts = mergeCounts(countSamples(received));

  return {
    message,
    counts,
    senderCounts: mergeCounts(countSamples(sender)),
    expectedProbabilityOne: expected.probabilityOne(0),
    measuredProbabilityOne: (counts['1'] ?? 0) / shots,
    minFidelity,
    success: minFidelity >= 1 - FIDELITY_TOLERANCE,
    shots,
  };
}

/**
 * ⟨ψ|ρ|ψ⟩ for a one-qubit pure state ψ and density matrix ρ
 */
function stateFidelity(psi: AmplitudeRegister, rho: Matrix2): number {
  const a = psi.amplitude(0);
  const b = psi.amplitude(1);
  const [r00, r01, r10, r11] = rho;
  // ρψ
  const x = {
    real: r00.real * a.real - r00.imag * a.imag + r01.real * b.real - r01.imag * b.imag,
    imag: r00.real * a.imag + r00.imag * a.real + r01.real * b.imag + r01.imag * b.real,
  };
  const y = {
    real: r10.real * a.real - r10.imag * a.imag + r11.real * b.real - r11.imag * b.imag,
    imag: r10.real * a.imag + r10.imag * a.real + r11.real * b.imag + r11.imag * b.real,
  };
  // Re ⟨ψ|ρψ⟩
  return a.real * x.real + a.imag * x.imag + b.real * y.real + b.imag * y.imag;
}
