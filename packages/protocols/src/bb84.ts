/**
 * BB84 quantum key distribution.
 *
 * Each trial sends one qubit: the sender encodes a random bit in a random
 * basis (rectilinear or diagonal), an optional eavesdropper measures and
 * resends it, the channel may flip it, and the receiver measures in a random
 * basis. Trials whose bases match are kept (sifting).
 */

import {
  Circuit,
  InvalidArgumentError,
  Simulator,
  randomBit,
  resolveRng,
} from '@qubit-lab/core';
import { assertPositiveInteger, binaryToHex } from './encoding';
import type { ProtocolOptions } from './types';

/**
 * 0 = rectilinear (Z), 1 = diagonal (X)
 */
export type Basis = 0 | 1;

export type SecurityLevel = 'HIGH' | 'COMPROMISED';

/**
 * Error rates at or above this are treated as evidence of interception
 */
export const SECURITY_THRESHOLD = 0.11;

/**
 * Trials attempted per requested key bit
 */
export const TRIALS_PER_KEY_BIT = 2;

export interface NoiseModel {
  /**
   * Probability that the channel flips the qubit (X) in transit
   */
  bitFlipProbability: number;
}

export interface BB84Options extends ProtocolOptions {
  noise?: NoiseModel;
  /**
   * Insert an intercept-resend eavesdropper on the channel
   */
  eavesdropper?: boolean;
  /**
   * Return every trial in `sessions`
   */
  recordSessions?: boolean;
}

export interface BB84Session {
  senderBit: 0 | 1;
  senderBasis: Basis;
  receiverBasis: Basis;
  measuredBit: 0 | 1;
  eavesdropperBasis?: Basis;
  channelFlipped: boolean;
}

export interface BB84Result {
  requestedLength: number;
  /**
   * Sender's sifted bits
   */
  key: (0 | 1)[];
  binary: string;
  hex: string;
  keyLength: number;
  trials: number;
  /**
   * Fraction of sifted bits the receiver measured differently
   */
  errorRate: number;
  /**
   * Sifted bits per trial
   */
  efficiency: number;
  securityLevel: SecurityLevel;
  /**
   * True when fewer than `requestedLength` bits survived sifting
   */
  partial: boolean;
  eavesdropper: boolean;
  sessions?: BB84Session[];
}

/**
 * The one-qubit circuit of a single trial, without the final readout
 */
export function bb84TrialCircuit(trial: {
  senderBit: 0 | 1;
  senderBasis: Basis;
  receiverBasis: Basis;
  eavesdropperBasis?: Basis;
  channelFlipped?: boolean;
}): Circuit {
  const circuit = new Circuit(1, 'BB84');
  if (trial.senderBit === 1) circuit.x(0);
  if (trial.senderBasis === 1) circuit.h(0);

  if (trial.eavesdropperBasis !== undefined) {
    // Intercept-resend in the eavesdropper's basis
    if (trial.eavesdropperBasis === 1) circuit.h(0);
    circuit.measure(0, 0);
    if (trial.eavesdropperBasis === 1) circuit.h(0);
  }

  if (trial.channelFlipped) circuit.x(0);
  if (trial.receiverBasis === 1) circuit.h(0);
  return circuit;
}

export function runBB84(keyLength: number, options: BB84Options = {}): BB84Result {
  assertPositiveInteger(keyLength, 'keyLength');
  const flipProbability = options.noise?.bitFlipProbability ?? 0;
  if (!(flipProbability >= 0 && flipProbability <= 1)) {
    throw new InvalidArgumentError(
      `bitFlipProbability must be in [0, 1], got ${flipProbability}`,
      'bitFlipProbability'
    );
  }

  const rng = resolveRng(options);
  const simulator = options.simulator ?? new Simulator();
  const eavesdropper = options.eavesdropper ?? false;
  const maxTrials = TRIALS_PER_KEY_BIT * keyLength;

  const key: (0 | 1)[] = [];
  const sessions: BB84Session[] = [];
  let errors = 0;
  let trials = 0;

  while (trials < maxTrials && key.length < keyLength) {
    trials++;
    const senderBit = randomBit(rng);
    const senderBasis = randomBit(rng);
    const receiverBasis = randomBit(rng);
    const eavesdropperBasis = eavesdropper ? randomBit(rng) : undefined;
    const channelFlipped = flipProbability > 0 && rng() < flipProbability;

    const circuit = bb84TrialCircuit({
      senderBit,
      senderBasis,
      receiverBasis,
      eavesdropperBasis,
      channelFlipped,
    });
    const { bitString } = simulator.measureSingle(circuit, { rng });
    const measuredBit = bitString === '1' ? 1 : 0;

    if (options.recordSessions) {
      sessions.push({
        senderBit,
        senderBasis,
        receiverBasis,
        measuredBit,
        eavesdropperBasis,
        channelFlipped,
      });
    }

    if (senderBasis === receiverBasis) {
      key.push(senderBit);
      if (measuredBit !== senderBit) {
        errors++;
      }
    }
  }

  const errorRate = key.length > 0 ? errors / key.length : 0;
  const binary = key.join('');

  return {
    requestedLength: keyLength,
    key,
    binary,
    hex: binaryToHex(binary),
    keyLength: key.length,
    trials,
    errorRate,
    efficiency: trials > 0 ? key.length / trials : 0,
    securityLevel: errorRate < SECURITY_THRESHOLD ? 'HIGH' : 'COMPROMISED',
    partial: key.length < keyLength,
    eavesdropper,
    sessions: options.recordSessions ? sessions : undefined,
  };
}
