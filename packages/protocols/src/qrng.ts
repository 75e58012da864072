/**
 * Quantum random number generation: Hadamard on every qubit, one readout.
 *
 * Requests wider than one register are split into chunks; the chunks are
 * independent and identically distributed, so concatenating them gives the
 * same distribution as one wide register.
 */

import {
  InvalidArgumentError,
  Simulator,
  resolveRng,
  superpositionCircuit,
} from '@qubit-lab/core';
import { assertPositiveInteger, binaryToBigInt, binaryToHex } from './encoding';
import type { ProtocolOptions } from './types';

export const DEFAULT_CHUNK_QUBITS = 8;
export const MAX_RANDOM_BITS = 1 << 16;

export interface QuantumRandomOptions extends ProtocolOptions {
  /**
   * Qubits per register chunk
   */
  chunkQubits?: number;
}

export interface QuantumRandomResult {
  numBits: number;
  /**
   * Big-endian bitstring
   */
  binary: string;
  decimal: bigint;
  hex: string;
  /**
   * Bits of entropy (one per measured |+⟩ qubit)
   */
  entropy: number;
  chunks: number;
}

export function quantumRandom(
  numBits: number,
  options: QuantumRandomOptions = {}
): QuantumRandomResult {
  assertPositiveInteger(numBits, 'numBits');
  if (numBits > MAX_RANDOM_BITS) {
    throw new InvalidArgumentError(
      `numBits must be at most ${MAX_RANDOM_BITS}, got ${numBits}`,
      'numBits'
    );
  }
  const chunkQubits = options.chunkQubits ?? DEFAULT_CHUNK_QUBITS;
  assertPositiveInteger(chunkQubits, 'chunkQubits');

  const simulator = options.simulator ?? new Simulator();
  const rng = resolveRng(options);
  const parts: string[] = [];
  const full = superpositionCircuit(chunkQubits).freeze();

  for (let remaining = numBits; remaining > 0; remaining -= chunkQubits) {
    const circuit =
      remaining >= chunkQubits ? full : superpositionCircuit(remaining).freeze();
    parts.push(simulator.measureSingle(circuit, { rng }).bitString);
  }

  const binary = parts.join('');
  return {
    numBits,
    binary,
    decimal: binaryToBigInt(binary),
    hex: binaryToHex(binary),
    entropy: numBits,
    chunks: parts.length,
  };
}
