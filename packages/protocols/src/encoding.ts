/**
 * Bitstring encodings shared by the key and random-number protocols.
 */

import { InvalidArgumentError } from '@qubit-lab/core';

const BINARY = /^[01]*$/;

/**
 * Upper-case hex of a big-endian bitstring, one digit per started nibble
 */
export function binaryToHex(binary: string): string {
  if (!BINARY.test(binary)) {
    throw new InvalidArgumentError(`Not a bitstring: '${binary}'`, 'binary');
  }
  if (binary.length === 0) {
    return '';
  }
  return BigInt(`0b${binary}`)
    .toString(16)
    .toUpperCase()
    .padStart(Math.ceil(binary.length / 4), '0');
}

export function binaryToBigInt(binary: string): bigint {
  if (!BINARY.test(binary)) {
    throw new InvalidArgumentError(`Not a bitstring: '${binary}'`, 'binary');
  }
  return binary.length === 0 ? 0n : BigInt(`0b${binary}`);
}

export function assertPositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError(`${name} must be a positive integer, got ${value}`, name);
  }
}
