/**
 * Tests for quantum random number generation and bit encodings
 */

import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from '@qubit-lab/core';
import { MAX_RANDOM_BITS, quantumRandom } from '../qrng';
import { binaryToBigInt, binaryToHex } from '../encoding';

describe('quantumRandom', () => {
  it('returns the requested number of bits in every encoding', () => {
    const result = quantumRandom(40, { seed: 9 });
    expect(result.binary).toMatch(/^[01]{40}$/);
    expect(result.chunks).toBe(5);
    expect(result.decimal).toBe(BigInt(`0b${result.binary}`));
    expect(result.hex).toBe(result.decimal.toString(16).toUpperCase().padStart(10, '0'));
    expect(result.entropy).toBe(40);
  });

  it('splits wide requests into register-sized chunks', () => {
    expect(quantumRandom(10, { seed: 1, chunkQubits: 4 }).chunks).toBe(3);
    expect(quantumRandom(16, { seed: 1 }).chunks).toBe(2);
    expect(quantumRandom(17, { seed: 1 }).chunks).toBe(3);
  });

  it('is reproducible for a fixed seed', () => {
    expect(quantumRandom(64, { seed: 77 }).binary).toBe(quantumRandom(64, { seed: 77 }).binary);
  });

  it('produces balanced bits', () => {
    const { binary } = quantumRandom(4000, { seed: 2024 });
    const ones = binary.split('').filter((b) => b === '1').length;
    expect(ones / 4000).toBeGreaterThan(0.45);
    expect(ones / 4000).toBeLessThan(0.55);
  });

  it('fills the largest request within the test timeout', () => {
    const result = quantumRandom(MAX_RANDOM_BITS, { seed: 3 });
    expect(result.binary).toHaveLength(MAX_RANDOM_BITS);
    expect(result.chunks).toBe(MAX_RANDOM_BITS / 8);
    expect(result.hex).toHaveLength(MAX_RANDOM_BITS / 4);
  });

  it('rejects invalid sizes', () => {
    expect(() => quantumRandom(0)).toThrow(InvalidArgumentError);
    expect(() => quantumRandom(MAX_RANDOM_BITS + 1)).toThrow(InvalidArgumentError);
    expect(() => quantumRandom(8, { chunkQubits: 0 })).toThrow(InvalidArgumentError);
  });
});

describe('Bit Encodings', () => {
  it('converts bitstrings to upper-case hex, one digit per started nibble', () => {
    expect(binaryToHex('')).toBe('');
    expect(binaryToHex('1010')).toBe('A');
    expect(binaryToHex('00001111')).toBe('0F');
    expect(binaryToHex('101')).toBe('5');
    expect(binaryToHex('10000')).toBe('10');
  });

  it('converts bitstrings to bigint', () => {
    expect(binaryToBigInt('')).toBe(0n);
    expect(binaryToBigInt('11111111')).toBe(255n);
  });

  it('rejects non-binary input', () => {
    expect(() => binaryToHex('102')).toThrow(InvalidArgumentError);
    expect(() => binaryToBigInt('x')).toThrow("Not a bitstring: 'x'");
  });
});
