/**
 * Seedable randomness.
 *
 * Every sampling call receives its own `Rng` (or a seed to build one); the
 * engine never reads `Math.random` or any other process-wide generator.
 */

import { InvalidArgumentError } from './errors';

/**
 * Uniform generator on [0, 1)
 */
export type Rng = () => number;

/**
 * Either a ready generator or a seed to create one
 */
export interface RandomOptions {
  rng?: Rng;
  seed?: number;
}

/**
 * mulberry32: small, fast 32-bit PRNG with a full 2^32 period.
 */
export function createRng(seed: number): Rng {
  if (!Number.isFinite(seed)) {
    throw new InvalidArgumentError(`Seed must be a finite number, got ${seed}`, 'seed');
  }
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Draw a 32-bit seed from a generator, for handing a child generator to an
 * independent unit of work (a shot batch, a protocol trial).
 */
export function nextSeed(rng: Rng): number {
  return Math.floor(rng() * 4294967296) >>> 0;
}

export function deriveRng(rng: Rng): Rng {
  return createRng(nextSeed(rng));
}

/**
 * Resolve call options to a generator. Without rng or seed a fresh
 * time-seeded generator is created for this call only.
 */
export function resolveRng(options: RandomOptions = {}): Rng {
  if (options.rng) {
    return options.rng;
  }
  return createRng(options.seed ?? Date.now());
}

/**
 * Fair coin flip: 0 or 1
 */
export function randomBit(rng: Rng): 0 | 1 {
  return rng() < 0.5 ? 0 : 1;
}
