/**
 * Result aggregation: histograms of measured bitstrings.
 */

import { InvalidArgumentError, InvariantViolationError } from './errors';

/**
 * Bitstring → number of shots that produced it
 */
export type Counts = Record<string, number>;

export interface CountsSummary {
  shots: number;
  distinctOutcomes: number;
  mostLikely: string;
  mostLikelyProbability: number;
  /**
   * Shannon entropy of the empirical distribution, in bits
   */
  entropy: number;
}

/**
 * Render an outcome index as a bitstring of `width` characters. Bit j of
 * the outcome is character `width - 1 - j`.
 */
export function toBitString(outcome: number, width: number): string {
  return outcome.toString(2).padStart(width, '0');
}

export function countSamples(samples: Iterable<string>): Counts {
  const counts: Counts = {};
  for (const sample of samples) {
    counts[sample] = (counts[sample] ?? 0) + 1;
  }
  return counts;
}

/**
 * Sum histograms key by key. The result does not depend on argument order.
 */
export function mergeCounts(...parts: readonly Counts[]): Counts {
  const merged: Counts = {};
  for (const part of parts) {
    for (const [key, value] of Object.entries(part)) {
      merged[key] = (merged[key] ?? 0) + value;
    }
  }
  return sortCounts(merged);
}

/**
 * Same histogram with keys in ascending bitstring order
 */
export function sortCounts(counts: Counts): Counts {
  const sorted: Counts = {};
  for (const key of Object.keys(counts).sort()) {
    sorted[key] = counts[key];
  }
  return sorted;
}

export function totalShots(counts: Counts): number {
  return Object.values(counts).reduce((sum, n) => sum + n, 0);
}

export function toProbabilities(counts: Counts): Record<string, number> {
  const total = totalShots(counts);
  if (total <= 0) {
    throw new InvalidArgumentError('Cannot normalize an empty histogram', 'counts');
  }
  const probabilities: Record<string, number> = {};
  for (const [key, value] of Object.entries(counts)) {
    probabilities[key] = value / total;
  }
  return probabilities;
}

/**
 * Outcome with the highest count; ties go to the lexicographically
 * smallest bitstring
 */
export function mostLikely(counts: Counts): string {
  let best: string | undefined;
  let bestCount = -1;
  for (const [key, value] of Object.entries(counts)) {
    if (value > bestCount || (value === bestCount && best !== undefined && key < best)) {
      best = key;
      bestCount = value;
    }
  }
  if (best === undefined) {
    throw new InvalidArgumentError('Histogram has no outcomes', 'counts');
  }
  return best;
}

export function summarizeCounts(counts: Counts): CountsSummary {
  const shots = totalShots(counts);
  const top = mostLikely(counts);
  let entropy = 0;
  for (const value of Object.values(counts)) {
    if (value > 0) {
      const p = value / shots;
      entropy -= p * Math.log2(p);
    }
  }
  return {
    shots,
    distinctOutcomes: Object.keys(counts).length,
    mostLikely: top,
    mostLikelyProbability: counts[top] / shots,
    entropy,
  };
}

/**
 * Bhattacharyya coefficient Σ √(p_ideal · p_measured); 1 for identical
 * distributions
 */
export function classicalFidelity(ideal: Record<string, number>, counts: Counts): number {
  const measured = toProbabilities(counts);
  let fidelity = 0;
  for (const [key, p] of Object.entries(ideal)) {
    fidelity += Math.sqrt(p * (measured[key] ?? 0));
  }
  return fidelity;
}

/**
 * Throw unless the histogram sums to exactly `shots`
 */
export function assertShotTotal(counts: Counts, shots: number): void {
  const total = totalShots(counts);
  if (total !== shots) {
    throw new InvariantViolationError(`Histogram holds ${total} shots, expected ${shots}`);
  }
}
