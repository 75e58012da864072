/**
 * Simulator
 *
 * Evolves circuits on a fresh AmplitudeRegister and samples measurement
 * outcomes by the Born rule. Circuits without mid-circuit measurement are
 * evolved once and sampled many times; dynamic circuits are re-evolved for
 * every shot so that each shot sees its own collapse history.
 */

import { applyGate, type Circuit } from './circuit';
import type { Complex } from './complex';
import { InvalidArgumentError } from './errors';
import { deriveRng, resolveRng, type RandomOptions, type Rng } from './random';
import {
  AmplitudeRegister,
  NORMALIZATION_TOLERANCE,
  assertDistinctQubits,
  assertQubitIndex,
} from './register';
import {
  assertShotTotal,
  countSamples,
  mergeCounts,
  mostLikely,
  toBitString,
  toProbabilities,
  type Counts,
} from './results';

// ============================================================================
// Options
// ============================================================================

export interface SimulatorOptions {
  /**
   * Allowed drift of Σ|a|² from 1 after each gate
   */
  tolerance: number;

  /**
   * Assert normalization after every gate
   */
  checkNormalization: boolean;

  /**
   * Shots drawn per independent sampling batch
   */
  batchSize: number;
}

export const DEFAULT_SIMULATOR_OPTIONS: SimulatorOptions = {
  tolerance: NORMALIZATION_TOLERANCE,
  checkNormalization: true,
  batchSize: 1024,
};

export interface RunOptions extends RandomOptions {
  shots: number;

  /**
   * Qubits to read out, in outcome-bit order (defaults to all qubits)
   */
  measuredQubits?: readonly number[];

  batchSize?: number;
}

export interface MeasureOptions extends RandomOptions {
  measuredQubits?: readonly number[];
}

// ============================================================================
// Results
// ============================================================================

export interface Evolution {
  register: AmplitudeRegister;
  /**
   * Classical bits written by measurement ops (0 where never written)
   */
  classicalBits: (0 | 1)[];
}

export interface RunResult {
  counts: Counts;
  probabilities: Record<string, number>;
  mostLikely: string;
  /**
   * Amplitudes before readout (for dynamic circuits, from the last shot)
   */
  finalAmplitudes: Complex[];
  shots: number;
  measuredQubits: number[];
}

export interface SingleMeasurement extends Evolution {
  bitString: string;
}

// ============================================================================
// Sampling helpers
// ============================================================================

export function assertShots(shots: number): void {
  if (!Number.isInteger(shots) || shots <= 0) {
    throw new InvalidArgumentError(`shots must be a positive integer, got ${shots}`, 'shots');
  }
}

/**
 * Draws outcome indices from a discrete distribution. Outcomes with zero
 * probability are never returned.
 */
export class CategoricalSampler {
  private readonly cumulative: Float64Array;
  private readonly lastNonZero: number;

  constructor(distribution: Float64Array) {
    this.cumulative = new Float64Array(distribution.length);
    let total = 0;
    let lastNonZero = -1;
    for (let i = 0; i < distribution.length; i++) {
      total += distribution[i];
      this.cumulative[i] = total;
      if (distribution[i] > 0) lastNonZero = i;
    }
    if (lastNonZero < 0) {
      throw new InvalidArgumentError('Distribution has no outcome with nonzero probability');
    }
    this.lastNonZero = lastNonZero;
  }

  sample(rng: Rng): number {
    const r = rng() * this.cumulative[this.lastNonZero];
    // First index whose cumulative mass exceeds r
    let lo = 0;
    let hi = this.lastNonZero;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.cumulative[mid] > r) {
        hi = mid;
      } else {
        lo = mid + 1;
      }
    }
    return lo;
  }
}

// ============================================================================
// Simulator
// ============================================================================

export class Simulator {
  readonly options: SimulatorOptions;

  constructor(options: Partial<SimulatorOptions> = {}) {
    this.options = {
      tolerance: options.tolerance ?? DEFAULT_SIMULATOR_OPTIONS.tolerance,
      checkNormalization:
        options.checkNormalization ?? DEFAULT_SIMULATOR_OPTIONS.checkNormalization,
      batchSize: options.batchSize ?? DEFAULT_SIMULATOR_OPTIONS.batchSize,
    };
    if (!(this.options.tolerance > 0) || !Number.isFinite(this.options.tolerance)) {
      throw new InvalidArgumentError(
        `tolerance must be a positive finite number, got ${this.options.tolerance}`,
        'tolerance'
      );
    }
    assertBatchSize(this.options.batchSize);
  }

  /**
   * Run every op of the circuit on |0...0⟩. Measurement ops collapse the
   * register and record their outcome; conditional ops run only when their
   * classical bit matches.
   */
  evolve(circuit: Circuit, options: RandomOptions = {}): Evolution {
    return this.evolveWith(circuit, resolveRng(options));
  }

  /**
   * Sample `shots` readouts of the measured qubits
   */
  run(circuit: Circuit, options: RunOptions): RunResult {
    assertShots(options.shots);
    const measured = resolveMeasuredQubits(circuit, options.measuredQubits);
    const batchSize = options.batchSize ?? this.options.batchSize;
    assertBatchSize(batchSize);
    const rng = resolveRng(options);

    let counts: Counts;
    let finalRegister: AmplitudeRegister;

    if (circuit.isDynamic) {
      const samples: string[] = [];
      let last: AmplitudeRegister | undefined;
      for (let shot = 0; shot < options.shots; shot++) {
        const { register } = this.evolveWith(circuit, rng);
        const sampler = new CategoricalSampler(register.marginalProbabilities(measured));
        samples.push(toBitString(sampler.sample(rng), measured.length));
        last = register;
      }
      counts = mergeCounts(countSamples(samples));
      finalRegister = last ?? AmplitudeRegister.create({ numQubits: circuit.numQubits });
    } else {
      finalRegister = this.evolveWith(circuit, rng).register;
      const sampler = new CategoricalSampler(finalRegister.marginalProbabilities(measured));
      const batches: Counts[] = [];
      for (let done = 0; done < options.shots; done += batchSize) {
        const size = Math.min(batchSize, options.shots - done);
        batches.push(sampleBatch(sampler, size, measured.length, deriveRng(rng)));
      }
      counts = mergeCounts(...batches);
    }

    assertShotTotal(counts, options.shots);

    return {
      counts,
      probabilities: toProbabilities(counts),
      mostLikely: mostLikely(counts),
      finalAmplitudes: finalRegister.getAmplitudes(),
      shots: options.shots,
      measuredQubits: [...measured],
    };
  }

  /**
   * Evolve once and measure the chosen qubits, leaving the register
   * collapsed onto the observed outcome
   */
  measureSingle(circuit: Circuit, options: MeasureOptions = {}): SingleMeasurement {
    const measured = resolveMeasuredQubits(circuit, options.measuredQubits);
    const rng = resolveRng(options);
    const { register, classicalBits } = this.evolveWith(circuit, rng);

    let outcome = 0;
    measured.forEach((qubit, j) => {
      if (register.measure(qubit, rng) === 1) {
        outcome |= 1 << j;
      }
    });

    return {
      bitString: toBitString(outcome, measured.length),
      register,
      classicalBits,
    };
  }

  private evolveWith(circuit: Circuit, rng: Rng): Evolution {
    const register = AmplitudeRegister.create({ numQubits: circuit.numQubits });
    const classicalBits = new Array<0 | 1>(circuit.numClassicalBits).fill(0);

    for (const gate of circuit.gates) {
      if (gate.type === 'barrier') {
        continue;
      }
      if (gate.type === 'measure') {
        classicalBits[gate.classicalBit] = register.measure(gate.qubit, rng);
      } else {
        const { condition } = gate;
        if (condition && classicalBits[condition.classicalBit] !== condition.value) {
          continue;
        }
        applyGate(register, gate);
      }
      if (this.options.checkNormalization) {
        register.assertNormalized(this.options.tolerance);
      }
    }

    return { register, classicalBits };
  }
}

function assertBatchSize(batchSize: number): void {
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new InvalidArgumentError(
      `batchSize must be a positive integer, got ${batchSize}`,
      'batchSize'
    );
  }
}

function resolveMeasuredQubits(
  circuit: Circuit,
  measuredQubits: readonly number[] | undefined
): readonly number[] {
  if (measuredQubits === undefined) {
    return Array.from({ length: circuit.numQubits }, (_, i) => i);
  }
  if (measuredQubits.length === 0) {
    throw new InvalidArgumentError('measuredQubits must not be empty', 'measuredQubits');
  }
  for (const q of measuredQubits) {
    assertQubitIndex(q, circuit.numQubits);
  }
  assertDistinctQubits(measuredQubits);
  return measuredQubits;
}

function sampleBatch(sampler: CategoricalSampler, size: number, width: number, rng: Rng): Counts {
  const counts: Counts = {};
  for (let i = 0; i < size; i++) {
    const key = toBitString(sampler.sample(rng), width);
    counts[key] = (counts[key] ?? 0) + 1;
  }
  return counts;
}
