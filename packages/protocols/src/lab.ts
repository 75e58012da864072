/**
 * QuantumLab
 *
 * The application-facing facade: a circuit registry plus entry points for
 * every protocol. Instances are independent; nothing is shared between them
 * and nothing outlives them.
 */

import {
  Circuit,
  ConfigurationError,
  InvalidArgumentError,
  MAX_QUBITS,
  Simulator,
  VERSION,
  assertQubitCount,
  createRng,
  deriveRng,
  type CircuitStats,
  type RandomOptions,
  type Rng,
  type RunResult,
  type SimulatorOptions,
  type TokenBinding,
} from '@qubit-lab/core';
import { runBB84, type BB84Options, type BB84Result } from './bb84';
import { runBellState, type BellStateResult } from './bell';
import { assertPositiveInteger } from './encoding';
import { runGrover, type GroverOptions, type GroverResult } from './grover';
import {
  MOLECULES,
  parseMoleculeType,
  simulateMolecule,
  type MoleculeOptions,
  type MoleculeResult,
} from './molecule';
import {
  runPhaseEstimation,
  type PhaseEstimationOptions,
  type PhaseEstimationResult,
} from './phase-estimation';
import { runQft, type QftOptions, type QftResult } from './qft';
import { quantumRandom, type QuantumRandomOptions, type QuantumRandomResult } from './qrng';
import { CircuitRegistry, type CircuitRecord } from './registry';
import {
  runTeleportation,
  type TeleportationOptions,
  type TeleportationResult,
} from './teleportation';

// ============================================================================
// Options
// ============================================================================

export type LabLogger = Pick<Console, 'debug' | 'info' | 'warn'>;

export interface LabOptions {
  /**
   * Seed for the lab's generator. Each call then draws its own derived
   * generator, so a seeded lab replays the same sequence of results.
   */
  seed?: number;
  defaultShots: number;
  maxQubits: number;
  logger: LabLogger;
  simulator: Partial<SimulatorOptions>;
}

export const DEFAULT_LAB_OPTIONS: LabOptions = {
  defaultShots: 1024,
  maxQubits: MAX_QUBITS,
  logger: console,
  simulator: {},
};

// ============================================================================
// Results
// ============================================================================

export interface ExecutionResult extends RunResult {
  circuitId: number;
}

export interface CircuitInfo {
  id: number;
  name: string;
  numQubits: number;
  tokens: string[];
  gateCount: number;
  depth: number;
  stats: CircuitStats;
  qasm: string;
  createdAt: string;
}

export interface LabStatus {
  backend: 'statevector';
  version: string;
  circuits: number;
  maxQubits: number;
  defaultShots: number;
  seeded: boolean;
}

export type ProtocolName =
  | 'bb84'
  | 'quantum-random'
  | 'grover'
  | 'qft'
  | 'phase-estimation'
  | 'teleportation'
  | 'bell-state'
  | 'molecule';

export const PROTOCOL_NAMES: readonly ProtocolName[] = [
  'bb84',
  'quantum-random',
  'grover',
  'qft',
  'phase-estimation',
  'teleportation',
  'bell-state',
  'molecule',
];

export type ProtocolRun =
  | { protocol: 'bb84'; result: BB84Result }
  | { protocol: 'quantum-random'; result: QuantumRandomResult }
  | { protocol: 'grover'; result: GroverResult }
  | { protocol: 'qft'; result: QftResult }
  | { protocol: 'phase-estimation'; result: PhaseEstimationResult }
  | { protocol: 'teleportation'; result: TeleportationResult }
  | { protocol: 'bell-state'; result: BellStateResult }
  | { protocol: 'molecule'; result: MoleculeResult };

type CallOptions<T> = Omit<T, 'simulator'>;

// ============================================================================
// QuantumLab
// ============================================================================

/**
 * @example
 * ```typescript
 * const lab = new QuantumLab({ seed: 42 });
 * const id = lab.createCircuit('bell', 2, ['H', 'CNOT'], [undefined, { control: 0, target: 1 }]);
 * lab.execute(id, 1000).counts; // { '00': ~500, '11': ~500 }
 * lab.grover(3, 5).foundBitString; // '101'
 * ```
 */
export class QuantumLab {
  readonly options: LabOptions;
  private readonly registry = new CircuitRegistry();
  private readonly simulator: Simulator;
  private readonly rng?: Rng;

  constructor(options: Partial<LabOptions> = {}) {
    this.options = {
      seed: options.seed,
      defaultShots: options.defaultShots ?? DEFAULT_LAB_OPTIONS.defaultShots,
      maxQubits: options.maxQubits ?? DEFAULT_LAB_OPTIONS.maxQubits,
      logger: options.logger ?? DEFAULT_LAB_OPTIONS.logger,
      simulator: options.simulator ?? DEFAULT_LAB_OPTIONS.simulator,
    };
    assertPositiveInteger(this.options.defaultShots, 'defaultShots');
    assertQubitCount(this.options.maxQubits);
    this.simulator = new Simulator(this.options.simulator);
    if (this.options.seed !== undefined) {
      this.rng = createRng(this.options.seed);
    }
  }

  private get logger(): LabLogger {
    return this.options.logger;
  }

  // =========================================================================
  // Circuits
  // =========================================================================

  /**
   * Build a circuit from gate tokens and register it
   * @returns the new circuit id (1, 2, ...)
   */
  createCircuit(
    name: string,
    numQubits: number,
    tokens: readonly string[],
    bindings?: readonly (TokenBinding | undefined)[]
  ): number {
    assertQubitCount(numQubits, this.options.maxQubits);
    const circuit = Circuit.fromTokens(name, numQubits, tokens, bindings).freeze();
    const record = this.registry.register(name, circuit, tokens);
    this.logger.debug(
      `Registered circuit ${record.id} '${name}' (${numQubits} qubits, ${tokens.length} gates)`
    );
    return record.id;
  }

  execute(
    circuitId: number,
    shots: number = this.options.defaultShots,
    options: RandomOptions & { measuredQubits?: readonly number[] } = {}
  ): ExecutionResult {
    const { circuit } = this.registry.get(circuitId);
    const result = this.simulator.run(circuit, {
      ...this.randomFor(options),
      shots,
      measuredQubits: options.measuredQubits,
    });
    this.logger.debug(`Executed circuit ${circuitId} for ${shots} shots`);
    return { circuitId, ...result };
  }

  getCircuitInfo(circuitId: number): CircuitInfo {
    return toCircuitInfo(this.registry.get(circuitId));
  }

  listCircuits(): CircuitInfo[] {
    return this.registry.list().map(toCircuitInfo);
  }

  // =========================================================================
  // Protocols
  // =========================================================================

  bb84(keyLength: number, options: CallOptions<BB84Options> = {}): BB84Result {
    const result = runBB84(keyLength, this.protocolOptions(options));
    this.logger.debug(
      `BB84: ${result.keyLength}/${keyLength} key bits from ${result.trials} trials, error rate ${result.errorRate}`
    );
    if (result.partial) {
      this.logger.warn(
        `BB84 produced a partial key: ${result.keyLength} of ${keyLength} bits after ${result.trials} trials`
      );
    }
    return result;
  }

  quantumRandom(
    numBits: number,
    options: CallOptions<QuantumRandomOptions> = {}
  ): QuantumRandomResult {
    const result = quantumRandom(numBits, this.protocolOptions(options));
    this.logger.debug(`Generated ${numBits} random bits in ${result.chunks} chunk(s)`);
    return result;
  }

  grover(numQubits: number, marked: number, options: CallOptions<GroverOptions> = {}): GroverResult {
    assertQubitCount(numQubits, this.options.maxQubits);
    const result = runGrover(numQubits, marked, {
      ...this.protocolOptions(options),
      shots: options.shots ?? this.options.defaultShots,
    });
    this.logger.debug(
      `Grover(${numQubits}, ${marked}): found ${result.foundBitString} with p=${result.probability}`
    );
    return result;
  }

  qft(numQubits: number, options: QftOptions = {}): QftResult {
    assertQubitCount(numQubits, this.options.maxQubits);
    const result = runQft(numQubits, options);
    this.logger.debug(`QFT(${numQubits}): ${result.stats.totalGates} gates, depth ${result.stats.depth}`);
    return result;
  }

  phaseEstimation(
    countingQubits: number,
    options: CallOptions<PhaseEstimationOptions> = {}
  ): PhaseEstimationResult {
    assertQubitCount(countingQubits + 1, this.options.maxQubits);
    const result = runPhaseEstimation(countingQubits, this.protocolOptions(options));
    this.logger.debug(
      `Phase estimation: phase ${result.phase} estimated as ${result.estimatedPhase}`
    );
    return result;
  }

  teleport(options: CallOptions<TeleportationOptions> = {}): TeleportationResult {
    const result = runTeleportation(this.protocolOptions(options));
    this.logger.debug(
      `Teleported [${result.message.join(', ')}]: min fidelity ${result.minFidelity}`
    );
    return result;
  }

  bellState(shots: number = this.options.defaultShots, options: RandomOptions = {}): BellStateResult {
    const result = runBellState({ shots, ...this.protocolOptions(options) });
    this.logger.debug(`Bell state: fidelity ${result.fidelity}`);
    return result;
  }

  molecule(name: string, options: CallOptions<MoleculeOptions> = {}): MoleculeResult {
    assertQubitCount(MOLECULES[parseMoleculeType(name)].numQubits, this.options.maxQubits);
    const result = simulateMolecule(name, this.protocolOptions(options));
    this.logger.debug(
      `Molecule ${result.formula} at ${result.temperature} K, ${result.pressure} atm: energy ${result.energy}`
    );
    return result;
  }

  /**
   * Run a protocol by name with loosely typed parameters (e.g. from a
   * request body). Unknown names throw ConfigurationError; parameters of the
   * wrong type throw InvalidArgumentError.
   */
  runProtocol(name: string, params: Readonly<Record<string, unknown>> = {}): ProtocolRun {
    const protocol = parseProtocolName(name);
    const seed = optionalNumber(params, 'seed');
    this.logger.debug(`Running protocol ${protocol}`);

    switch (protocol) {
      case 'bb84': {
        const bitFlipProbability = optionalNumber(params, 'bitFlipProbability');
        return {
          protocol,
          result: this.bb84(optionalNumber(params, 'keyLength') ?? 16, {
            seed,
            eavesdropper: optionalBoolean(params, 'eavesdropper'),
            noise: bitFlipProbability === undefined ? undefined : { bitFlipProbability },
          }),
        };
      }
      case 'quantum-random':
        return {
          protocol,
          result: this.quantumRandom(optionalNumber(params, 'numBits') ?? 32, { seed }),
        };
      case 'grover':
        return {
          protocol,
          result: this.grover(
            optionalNumber(params, 'numQubits') ?? 3,
            requiredNumber(params, 'markedItem'),
            { seed, shots: optionalNumber(params, 'shots') }
          ),
        };
      case 'qft':
        return {
          protocol,
          result: this.qft(optionalNumber(params, 'numQubits') ?? 3, {
            input: optionalNumber(params, 'input'),
          }),
        };
      case 'phase-estimation':
        return {
          protocol,
          result: this.phaseEstimation(optionalNumber(params, 'countingQubits') ?? 3, {
            seed,
            phase: optionalNumber(params, 'phase'),
            shots: optionalNumber(params, 'shots'),
          }),
        };
      case 'teleportation':
        return {
          protocol,
          result: this.teleport({
            seed,
            message: optionalStringArray(params, 'message'),
            shots: optionalNumber(params, 'shots'),
          }),
        };
      case 'bell-state':
        return {
          protocol,
          result: this.bellState(optionalNumber(params, 'shots') ?? this.options.defaultShots, {
            seed,
          }),
        };
      case 'molecule':
        return {
          protocol,
          result: this.molecule(requiredString(params, 'type'), {
            temperature: optionalNumber(params, 'temperature'),
            pressure: optionalNumber(params, 'pressure'),
          }),
        };
    }
  }

  getStatus(): LabStatus {
    return {
      backend: 'statevector',
      version: VERSION,
      circuits: this.registry.size,
      maxQubits: this.options.maxQubits,
      defaultShots: this.options.defaultShots,
      seeded: this.rng !== undefined,
    };
  }

  // =========================================================================
  // Private Helpers
  // =========================================================================

  /**
   * Randomness for one call: explicit rng or seed first, then a generator
   * derived from the lab's own, else a fresh time-seeded one
   */
  private randomFor(options: RandomOptions): RandomOptions {
    if (options.rng || options.seed !== undefined) {
      return { rng: options.rng, seed: options.seed };
    }
    return this.rng ? { rng: deriveRng(this.rng) } : {};
  }

  private protocolOptions<T extends RandomOptions>(
    options: T
  ): T & RandomOptions & { simulator: Simulator } {
    return { ...options, ...this.randomFor(options), simulator: this.simulator };
  }
}

// ============================================================================
// Helpers
// ============================================================================

function toCircuitInfo(record: CircuitRecord): CircuitInfo {
  const stats = record.circuit.getStats();
  return {
    id: record.id,
    name: record.name,
    numQubits: record.circuit.numQubits,
    tokens: [...record.tokens],
    gateCount: stats.totalGates,
    depth: stats.depth,
    stats,
    qasm: record.circuit.toQASM(),
    createdAt: record.circuit.createdAt.toISOString(),
  };
}

function parseProtocolName(name: string): ProtocolName {
  const normalized = name.trim().toLowerCase().replace(/_/g, '-');
  const match = PROTOCOL_NAMES.find((p) => p === normalized);
  if (!match) {
    throw new ConfigurationError(
      `Unknown protocol '${name}', expected one of: ${PROTOCOL_NAMES.join(', ')}`,
      name
    );
  }
  return match;
}

function optionalNumber(params: Readonly<Record<string, unknown>>, key: string): number | undefined {
  const value = params[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new InvalidArgumentError(`Parameter '${key}' must be a number`, key);
  }
  return value;
}

function requiredNumber(params: Readonly<Record<string, unknown>>, key: string): number {
  const value = optionalNumber(params, key);
  if (value === undefined) {
    throw new InvalidArgumentError(`Parameter '${key}' is required`, key);
  }
  return value;
}

function requiredString(params: Readonly<Record<string, unknown>>, key: string): string {
  const value = params[key];
  if (value === undefined) {
    throw new InvalidArgumentError(`Parameter '${key}' is required`, key);
  }
  if (typeof value !== 'string') {
    throw new InvalidArgumentError(`Parameter '${key}' must be a string`, key);
  }
  return value;
}

function optionalBoolean(params: Readonly<Record<string, unknown>>, key: string): boolean | undefined {
  const value = params[key];
  if (value === undefined || typeof value === 'boolean') {
    return value;
  }
  throw new InvalidArgumentError(`Parameter '${key}' must be a boolean`, key);
}

function optionalStringArray(
  params: Readonly<Record<string, unknown>>,
  key: string
): string[] | undefined {
  const value = params[key];
  if (value === undefined) {
    return undefined;
  }
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return [...value];
  }
  throw new InvalidArgumentError(`Parameter '${key}' must be an array of gate tokens`, key);
}
