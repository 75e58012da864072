/**
 * @qubit-lab/protocols
 *
 * Quantum protocols on the statevector engine and the QuantumLab facade.
 *
 * @example
 * ```typescript
 * import { QuantumLab } from '@qubit-lab/protocols';
 *
 * const lab = new QuantumLab({ seed: 7 });
 * lab.bb84(16).binary;        // 16-bit sifted key
 * lab.grover(3, 5).foundItem; // 5
 * lab.runProtocol('teleportation', { message: ['H'] });
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Facade
// ============================================================================

export { QuantumLab, DEFAULT_LAB_OPTIONS, PROTOCOL_NAMES } from './lab';
export type {
  LabOptions,
  LabLogger,
  LabStatus,
  CircuitInfo,
  ExecutionResult,
  ProtocolName,
  ProtocolRun,
} from './lab';

export { CircuitRegistry } from './registry';
export type { CircuitRecord } from './registry';

// ============================================================================
// Protocols
// ============================================================================

export {
  runBB84,
  bb84TrialCircuit,
  SECURITY_THRESHOLD,
  TRIALS_PER_KEY_BIT,
} from './bb84';
export type {
  BB84Options,
  BB84Result,
  BB84Session,
  Basis,
  NoiseModel,
  SecurityLevel,
} from './bb84';

export { quantumRandom, DEFAULT_CHUNK_QUBITS, MAX_RANDOM_BITS } from './qrng';
export type { QuantumRandomOptions, QuantumRandomResult } from './qrng';

export {
  runGrover,
  groverCircuit,
  appendOracle,
  appendDiffusion,
  optimalIterations,
  DEFAULT_GROVER_SHOTS,
} from './grover';
export type { GroverOptions, GroverResult } from './grover';

export { runQft, qftCircuit, inverseQftCircuit, appendQft } from './qft';
export type { QftOptions, QftResult } from './qft';

export {
  runPhaseEstimation,
  phaseEstimationCircuit,
  DEFAULT_PHASE,
  DEFAULT_PHASE_ESTIMATION_SHOTS,
  MAX_COUNTING_QUBITS,
} from './phase-estimation';
export type { PhaseEstimationOptions, PhaseEstimationResult } from './phase-estimation';

export {
  runTeleportation,
  teleportationCircuit,
  DEFAULT_MESSAGE,
  DEFAULT_TELEPORTATION_SHOTS,
} from './teleportation';
export type { TeleportationOptions, TeleportationResult } from './teleportation';

export { runBellState, IDEAL_BELL_DISTRIBUTION, DEFAULT_BELL_SHOTS } from './bell';
export type { BellStateResult } from './bell';

export {
  simulateMolecule,
  moleculeCircuit,
  parseMoleculeType,
  MOLECULES,
  MOLECULE_TYPES,
  DEFAULT_TEMPERATURE,
  DEFAULT_PRESSURE,
} from './molecule';
export type { MoleculeType, MoleculeSpec, MoleculeOptions, MoleculeResult } from './molecule';

// ============================================================================
// Utilities
// ============================================================================

export { binaryToHex, binaryToBigInt } from './encoding';
export type { ProtocolOptions, ShotOptions } from './types';
