/**
 * @qubit-lab/core
 *
 * Statevector quantum simulation engine: amplitude register, gate library,
 * circuit builder, Born-rule sampling with mid-circuit measurement.
 *
 * @example
 * ```typescript
 * import { Circuit, Simulator } from '@qubit-lab/core';
 *
 * // Bell state from the fluent builder
 * const bell = new Circuit(2, 'Bell').h(0).cnot(0, 1).freeze();
 * const result = new Simulator().run(bell, { shots: 1000, seed: 42 });
 * console.log(result.counts); // { '00': ~500, '11': ~500 }
 *
 * // Or from gate tokens
 * const same = Circuit.fromTokens('Bell', 2, ['H', 'CNOT']);
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Core Classes
// ============================================================================

export {
  AmplitudeRegister,
  MAX_QUBITS,
  NORMALIZATION_TOLERANCE,
  assertQubitCount,
  assertQubitIndex,
  assertDistinctQubits,
} from './register';
export type { RegisterOptions } from './register';

export { Circuit, applyGate, bellCircuit, superpositionCircuit } from './circuit';
export type {
  Gate,
  GateType,
  UnitaryGate,
  SingleQubitGate,
  SingleQubitGateType,
  ParameterizedGate,
  ParameterizedGateType,
  TwoQubitGate,
  TwoQubitGateType,
  ControlledPhaseGate,
  MultiControlledGate,
  MultiControlledGateType,
  MeasureGate,
  BarrierGate,
  ClassicalCondition,
  CircuitStats,
  CircuitJSON,
} from './circuit';

export { bindTokens, parseAngle, DEFAULT_TOKEN_ANGLE } from './tokens';
export type { TokenBinding } from './tokens';

export {
  Simulator,
  CategoricalSampler,
  DEFAULT_SIMULATOR_OPTIONS,
  assertShots,
} from './simulator';
export type {
  SimulatorOptions,
  RunOptions,
  MeasureOptions,
  RunResult,
  Evolution,
  SingleMeasurement,
} from './simulator';

// ============================================================================
// Gate Library
// ============================================================================

export {
  IDENTITY,
  HADAMARD,
  PAULI_X,
  PAULI_Y,
  PAULI_Z,
  S_GATE,
  S_DAGGER,
  T_GATE,
  T_DAGGER,
  rotationX,
  rotationY,
  rotationZ,
  phaseShift,
  adjoint,
  multiplyMatrices,
  isUnitary,
  assertFiniteAngle,
} from './gates';
export type { Matrix2 } from './gates';

// ============================================================================
// Results
// ============================================================================

export {
  toBitString,
  countSamples,
  mergeCounts,
  sortCounts,
  totalShots,
  toProbabilities,
  mostLikely,
  summarizeCounts,
  classicalFidelity,
  assertShotTotal,
} from './results';
export type { Counts, CountsSummary } from './results';

// ============================================================================
// Randomness
// ============================================================================

export { createRng, deriveRng, nextSeed, resolveRng, randomBit } from './random';
export type { Rng, RandomOptions } from './random';

// ============================================================================
// Errors
// ============================================================================

export {
  QuantumLabError,
  ConfigurationError,
  IndexError,
  InvalidArgumentError,
  NotFoundError,
  ImmutableCircuitError,
  InvariantViolationError,
} from './errors';
export type { QuantumLabErrorCode } from './errors';

// ============================================================================
// Complex Number Utilities
// ============================================================================

export {
  complex,
  magnitudeSquared,
  conjugate,
  add,
  multiply,
  expI,
  isFiniteComplex,
  equals,
  vectorsEqual,
} from './complex';
export type { Complex } from './complex';

// ============================================================================
// Version Info
// ============================================================================

export const VERSION = '0.1.0';
