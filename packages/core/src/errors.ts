/**
 * Error taxonomy for the simulation engine.
 *
 * Every error is raised where the problem is detected and propagated to the
 * caller unchanged. `code` is stable and meant for programmatic handling;
 * `message` is for humans.
 */

export type QuantumLabErrorCode =
  | 'CONFIGURATION'
  | 'INDEX_OUT_OF_RANGE'
  | 'INVALID_ARGUMENT'
  | 'NOT_FOUND'
  | 'CIRCUIT_FROZEN'
  | 'INVARIANT_VIOLATION';

export class QuantumLabError extends Error {
  constructor(message: string, public readonly code: QuantumLabErrorCode) {
    super(message);
    this.name = 'QuantumLabError';
  }
}

/**
 * Unknown gate token or kind, unknown protocol name, unsupported construct
 */
export class ConfigurationError extends QuantumLabError {
  constructor(
    message: string,
    public readonly subject?: string
  ) {
    super(message, 'CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}

/**
 * Qubit or classical bit index outside the register
 */
export class IndexError extends QuantumLabError {
  constructor(
    public readonly index: number,
    public readonly size: number,
    kind: 'Qubit' | 'Classical bit' | 'Basis state' = 'Qubit'
  ) {
    super(`${kind} index ${index} out of range [0, ${size - 1}]`, 'INDEX_OUT_OF_RANGE');
    this.name = 'IndexError';
  }
}

export class InvalidArgumentError extends QuantumLabError {
  constructor(
    message: string,
    public readonly argument?: string
  ) {
    super(message, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
  }
}

export class NotFoundError extends QuantumLabError {
  constructor(
    public readonly resource: string,
    public readonly id: string | number
  ) {
    super(`${resource} ${id} not found`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ImmutableCircuitError extends QuantumLabError {
  constructor(circuitName: string) {
    super(`Circuit '${circuitName}' is frozen and cannot be modified`, 'CIRCUIT_FROZEN');
    this.name = 'ImmutableCircuitError';
  }
}

/**
 * A numerical invariant of the register no longer holds (e.g. the total
 * probability drifted away from 1).
 */
export class InvariantViolationError extends QuantumLabError {
  constructor(message: string) {
    super(message, 'INVARIANT_VIOLATION');
    this.name = 'InvariantViolationError';
  }
}
