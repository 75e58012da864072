/**
 * Circuit Builder
 *
 * Provides a declarative way to build quantum circuits that can be evolved
 * by the simulator. A circuit is an ordered list of frozen gate operations;
 * once `freeze()` is called the list itself can no longer change.
 */

import {
  ConfigurationError,
  ImmutableCircuitError,
  IndexError,
  InvalidArgumentError,
} from './errors';
import { assertFiniteAngle } from './gates';
import { bindTokens, type TokenBinding } from './tokens';
import {
  assertDistinctQubits,
  assertQubitCount,
  assertQubitIndex,
  type AmplitudeRegister,
} from './register';

// ============================================================================
// Gate Type Definitions
// ============================================================================

export type SingleQubitGateType = 'h' | 'x' | 'y' | 'z' | 's' | 'sdg' | 't' | 'tdg';

export type ParameterizedGateType = 'rx' | 'ry' | 'rz' | 'phase';

export type TwoQubitGateType = 'cnot' | 'cz' | 'swap';

export type MultiControlledGateType = 'mcx' | 'mcz';

export type GateType =
  | SingleQubitGateType
  | ParameterizedGateType
  | TwoQubitGateType
  | MultiControlledGateType
  | 'cphase'
  | 'barrier'
  | 'measure';

// ============================================================================
// Gate Definitions
// ============================================================================

/**
 * Run the gate only when a classical bit holds `value`
 */
export interface ClassicalCondition {
  readonly classicalBit: number;
  readonly value: 0 | 1;
}

interface Conditional {
  readonly condition?: ClassicalCondition;
}

export interface SingleQubitGate extends Conditional {
  readonly type: SingleQubitGateType;
  readonly qubit: number;
}

export interface ParameterizedGate extends Conditional {
  readonly type: ParameterizedGateType;
  readonly qubit: number;
  readonly theta: number;
}

/**
 * CNOT, CZ and SWAP. For SWAP the two fields simply name the exchanged qubits.
 */
export interface TwoQubitGate extends Conditional {
  readonly type: TwoQubitGateType;
  readonly control: number;
  readonly target: number;
}

export interface ControlledPhaseGate extends Conditional {
  readonly type: 'cphase';
  readonly control: number;
  readonly target: number;
  readonly theta: number;
}

export interface MultiControlledGate extends Conditional {
  readonly type: MultiControlledGateType;
  readonly controls: readonly number[];
  readonly target: number;
}

/**
 * Mid-circuit measurement: collapses `qubit` and stores the outcome
 */
export interface MeasureGate {
  readonly type: 'measure';
  readonly qubit: number;
  readonly classicalBit: number;
}

/**
 * Barrier (for display and depth grouping, doesn't affect state)
 */
export interface BarrierGate {
  readonly type: 'barrier';
  readonly qubits: readonly number[];
}

export type UnitaryGate =
  | SingleQubitGate
  | ParameterizedGate
  | TwoQubitGate
  | ControlledPhaseGate
  | MultiControlledGate;

export type Gate = UnitaryGate | MeasureGate | BarrierGate;

// ============================================================================
// Circuit Statistics
// ============================================================================

export interface CircuitStats {
  numQubits: number;
  depth: number;
  totalGates: number;
  singleQubitGates: number;
  twoQubitGates: number;
  multiQubitGates: number;
  measurements: number;
  conditionalGates: number;
  gateBreakdown: Record<string, number>;
}

export interface CircuitJSON {
  name?: string;
  numQubits: number;
  createdAt: string;
  gates: readonly Gate[];
}

// ============================================================================
// Gate Application
// ============================================================================

function unknownGate(gate: never): never {
  throw new ConfigurationError(`Unknown gate: ${JSON.stringify(gate)}`);
}

/**
 * Apply one unitary gate (or barrier) to a register. Measurement and
 * classical conditions are the simulator's job and are rejected here.
 */
export function applyGate(register: AmplitudeRegister, gate: Gate): void {
  switch (gate.type) {
    case 'h':
      register.h(gate.qubit);
      break;
    case 'x':
      register.x(gate.qubit);
      break;
    case 'y':
      register.y(gate.qubit);
      break;
    case 'z':
      register.z(gate.qubit);
      break;
    case 's':
      register.s(gate.qubit);
      break;
    case 'sdg':
      register.sdg(gate.qubit);
      break;
    case 't':
      register.t(gate.qubit);
      break;
    case 'tdg':
      register.tdg(gate.qubit);
      break;
    case 'rx':
      register.rx(gate.qubit, gate.theta);
      break;
    case 'ry':
      register.ry(gate.qubit, gate.theta);
      break;
    case 'rz':
      register.rz(gate.qubit, gate.theta);
      break;
    case 'phase':
      register.phase(gate.qubit, gate.theta);
      break;
    case 'cnot':
      register.cnot(gate.control, gate.target);
      break;
    case 'cz':
      register.cz(gate.control, gate.target);
      break;
    case 'swap':
      register.swap(gate.control, gate.target);
      break;
    case 'cphase':
      register.cphase(gate.control, gate.target, gate.theta);
      break;
    case 'mcx':
      register.mcx(gate.controls, gate.target);
      break;
    case 'mcz':
      register.mcz(gate.controls, gate.target);
      break;
    case 'barrier':
      break;
    case 'measure':
      throw new ConfigurationError(
        `Measurement of qubit ${gate.qubit} needs a random source; evolve the circuit with a Simulator`
      );
    default:
      unknownGate(gate);
  }
}

// ============================================================================
// Circuit Class
// ============================================================================

/**
 * Quantum Circuit Builder
 *
 * @example
 * ```typescript
 * const bell = new Circuit(2, 'Bell')
 *   .h(0)
 *   .cnot(0, 1)
 *   .freeze();
 *
 * const result = new Simulator().run(bell, { shots: 1000, seed: 7 });
 * ```
 */
export class Circuit {
  private readonly _numQubits: number;
  private readonly _name?: string;
  private readonly _createdAt: Date;
  private _gates: Gate[] = [];
  private _frozen = false;
  private _condition?: ClassicalCondition;

  /**
   * @param numQubits Number of qubits (and classical bits) in the circuit
   * @param name Optional name for the circuit
   */
  constructor(numQubits: number, name?: string) {
    assertQubitCount(numQubits);
    this._numQubits = numQubits;
    this._name = name;
    this._createdAt = new Date();
  }

  /**
   * Build a circuit from gate tokens such as `['H', 'CNOT', 'RZ(pi/2)']`.
   * An unknown token aborts construction with a ConfigurationError.
   */
  static fromTokens(
    name: string,
    numQubits: number,
    tokens: readonly string[],
    bindings?: readonly (TokenBinding | undefined)[]
  ): Circuit {
    const circuit = new Circuit(numQubits, name);
    for (const gate of bindTokens(numQubits, tokens, bindings)) {
      circuit.add(gate);
    }
    return circuit;
  }

  // =========================================================================
  // Properties
  // =========================================================================

  get numQubits(): number {
    return this._numQubits;
  }

  /**
   * One classical bit per qubit
   */
  get numClassicalBits(): number {
    return this._numQubits;
  }

  get name(): string | undefined {
    return this._name;
  }

  get createdAt(): Date {
    return new Date(this._createdAt.getTime());
  }

  /**
   * The gate list; a copy until the circuit is frozen
   */
  get gates(): readonly Gate[] {
    return this._frozen ? this._gates : [...this._gates];
  }

  get length(): number {
    return this._gates.length;
  }

  get isFrozen(): boolean {
    return this._frozen;
  }

  /**
   * True when the circuit measures mid-way or uses classical control, so
   * each shot has to be evolved separately
   */
  get isDynamic(): boolean {
    return this._gates.some(
      (g) => g.type === 'measure' || (g.type !== 'barrier' && g.condition !== undefined)
    );
  }

  /**
   * Make the circuit immutable. Further edits throw ImmutableCircuitError.
   */
  freeze(): this {
    if (!this._frozen) {
      this._frozen = true;
      Object.freeze(this._gates);
    }
    return this;
  }

  /**
   * Add a gate operation, validating it against this circuit
   */
  add(gate: Gate): this {
    switch (gate.type) {
      case 'barrier':
        return this.barrier(gate.qubits);
      case 'measure':
        return this.measure(gate.qubit, gate.classicalBit);
      default:
        if (gate.condition) {
          const { condition } = gate;
          const unconditioned: UnitaryGate = { ...gate, condition: undefined };
          return this.onClassical(condition.classicalBit, condition.value, (c) =>
            c.addUnconditioned(unconditioned)
          );
        }
        return this.addUnconditioned(gate);
    }
  }

  private addUnconditioned(gate: UnitaryGate): this {
    switch (gate.type) {
      case 'rx':
      case 'ry':
      case 'rz':
      case 'phase':
        return this.rotation(gate.type, gate.qubit, gate.theta);
      case 'cnot':
        return this.cnot(gate.control, gate.target);
      case 'cz':
        return this.cz(gate.control, gate.target);
      case 'swap':
        return this.swap(gate.control, gate.target);
      case 'cphase':
        return this.cphase(gate.control, gate.target, gate.theta);
      case 'mcx':
      case 'mcz':
        return this.multiControlled(gate.type, gate.controls, gate.target);
      default:
        return this.single(gate.type, gate.qubit);
    }
  }

  // =========================================================================
  // Single-Qubit Gates
  // =========================================================================

  h(qubit: number): this {
    return this.single('h', qubit);
  }

  /**
   * Pauli-X gate (NOT)
   */
  x(qubit: number): this {
    return this.single('x', qubit);
  }

  y(qubit: number): this {
    return this.single('y', qubit);
  }

  z(qubit: number): this {
    return this.single('z', qubit);
  }

  /**
   * S gate (sqrt Z)
   */
  s(qubit: number): this {
    return this.single('s', qubit);
  }

  sdg(qubit: number): this {
    return this.single('sdg', qubit);
  }

  /**
   * T gate (sqrt S)
   */
  t(qubit: number): this {
    return this.single('t', qubit);
  }

  tdg(qubit: number): this {
    return this.single('tdg', qubit);
  }

  // =========================================================================
  // Parameterized Single-Qubit Gates
  // =========================================================================

  rx(qubit: number, angle: number): this {
    return this.rotation('rx', qubit, angle);
  }

  ry(qubit: number, angle: number): this {
    return this.rotation('ry', qubit, angle);
  }

  rz(qubit: number, angle: number): this {
    return this.rotation('rz', qubit, angle);
  }

  /**
   * Phase gate P(angle)
   */
  phase(qubit: number, angle: number): this {
    return this.rotation('phase', qubit, angle);
  }

  // =========================================================================
  // Two-Qubit Gates
  // =========================================================================

  cnot(control: number, target: number): this {
    this.validateQubit(control);
    this.validateQubit(target);
    assertDistinctQubits([control, target]);
    return this.push({ type: 'cnot', control, target });
  }

  /**
   * Alias for CNOT
   */
  cx(control: number, target: number): this {
    return this.cnot(control, target);
  }

  cz(control: number, target: number): this {
    this.validateQubit(control);
    this.validateQubit(target);
    assertDistinctQubits([control, target]);
    return this.push({ type: 'cz', control, target });
  }

  swap(qubit1: number, qubit2: number): this {
    this.validateQubit(qubit1);
    this.validateQubit(qubit2);
    assertDistinctQubits([qubit1, qubit2]);
    return this.push({ type: 'swap', control: qubit1, target: qubit2 });
  }

  /**
   * Controlled phase gate
   */
  cphase(control: number, target: number, angle: number): this {
    this.validateQubit(control);
    this.validateQubit(target);
    assertDistinctQubits([control, target]);
    assertFiniteAngle(angle, 'cphase');
    return this.push({ type: 'cphase', control, target, theta: angle });
  }

  // =========================================================================
  // Multi-Controlled Gates
  // =========================================================================

  /**
   * Multi-controlled X; with no controls this is plain X
   */
  mcx(controls: readonly number[], target: number): this {
    return this.multiControlled('mcx', controls, target);
  }

  /**
   * Alias for two-control MCX
   */
  toffoli(control1: number, control2: number, target: number): this {
    return this.mcx([control1, control2], target);
  }

  /**
   * Multi-controlled Z; with no controls this is plain Z
   */
  mcz(controls: readonly number[], target: number): this {
    return this.multiControlled('mcz', controls, target);
  }

  // =========================================================================
  // Measurement and Classical Control
  // =========================================================================

  /**
   * Measure a qubit mid-circuit into a classical bit (defaults to the
   * qubit's own index)
   */
  measure(qubit: number, classicalBit: number = qubit): this {
    this.validateQubit(qubit);
    this.validateClassicalBit(classicalBit);
    if (this._condition) {
      throw new ConfigurationError('Measurement cannot be classically conditioned');
    }
    return this.push({ type: 'measure', qubit, classicalBit });
  }

  measureAll(): this {
    for (let i = 0; i < this._numQubits; i++) {
      this.measure(i, i);
    }
    return this;
  }

  /**
   * Add the gates built in `body` with the condition `c[classicalBit] == value`
   *
   * @example
   * ```typescript
   * circuit.measure(1, 1).onClassical(1, 1, (c) => c.x(2));
   * ```
   */
  onClassical(classicalBit: number, value: 0 | 1, body: (circuit: this) => void): this {
    this.validateClassicalBit(classicalBit);
    if (this._condition) {
      throw new ConfigurationError('Classical conditions cannot be nested');
    }
    this._condition = { classicalBit, value };
    try {
      body(this);
    } finally {
      this._condition = undefined;
    }
    return this;
  }

  /**
   * Add a barrier (no effect on state)
   */
  barrier(qubits?: readonly number[]): this {
    const qs = qubits ?? Array.from({ length: this._numQubits }, (_, i) => i);
    for (const q of qs) {
      this.validateQubit(q);
    }
    return this.push({ type: 'barrier', qubits: [...qs] });
  }

  // =========================================================================
  // Circuit Composition
  // =========================================================================

  /**
   * Append another circuit's gates, shifting its qubits and classical bits
   * by `offset`
   */
  append(other: Circuit, offset: number = 0): this {
    if (!Number.isInteger(offset) || offset < 0 || offset + other.numQubits > this._numQubits) {
      throw new InvalidArgumentError(
        `Cannot append ${other.numQubits}-qubit circuit at offset ${offset} to ${this._numQubits}-qubit circuit`,
        'offset'
      );
    }

    const gates = [...other._gates];
    for (const gate of gates) {
      this.push(offsetGate(gate, offset));
    }
    return this;
  }

  /**
   * Create the inverse (dagger) of a unitary circuit
   */
  inverse(): Circuit {
    if (this.isDynamic) {
      throw new ConfigurationError(
        'Cannot invert a circuit with measurement or classical control'
      );
    }
    const inverse = new Circuit(this._numQubits, `${this._name ?? 'circuit'}†`);
    for (let i = this._gates.length - 1; i >= 0; i--) {
      inverse.push(invertGate(this._gates[i]));
    }
    return inverse;
  }

  // =========================================================================
  // Application
  // =========================================================================

  /**
   * Apply this unitary circuit to a register in place
   */
  apply(register: AmplitudeRegister): AmplitudeRegister {
    if (register.numQubits !== this._numQubits) {
      throw new InvalidArgumentError(
        `Circuit has ${this._numQubits} qubits but register has ${register.numQubits}`,
        'register'
      );
    }
    if (this.isDynamic) {
      throw new ConfigurationError(
        `Circuit '${this._name ?? 'circuit'}' measures mid-circuit; evolve it with a Simulator`
      );
    }
    for (const gate of this._gates) {
      applyGate(register, gate);
    }
    return register;
  }

  // =========================================================================
  // Statistics
  // =========================================================================

  getStats(): CircuitStats {
    const gateBreakdown: Record<string, number> = {};
    let singleQubitGates = 0;
    let twoQubitGates = 0;
    let multiQubitGates = 0;
    let measurements = 0;
    let conditionalGates = 0;

    for (const gate of this._gates) {
      if (gate.type === 'barrier') continue;
      gateBreakdown[gate.type] = (gateBreakdown[gate.type] ?? 0) + 1;

      if (gate.type === 'measure') {
        measurements++;
        continue;
      }
      if (gate.condition) {
        conditionalGates++;
      }
      const width = gateQubits(gate).length;
      if (width === 1) {
        singleQubitGates++;
      } else if (width === 2) {
        twoQubitGates++;
      } else {
        multiQubitGates++;
      }
    }

    return {
      numQubits: this._numQubits,
      depth: this.calculateDepth(),
      totalGates: singleQubitGates + twoQubitGates + multiQubitGates + measurements,
      singleQubitGates,
      twoQubitGates,
      multiQubitGates,
      measurements,
      conditionalGates,
      gateBreakdown,
    };
  }

  private calculateDepth(): number {
    const qubitDepths: number[] = new Array<number>(this._numQubits).fill(0);

    for (const gate of this._gates) {
      if (gate.type === 'barrier') continue;

      const qubits = gateQubits(gate);
      const maxDepth = Math.max(...qubits.map((q) => qubitDepths[q]));
      for (const q of qubits) {
        qubitDepths[q] = maxDepth + 1;
      }
    }

    return Math.max(...qubitDepths);
  }

  // =========================================================================
  // Serialization
  // =========================================================================

  toJSON(): CircuitJSON {
    return {
      name: this._name,
      numQubits: this._numQubits,
      createdAt: this._createdAt.toISOString(),
      gates: [...this._gates],
    };
  }

  /**
   * Convert to OpenQASM 3 (stdgates.inc)
   */
  toQASM(): string {
    const lines: string[] = [
      'OPENQASM 3.0;',
      'include "stdgates.inc";',
      `qubit[${this._numQubits}] q;`,
      `bit[${this._numQubits}] c;`,
      '',
    ];

    for (const gate of this._gates) {
      lines.push(gateToQASM(gate));
    }

    return lines.join('\n');
  }

  // =========================================================================
  // Private Helpers
  // =========================================================================

  private push(gate: Gate): this {
    if (this._frozen) {
      throw new ImmutableCircuitError(this._name ?? 'circuit');
    }
    let stored = gate;
    if (this._condition && gate.type !== 'measure' && gate.type !== 'barrier') {
      if (gate.condition) {
        throw new ConfigurationError('Classical conditions cannot be nested');
      }
      stored = { ...gate, condition: this._condition };
    }
    if (stored.type !== 'measure' && stored.type !== 'barrier' && stored.condition) {
      this.validateClassicalBit(stored.condition.classicalBit);
    }
    this._gates.push(Object.freeze(stored));
    return this;
  }

  private single(type: SingleQubitGateType, qubit: number): this {
    this.validateQubit(qubit);
    return this.push({ type, qubit });
  }

  private rotation(type: ParameterizedGateType, qubit: number, angle: number): this {
    this.validateQubit(qubit);
    assertFiniteAngle(angle, type);
    return this.push({ type, qubit, theta: angle });
  }

  private multiControlled(
    type: MultiControlledGateType,
    controls: readonly number[],
    target: number
  ): this {
    for (const c of controls) {
      this.validateQubit(c);
    }
    this.validateQubit(target);
    assertDistinctQubits([...controls, target]);
    return this.push({ type, controls: Object.freeze([...controls]), target });
  }

  private validateQubit(qubit: number): void {
    assertQubitIndex(qubit, this._numQubits);
  }

  private validateClassicalBit(bit: number): void {
    if (!Number.isInteger(bit) || bit < 0 || bit >= this.numClassicalBits) {
      throw new IndexError(bit, this.numClassicalBits, 'Classical bit');
    }
  }
}

// ============================================================================
// Gate Helpers
// ============================================================================

function gateQubits(gate: Exclude<Gate, BarrierGate>): number[] {
  switch (gate.type) {
    case 'cnot':
    case 'cz':
    case 'swap':
    case 'cphase':
      return [gate.control, gate.target];
    case 'mcx':
    case 'mcz':
      return [...gate.controls, gate.target];
    default:
      return [gate.qubit];
  }
}

function offsetCondition(
  condition: ClassicalCondition | undefined,
  offset: number
): ClassicalCondition | undefined {
  return condition && { ...condition, classicalBit: condition.classicalBit + offset };
}

function offsetGate(gate: Gate, offset: number): Gate {
  switch (gate.type) {
    case 'barrier':
      return { ...gate, qubits: gate.qubits.map((q) => q + offset) };
    case 'measure':
      return {
        ...gate,
        qubit: gate.qubit + offset,
        classicalBit: gate.classicalBit + offset,
      };
    case 'cnot':
    case 'cz':
    case 'swap':
    case 'cphase':
      return {
        ...gate,
        control: gate.control + offset,
        target: gate.target + offset,
        condition: offsetCondition(gate.condition, offset),
      };
    case 'mcx':
    case 'mcz':
      return {
        ...gate,
        controls: gate.controls.map((q) => q + offset),
        target: gate.target + offset,
        condition: offsetCondition(gate.condition, offset),
      };
    default:
      return {
        ...gate,
        qubit: gate.qubit + offset,
        condition: offsetCondition(gate.condition, offset),
      };
  }
}

function invertGate(gate: Gate): Gate {
  switch (gate.type) {
    case 's':
      return { ...gate, type: 'sdg' };
    case 'sdg':
      return { ...gate, type: 's' };
    case 't':
      return { ...gate, type: 'tdg' };
    case 'tdg':
      return { ...gate, type: 't' };
    case 'rx':
    case 'ry':
    case 'rz':
    case 'phase':
    case 'cphase':
      return { ...gate, theta: -gate.theta };
    default:
      // Self-inverse gates (H, X, Y, Z, CNOT, CZ, SWAP, MCX, MCZ)
      return { ...gate };
  }
}

function conditionPrefix(gate: UnitaryGate): string {
  return gate.condition
    ? `if (c[${gate.condition.classicalBit}] == ${gate.condition.value}) `
    : '';
}

function gateToQASM(gate: Gate): string {
  switch (gate.type) {
    case 'barrier':
      return `barrier ${gate.qubits.map((q) => `q[${q}]`).join(', ')};`;
    case 'measure':
      return `c[${gate.classicalBit}] = measure q[${gate.qubit}];`;
    default:
      return `${conditionPrefix(gate)}${unitaryToQASM(gate)};`;
  }
}

function unitaryToQASM(gate: UnitaryGate): string {
  switch (gate.type) {
    case 'rx':
    case 'ry':
    case 'rz':
      return `${gate.type}(${gate.theta}) q[${gate.qubit}]`;
    case 'phase':
      return `p(${gate.theta}) q[${gate.qubit}]`;
    case 'cnot':
      return `cx q[${gate.control}], q[${gate.target}]`;
    case 'cz':
    case 'swap':
      return `${gate.type} q[${gate.control}], q[${gate.target}]`;
    case 'cphase':
      return `cp(${gate.theta}) q[${gate.control}], q[${gate.target}]`;
    case 'mcx':
    case 'mcz': {
      const base = gate.type === 'mcx' ? 'x' : 'z';
      const operands = [...gate.controls, gate.target].map((q) => `q[${q}]`).join(', ');
      return gate.controls.length === 0
        ? `${base} ${operands}`
        : `ctrl(${gate.controls.length}) @ ${base} ${operands}`;
    }
    default:
      return `${gate.type} q[${gate.qubit}]`;
  }
}

// ============================================================================
// Common Circuits
// ============================================================================

/**
 * Bell state circuit (|00⟩ + |11⟩) / sqrt(2)
 */
export function bellCircuit(): Circuit {
  return new Circuit(2, 'Bell').h(0).cnot(0, 1);
}

/**
 * Uniform superposition circuit (Hadamard on all qubits)
 */
export function superpositionCircuit(numQubits: number): Circuit {
  const circuit = new Circuit(numQubits, 'Superposition');
  for (let i = 0; i < numQubits; i++) {
    circuit.h(i);
  }
  return circuit;
}
