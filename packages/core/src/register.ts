/**
 * AmplitudeRegister
 *
 * Owns the 2^n complex amplitudes of an n-qubit pure state and applies gates
 * to it in place. Bit i of a basis index is the state of qubit i, so qubit 0
 * is the least significant bit of the index.
 */

import { isFiniteComplex, magnitudeSquared, type Complex } from './complex';
import { InvalidArgumentError, IndexError, InvariantViolationError } from './errors';
import {
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
  type Matrix2,
} from './gates';
import type { Rng } from './random';

/**
 * Largest register the engine will allocate (2^24 amplitudes, 256 MiB)
 */
export const MAX_QUBITS = 24;

/**
 * Default tolerance on Σ|a|² = 1
 */
export const NORMALIZATION_TOLERANCE = 1e-9;

/**
 * Options for creating a register
 */
export interface RegisterOptions {
  /**
   * Number of qubits (1 to MAX_QUBITS)
   */
  numQubits: number;

  /**
   * Initial amplitudes (optional, defaults to |0...0⟩)
   */
  amplitudes?: readonly Complex[];
}

export function assertQubitCount(numQubits: number, max: number = MAX_QUBITS): void {
  if (!Number.isInteger(numQubits) || numQubits < 1 || numQubits > max) {
    throw new InvalidArgumentError(
      `numQubits must be an integer between 1 and ${max}, got ${numQubits}`,
      'numQubits'
    );
  }
}

export function assertQubitIndex(qubit: number, numQubits: number): void {
  if (!Number.isInteger(qubit) || qubit < 0 || qubit >= numQubits) {
    throw new IndexError(qubit, numQubits);
  }
}

/**
 * Throws unless every qubit is distinct
 */
export function assertDistinctQubits(qubits: readonly number[]): void {
  if (new Set(qubits).size !== qubits.length) {
    throw new InvalidArgumentError(
      `Gate qubits must be different, got [${qubits.join(', ')}]`,
      'qubits'
    );
  }
}

/**
 * Quantum register with a fluent gate API
 *
 * @example
 * ```typescript
 * const reg = AmplitudeRegister.create({ numQubits: 2 });
 * reg.h(0).cnot(0, 1);  // Bell state
 * reg.getProbabilities(); // [0.5, 0, 0, 0.5]
 * ```
 */
export class AmplitudeRegister {
  private readonly re: Float64Array;
  private readonly im: Float64Array;
  private readonly _numQubits: number;

  private constructor(numQubits: number, re: Float64Array, im: Float64Array) {
    this._numQubits = numQubits;
    this.re = re;
    this.im = im;
  }

  /**
   * Create a register in |0...0⟩, or in the given normalized state
   */
  static create(options: RegisterOptions): AmplitudeRegister {
    assertQubitCount(options.numQubits);
    const dim = 2 ** options.numQubits;
    const register = new AmplitudeRegister(
      options.numQubits,
      new Float64Array(dim),
      new Float64Array(dim)
    );
    if (options.amplitudes) {
      register.setAmplitudes(options.amplitudes);
    } else {
      register.re[0] = 1;
    }
    return register;
  }

  // =========================================================================
  // Properties
  // =========================================================================

  get numQubits(): number {
    return this._numQubits;
  }

  /**
   * Dimension of state space (2^n)
   */
  get stateDim(): number {
    return this.re.length;
  }

  // =========================================================================
  // State Operations
  // =========================================================================

  /**
   * Reset to |0...0⟩
   */
  reset(): this {
    this.re.fill(0);
    this.im.fill(0);
    this.re[0] = 1;
    return this;
  }

  clone(): AmplitudeRegister {
    return new AmplitudeRegister(
      this._numQubits,
      Float64Array.from(this.re),
      Float64Array.from(this.im)
    );
  }

  // =========================================================================
  // Single-Qubit Gates
  // =========================================================================

  /**
   * Hadamard gate - creates superposition
   * H|0⟩ = (|0⟩ + |1⟩)/√2
   */
  h(qubit: number): this {
    return this.applyMatrix(qubit, HADAMARD);
  }

  /**
   * Pauli-X gate (NOT gate)
   */
  x(qubit: number): this {
    return this.applyMatrix(qubit, PAULI_X);
  }

  /**
   * Pauli-Y gate
   * Y|0⟩ = i|1⟩, Y|1⟩ = -i|0⟩
   */
  y(qubit: number): this {
    return this.applyMatrix(qubit, PAULI_Y);
  }

  /**
   * Pauli-Z gate (phase flip)
   */
  z(qubit: number): this {
    return this.applyMatrix(qubit, PAULI_Z);
  }

  s(qubit: number): this {
    return this.applyMatrix(qubit, S_GATE);
  }

  sdg(qubit: number): this {
    return this.applyMatrix(qubit, S_DAGGER);
  }

  t(qubit: number): this {
    return this.applyMatrix(qubit, T_GATE);
  }

  tdg(qubit: number): this {
    return this.applyMatrix(qubit, T_DAGGER);
  }

  rx(qubit: number, angle: number): this {
    return this.applyMatrix(qubit, rotationX(angle));
  }

  ry(qubit: number, angle: number): this {
    return this.applyMatrix(qubit, rotationY(angle));
  }

  rz(qubit: number, angle: number): this {
    return this.applyMatrix(qubit, rotationZ(angle));
  }

  /**
   * Phase gate P(θ)
   * P(θ)|0⟩ = |0⟩, P(θ)|1⟩ = e^(iθ)|1⟩
   */
  phase(qubit: number, angle: number): this {
    return this.applyMatrix(qubit, phaseShift(angle));
  }

  // =========================================================================
  // Controlled Gates
  // =========================================================================

  /**
   * Controlled-NOT: flips target where control is |1⟩
   */
  cnot(control: number, target: number): this {
    return this.applyMatrix(target, PAULI_X, [control]);
  }

  cz(control: number, target: number): this {
    return this.applyMatrix(target, PAULI_Z, [control]);
  }

  /**
   * Controlled phase CP(θ): multiplies |11⟩ by e^(iθ)
   */
  cphase(control: number, target: number, angle: number): this {
    return this.applyMatrix(target, phaseShift(angle), [control]);
  }

  /**
   * Multi-controlled X (Toffoli for two controls)
   */
  mcx(controls: readonly number[], target: number): this {
    return this.applyMatrix(target, PAULI_X, controls);
  }

  /**
   * Multi-controlled Z: flips the sign of basis states where every control
   * and the target are |1⟩
   */
  mcz(controls: readonly number[], target: number): this {
    return this.applyMatrix(target, PAULI_Z, controls);
  }

  /**
   * SWAP: exchanges the two bit positions unconditionally
   */
  swap(qubit1: number, qubit2: number): this {
    assertQubitIndex(qubit1, this._numQubits);
    assertQubitIndex(qubit2, this._numQubits);
    assertDistinctQubits([qubit1, qubit2]);
    const m1 = 1 << qubit1;
    const m2 = 1 << qubit2;
    for (let i = 0; i < this.stateDim; i++) {
      if ((i & m1) !== 0 && (i & m2) === 0) {
        const j = (i ^ m1) | m2;
        const r = this.re[i];
        const im = this.im[i];
        this.re[i] = this.re[j];
        this.im[i] = this.im[j];
        this.re[j] = r;
        this.im[j] = im;
      }
    }
    return this;
  }

  /**
   * Left-multiply the state by `matrix` acting on `target`, embedded as the
   * identity on every other qubit. With controls, only basis states whose
   * control bits are all 1 are touched.
   */
  applyMatrix(target: number, matrix: Matrix2, controls: readonly number[] = []): this {
    assertQubitIndex(target, this._numQubits);
    for (const c of controls) {
      assertQubitIndex(c, this._numQubits);
    }
    assertDistinctQubits([...controls, target]);

    const mask = 1 << target;
    const controlMask = controls.reduce((acc, c) => acc | (1 << c), 0);
    const [m00, m01, m10, m11] = matrix;
    const re = this.re;
    const im = this.im;

    for (let i0 = 0; i0 < this.stateDim; i0++) {
      if ((i0 & mask) !== 0 || (i0 & controlMask) !== controlMask) {
        continue;
      }
      const i1 = i0 | mask;
      const ar = re[i0];
      const ai = im[i0];
      const br = re[i1];
      const bi = im[i1];
      re[i0] = m00.real * ar - m00.imag * ai + m01.real * br - m01.imag * bi;
      im[i0] = m00.real * ai + m00.imag * ar + m01.real * bi + m01.imag * br;
      re[i1] = m10.real * ar - m10.imag * ai + m11.real * br - m11.imag * bi;
      im[i1] = m10.real * ai + m10.imag * ar + m11.real * bi + m11.imag * br;
    }
    return this;
  }

  // =========================================================================
  // State Queries
  // =========================================================================

  getAmplitudes(): Complex[] {
    const amplitudes: Complex[] = [];
    for (let i = 0; i < this.stateDim; i++) {
      amplitudes.push({ real: this.re[i], imag: this.im[i] });
    }
    return amplitudes;
  }

  amplitude(basisState: number): Complex {
    this.checkBasisState(basisState);
    return { real: this.re[basisState], imag: this.im[basisState] };
  }

  /**
   * Replace the state (must have dimension 2^n and unit norm)
   */
  setAmplitudes(amplitudes: readonly Complex[]): this {
    if (amplitudes.length !== this.stateDim) {
      throw new InvalidArgumentError(
        `Expected ${this.stateDim} amplitudes, got ${amplitudes.length}`,
        'amplitudes'
      );
    }
    let total = 0;
    for (const a of amplitudes) {
      if (!isFiniteComplex(a)) {
        throw new InvalidArgumentError('Amplitudes must be finite', 'amplitudes');
      }
      total += magnitudeSquared(a);
    }
    if (Math.abs(total - 1) > NORMALIZATION_TOLERANCE) {
      throw new InvalidArgumentError(
        `Amplitudes must be normalized, total probability is ${total}`,
        'amplitudes'
      );
    }
    amplitudes.forEach((a, i) => {
      this.re[i] = a.real;
      this.im[i] = a.imag;
    });
    return this;
  }

  /**
   * Born-rule probability of every basis state
   */
  getProbabilities(): Float64Array {
    const probs = new Float64Array(this.stateDim);
    for (let i = 0; i < this.stateDim; i++) {
      probs[i] = this.re[i] * this.re[i] + this.im[i] * this.im[i];
    }
    return probs;
  }

  probability(basisState: number): number {
    this.checkBasisState(basisState);
    return this.re[basisState] ** 2 + this.im[basisState] ** 2;
  }

  /**
   * Σ|a|², 1 for a valid state
   */
  totalProbability(): number {
    let total = 0;
    for (let i = 0; i < this.stateDim; i++) {
      total += this.re[i] * this.re[i] + this.im[i] * this.im[i];
    }
    return total;
  }

  probabilityOne(qubit: number): number {
    assertQubitIndex(qubit, this._numQubits);
    const mask = 1 << qubit;
    let p = 0;
    for (let i = 0; i < this.stateDim; i++) {
      if ((i & mask) !== 0) {
        p += this.re[i] * this.re[i] + this.im[i] * this.im[i];
      }
    }
    return p;
  }

  probabilityZero(qubit: number): number {
    assertQubitIndex(qubit, this._numQubits);
    const mask = 1 << qubit;
    let p = 0;
    for (let i = 0; i < this.stateDim; i++) {
      if ((i & mask) === 0) {
        p += this.re[i] * this.re[i] + this.im[i] * this.im[i];
      }
    }
    return p;
  }

  /**
   * Distribution over the 2^m outcomes of measuring `qubits`. Bit j of an
   * outcome index is the value of `qubits[j]`; basis states that agree on
   * the measured bits are summed.
   */
  marginalProbabilities(qubits: readonly number[]): Float64Array {
    for (const q of qubits) {
      assertQubitIndex(q, this._numQubits);
    }
    assertDistinctQubits(qubits);

    const dist = new Float64Array(2 ** qubits.length);
    for (let i = 0; i < this.stateDim; i++) {
      const p = this.re[i] * this.re[i] + this.im[i] * this.im[i];
      if (p === 0) continue;
      let outcome = 0;
      for (let j = 0; j < qubits.length; j++) {
        if ((i >> qubits[j]) & 1) {
          outcome |= 1 << j;
        }
      }
      dist[outcome] += p;
    }
    return dist;
  }

  // =========================================================================
  // Measurement
  // =========================================================================

  /**
   * Measure one qubit in the computational basis, collapsing the state onto
   * the observed outcome and renormalizing.
   * @returns 0 or 1
   */
  measure(qubit: number, rng: Rng): 0 | 1 {
    const p0 = this.probabilityZero(qubit);
    const p1 = this.probabilityOne(qubit);
    const outcome = rng() * (p0 + p1) < p0 ? 0 : 1;
    this.collapse(qubit, outcome);
    return outcome;
  }

  /**
   * Project onto `qubit = outcome` and renormalize
   */
  collapse(qubit: number, outcome: 0 | 1): this {
    const p = outcome === 1 ? this.probabilityOne(qubit) : this.probabilityZero(qubit);
    if (p <= 0) {
      throw new InvalidArgumentError(
        `Cannot collapse qubit ${qubit} onto |${outcome}⟩: outcome has zero probability`,
        'outcome'
      );
    }
    const mask = 1 << qubit;
    const factor = 1 / Math.sqrt(p);
    for (let i = 0; i < this.stateDim; i++) {
      const bit = (i & mask) !== 0 ? 1 : 0;
      if (bit === outcome) {
        this.re[i] *= factor;
        this.im[i] *= factor;
      } else {
        this.re[i] = 0;
        this.im[i] = 0;
      }
    }
    return this;
  }

  // =========================================================================
  // State Properties
  // =========================================================================

  /**
   * Single-qubit reduced density matrix ρ = Tr_rest |ψ⟩⟨ψ|, row-major
   */
  reducedDensityMatrix(qubit: number): Matrix2 {
    assertQubitIndex(qubit, this._numQubits);
    const mask = 1 << qubit;
    let rho00 = 0;
    let rho11 = 0;
    let offRe = 0;
    let offIm = 0;
    for (let i0 = 0; i0 < this.stateDim; i0++) {
      if ((i0 & mask) !== 0) continue;
      const i1 = i0 | mask;
      rho00 += this.re[i0] ** 2 + this.im[i0] ** 2;
      rho11 += this.re[i1] ** 2 + this.im[i1] ** 2;
      // ψ0 · conj(ψ1)
      offRe += this.re[i0] * this.re[i1] + this.im[i0] * this.im[i1];
      offIm += this.im[i0] * this.re[i1] - this.re[i0] * this.im[i1];
    }
    return [
      { real: rho00, imag: 0 },
      { real: offRe, imag: offIm },
      { real: offRe, imag: -offIm },
      { real: rho11, imag: 0 },
    ];
  }

  /**
   * Von Neumann entropy (base 2) of one qubit's reduced state: 0 for a
   * product state, 1 for a maximally entangled qubit
   */
  entanglementEntropy(qubit: number): number {
    const [rho00, rho01, , rho11] = this.reducedDensityMatrix(qubit);
    const a = rho00.real;
    const d = rho11.real;
    const trace = a + d;
    const offSq = rho01.real ** 2 + rho01.imag ** 2;
    const gap = Math.sqrt((a - d) ** 2 + 4 * offSq);
    const eigenvalues = [(trace + gap) / 2, (trace - gap) / 2];
    let entropy = 0;
    for (const lambda of eigenvalues) {
      if (lambda > 1e-15) {
        entropy -= lambda * Math.log2(lambda);
      }
    }
    return entropy;
  }

  /**
   * Fidelity with another state
   * F = |⟨ψ|φ⟩|²
   */
  fidelity(other: AmplitudeRegister): number {
    if (this._numQubits !== other._numQubits) {
      throw new InvalidArgumentError('States must have same number of qubits', 'other');
    }
    let real = 0;
    let imag = 0;
    for (let i = 0; i < this.stateDim; i++) {
      real += this.re[i] * other.re[i] + this.im[i] * other.im[i];
      imag += this.re[i] * other.im[i] - this.im[i] * other.re[i];
    }
    return real * real + imag * imag;
  }

  /**
   * Throw if Σ|a|² has drifted from 1 by more than `tolerance`
   */
  assertNormalized(tolerance: number = NORMALIZATION_TOLERANCE): void {
    const total = this.totalProbability();
    if (!(Math.abs(total - 1) <= tolerance)) {
      throw new InvariantViolationError(
        `Total probability ${total} deviates from 1 by more than ${tolerance}`
      );
    }
  }

  // =========================================================================
  // Internal Helpers
  // =========================================================================

  private checkBasisState(basisState: number): void {
    if (!Number.isInteger(basisState) || basisState < 0 || basisState >= this.stateDim) {
      throw new IndexError(basisState, this.stateDim, 'Basis state');
    }
  }
}
