/**
 * Gate library: 2x2 unitaries for single-qubit gates.
 *
 * Matrices are stored row-major as [m00, m01, m10, m11]. Controlled and
 * multi-controlled gates reuse these matrices with a control mask; SWAP is a
 * permutation and has no entry here.
 */

import { complex, conjugate, multiply, add, equals, expI, type Complex } from './complex';
import { InvalidArgumentError } from './errors';

export type Matrix2 = readonly [Complex, Complex, Complex, Complex];

const S2 = Math.SQRT1_2;

export const IDENTITY: Matrix2 = [complex(1), complex(0), complex(0), complex(1)];

export const HADAMARD: Matrix2 = [complex(S2), complex(S2), complex(S2), complex(-S2)];

export const PAULI_X: Matrix2 = [complex(0), complex(1), complex(1), complex(0)];

export const PAULI_Y: Matrix2 = [complex(0), complex(0, -1), complex(0, 1), complex(0)];

export const PAULI_Z: Matrix2 = [complex(1), complex(0), complex(0), complex(-1)];

// [[1,0],[0,i]]
export const S_GATE: Matrix2 = [complex(1), complex(0), complex(0), complex(0, 1)];

export const S_DAGGER: Matrix2 = [complex(1), complex(0), complex(0), complex(0, -1)];

export const T_GATE: Matrix2 = [complex(1), complex(0), complex(0), complex(S2, S2)];

export const T_DAGGER: Matrix2 = [complex(1), complex(0), complex(0), complex(S2, -S2)];

/**
 * Reject NaN and ±Infinity rotation angles
 */
export function assertFiniteAngle(theta: number, gate: string): void {
  if (!Number.isFinite(theta)) {
    throw new InvalidArgumentError(
      `Angle for ${gate} must be a finite number, got ${theta}`,
      'theta'
    );
  }
}

/**
 * Rx(θ) = exp(-iθX/2)
 */
export function rotationX(theta: number): Matrix2 {
  assertFiniteAngle(theta, 'rx');
  const c = Math.cos(theta / 2);
  const s = Math.sin(theta / 2);
  return [complex(c), complex(0, -s), complex(0, -s), complex(c)];
}

/**
 * Ry(θ) = exp(-iθY/2)
 */
export function rotationY(theta: number): Matrix2 {
  assertFiniteAngle(theta, 'ry');
  const c = Math.cos(theta / 2);
  const s = Math.sin(theta / 2);
  return [complex(c), complex(-s), complex(s), complex(c)];
}

/**
 * Rz(θ) = diag(e^(-iθ/2), e^(iθ/2))
 */
export function rotationZ(theta: number): Matrix2 {
  assertFiniteAngle(theta, 'rz');
  return [expI(-theta / 2), complex(0), complex(0), expI(theta / 2)];
}

/**
 * P(θ) = diag(1, e^(iθ)); the target matrix of controlled-phase
 */
export function phaseShift(theta: number): Matrix2 {
  assertFiniteAngle(theta, 'phase');
  return [complex(1), complex(0), complex(0), expI(theta)];
}

/**
 * Conjugate transpose
 */
export function adjoint(m: Matrix2): Matrix2 {
  return [conjugate(m[0]), conjugate(m[2]), conjugate(m[1]), conjugate(m[3])];
}

export function multiplyMatrices(a: Matrix2, b: Matrix2): Matrix2 {
  return [
    add(multiply(a[0], b[0]), multiply(a[1], b[2])),
    add(multiply(a[0], b[1]), multiply(a[1], b[3])),
    add(multiply(a[2], b[0]), multiply(a[3], b[2])),
    add(multiply(a[2], b[1]), multiply(a[3], b[3])),
  ];
}

/**
 * U†U = I within tolerance
 */
export function isUnitary(m: Matrix2, tolerance: number = 1e-12): boolean {
  const product = multiplyMatrices(adjoint(m), m);
  return product.every((entry, i) => equals(entry, IDENTITY[i], tolerance));
}
