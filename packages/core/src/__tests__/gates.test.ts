/**
 * Tests for the single-qubit gate library
 */

import { describe, it, expect } from 'vitest';
import {
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
  type Matrix2,
} from '../gates';
import { equals } from '../complex';
import { InvalidArgumentError } from '../errors';

function matricesEqual(a: Matrix2, b: Matrix2, tolerance = 1e-12): boolean {
  return a.every((entry, i) => equals(entry, b[i], tolerance));
}

describe('Gate Library', () => {
  it('every fixed gate is unitary', () => {
    for (const m of [IDENTITY, HADAMARD, PAULI_X, PAULI_Y, PAULI_Z, S_GATE, S_DAGGER, T_GATE, T_DAGGER]) {
      expect(isUnitary(m)).toBe(true);
    }
  });

  it('rotations are unitary for arbitrary angles', () => {
    for (const theta of [0, 0.3, Math.PI / 3, -2.5, 7]) {
      expect(isUnitary(rotationX(theta))).toBe(true);
      expect(isUnitary(rotationY(theta))).toBe(true);
      expect(isUnitary(rotationZ(theta))).toBe(true);
      expect(isUnitary(phaseShift(theta))).toBe(true);
    }
  });

  it('detects a non-unitary matrix', () => {
    const m: Matrix2 = [
      { real: 1, imag: 0 },
      { real: 1, imag: 0 },
      { real: 0, imag: 0 },
      { real: 1, imag: 0 },
    ];
    expect(isUnitary(m)).toBe(false);
  });

  it('H is self-inverse', () => {
    expect(matricesEqual(multiplyMatrices(HADAMARD, HADAMARD), IDENTITY)).toBe(true);
  });

  it('S² = Z and T² = S', () => {
    expect(matricesEqual(multiplyMatrices(S_GATE, S_GATE), PAULI_Z)).toBe(true);
    expect(matricesEqual(multiplyMatrices(T_GATE, T_GATE), S_GATE)).toBe(true);
  });

  it('adjoint maps S to S† and T to T†', () => {
    expect(matricesEqual(adjoint(S_GATE), S_DAGGER)).toBe(true);
    expect(matricesEqual(adjoint(T_GATE), T_DAGGER)).toBe(true);
  });

  it('RZ(θ) = diag(e^(-iθ/2), e^(iθ/2))', () => {
    const [m00, m01, m10, m11] = rotationZ(Math.PI);
    expect(m00.real).toBeCloseTo(0, 12);
    expect(m00.imag).toBeCloseTo(-1, 12);
    expect(m01).toEqual({ real: 0, imag: 0 });
    expect(m10).toEqual({ real: 0, imag: 0 });
    expect(m11.real).toBeCloseTo(0, 12);
    expect(m11.imag).toBeCloseTo(1, 12);
  });

  it('P(π) equals Z and RX(π) equals -iX', () => {
    expect(matricesEqual(phaseShift(Math.PI), PAULI_Z)).toBe(true);
    const rx = rotationX(Math.PI);
    expect(rx[1].imag).toBeCloseTo(-1, 12);
    expect(rx[0].real).toBeCloseTo(0, 12);
  });

  it('rejects non-finite angles', () => {
    expect(() => rotationX(Number.NaN)).toThrow(InvalidArgumentError);
    expect(() => rotationY(Infinity)).toThrow('Angle for ry must be a finite number');
    expect(() => phaseShift(-Infinity)).toThrow(InvalidArgumentError);
  });
});
