/**
 * Complex number utilities for statevector amplitudes.
 *
 * Amplitudes are complex numbers of the form a + bi. The register stores
 * them as split real/imaginary Float64Arrays; these helpers work on the
 * boxed `Complex` form used at API boundaries and in gate matrices.
 */

/**
 * Complex number interface
 */
export interface Complex {
  real: number;
  imag: number;
}

/**
 * Create a complex number
 */
export function complex(real: number, imag: number = 0): Complex {
  return { real, imag };
}

/**
 * Magnitude squared |z|² = a² + b²
 * This is the Born-rule probability of an amplitude
 */
export function magnitudeSquared(c: Complex): number {
  return c.real * c.real + c.imag * c.imag;
}

export function conjugate(c: Complex): Complex {
  return { real: c.real, imag: -c.imag };
}

export function add(a: Complex, b: Complex): Complex {
  return { real: a.real + b.real, imag: a.imag + b.imag };
}

/**
 * Complex multiplication z1 * z2 = (a1*a2 - b1*b2) + (a1*b2 + a2*b1)i
 */
export function multiply(a: Complex, b: Complex): Complex {
  return {
    real: a.real * b.real - a.imag * b.imag,
    imag: a.real * b.imag + a.imag * b.real,
  };
}

/**
 * Unit phasor e^(iθ) = cos(θ) + i*sin(θ)
 */
export function expI(theta: number): Complex {
  return { real: Math.cos(theta), imag: Math.sin(theta) };
}

export function isFiniteComplex(c: Complex): boolean {
  return Number.isFinite(c.real) && Number.isFinite(c.imag);
}

/**
 * Check if two complex numbers are approximately equal
 */
export function equals(a: Complex, b: Complex, tolerance: number = 1e-10): boolean {
  return (
    Math.abs(a.real - b.real) < tolerance && Math.abs(a.imag - b.imag) < tolerance
  );
}

/**
 * Element-wise approximate equality of two amplitude vectors
 */
export function vectorsEqual(
  a: readonly Complex[],
  b: readonly Complex[],
  tolerance: number = 1e-10
): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return a.every((c, i) => equals(c, b[i], tolerance));
}
