/**
 * Tests for the gate token binder
 */

import { describe, it, expect } from 'vitest';
import { Circuit } from '../circuit';
import { DEFAULT_TOKEN_ANGLE, bindTokens, parseAngle } from '../tokens';
import { ConfigurationError, IndexError, InvalidArgumentError } from '../errors';

describe('Default Binding Policy', () => {
  it('binds single-qubit tokens to index mod n', () => {
    const circuit = Circuit.fromTokens('wrap', 2, ['X', 'X', 'X']);
    expect(circuit.gates.map((g) => (g.type === 'x' ? g.qubit : -1))).toEqual([0, 1, 0]);
  });

  it('binds two-qubit tokens to (index mod n, index mod n + 1)', () => {
    const circuit = Circuit.fromTokens('pair', 2, ['H', 'CNOT']);
    expect(circuit.gates).toEqual([
      { type: 'h', qubit: 0 },
      { type: 'cnot', control: 1, target: 0 },
    ]);
  });

  it('wraps the target past the last qubit', () => {
    expect(bindTokens(3, ['H', 'H', 'CZ'])[2]).toEqual({ type: 'cz', control: 2, target: 0 });
  });

  it('is case-insensitive and accepts aliases', () => {
    const gates = bindTokens(4, ['h', 'cx', 'Swap', 'sDg']);
    expect(gates).toEqual([
      { type: 'h', qubit: 0 },
      { type: 'cnot', control: 1, target: 2 },
      { type: 'swap', control: 2, target: 3 },
      { type: 'sdg', qubit: 3 },
    ]);
  });

  it('uses π/4 for rotations without an angle', () => {
    expect(bindTokens(1, ['RX'])).toEqual([{ type: 'rx', qubit: 0, theta: DEFAULT_TOKEN_ANGLE }]);
    expect(DEFAULT_TOKEN_ANGLE).toBe(Math.PI / 4);
  });

  it('parses explicit angles', () => {
    const gates = bindTokens(3, ['RZ(0.5)', 'p(pi/2)', 'ry(-pi)']);
    expect(gates).toEqual([
      { type: 'rz', qubit: 0, theta: 0.5 },
      { type: 'phase', qubit: 1, theta: Math.PI / 2 },
      { type: 'ry', qubit: 2, theta: -Math.PI },
    ]);
  });
});

describe('Explicit Bindings', () => {
  it('overrides the default wiring per token', () => {
    const circuit = Circuit.fromTokens('bound', 3, ['CNOT', 'RZ'], [
      { control: 2, target: 0 },
      { qubit: 2, theta: 1.25 },
    ]);
    expect(circuit.gates).toEqual([
      { type: 'cnot', control: 2, target: 0 },
      { type: 'rz', qubit: 2, theta: 1.25 },
    ]);
  });

  it('leaves unbound tokens on the default policy', () => {
    const circuit = Circuit.fromTokens('partial', 2, ['H', 'X'], [undefined, { qubit: 0 }]);
    expect(circuit.gates).toEqual([
      { type: 'h', qubit: 0 },
      { type: 'x', qubit: 0 },
    ]);
  });

  it('rejects bindings outside the register', () => {
    expect(() => Circuit.fromTokens('bad', 2, ['H'], [{ qubit: 5 }])).toThrow(IndexError);
  });
});

describe('Token Errors', () => {
  it('names the unknown token', () => {
    expect(() => Circuit.fromTokens('x', 2, ['BOGUS'])).toThrow(ConfigurationError);
    expect(() => Circuit.fromTokens('x', 2, ['H', 'BOGUS'])).toThrow("Unknown gate token 'BOGUS'");
  });

  it('carries the token as the error subject', () => {
    try {
      bindTokens(2, ['QQ']);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.subject).toBe('QQ');
        expect(error.code).toBe('CONFIGURATION');
      }
    }
  });

  it('rejects malformed angles', () => {
    expect(() => bindTokens(1, ['RZ(abc)'])).toThrow("Malformed angle 'abc' in token 'RZ(abc)'");
    expect(() => bindTokens(1, ['RZ()'])).toThrow(InvalidArgumentError);
  });

  it('rejects an angle on a fixed gate', () => {
    expect(() => bindTokens(1, ['H(0.5)'])).toThrow("Gate token 'H(0.5)' takes no angle");
  });

  it('needs two qubits for two-qubit tokens', () => {
    expect(() => bindTokens(1, ['CNOT'])).toThrow(
      "Gate token 'CNOT' needs at least 2 qubits, circuit has 1"
    );
  });

  it('rejects malformed token syntax', () => {
    expect(() => bindTokens(2, ['H H'])).toThrow(ConfigurationError);
  });
});

describe('parseAngle', () => {
  it('reads numbers and multiples of pi', () => {
    expect(parseAngle('1.5')).toBe(1.5);
    expect(parseAngle('pi')).toBe(Math.PI);
    expect(parseAngle('2*pi')).toBe(2 * Math.PI);
    expect(parseAngle('3pi/4')).toBe((3 * Math.PI) / 4);
    expect(parseAngle(' -PI/2 ')).toBe(-Math.PI / 2);
  });

  it('rejects non-numbers', () => {
    expect(() => parseAngle('tau')).toThrow(InvalidArgumentError);
    expect(() => parseAngle('Infinity')).toThrow(InvalidArgumentError);
  });
});
