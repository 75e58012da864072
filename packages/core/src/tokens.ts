/**
 * Token binder: turns symbolic gate names ("H", "CNOT", "RZ(0.5)") into
 * bound gate operations.
 *
 * Default wiring, in token order:
 * - single-qubit and rotation tokens act on `index mod n`
 * - two-qubit tokens use control `index mod n`, target `(index mod n + 1) mod n`
 * - rotations without an explicit angle use π/4
 */

import type {
  ParameterizedGateType,
  SingleQubitGateType,
  TwoQubitGateType,
  UnitaryGate,
} from './circuit';
import { ConfigurationError, InvalidArgumentError } from './errors';

export const DEFAULT_TOKEN_ANGLE = Math.PI / 4;

/**
 * Explicit wiring for one token, overriding the default policy
 */
export interface TokenBinding {
  qubit?: number;
  control?: number;
  target?: number;
  theta?: number;
}

const SINGLE_QUBIT_TOKENS = new Map<string, SingleQubitGateType>([
  ['H', 'h'],
  ['X', 'x'],
  ['Y', 'y'],
  ['Z', 'z'],
  ['S', 's'],
  ['SDG', 'sdg'],
  ['T', 't'],
  ['TDG', 'tdg'],
]);

const ROTATION_TOKENS = new Map<string, ParameterizedGateType>([
  ['RX', 'rx'],
  ['RY', 'ry'],
  ['RZ', 'rz'],
  ['P', 'phase'],
  ['PHASE', 'phase'],
]);

const TWO_QUBIT_TOKENS = new Map<string, TwoQubitGateType>([
  ['CNOT', 'cnot'],
  ['CX', 'cnot'],
  ['CZ', 'cz'],
  ['SWAP', 'swap'],
]);

const TOKEN_PATTERN = /^([A-Za-z]+)(?:\(([^()]*)\))?$/;

// "pi", "-pi/2", "2pi", "3*pi/4"
const PI_PATTERN = /^(-)?(?:(\d+(?:\.\d+)?)\*?)?pi(?:\/(\d+(?:\.\d+)?))?$/i;

/**
 * Parse an angle written as a number or a multiple of pi
 */
export function parseAngle(text: string, token: string = text): number {
  const trimmed = text.trim();
  const piMatch = PI_PATTERN.exec(trimmed);
  let angle: number;
  if (piMatch) {
    const sign = piMatch[1] ? -1 : 1;
    const factor = piMatch[2] ? Number(piMatch[2]) : 1;
    const divisor = piMatch[3] ? Number(piMatch[3]) : 1;
    angle = (sign * factor * Math.PI) / divisor;
  } else {
    angle = trimmed === '' ? Number.NaN : Number(trimmed);
  }
  if (!Number.isFinite(angle)) {
    throw new InvalidArgumentError(`Malformed angle '${text}' in token '${token}'`, 'theta');
  }
  return angle;
}

/**
 * Bind a token sequence to gate operations on an n-qubit register.
 * Index validation is left to the circuit the gates are added to.
 */
export function bindTokens(
  numQubits: number,
  tokens: readonly string[],
  bindings: readonly (TokenBinding | undefined)[] = []
): UnitaryGate[] {
  return tokens.map((token, index) => bindToken(numQubits, token, index, bindings[index]));
}

function bindToken(
  numQubits: number,
  token: string,
  index: number,
  binding: TokenBinding = {}
): UnitaryGate {
  const match = TOKEN_PATTERN.exec(token.trim());
  if (!match) {
    throw new ConfigurationError(`Unknown gate token '${token}'`, token);
  }
  const name = match[1].toUpperCase();
  const angleText = match[2];
  const slot = index % numQubits;

  const single = SINGLE_QUBIT_TOKENS.get(name);
  const rotation = ROTATION_TOKENS.get(name);
  const twoQubit = TWO_QUBIT_TOKENS.get(name);

  if (angleText !== undefined && rotation === undefined && (single || twoQubit)) {
    throw new InvalidArgumentError(`Gate token '${token}' takes no angle`, 'theta');
  }

  if (single) {
    return { type: single, qubit: binding.qubit ?? slot };
  }

  if (rotation) {
    const theta =
      binding.theta ?? (angleText === undefined ? DEFAULT_TOKEN_ANGLE : parseAngle(angleText, token));
    return { type: rotation, qubit: binding.qubit ?? slot, theta };
  }

  if (twoQubit) {
    if (numQubits < 2 && (binding.control === undefined || binding.target === undefined)) {
      throw new ConfigurationError(
        `Gate token '${token}' needs at least 2 qubits, circuit has ${numQubits}`,
        token
      );
    }
    return {
      type: twoQubit,
      control: binding.control ?? slot,
      target: binding.target ?? (slot + 1) % numQubits,
    };
  }

  throw new ConfigurationError(`Unknown gate token '${token}'`, token);
}
