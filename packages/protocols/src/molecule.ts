/**
 * Toy molecular simulation.
 *
 * Each electron pair is a Bell pair on qubits (2k, 2k+1). Bond k is then
 * perturbed by RZ(π·T/1000) on qubit 2k and RY(π·P/10) on qubit 2k+1, with
 * temperature T and pressure P. Every reported property is read off the
 * final statevector.
 */

import {
  Circuit,
  ConfigurationError,
  InvalidArgumentError,
  Simulator,
  type CircuitStats,
  type Complex,
} from '@qubit-lab/core';
import type { ProtocolOptions } from './types';

export type MoleculeType = 'h2o' | 'co2' | 'nh3' | 'ch4';

export interface MoleculeSpec {
  formula: string;
  atoms: readonly string[];
  bonds: number;
  numQubits: number;
}

export const MOLECULES: Readonly<Record<MoleculeType, MoleculeSpec>> = {
  h2o: { formula: 'H2O', atoms: ['H', 'H', 'O'], bonds: 2, numQubits: 6 },
  co2: { formula: 'CO2', atoms: ['C', 'O', 'O'], bonds: 2, numQubits: 6 },
  nh3: { formula: 'NH3', atoms: ['N', 'H', 'H', 'H'], bonds: 3, numQubits: 8 },
  ch4: { formula: 'CH4', atoms: ['C', 'H', 'H', 'H', 'H'], bonds: 4, numQubits: 10 },
};

export const MOLECULE_TYPES: readonly MoleculeType[] = ['h2o', 'co2', 'nh3', 'ch4'];

/**
 * Kelvin
 */
export const DEFAULT_TEMPERATURE = 300;

/**
 * Atmospheres
 */
export const DEFAULT_PRESSURE = 1;

export interface MoleculeOptions extends ProtocolOptions {
  temperature?: number;
  pressure?: number;
}

export interface MoleculeResult {
  molecule: MoleculeType;
  formula: string;
  atoms: string[];
  bonds: number;
  numQubits: number;
  temperature: number;
  pressure: number;
  stats: CircuitStats;
  qasm: string;
  amplitudes: Complex[];
  /**
   * ⟨Z_2k Z_2k+1⟩ for each electron pair k
   */
  pairCorrelations: number[];
  /**
   * ⟨H⟩ for H = -Σ_k Z_2k Z_2k+1, in units of the pair coupling
   */
  energy: number;
  /**
   * Von Neumann entropy (bits) of qubit 0
   */
  entanglementEntropy: number;
}

/**
 * Resolve a molecule name (any case)
 */
export function parseMoleculeType(name: string): MoleculeType {
  const normalized = name.trim().toLowerCase();
  const match = MOLECULE_TYPES.find((m) => m === normalized);
  if (!match) {
    throw new ConfigurationError(
      `Unsupported molecule '${name}', expected one of: ${MOLECULE_TYPES.join(', ')}`,
      name
    );
  }
  return match;
}

export function moleculeCircuit(
  molecule: MoleculeType,
  temperature: number = DEFAULT_TEMPERATURE,
  pressure: number = DEFAULT_PRESSURE
): Circuit {
  assertNonNegative(temperature, 'temperature');
  assertNonNegative(pressure, 'pressure');
  const spec = MOLECULES[molecule];
  const circuit = new Circuit(spec.numQubits, `${spec.formula} Molecule`);

  for (let q = 0; q + 1 < spec.numQubits; q += 2) {
    circuit.h(q).cnot(q, q + 1);
  }
  for (let bond = 0; bond < spec.bonds && 2 * bond + 1 < spec.numQubits; bond++) {
    circuit.rz(2 * bond, (Math.PI * temperature) / 1000);
    circuit.ry(2 * bond + 1, (Math.PI * pressure) / 10);
  }
  return circuit;
}

export function simulateMolecule(name: string, options: MoleculeOptions = {}): MoleculeResult {
  const molecule = parseMoleculeType(name);
  const temperature = options.temperature ?? DEFAULT_TEMPERATURE;
  const pressure = options.pressure ?? DEFAULT_PRESSURE;
  const spec = MOLECULES[molecule];

  const circuit = moleculeCircuit(molecule, temperature, pressure).freeze();
  const simulator = options.simulator ?? new Simulator();
  const { register } = simulator.evolve(circuit, options);

  const pairCorrelations: number[] = [];
  for (let q = 0; q + 1 < spec.numQubits; q += 2) {
    // Index bit 0 is qubit q, bit 1 is qubit q+1
    const pair = register.marginalProbabilities([q, q + 1]);
    pairCorrelations.push(pair[0] + pair[3] - pair[1] - pair[2]);
  }

  return {
    molecule,
    formula: spec.formula,
    atoms: [...spec.atoms],
    bonds: spec.bonds,
    numQubits: spec.numQubits,
    temperature,
    pressure,
    stats: circuit.getStats(),
    qasm: circuit.toQASM(),
    amplitudes: register.getAmplitudes(),
    pairCorrelations,
    energy: -pairCorrelations.reduce((sum, c) => sum + c, 0),
    entanglementEntropy: register.entanglementEntropy(0),
  };
}

function assertNonNegative(value: number, name: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidArgumentError(
      `${name} must be a non-negative finite number, got ${value}`,
      name
    );
  }
}
