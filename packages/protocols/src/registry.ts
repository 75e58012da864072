/**
 * In-memory, append-only store of named circuits.
 */

import { NotFoundError, type Circuit } from '@qubit-lab/core';

export interface CircuitRecord {
  id: number;
  name: string;
  tokens: readonly string[];
  circuit: Circuit;
}

export class CircuitRegistry {
  private readonly records = new Map<number, CircuitRecord>();
  private nextId = 1;

  /**
   * Store a circuit under the next id (1, 2, ...)
   */
  register(name: string, circuit: Circuit, tokens: readonly string[] = []): CircuitRecord {
    const record: CircuitRecord = Object.freeze({
      id: this.nextId++,
      name,
      tokens: Object.freeze([...tokens]),
      circuit,
    });
    this.records.set(record.id, record);
    return record;
  }

  get(id: number): CircuitRecord {
    const record = this.records.get(id);
    if (!record) {
      throw new NotFoundError('Circuit', id);
    }
    return record;
  }

  has(id: number): boolean {
    return this.records.has(id);
  }

  list(): CircuitRecord[] {
    return [...this.records.values()];
  }

  get size(): number {
    return this.records.size;
  }
}
