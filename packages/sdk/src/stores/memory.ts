/**
 * In-process lookup store
 *
 * Assigns ids from 1 per table and rejects duplicate names the way a
 * unique index would. Useful for tests and for embedding without a database.
 */

import type { LookupEntry, LookupStore, LookupTable } from "../types.js";
import { DuplicateNameError } from "../errors.js";

interface MemoryTable {
  nextId: number;
  byName: Map<string, LookupEntry>;
  byId: Map<number, LookupEntry>;
}

export class MemoryLookupStore implements LookupStore {
  #tables = new Map<string, MemoryTable>();

  async findByName(table: LookupTable, name: string): Promise<LookupEntry | null> {
    return this.#table(table.name).byName.get(name) ?? null;
  }

  async findById(table: LookupTable, id: number): Promise<LookupEntry | null> {
    return this.#table(table.name).byId.get(id) ?? null;
  }

  async createWithUniqueName(table: LookupTable, name: string): Promise<LookupEntry> {
    const data = this.#table(table.name);
    if (data.byName.has(name)) {
      throw new DuplicateNameError(table.name, name);
    }

    const entry: LookupEntry = Object.freeze({ id: data.nextId, name });
    data.nextId++;
    data.byName.set(name, entry);
    data.byId.set(entry.id, entry);
    return entry;
  }

  async list(table: LookupTable): Promise<LookupEntry[]> {
    return [...this.#table(table.name).byId.values()].sort((a, b) => a.id - b.id);
  }

  /**
   * Insert entries with fixed ids, as an administrator or a migration would.
   * Later creates continue after the highest id.
   */
  seed(table: LookupTable, entries: LookupEntry[]): void {
    const data = this.#table(table.name);
    for (const { id, name } of entries) {
      if (data.byName.has(name)) {
        throw new DuplicateNameError(table.name, name);
      }
      const entry: LookupEntry = Object.freeze({ id, name });
      data.byName.set(name, entry);
      data.byId.set(id, entry);
      data.nextId = Math.max(data.nextId, id + 1);
    }
  }

  /**
   * Delete an entry out-of-band
   * @returns true if the entry existed
   */
  remove(table: LookupTable, id: number): boolean {
    const data = this.#table(table.name);
    const entry = data.byId.get(id);
    if (!entry) return false;
    data.byId.delete(id);
    data.byName.delete(entry.name);
    return true;
  }

  /**
   * Number of persisted entries in a table
   */
  count(table: LookupTable): number {
    return this.#table(table.name).byId.size;
  }

  #table(name: string): MemoryTable {
    let data = this.#tables.get(name);
    if (!data) {
      data = { nextId: 1, byName: new Map(), byId: new Map() };
      this.#tables.set(name, data);
    }
    return data;
  }
}
