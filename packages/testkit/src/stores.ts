/**
 * Store wrappers for exercising concurrency in tests
 */

import type { LookupEntry, LookupStore, LookupTable } from "@lookup-intern/sdk";

/**
 * Holds the first `parties` findByName calls until all of them have read,
 * so every caller sees the table before anyone creates. Later calls pass through.
 * Counts the calls that reach the inner store.
 */
export class BarrierStore implements LookupStore {
  readonly calls = { findByName: 0, findById: 0, createWithUniqueName: 0 };
  #inner: LookupStore;
  #parties: number;
  #arrived = 0;
  #waiters: Array<() => void> = [];

  constructor(inner: LookupStore, parties: number) {
    this.#inner = inner;
    this.#parties = parties;
  }

  async findByName(table: LookupTable, name: string): Promise<LookupEntry | null> {
    this.calls.findByName++;
    if (this.#arrived >= this.#parties) {
      return this.#inner.findByName(table, name);
    }

    this.#arrived++;
    const result = await this.#inner.findByName(table, name);
    if (this.#arrived === this.#parties) {
      for (const release of this.#waiters.splice(0)) {
        release();
      }
    } else {
      await new Promise<void>((resolve) => this.#waiters.push(resolve));
    }
    return result;
  }

  async findById(table: LookupTable, id: number): Promise<LookupEntry | null> {
    this.calls.findById++;
    return this.#inner.findById(table, id);
  }

  async createWithUniqueName(table: LookupTable, name: string): Promise<LookupEntry> {
    this.calls.createWithUniqueName++;
    return this.#inner.createWithUniqueName(table, name);
  }
}

/**
 * Store whose every call rejects with the given error
 */
export class FailingStore implements LookupStore {
  #error: unknown;

  constructor(error: unknown) {
    this.#error = error;
  }

  async findByName(): Promise<LookupEntry | null> {
    throw this.#error;
  }

  async findById(): Promise<LookupEntry | null> {
    throw this.#error;
  }

  async createWithUniqueName(): Promise<LookupEntry> {
    throw this.#error;
  }
}
