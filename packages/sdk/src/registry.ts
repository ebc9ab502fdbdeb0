/**
 * Registry of intern caches sharing one store
 *
 * Created once at startup and passed to whatever needs lookups;
 * close() at shutdown drops every cache and closes the store.
 */

import type { LookupStore, LookupTable } from "./types.js";
import { InternCache } from "./intern-cache.js";
import { LookupConfigError } from "./errors.js";
import { logger } from "./observability/logs.js";

export interface LookupRegistryOptions {
  store: LookupStore;
  /** Passed to every cache the registry creates */
  warnAtSize?: number;
}

export class LookupRegistry {
  #store: LookupStore;
  #warnAtSize: number | undefined;
  #caches = new Map<string, InternCache>();
  #closed = false;

  constructor(options: LookupRegistryOptions) {
    this.#store = options.store;
    this.#warnAtSize = options.warnAtSize;
  }

  /**
   * Register a table and return its cache.
   * Registering the same definition again returns the existing cache.
   *
   * @throws LookupConfigError if another definition already uses the table name
   */
  register(table: LookupTable): InternCache {
    this.#assertOpen();

    const existing = this.#caches.get(table.name);
    if (existing) {
      if (!sameTable(existing.table, table)) {
        throw new LookupConfigError(
          `Lookup table "${table.name}" is already registered with a different definition`
        );
      }
      return existing;
    }

    const cache = new InternCache({
      table,
      store: this.#store,
      ...(this.#warnAtSize !== undefined ? { warnAtSize: this.#warnAtSize } : {}),
    });
    this.#caches.set(table.name, cache);
    logger.debug("lookup.registry.register", { table: table.name });
    return cache;
  }

  /**
   * Cache for a registered table
   * @throws LookupConfigError if the table was never registered
   */
  cache(tableName: string): InternCache {
    this.#assertOpen();

    const cache = this.#caches.get(tableName);
    if (!cache) {
      throw new LookupConfigError(`Lookup table "${tableName}" is not registered`);
    }
    return cache;
  }

  /**
   * Names of registered tables, in registration order
   */
  tables(): string[] {
    return [...this.#caches.keys()];
  }

  /**
   * Drop every cache and close the store
   */
  async close(): Promise<void> {
    if (this.#closed) return;
    this.#closed = true;

    for (const cache of this.#caches.values()) {
      cache.clear();
    }
    this.#caches.clear();

    if (this.#store.close) {
      await this.#store.close();
    }
  }

  #assertOpen(): void {
    if (this.#closed) {
      throw new LookupConfigError("Lookup registry is closed");
    }
  }
}

function sameTable(a: LookupTable, b: LookupTable): boolean {
  return (
    a.name === b.name &&
    a.idColumn === b.idColumn &&
    a.nameColumn === b.nameColumn &&
    a.maxNameLength === b.maxNameLength &&
    a.attribute === b.attribute &&
    a.foreignKey === b.foreignKey
  );
}
