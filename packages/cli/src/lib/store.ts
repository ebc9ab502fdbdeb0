/**
 * Lookup tables for CLI commands
 * One registry over a file store, opened per command and closed after it
 */

import {
  FileLookupStore,
  LookupRegistry,
  defineLookupTable,
  type InternCache,
  type LookupEntry,
} from "@lookup-intern/sdk";

export interface CliLookup {
  /**
   * Create the root and _meta directories
   */
  init(): Promise<void>;

  /**
   * Find or create an id for each name, in argument order
   */
  idsFor(tableName: string, names: string[]): Promise<Array<[string, number]>>;

  /**
   * Name for each id, in argument order
   */
  namesFor(tableName: string, ids: number[]): Promise<Array<[number, string]>>;

  /**
   * All entries of a table, sorted by id
   */
  list(tableName: string): Promise<LookupEntry[]>;

  close(): Promise<void>;
}

export function openCliLookup(root: string): CliLookup {
  const store = new FileLookupStore({ root });
  const registry = new LookupRegistry({ store });

  const cacheFor = (tableName: string): InternCache =>
    registry.register(defineLookupTable({ name: tableName }));

  return {
    async init(): Promise<void> {
      await store.init();
    },

    async idsFor(tableName, names): Promise<Array<[string, number]>> {
      const cache = cacheFor(tableName);
      const pairs: Array<[string, number]> = [];
      // One at a time so new ids follow argument order
      for (const name of names) {
        pairs.push([name, await cache.idFor(name)]);
      }
      return pairs;
    },

    async namesFor(tableName, ids): Promise<Array<[number, string]>> {
      const cache = cacheFor(tableName);
      const pairs: Array<[number, string]> = [];
      for (const id of ids) {
        pairs.push([id, await cache.nameFor(id)]);
      }
      return pairs;
    },

    async list(tableName): Promise<LookupEntry[]> {
      return store.list(defineLookupTable({ name: tableName }));
    },

    async close(): Promise<void> {
      await registry.close();
    },
  };
}
