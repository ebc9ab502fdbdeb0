/**
 * Name/id intern cache for one lookup table
 *
 * Invariants:
 * - nameToId[n] === id  <=>  idToName[id] === n for every cached pair
 * - Every cached pair was returned by the store
 * - Both directions change together in one synchronous step
 * - Entries are never evicted; invalidate() and clear() are the only removals
 */

import type {
  CacheStats,
  InternCacheOptions,
  LookupEntry,
  LookupStore,
  LookupTable,
} from "./types.js";
import { DuplicateNameError, LookupError, NotFoundError, StoreError } from "./errors.js";
import { validateEntryId, validateEntryName } from "./validation.js";
import { logger } from "./observability/logs.js";

const DEFAULT_WARN_AT_SIZE = 10000;

/**
 * Resolves names to ids and back for one lookup table, creating
 * entries on first use.
 *
 * @example
 * ```typescript
 * const carTypes = new InternCache({ table: lookupTableFor("carType"), store });
 * const id = await carTypes.idFor("Sports");
 * await carTypes.nameFor(id); // "Sports"
 * ```
 */
export class InternCache {
  readonly table: LookupTable;
  #store: LookupStore;
  #nameToId = new Map<string, number>();
  #idToName = new Map<number, string>();
  #pendingNames = new Map<string, Promise<number>>();
  #pendingIds = new Map<number, Promise<string>>();
  #warnAtSize: number;
  #warned = false;
  #hits = 0;
  #misses = 0;
  #creates = 0;
  #raceRecoveries = 0;

  constructor(options: InternCacheOptions) {
    this.table = options.table;
    this.#store = options.store;
    this.#warnAtSize = resolveWarnAtSize(options.warnAtSize);
  }

  /**
   * Number of cached name/id pairs
   */
  get size(): number {
    return this.#nameToId.size;
  }

  /**
   * Id for a name, creating the entry when the store has none
   *
   * @throws InvalidNameError if the name is empty or too long
   * @throws StoreError if the store fails
   */
  async idFor(name: string): Promise<number> {
    validateEntryName(this.table, name);

    const cached = this.#nameToId.get(name);
    if (cached !== undefined) {
      this.#hits++;
      return cached;
    }

    // Share one store round-trip between concurrent callers
    const pending = this.#pendingNames.get(name);
    if (pending) {
      this.#misses++;
      return pending;
    }

    this.#misses++;
    const lookup = this.#findOrCreate(name).finally(() => {
      this.#pendingNames.delete(name);
    });
    this.#pendingNames.set(name, lookup);
    return lookup;
  }

  /**
   * Name for an id, loading it from the store on a miss
   *
   * @throws InvalidIdError if the id is not a positive integer
   * @throws NotFoundError if the store has no entry with this id
   * @throws StoreError if the store fails
   */
  async nameFor(id: number): Promise<string> {
    validateEntryId(this.table, id);

    const cached = this.#idToName.get(id);
    if (cached !== undefined) {
      this.#hits++;
      return cached;
    }

    const pending = this.#pendingIds.get(id);
    if (pending) {
      this.#misses++;
      return pending;
    }

    this.#misses++;
    const lookup = this.#load(id).finally(() => {
      this.#pendingIds.delete(id);
    });
    this.#pendingIds.set(id, lookup);
    return lookup;
  }

  /**
   * Cached id for a name, without touching the store
   */
  peekId(name: string): number | undefined {
    return this.#nameToId.get(name);
  }

  /**
   * Cached name for an id, without touching the store
   */
  peekName(id: number): string | undefined {
    return this.#idToName.get(id);
  }

  /**
   * Drop a pair from both directions. The store is not touched.
   * @returns true if a pair was cached
   */
  invalidate(nameOrId: string | number): boolean {
    if (typeof nameOrId === "number") {
      const name = this.#idToName.get(nameOrId);
      if (name === undefined) return false;
      this.#forget(name, nameOrId);
      return true;
    }

    const id = this.#nameToId.get(nameOrId);
    if (id === undefined) return false;
    this.#forget(nameOrId, id);
    return true;
  }

  /**
   * Drop every cached pair
   */
  clear(): void {
    this.#nameToId.clear();
    this.#idToName.clear();
  }

  /**
   * Load every entry of the table into the cache
   *
   * @returns Number of cached pairs afterwards
   * @throws StoreError if the store cannot list entries
   */
  async warm(): Promise<number> {
    const store = this.#store;
    if (!store.list) {
      throw new StoreError(this.table.name, "list", {
        detail: "store does not support listing entries",
      });
    }

    const list = store.list.bind(store);
    const entries = await this.#call("list", () => list(this.table));
    for (const entry of entries) {
      this.#remember(entry);
    }

    logger.debug("lookup.cache.warm", {
      table: this.table.name,
      details: { loaded: entries.length, size: this.size },
    });
    return this.size;
  }

  /**
   * Cache counters
   */
  stats(): CacheStats {
    const total = this.#hits + this.#misses;
    return {
      size: this.size,
      hits: this.#hits,
      misses: this.#misses,
      creates: this.#creates,
      raceRecoveries: this.#raceRecoveries,
      hitRate: total > 0 ? this.#hits / total : 0,
    };
  }

  async #findOrCreate(name: string): Promise<number> {
    const existing = await this.#call("findByName", () =>
      this.#store.findByName(this.table, name)
    );
    if (existing) {
      return this.#accept(existing, name);
    }

    try {
      const created = await this.#call("createWithUniqueName", () =>
        this.#store.createWithUniqueName(this.table, name)
      );
      this.#creates++;
      logger.debug("lookup.entry.created", {
        table: this.table.name,
        details: { id: created.id, name },
      });
      return this.#accept(created, name);
    } catch (err) {
      if (!(err instanceof DuplicateNameError)) {
        throw err;
      }
      return this.#recoverFromRace(name, err);
    }
  }

  /**
   * Another writer created the name first; its row is the answer
   */
  async #recoverFromRace(name: string, duplicate: DuplicateNameError): Promise<number> {
    const winner = await this.#call("findByName", () => this.#store.findByName(this.table, name));
    if (!winner) {
      throw new StoreError(this.table.name, "createWithUniqueName", {
        detail: `name "${name}" reported as duplicate but not found on re-read`,
        cause: duplicate,
      });
    }

    this.#raceRecoveries++;
    logger.debug("lookup.entry.race_recovered", {
      table: this.table.name,
      details: { id: winner.id, name },
    });
    return this.#accept(winner, name);
  }

  async #load(id: number): Promise<string> {
    const entry = await this.#call("findById", () => this.#store.findById(this.table, id));
    if (!entry) {
      throw new NotFoundError(this.table.name, id);
    }
    if (entry.id !== id) {
      throw new StoreError(this.table.name, "findById", {
        detail: `asked for id ${id}, store returned id ${entry.id}`,
      });
    }
    this.#remember(entry);
    return entry.name;
  }

  /**
   * Remember an entry found for `name`, rejecting one that does not match
   */
  #accept(entry: LookupEntry, name: string): number {
    if (entry.name !== name) {
      throw new StoreError(this.table.name, "findByName", {
        detail: `asked for "${name}", store returned "${entry.name}"`,
      });
    }
    this.#remember(entry);
    return entry.id;
  }

  /**
   * Store both directions together. A cached pair that conflicts with
   * the store's entry is stale and is dropped first.
   */
  #remember(entry: LookupEntry): void {
    const { id, name } = entry;

    const staleId = this.#nameToId.get(name);
    if (staleId !== undefined && staleId !== id) {
      this.#forget(name, staleId);
    }
    const staleName = this.#idToName.get(id);
    if (staleName !== undefined && staleName !== name) {
      this.#forget(staleName, id);
    }

    this.#nameToId.set(name, id);
    this.#idToName.set(id, name);

    if (!this.#warned && this.#warnAtSize > 0 && this.size > this.#warnAtSize) {
      this.#warned = true;
      logger.warn("lookup.cache.size_warning", {
        table: this.table.name,
        message: `cache holds ${this.size} entries and never evicts`,
        details: { warnAtSize: this.#warnAtSize },
      });
    }
  }

  #forget(name: string, id: number): void {
    if (this.#nameToId.get(name) === id) {
      this.#nameToId.delete(name);
    }
    if (this.#idToName.get(id) === name) {
      this.#idToName.delete(id);
    }
  }

  /**
   * Run a store call; anything that is not a LookupError becomes a StoreError
   */
  async #call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      // Only a create may report a duplicate; the cache recovers from that one
      if (err instanceof DuplicateNameError && operation !== "createWithUniqueName") {
        throw new StoreError(this.table.name, operation, {
          detail: "store reported a duplicate name outside a create",
          cause: err,
        });
      }
      if (err instanceof LookupError) {
        throw err;
      }
      logger.error("lookup.store.failed", {
        table: this.table.name,
        message: err instanceof Error ? err.message : String(err),
        details: { operation },
      });
      throw new StoreError(this.table.name, operation, { cause: err });
    }
  }
}

/**
 * Size warning threshold; LOOKUP_CACHE_WARN_SIZE wins over the option
 */
function resolveWarnAtSize(option: number | undefined): number {
  const envValue = process.env.LOOKUP_CACHE_WARN_SIZE;
  if (envValue !== undefined) {
    const parsed = parseInt(envValue, 10);
    if (!isNaN(parsed) && parsed >= 0) {
      return parsed;
    }
  }

  if (option !== undefined && Number.isFinite(option) && option >= 0) {
    return option;
  }
  return DEFAULT_WARN_AT_SIZE;
}
