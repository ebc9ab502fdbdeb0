/**
 * Core types for lookup tables
 */

/**
 * One row of a lookup table
 */
export interface LookupEntry {
  /** Identifier assigned by the store (positive integer) */
  readonly id: number;
  /** Unique name within the table */
  readonly name: string;
}

/**
 * Static description of one lookup table.
 * Built once at startup by defineLookupTable() or lookupTableFor() and passed by reference.
 */
export interface LookupTable {
  /** Backing table name (e.g., "car_types") */
  readonly name: string;
  /** Primary key column (default: "id"); the file store keys rows by it */
  readonly idColumn: string;
  /** Unique name column (default: "name"); the file store keys rows by it */
  readonly nameColumn: string;
  /** Longest name the name column accepts (default: 255) */
  readonly maxNameLength: number;
  /** Attribute on referencing records, when derived from one (e.g., "car_type") */
  readonly attribute?: string;
  /** Foreign-key field on referencing records (e.g., "car_type_id") */
  readonly foreignKey?: string;
}

/**
 * Input accepted by defineLookupTable()
 */
export interface LookupTableInput {
  name: string;
  idColumn?: string;
  nameColumn?: string;
  maxNameLength?: number;
  attribute?: string;
  foreignKey?: string;
}

/**
 * Minimal contract the intern cache needs from persistent storage
 */
export interface LookupStore {
  /**
   * Find the entry with this exact name
   * @returns The entry, or null when absent
   */
  findByName(table: LookupTable, name: string): Promise<LookupEntry | null>;

  /**
   * Find the entry with this id
   * @returns The entry, or null when absent
   */
  findById(table: LookupTable, id: number): Promise<LookupEntry | null>;

  /**
   * Insert a new entry; the store assigns the id.
   * Must reject with DuplicateNameError when the name already exists.
   */
  createWithUniqueName(table: LookupTable, name: string): Promise<LookupEntry>;

  /**
   * List every entry of the table (optional, used by InternCache.warm)
   */
  list?(table: LookupTable): Promise<LookupEntry[]>;

  /**
   * Release store resources (optional)
   */
  close?(): Promise<void>;
}

/**
 * Options for an intern cache
 */
export interface InternCacheOptions {
  /** Table the cache resolves names for */
  table: LookupTable;
  /** Store holding the table */
  store: LookupStore;
  /**
   * Log a warning once the cache holds more pairs than this (default: 10000, 0 disables).
   * LOOKUP_CACHE_WARN_SIZE overrides it.
   */
  warnAtSize?: number;
}

/**
 * Counters for monitoring an intern cache
 */
export interface CacheStats {
  /** Cached name/id pairs */
  size: number;
  /** Lookups answered from memory */
  hits: number;
  /** Lookups that waited on the store, including callers that joined an in-flight one */
  misses: number;
  /** Entries this cache created in the store */
  creates: number;
  /** Creates that lost a race and were resolved by re-reading */
  raceRecoveries: number;
  /** hits / (hits + misses), 0 before any lookup */
  hitRate: number;
}
