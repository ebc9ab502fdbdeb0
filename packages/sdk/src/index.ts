/**
 * Lookup Intern SDK
 *
 * Name/id intern caches for lookup tables, with find-or-create semantics
 */

// Re-export types
export type {
  LookupEntry,
  LookupTable,
  LookupTableInput,
  LookupStore,
  InternCacheOptions,
  CacheStats,
} from "./types.js";

// Core
export { InternCache } from "./intern-cache.js";
export { LookupRegistry } from "./registry.js";
export type { LookupRegistryOptions } from "./registry.js";
export { bindLookupAttribute } from "./attribute.js";
export type { LookupAttribute, WithLookupId } from "./attribute.js";

// Table configuration
export {
  defineLookupTable,
  lookupTableFor,
  toSnakeCase,
  pluralize,
  LookupTableSchema,
} from "./table.js";

// Stores
export { MemoryLookupStore } from "./stores/memory.js";
export { FileLookupStore } from "./stores/file.js";
export type { FileLookupStoreOptions, TableFile } from "./stores/file.js";
export { FileLock } from "./lock.js";
export type { LockOptions } from "./lock.js";

// Utilities
export { stableStringify } from "./format.js";
export { atomicWrite, readTextFile, ensureDirectory } from "./io.js";
export { validateEntryName, validateEntryId } from "./validation.js";
export { logger, Logger, formatLogLine } from "./observability/logs.js";
export type { LogLevel, LogEntry, LogData } from "./observability/logs.js";
export { VERSION } from "./version.js";

// Re-export errors
export {
  LookupError,
  NotFoundError,
  StoreError,
  DuplicateNameError,
  InvalidNameError,
  InvalidIdError,
  LookupConfigError,
  FileIOError,
  isErrnoException,
} from "./errors.js";
