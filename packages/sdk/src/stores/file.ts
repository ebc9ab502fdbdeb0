/**
 * JSON-file lookup store
 *
 * One file per table at <root>/<table>.json, rows keyed by the table's
 * id and name columns:
 *
 * ```json
 * { "entries": [{ "id": 1, "name": "Sports" }], "nextId": 2 }
 * ```
 *
 * Invariants:
 * - Files are replaced atomically, so reads need no lock
 * - Creates hold <root>/_meta/<table>.lock and re-read the file under it,
 *   which makes name uniqueness hold across processes
 * - A missing file is an empty table
 */

import * as path from "node:path";
import { z } from "zod";
import type { LookupEntry, LookupStore, LookupTable } from "../types.js";
import { DuplicateNameError, StoreError } from "../errors.js";
import { atomicWrite, ensureDirectory, readTextFile } from "../io.js";
import { stableStringify } from "../format.js";
import { FileLock, type LockOptions } from "../lock.js";

const EntrySchema = z.object({
  id: z.number().int().min(1),
  name: z.string().min(1),
});

/**
 * Table file shape for one table; rows are keyed by its id and name columns
 */
function tableFileSchema(table: LookupTable) {
  const RowSchema = z
    .record(z.string(), z.unknown())
    .transform((row) => ({ id: row[table.idColumn], name: row[table.nameColumn] }))
    .pipe(EntrySchema);

  return z
    .object({
      nextId: z.number().int().min(1),
      entries: z.array(RowSchema),
    })
    .superRefine((file, ctx) => {
      const names = new Set<string>();
      const ids = new Set<number>();
      for (const [index, entry] of file.entries.entries()) {
        if (names.has(entry.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["entries", index, "name"],
            message: `duplicate name "${entry.name}"`,
          });
        }
        if (ids.has(entry.id)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["entries", index, "id"],
            message: `duplicate id ${entry.id}`,
          });
        }
        if (entry.id >= file.nextId) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["entries", index, "id"],
            message: `id ${entry.id} is not below nextId ${file.nextId}`,
          });
        }
        names.add(entry.name);
        ids.add(entry.id);
      }
    });
}

/**
 * Parsed table file, with rows read through the table's columns
 */
export interface TableFile {
  nextId: number;
  entries: LookupEntry[];
}

export interface FileLookupStoreOptions {
  /** Directory holding one JSON file per table */
  root: string;
  /** Lock acquisition settings for creates */
  lock?: LockOptions;
}

export class FileLookupStore implements LookupStore {
  readonly root: string;
  #lockOptions: LockOptions;

  constructor(options: FileLookupStoreOptions) {
    this.root = path.resolve(options.root);
    this.#lockOptions = options.lock ?? {};
  }

  /**
   * Create the root and _meta directories
   */
  async init(): Promise<void> {
    try {
      await ensureDirectory(path.join(this.root, "_meta"));
    } catch (err) {
      throw new StoreError(this.root, "init", { cause: err });
    }
  }

  /**
   * Path of the file backing a table
   */
  tablePath(table: LookupTable): string {
    return path.join(this.root, `${table.name}.json`);
  }

  async findByName(table: LookupTable, name: string): Promise<LookupEntry | null> {
    const file = await this.#read(table, "findByName");
    return file.entries.find((entry) => entry.name === name) ?? null;
  }

  async findById(table: LookupTable, id: number): Promise<LookupEntry | null> {
    const file = await this.#read(table, "findById");
    return file.entries.find((entry) => entry.id === id) ?? null;
  }

  async createWithUniqueName(table: LookupTable, name: string): Promise<LookupEntry> {
    // A fresh lock per call: FileLock instances are single-holder
    const lock = new FileLock(this.root, `${table.name}.lock`, this.#lockOptions);

    try {
      return await lock.withLock(async () => {
        const file = await this.#read(table, "createWithUniqueName");
        if (file.entries.some((entry) => entry.name === name)) {
          throw new DuplicateNameError(table.name, name);
        }

        const entry: LookupEntry = { id: file.nextId, name };
        const entries = [...file.entries, entry].map((row) => ({
          [table.idColumn]: row.id,
          [table.nameColumn]: row.name,
        }));
        await atomicWrite(this.tablePath(table), stableStringify({ nextId: entry.id + 1, entries }));
        return entry;
      });
    } catch (err) {
      if (err instanceof DuplicateNameError || err instanceof StoreError) {
        throw err;
      }
      throw new StoreError(table.name, "createWithUniqueName", { cause: err });
    }
  }

  async list(table: LookupTable): Promise<LookupEntry[]> {
    const file = await this.#read(table, "list");
    return [...file.entries].sort((a, b) => a.id - b.id);
  }

  async #read(table: LookupTable, operation: string): Promise<TableFile> {
    const filePath = this.tablePath(table);

    let content: string | null;
    try {
      content = await readTextFile(filePath);
    } catch (err) {
      throw new StoreError(table.name, operation, { cause: err });
    }

    if (content === null) {
      return { nextId: 1, entries: [] };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      throw new StoreError(table.name, operation, {
        detail: `invalid JSON in ${filePath}`,
        cause: err,
      });
    }

    const result = tableFileSchema(table).safeParse(parsed);
    if (!result.success) {
      const column = (segment: string | number): string | number =>
        segment === "id" ? table.idColumn : segment === "name" ? table.nameColumn : segment;
      const issues = result.error.issues.map(
        (issue) => `${issue.path.map(column).join(".") || "file"}: ${issue.message}`
      );
      throw new StoreError(table.name, operation, {
        detail: `malformed table file ${filePath} (${issues.join("; ")})`,
        cause: result.error,
      });
    }
    return result.data;
  }
}
