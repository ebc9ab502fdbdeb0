/**
 * Lookup table configuration
 *
 * Tables are described by frozen records built once at startup,
 * then handed to caches, stores and attribute bindings.
 */

import { z } from "zod";
import type { LookupTable, LookupTableInput } from "./types.js";
import { LookupConfigError } from "./errors.js";

const identifierPattern = /^[a-z][a-z0-9_]*$/;

const IdentifierSchema = z
  .string()
  .min(1)
  .max(63)
  .superRefine((val, ctx) => {
    if (!identifierPattern.test(val)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          "must start with a lowercase letter and contain only lowercase letters, numbers, and underscores",
      });
    }
  });

export const LookupTableSchema = z
  .object({
    name: IdentifierSchema,
    idColumn: IdentifierSchema.default("id"),
    nameColumn: IdentifierSchema.default("name"),
    maxNameLength: z.number().int().min(1).max(65535).default(255),
    attribute: IdentifierSchema.optional(),
    foreignKey: IdentifierSchema.optional(),
  })
  .strict()
  .superRefine((table, ctx) => {
    if (table.idColumn === table.nameColumn) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["nameColumn"],
        message: "name column must differ from id column",
      });
    }
  });

/**
 * Validate a table description and freeze it
 * @throws LookupConfigError listing every invalid field
 */
export function defineLookupTable(input: LookupTableInput): LookupTable {
  const result = LookupTableSchema.safeParse(input);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "table";
      return `${where}: ${issue.message}`;
    });
    throw new LookupConfigError("Invalid lookup table definition", issues);
  }

  const table: LookupTable = { ...result.data };
  return Object.freeze(table);
}

/**
 * Convert camelCase, PascalCase or kebab-case to snake_case
 * @example toSnakeCase("carType") // "car_type"
 */
export function toSnakeCase(value: string): string {
  return value
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    .replace(/[-\s]+/g, "_")
    .toLowerCase();
}

/**
 * English plural of the last word of a snake_case name
 * @example pluralize("category") // "categories"
 */
export function pluralize(word: string): string {
  if (/[^aeiou]y$/.test(word)) {
    return word.slice(0, -1) + "ies";
  }
  if (/(s|x|z|ch|sh)$/.test(word)) {
    return word + "es";
  }
  return word + "s";
}

/**
 * Derive a lookup table from the attribute that references it.
 * `carType` and `car_type` both map to table `car_types` with foreign key `car_type_id`.
 */
export function lookupTableFor(
  attribute: string,
  overrides: Partial<Omit<LookupTableInput, "attribute">> = {}
): LookupTable {
  const snake = toSnakeCase(attribute.trim());
  return defineLookupTable({
    name: pluralize(snake),
    foreignKey: `${snake}_id`,
    ...overrides,
    attribute: snake,
  });
}
