/**
 * Input validation for intern cache operations
 */

import type { LookupTable } from "./types.js";
import { InvalidIdError, InvalidNameError } from "./errors.js";

/**
 * Validate a name before it is looked up or created
 * @throws InvalidNameError if the name is empty, not a string, or too long for the table
 */
export function validateEntryName(table: LookupTable, name: unknown): asserts name is string {
  if (typeof name !== "string") {
    throw new InvalidNameError(table.name, `expected a string, got ${typeof name}`);
  }

  if (name.length === 0) {
    throw new InvalidNameError(table.name, "name must be non-empty");
  }

  // Code points, not UTF-16 units, so "🚗" is one character
  const length = [...name].length;
  if (length > table.maxNameLength) {
    throw new InvalidNameError(
      table.name,
      `name is ${length} characters, maximum is ${table.maxNameLength}`
    );
  }
}

/**
 * Validate an id before it is resolved
 * @throws InvalidIdError unless the id is a positive safe integer
 */
export function validateEntryId(table: LookupTable, id: unknown): asserts id is number {
  if (typeof id !== "number" || !Number.isSafeInteger(id) || id < 1) {
    throw new InvalidIdError(table.name, id);
  }
}
