/**
 * Error types for lookup table operations
 *
 * Invariants:
 * - All errors name the lookup table (or file) they concern in the message
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all lookup errors
 */
export abstract class LookupError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when an id has no entry in the store
 */
export class NotFoundError extends LookupError {
  readonly code = "E_NOT_FOUND";

  constructor(
    public readonly table: string,
    public readonly id: number,
    options?: ErrorOptions
  ) {
    super(`No entry with id ${id} in lookup table "${table}"`, options);
  }
}

/**
 * Thrown when a store call fails (connectivity, corrupt data, unexpected constraint)
 */
export class StoreError extends LookupError {
  readonly code = "E_STORE";

  constructor(
    public readonly table: string,
    public readonly operation: string,
    options?: ErrorOptions & { detail?: string }
  ) {
    const detail = options?.detail ? `: ${options.detail}` : "";
    super(`Store ${operation} failed for lookup table "${table}"${detail}`, options);
  }
}

/**
 * Raised by a store when a create lost a race for a name.
 * InternCache recovers from it; it never reaches idFor callers.
 */
export class DuplicateNameError extends LookupError {
  readonly code = "E_DUPLICATE";

  constructor(
    public readonly table: string,
    public readonly entryName: string,
    options?: ErrorOptions
  ) {
    super(`Name "${entryName}" already exists in lookup table "${table}"`, options);
  }
}

/**
 * Thrown when idFor receives a name the table cannot hold
 */
export class InvalidNameError extends LookupError {
  readonly code = "E_INVALID_NAME";

  constructor(table: string, reason: string, options?: ErrorOptions) {
    super(`Invalid name for lookup table "${table}": ${reason}`, options);
  }
}

/**
 * Thrown when nameFor receives something that cannot be an id
 */
export class InvalidIdError extends LookupError {
  readonly code = "E_INVALID_ID";

  constructor(table: string, id: unknown, options?: ErrorOptions) {
    super(`Invalid id for lookup table "${table}": ${String(id)}`, options);
  }
}

/**
 * Thrown for invalid lookup table configuration or registry misuse
 */
export class LookupConfigError extends LookupError {
  readonly code = "E_CONFIG";

  constructor(
    message: string,
    public readonly issues: string[] = [],
    options?: ErrorOptions
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, options);
  }
}

/**
 * Thrown by the file I/O helpers
 */
export class FileIOError extends LookupError {
  readonly code = "E_IO";

  constructor(
    public readonly filePath: string,
    operation: string,
    options?: ErrorOptions
  ) {
    super(`Failed to ${operation}: ${filePath}`, options);
  }
}

/**
 * Narrow an unknown thrown value to a Node.js system error
 */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}
