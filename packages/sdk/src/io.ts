/**
 * Atomic file I/O for the file-backed lookup store
 *
 * Invariants:
 * - Writes are atomic: readers never observe partial file contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Reads are UTF-8 only; a missing file reads as null
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import { FileIOError, isErrnoException } from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Ensure a directory exists, creating it and parent directories as needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  if (!dirPath) {
    throw new FileIOError(String(dirPath), "create directory", {
      cause: new TypeError("Directory path must be a non-empty string"),
    });
  }

  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new FileIOError(dirPath, "create directory", { cause: err });
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const base = basename(filePath);
  const tmp = join(dir, `.${base}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o600);
    await fileHandle.writeFile(content, "utf-8");

    // Prefer datasync, fall back to a full sync where it is unsupported
    try {
      await fileHandle.datasync();
    } catch (err) {
      if (
        isErrnoException(err) &&
        (err.code === "ENOTSUP" || err.code === "ENOSYS" || err.code === "EINVAL")
      ) {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    await fs.rename(tmp, filePath);
    await syncDirectory(dir);
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("io.close_failed", { details: { path: tmp, error: String(closeErr) } });
      });
    }

    // Temp file may not exist if open() failed
    await fs.unlink(tmp).catch(() => undefined);

    throw new FileIOError(filePath, "write file", { cause: err });
  }
}

/**
 * fsync a directory so a rename inside it is durable (best-effort)
 */
async function syncDirectory(dir: string): Promise<void> {
  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    // EINVAL/ENOTSUP/EBADF: platform does not support directory fsync
    if (
      isErrnoException(err) &&
      (err.code === "EINVAL" || err.code === "ENOTSUP" || err.code === "EBADF")
    ) {
      return;
    }
    logger.debug("io.dir_fsync_failed", {
      details: { dir, error: err instanceof Error ? err.message : String(err) },
    });
  }
}

/**
 * Read a UTF-8 file
 * @returns File contents, or null if the file does not exist
 * @throws FileIOError for other read failures
 */
export async function readTextFile(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return null;
    }
    throw new FileIOError(filePath, "read file", { cause: err });
  }
}
