/**
 * File-based lock serializing lookup table writes across processes
 * Uses exclusive file open to ensure only one writer at a time
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { isErrnoException } from "./errors.js";
import { logger } from "./observability/logs.js";

export interface LockOptions {
  /** Maximum time to wait for the lock (default: 30000ms) */
  timeoutMs?: number;
  /** Time between retry attempts (default: 25ms) */
  retryIntervalMs?: number;
}

/**
 * Simple file-based lock using exclusive open
 */
export class FileLock {
  #lockPath: string;
  #fd?: fs.FileHandle;
  #acquired = false;
  #timeoutMs: number;
  #retryIntervalMs: number;

  constructor(root: string, lockName: string, options: LockOptions = {}) {
    this.#lockPath = path.join(root, "_meta", lockName);
    this.#timeoutMs = options.timeoutMs ?? 30000;
    this.#retryIntervalMs = options.retryIntervalMs ?? 25;
  }

  get lockPath(): string {
    return this.#lockPath;
  }

  /**
   * Acquire the lock, retrying until the timeout
   */
  async acquire(): Promise<void> {
    if (this.#acquired) {
      throw new Error("Lock already acquired");
    }

    const startTime = Date.now();

    await fs.mkdir(path.dirname(this.#lockPath), { recursive: true });

    while (true) {
      try {
        // Fails with EEXIST while another holder has the file
        const fd = await fs.open(this.#lockPath, "wx");

        try {
          // PID and timestamp for debugging stale locks
          await fd.writeFile(
            JSON.stringify({ pid: process.pid, acquiredAt: new Date().toISOString() }, null, 2)
          );
        } catch (err) {
          await this.#discard(fd);
          throw err;
        }

        this.#fd = fd;
        this.#acquired = true;
        return;
      } catch (err) {
        if (!isErrnoException(err) || err.code !== "EEXIST") {
          throw err;
        }

        if (Date.now() - startTime > this.#timeoutMs) {
          throw new Error(
            `Failed to acquire lock after ${this.#timeoutMs}ms. ` +
              `Lock file: ${this.#lockPath}. ` +
              `This may indicate a stale lock from a crashed process - ` +
              `manually delete the lock file if safe.`
          );
        }

        await new Promise((resolve) => setTimeout(resolve, this.#retryIntervalMs));
      }
    }
  }

  /**
   * Release the lock
   */
  async release(): Promise<void> {
    if (!this.#acquired) {
      return;
    }

    try {
      if (this.#fd) {
        await this.#fd.close();
        this.#fd = undefined;
      }
      await fs.unlink(this.#lockPath);
    } catch (err) {
      // Already cleaned up
      if (!isErrnoException(err) || err.code !== "ENOENT") {
        logger.error("lock.release_failed", {
          message: err instanceof Error ? err.message : String(err),
          details: { lockPath: this.#lockPath },
        });
      }
    } finally {
      this.#acquired = false;
    }
  }

  /**
   * Close and remove a lock file this holder created but could not fill in
   */
  async #discard(fd: fs.FileHandle): Promise<void> {
    try {
      await fd.close();
      await fs.unlink(this.#lockPath);
    } catch (err) {
      logger.error("lock.discard_failed", {
        message: err instanceof Error ? err.message : String(err),
        details: { lockPath: this.#lockPath },
      });
    }
  }

  isAcquired(): boolean {
    return this.#acquired;
  }

  /**
   * Execute a function with the lock held
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }
}
