/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FileLookupStore } from "@lookup-intern/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "lookup-intern-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempRoot(prefix = "lookup-intern-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a file store in a fresh temp directory, cleaning up after
 * @returns Result of fn
 */
export async function withTempFileStore<T>(
  fn: (store: FileLookupStore, root: string) => Promise<T>
): Promise<T> {
  const root = await createTempRoot();
  try {
    const store = new FileLookupStore({ root });
    await store.init();
    return await fn(store, root);
  } finally {
    await removeDir(root);
  }
}

/**
 * Execute a function with a clean temp directory
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempRoot();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}
