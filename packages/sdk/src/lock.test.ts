import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { readFile, readdir, writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { createTempRoot, removeDir } from "@lookup-intern/testkit";
import { FileLock } from "./lock.js";
import { FileLookupStore } from "./stores/file.js";
import { defineLookupTable } from "./table.js";
import { StoreError } from "./errors.js";

const lockWrites = vi.hoisted(() => ({ failNext: false }));

// Lets a test make the next lock file's contents fail to write
vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return {
    ...actual,
    open: async (...args: Parameters<typeof actual.open>) => {
      const handle = await actual.open(...args);
      if (args[1] === "wx" && lockWrites.failNext) {
        lockWrites.failNext = false;
        handle.writeFile = async () => {
          throw Object.assign(new Error("ENOSPC: no space left on device, write"), {
            code: "ENOSPC",
          });
        };
      }
      return handle;
    },
  };
});

describe("FileLock", () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempRoot();
  });

  afterEach(async () => {
    lockWrites.failNext = false;
    await removeDir(root);
  });

  it("should create the lock file under _meta while held", async () => {
    const lock = new FileLock(root, "car_types.lock");

    await lock.acquire();

    expect(lock.isAcquired()).toBe(true);
    const info: unknown = JSON.parse(await readFile(join(root, "_meta", "car_types.lock"), "utf-8"));
    expect(info).toMatchObject({ pid: process.pid });

    await lock.release();
    expect(lock.isAcquired()).toBe(false);
    expect(await readdir(join(root, "_meta"))).toEqual([]);
  });

  it("should refuse to acquire twice", async () => {
    const lock = new FileLock(root, "car_types.lock");
    await lock.acquire();

    await expect(lock.acquire()).rejects.toThrow("Lock already acquired");
    await lock.release();
  });

  it("should make a second holder wait for release", async () => {
    const first = new FileLock(root, "car_types.lock");
    const second = new FileLock(root, "car_types.lock", { retryIntervalMs: 5 });
    const order: string[] = [];

    await first.acquire();
    const waiting = second.withLock(async () => {
      order.push("second");
    });
    await new Promise((resolve) => setTimeout(resolve, 30));
    order.push("first-release");
    await first.release();
    await waiting;

    expect(order).toEqual(["first-release", "second"]);
  });

  it("should time out on a stale lock", async () => {
    await mkdir(join(root, "_meta"), { recursive: true });
    await writeFile(join(root, "_meta", "car_types.lock"), "{}");
    const lock = new FileLock(root, "car_types.lock", { timeoutMs: 20, retryIntervalMs: 5 });

    await expect(lock.acquire()).rejects.toThrow("Failed to acquire lock after 20ms");
  });

  it("should release the lock when the callback throws", async () => {
    const lock = new FileLock(root, "car_types.lock");

    await expect(
      lock.withLock(async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(lock.isAcquired()).toBe(false);
    expect(await readdir(join(root, "_meta"))).toEqual([]);
  });

  it("should remove the lock file when writing it fails", async () => {
    const lock = new FileLock(root, "car_types.lock");
    lockWrites.failNext = true;

    await expect(lock.acquire()).rejects.toThrow("ENOSPC");

    expect(lock.isAcquired()).toBe(false);
    expect(await readdir(join(root, "_meta"))).toEqual([]);

    const next = new FileLock(root, "car_types.lock", { timeoutMs: 200 });
    await next.acquire();
    expect(next.isAcquired()).toBe(true);
    await next.release();
  });

  it("should not block later creates after a failed lock write", async () => {
    const carTypes = defineLookupTable({ name: "car_types" });
    const store = new FileLookupStore({ root, lock: { timeoutMs: 200, retryIntervalMs: 5 } });
    lockWrites.failNext = true;

    await expect(store.createWithUniqueName(carTypes, "Sports")).rejects.toBeInstanceOf(StoreError);
    expect(await readdir(join(root, "_meta"))).toEqual([]);

    expect(await store.createWithUniqueName(carTypes, "Sports")).toEqual({ id: 1, name: "Sports" });
  });
});
