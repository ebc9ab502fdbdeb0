import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readdir, mkdir, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { atomicWrite, readTextFile, ensureDirectory } from "./io.js";
import { FileIOError } from "./errors.js";

describe("io operations", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "lookup-intern-io-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe("atomicWrite and readTextFile", () => {
    it("should write and read file successfully", async () => {
      const filePath = join(testDir, "car_types.json");
      const content = '{"entries": [], "nextId": 1}';

      await atomicWrite(filePath, content);

      expect(await readTextFile(filePath)).toBe(content);
    });

    it("should not leave temp files after successful write", async () => {
      const filePath = join(testDir, "car_types.json");

      await atomicWrite(filePath, "{}");

      const files = await readdir(testDir);
      expect(files).toEqual(["car_types.json"]);
    });

    it("should overwrite existing file atomically", async () => {
      const filePath = join(testDir, "car_types.json");

      await atomicWrite(filePath, "first");
      await atomicWrite(filePath, "second");

      expect(await readTextFile(filePath)).toBe("second");
    });

    it("should create missing parent directories", async () => {
      const filePath = join(testDir, "nested", "deeper", "colors.json");

      await atomicWrite(filePath, "{}");

      expect(await readTextFile(filePath)).toBe("{}");
    });

    it("should fail with FileIOError when the target is a directory", async () => {
      const filePath = join(testDir, "taken");
      await mkdir(filePath);

      await expect(atomicWrite(filePath, "{}")).rejects.toBeInstanceOf(FileIOError);

      // Temp file is cleaned up
      const files = await readdir(testDir);
      expect(files).toEqual(["taken"]);
    });

    it("should read a missing file as null", async () => {
      expect(await readTextFile(join(testDir, "absent.json"))).toBeNull();
    });

    it("should fail with FileIOError when reading a directory", async () => {
      await expect(readTextFile(testDir)).rejects.toMatchObject({
        code: "E_IO",
        filePath: testDir,
      });
    });
  });

  describe("ensureDirectory", () => {
    it("should be idempotent", async () => {
      const dir = join(testDir, "_meta");

      await ensureDirectory(dir);
      await ensureDirectory(dir);

      expect(await readdir(testDir)).toEqual(["_meta"]);
    });

    it("should reject an empty path", async () => {
      await expect(ensureDirectory("")).rejects.toBeInstanceOf(FileIOError);
    });

    it("should fail when a file is in the way", async () => {
      const blocker = join(testDir, "blocker");
      await writeFile(blocker, "x");

      await expect(ensureDirectory(join(blocker, "child"))).rejects.toBeInstanceOf(FileIOError);
    });
  });
});
