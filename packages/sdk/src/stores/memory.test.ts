import { describe, it, expect, beforeEach } from "vitest";
import { MemoryLookupStore } from "./memory.js";
import { defineLookupTable } from "../table.js";
import { DuplicateNameError } from "../errors.js";

const carTypes = defineLookupTable({ name: "car_types" });
const colors = defineLookupTable({ name: "colors" });

describe("MemoryLookupStore", () => {
  let store: MemoryLookupStore;

  beforeEach(() => {
    store = new MemoryLookupStore();
  });

  it("should assign ids per table starting at 1", async () => {
    expect(await store.createWithUniqueName(carTypes, "Sports")).toEqual({ id: 1, name: "Sports" });
    expect(await store.createWithUniqueName(colors, "Red")).toEqual({ id: 1, name: "Red" });
    expect(await store.createWithUniqueName(carTypes, "Compact")).toEqual({
      id: 2,
      name: "Compact",
    });
  });

  it("should find entries by name and id", async () => {
    await store.createWithUniqueName(carTypes, "Sports");

    expect(await store.findByName(carTypes, "Sports")).toEqual({ id: 1, name: "Sports" });
    expect(await store.findById(carTypes, 1)).toEqual({ id: 1, name: "Sports" });
    expect(await store.findByName(carTypes, "sports")).toBeNull();
    expect(await store.findById(colors, 1)).toBeNull();
  });

  it("should reject duplicate names", async () => {
    await store.createWithUniqueName(carTypes, "Sports");

    await expect(store.createWithUniqueName(carTypes, "Sports")).rejects.toMatchObject({
      code: "E_DUPLICATE",
      table: "car_types",
      entryName: "Sports",
    });
  });

  it("should reject seeding a duplicate name", () => {
    store.seed(carTypes, [{ id: 3, name: "Van" }]);

    expect(() => store.seed(carTypes, [{ id: 4, name: "Van" }])).toThrow(DuplicateNameError);
  });

  it("should list entries by id", async () => {
    store.seed(carTypes, [
      { id: 9, name: "Van" },
      { id: 2, name: "Coupe" },
    ]);
    await store.createWithUniqueName(carTypes, "Sports");

    expect(await store.list(carTypes)).toEqual([
      { id: 2, name: "Coupe" },
      { id: 9, name: "Van" },
      { id: 10, name: "Sports" },
    ]);
  });

  it("should remove entries out-of-band", async () => {
    await store.createWithUniqueName(carTypes, "Sports");

    expect(store.remove(carTypes, 1)).toBe(true);
    expect(store.remove(carTypes, 1)).toBe(false);
    expect(await store.findByName(carTypes, "Sports")).toBeNull();
    expect(store.count(carTypes)).toBe(0);
  });

  it("should return frozen entries", async () => {
    const entry = await store.createWithUniqueName(carTypes, "Sports");

    expect(Object.isFrozen(entry)).toBe(true);
  });
});
