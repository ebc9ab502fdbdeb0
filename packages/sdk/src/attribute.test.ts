import { describe, it, expect, beforeEach } from "vitest";
import { bindLookupAttribute, type LookupAttribute } from "./attribute.js";
import { InternCache } from "./intern-cache.js";
import { MemoryLookupStore } from "./stores/memory.js";
import { lookupTableFor } from "./table.js";
import { NotFoundError } from "./errors.js";

interface Car {
  model: string;
  car_type_id: number | null;
}

describe("bindLookupAttribute", () => {
  const table = lookupTableFor("carType");
  let store: MemoryLookupStore;
  let carType: LookupAttribute<"car_type_id">;

  beforeEach(() => {
    store = new MemoryLookupStore();
    carType = bindLookupAttribute(new InternCache({ table, store }), "car_type_id");
  });

  it("should set the foreign key from a name", async () => {
    const car: Car = { model: "Roadster", car_type_id: null };

    await carType.assign(car, "Sports");

    expect(car).toEqual({ model: "Roadster", car_type_id: 1 });
    expect(store.count(table)).toBe(1);
  });

  it("should read the name behind the foreign key", async () => {
    store.seed(table, [{ id: 3, name: "Compact" }]);
    const car: Car = { model: "Mini", car_type_id: 3 };

    expect(await carType.read(car)).toBe("Compact");
  });

  it("should read null for an unset foreign key", async () => {
    expect(await carType.read({ car_type_id: null })).toBeNull();
    expect(await carType.read({})).toBeNull();
  });

  it("should clear the foreign key when assigned null", async () => {
    const car: Car = { model: "Roadster", car_type_id: 1 };

    await carType.assign(car, null);

    expect(car.car_type_id).toBeNull();
  });

  it("should share ids between records with the same name", async () => {
    const a: Car = { model: "Roadster", car_type_id: null };
    const b: Car = { model: "Spider", car_type_id: null };

    await carType.assign(a, "Sports");
    await carType.assign(b, "Sports");

    expect(b.car_type_id).toBe(a.car_type_id);
  });

  it("should build query criteria from a name", async () => {
    expect(await carType.criteria("Sports")).toEqual({ car_type_id: 1 });
    expect(carType.idField).toBe("car_type_id");
  });

  it("should fail when the record points at a missing entry", async () => {
    await expect(carType.read({ car_type_id: 42 })).rejects.toBeInstanceOf(NotFoundError);
  });
});
