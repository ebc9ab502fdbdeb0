import { describe, it, expect } from "vitest";
import { stableStringify } from "./format.js";

describe("stableStringify", () => {
  it("should stringify with stable key order", () => {
    const obj = { z: 1, a: 2, m: 3 };
    const result = stableStringify(obj);
    expect(result).toBe('{\n  "a": 2,\n  "m": 3,\n  "z": 1\n}\n');
  });

  it("should format a table file deterministically", () => {
    const file = { nextId: 3, entries: [{ name: "Sports", id: 1 }, { name: "Compact", id: 2 }] };
    expect(stableStringify(file, 0)).toBe(
      '{"entries":[{"id":1,"name":"Sports"},{"id":2,"name":"Compact"}],"nextId":3}\n'
    );
  });

  it("should preserve array order", () => {
    const obj = { items: [3, 1, 2] };
    const result = stableStringify(obj);
    expect(result).toBe('{\n  "items": [\n    3,\n    1,\n    2\n  ]\n}\n');
  });

  it("should detect circular references", () => {
    const obj: Record<string, unknown> = { a: 1 };
    obj.self = obj;
    expect(() => stableStringify(obj)).toThrow("Circular reference");
  });

  it("should allow the same object twice when it is not a cycle", () => {
    const shared = { id: 1 };
    expect(stableStringify({ a: shared, b: shared }, 0)).toBe('{"a":{"id":1},"b":{"id":1}}\n');
  });

  it("should sort unicode keys using code point order", () => {
    const obj = { ä: 1, z: 2, a: 3 };
    const result = stableStringify(obj);
    const parsed = JSON.parse(result);
    expect(Object.keys(parsed)).toEqual(["a", "z", "ä"]);
  });
});
