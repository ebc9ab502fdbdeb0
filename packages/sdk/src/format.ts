/**
 * Deterministic JSON formatting for table files
 */

const byCodePoint = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Stable, deterministic JSON stringification with keys in code point order
 * @param value - Value to stringify
 * @param indent - Number of spaces for indentation (default: 2)
 * @returns Formatted JSON string with trailing newline
 */
export function stableStringify(value: unknown, indent = 2): string {
  const seen = new WeakSet<object>();

  const normalize = (current: unknown): unknown => {
    if (current === null || typeof current !== "object") {
      return current;
    }

    if (seen.has(current)) {
      throw new Error("Circular reference detected in object");
    }
    seen.add(current);

    try {
      if (Array.isArray(current)) {
        return current.map(normalize);
      }

      const out: Record<string, unknown> = {};
      for (const [key, child] of Object.entries(current).sort(([a], [b]) => byCodePoint(a, b))) {
        out[key] = normalize(child);
      }
      return out;
    } finally {
      seen.delete(current);
    }
  };

  return JSON.stringify(normalize(value), null, indent) + "\n";
}
