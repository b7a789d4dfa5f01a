/**
 * Deterministic JSON formatting for engine files
 */

/**
 * Stable, deterministic JSON stringification with alphabetical key order
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
      // Arrays: preserve order but normalize contents
      if (Array.isArray(current)) {
        return current.map(normalize);
      }

      const out: Record<string, unknown> = {};
      for (const key of Object.keys(current).sort((a, b) => a.localeCompare(b))) {
        out[key] = normalize(Reflect.get(current, key));
      }
      return out;
    } finally {
      seen.delete(current);
    }
  };

  return JSON.stringify(normalize(value), null, indent) + "\n";
}
