/**
 * Predicate evaluation used by the document engine
 *
 * A predicate maps dot paths to the value each must hold. Every field must
 * match; an empty predicate matches every document.
 */

import { isDeepStrictEqual } from "node:util";
import type { Document, Filter } from "./types.js";

/**
 * Get a nested value from an object using dot-path notation
 * @param path - Dot-separated path (e.g., "value.data.city")
 * @returns Value at path, or undefined if not found
 */
export function getPath(obj: unknown, path: string): unknown {
  let current: unknown = obj;
  for (const segment of path.split(".")) {
    if (current === null || typeof current !== "object") {
      return undefined;
    }
    current = Reflect.get(current, segment);
  }
  return current;
}

function operatorIn(cond: unknown): string | undefined {
  if (cond === null || typeof cond !== "object" || Array.isArray(cond)) {
    return undefined;
  }
  return Object.keys(cond).find((k) => k.startsWith("$"));
}

/**
 * Test if a document satisfies every field of a predicate
 * @throws Error if the predicate uses query operators
 */
export function matches(doc: Document, filter: Filter): boolean {
  for (const [path, expected] of Object.entries(filter)) {
    const operator = path.startsWith("$") ? path : operatorIn(expected);
    if (operator !== undefined) {
      throw new Error(`Unsupported operator: ${operator}`);
    }
    if (!isDeepStrictEqual(getPath(doc, path), expected)) {
      return false;
    }
  }
  return true;
}
