/**
 * Read-only path lookup over parsed documents
 */

import { isJsonObject } from "./json.js";
import type { JsonValue } from "./types.js";

const ARRAY_INDEX = /^(0|[1-9]\d*)$/;

/**
 * Get a nested value using dot notation
 * @param value - Value to traverse
 * @param path - Dot-separated path; numeric segments index into arrays
 * @returns The value at the path, or undefined if any step is missing
 *
 * @example
 * getPath({ db: { hosts: ["a", "b"] } }, "db.hosts.1") // "b"
 * getPath({ db: "x" }, "db.port")                     // undefined
 */
export function getPath(value: JsonValue, path: string): JsonValue | undefined {
  if (path === "") {
    return value;
  }

  let current: JsonValue = value;
  for (const segment of path.split(".")) {
    if (Array.isArray(current)) {
      if (!ARRAY_INDEX.test(segment)) return undefined;
      const index = Number(segment);
      if (index >= current.length) return undefined;
      current = current[index];
    } else if (isJsonObject(current)) {
      if (!Object.hasOwn(current, segment)) return undefined;
      current = current[segment];
    } else {
      return undefined;
    }
  }

  return current;
}
