/**
 * Document merger: folds fetched parts into one logical document
 */

import { DuplicateKeyError, EmptyPartError, MalformedPartError } from "./errors.js";
import { parseJsonObject } from "./json.js";
import type { JsonObject, JsonValue, PartIndex, RawPart } from "./types.js";

/**
 * Merge raw part payloads in ascending index order
 * @param parts - Fetched parts, in any order
 * @returns The logical document
 * @throws MalformedPartError, EmptyPartError, DuplicateKeyError
 */
export function mergeParts(parts: readonly RawPart[]): JsonObject {
  const ordered = [...parts].sort((a, b) => a.index - b.index);
  const entries: Array<[string, JsonValue]> = [];
  const origin = new Map<string, PartIndex>();

  for (const { index, raw } of ordered) {
    const parsed = parseJsonObject(raw);
    if (!parsed.success) {
      throw new MalformedPartError(index, parsed.error);
    }

    const pairs = Object.entries(parsed.data);
    if (pairs.length === 0) {
      throw new EmptyPartError(index);
    }

    for (const [key, value] of pairs) {
      const first = origin.get(key);
      if (first !== undefined) {
        throw new DuplicateKeyError(key, first, index);
      }
      origin.set(key, index);
      entries.push([key, value]);
    }
  }

  // fromEntries defines own properties, so a "__proto__" key stays data
  return Object.fromEntries(entries);
}
