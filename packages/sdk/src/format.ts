/**
 * Canonical JSON encoding for part payloads
 *
 * Invariants:
 * - Pure function: same document always produces the same bytes
 * - Object keys are emitted in UTF-16 code unit order at every depth, independent of
 *   the object's own property order (integer-like keys included)
 * - Arrays keep their order
 * - No trailing newline; the encoded text is exactly what gets stored
 */

import { isJsonObject } from "./json.js";
import type { EncodingOptions, JsonObject, JsonValue } from "./types.js";

export const DEFAULT_INDENT = 2;

/**
 * Deterministic comparison for object keys using code unit order
 */
export function compareKeys(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function sortedKeys(obj: JsonObject): string[] {
  return Object.keys(obj).sort(compareKeys);
}

function encodeValue(value: JsonValue, indent: string, depth: number): string {
  const inner = indent ? "\n" + indent.repeat(depth + 1) : "";
  const outer = indent ? "\n" + indent.repeat(depth) : "";

  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    const items = value.map((item) => inner + encodeValue(item, indent, depth + 1));
    return "[" + items.join(",") + outer + "]";
  }

  if (isJsonObject(value)) {
    const obj = value;
    const keys = sortedKeys(obj);
    if (keys.length === 0) return "{}";
    const colon = indent ? ": " : ":";
    const entries = keys.map(
      (key) => inner + JSON.stringify(key) + colon + encodeValue(obj[key], indent, depth + 1)
    );
    return "{" + entries.join(",") + outer + "}";
  }

  return JSON.stringify(value);
}

/**
 * Encode a chunk the way it is persisted
 * @param chunk - Object to encode
 * @param options - Encoding options
 * @returns Canonical JSON text
 */
export function encodePart(chunk: JsonObject, options: EncodingOptions = {}): string {
  const width = Math.max(0, Math.min(10, options.indent ?? DEFAULT_INDENT));
  return encodeValue(chunk, " ".repeat(width), 0);
}

/**
 * UTF-8 byte length of an encoded payload
 */
export function byteSize(text: string): number {
  return Buffer.byteLength(text, "utf8");
}

/**
 * Encoded size of a chunk in bytes
 */
export function encodedSize(chunk: JsonObject, options: EncodingOptions = {}): number {
  return byteSize(encodePart(chunk, options));
}
