/**
 * Part naming scheme
 *
 * Index 0 is the base record and carries the base name unchanged; index k >= 1
 * is stored as `<base>-<k>`.
 */

import { InvalidBaseNameError } from "./errors.js";
import type { PartIndex } from "./types.js";

const DIGITS = /^\d+$/;

/**
 * Physical record name for a part index
 */
export function partName(baseName: string, index: PartIndex): string {
  if (!Number.isInteger(index) || index < 0) {
    throw new RangeError(`Part index must be a non-negative integer, got ${index}`);
  }
  return index === 0 ? baseName : `${baseName}-${index}`;
}

/**
 * Recognize a physical name as a part of `baseName`
 * @returns The part index, or null if the name does not belong to the document
 *
 * @example
 * parsePartName("db", "db")     // 0
 * parsePartName("db", "db-2")   // 2
 * parsePartName("db", "db-x")   // null
 * parsePartName("db", "db-2-3") // null
 */
export function parsePartName(baseName: string, name: string): PartIndex | null {
  if (name === baseName) {
    return 0;
  }

  const prefix = `${baseName}-`;
  if (!name.startsWith(prefix)) {
    return null;
  }

  const suffix = name.slice(prefix.length);
  if (!DIGITS.test(suffix)) {
    return null;
  }

  const index = Number.parseInt(suffix, 10);
  return Number.isSafeInteger(index) && index >= 1 ? index : null;
}

/**
 * Validate and normalize a user-supplied base name
 * @throws InvalidBaseNameError for empty names or names that are themselves a part name
 */
export function validateBaseName(input: string): string {
  const clean = input.trim();

  if (clean === "") {
    throw new InvalidBaseNameError(input, "name must be non-empty");
  }

  const lastHyphen = clean.lastIndexOf("-");
  if (lastHyphen > 0 && DIGITS.test(clean.slice(lastHyphen + 1))) {
    throw new InvalidBaseNameError(
      clean,
      "this is a multipart part name; provide the base secret name instead"
    );
  }

  return clean;
}
