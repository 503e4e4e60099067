/**
 * Partitioner: deterministic greedy chunking of a document by sorted key
 *
 * Keys are visited in code unit order, so the layout depends only on the key
 * set and values. Sizes are measured on the same canonical encoding that is
 * written to the store.
 */

import { KeyTooLargeError } from "./errors.js";
import { encodedSize, sortedKeys } from "./format.js";
import type { JsonObject, PartitionOptions } from "./types.js";

/** 50 KiB, below the 64 KiB record limit of AWS Secrets Manager */
export const DEFAULT_MAX_PART_BYTES = 50 * 1024;

/**
 * Split a document into size-bounded chunks
 * @param document - Logical document
 * @param options - Size limit and encoding
 * @returns Chunks in key order; empty for an empty document
 * @throws KeyTooLargeError if one pair alone exceeds the limit
 */
export function partitionDocument(document: JsonObject, options: PartitionOptions = {}): JsonObject[] {
  const limit = options.maxPartBytes ?? DEFAULT_MAX_PART_BYTES;
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new RangeError(`maxPartBytes must be a positive integer, got ${limit}`);
  }
  const encoding = { indent: options.indent };

  const chunks: JsonObject[] = [];
  let current: JsonObject = {};
  let currentCount = 0;

  for (const key of sortedKeys(document)) {
    const value = document[key];

    const single = encodedSize({ [key]: value }, encoding);
    if (single > limit) {
      throw new KeyTooLargeError(key, single, limit);
    }

    const tentative: JsonObject = { ...current, [key]: value };
    if (currentCount > 0 && encodedSize(tentative, encoding) > limit) {
      chunks.push(current);
      current = { [key]: value };
      currentCount = 1;
    } else {
      current = tentative;
      currentCount++;
    }
  }

  if (currentCount > 0) {
    chunks.push(current);
  }

  return chunks;
}
