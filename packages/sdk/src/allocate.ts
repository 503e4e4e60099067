/**
 * Slot allocator: maps chunks onto part indices
 */

import { InsufficientChunksError, PartLimitExceededError } from "./errors.js";
import { encodePart } from "./format.js";
import { partName } from "./naming.js";
import type { AllocationOptions, JsonObject, PartAssignment, PartIndex } from "./types.js";

export const DEFAULT_MAX_OVERFLOW_PARTS = 5;

/**
 * Sort ascending and drop repeated indices
 */
export function normalizeIndices(indices: readonly PartIndex[]): PartIndex[] {
  return [...new Set(indices)].sort((a, b) => a - b);
}

/**
 * Assign each chunk to a part
 *
 * Existing slots are reused positionally in ascending index order; further chunks
 * get indices past the highest existing one. Chunk contents may therefore move
 * between slots across runs, but the set of slot names only ever grows.
 *
 * @param baseName - Base secret name
 * @param existing - Indices currently in the store
 * @param chunks - Output of the partitioner
 * @throws InsufficientChunksError if there are fewer chunks than existing parts
 * @throws PartLimitExceededError if an index beyond `maxOverflowParts` would be needed
 */
export function allocateSlots(
  baseName: string,
  existing: readonly PartIndex[],
  chunks: readonly JsonObject[],
  options: AllocationOptions = {}
): PartAssignment[] {
  const slots = normalizeIndices(existing);
  const maxOverflow = options.maxOverflowParts ?? DEFAULT_MAX_OVERFLOW_PARTS;

  if (chunks.length < slots.length) {
    throw new InsufficientChunksError(chunks.length, slots.length);
  }

  const next = slots.length > 0 ? slots[slots.length - 1] + 1 : 0;

  return chunks.map((chunk, i) => {
    const index = i < slots.length ? slots[i] : next + (i - slots.length);
    if (i >= slots.length && index > maxOverflow) {
      throw new PartLimitExceededError(index, maxOverflow);
    }
    return {
      index,
      name: partName(baseName, index),
      chunk,
      payload: encodePart(chunk, { indent: options.indent }),
    };
  });
}
