/**
 * Redistribution engine
 *
 * One call is one read-modify-write cycle: list the parts of a base name, fetch
 * and merge them, apply the change, re-partition the whole document and upsert
 * every part. All validation happens before the first write; there is no
 * rollback once writes have started and no protection against concurrent runs.
 */

import { allocateSlots, normalizeIndices } from "./allocate.js";
import { BaseNotFoundError, MalformedPartError, PartNotFoundError } from "./errors.js";
import { byteSize, encodedSize } from "./format.js";
import { parseJsonObject } from "./json.js";
import { mergeParts } from "./merge.js";
import { applyMutation } from "./mutate.js";
import { partName, validateBaseName } from "./naming.js";
import { logger } from "./observability/logs.js";
import { partitionDocument } from "./partition.js";
import { getPath } from "./query.js";
import type {
  DocumentStats,
  EncodingOptions,
  FindResult,
  LoadedDocument,
  MutationOptions,
  MutationRequest,
  MutationResult,
  PartIndex,
  PartStore,
  RawPart,
} from "./types.js";

/**
 * Fetch the given parts, failing if the store returned fewer than requested
 */
async function fetchRawParts(
  store: PartStore,
  baseName: string,
  indices: readonly PartIndex[]
): Promise<RawPart[]> {
  if (indices.length === 0) {
    return [];
  }

  const payloads = await store.fetchParts(baseName, indices);
  return indices.map((index) => {
    const raw = payloads.get(index);
    if (raw === undefined) {
      throw new PartNotFoundError(partName(baseName, index));
    }
    return { index, raw };
  });
}

/**
 * List and fetch every part of a base name
 */
async function loadParts(
  store: PartStore,
  base: string
): Promise<{ indices: PartIndex[]; parts: RawPart[] }> {
  const indices = normalizeIndices(await store.listPartIndices(base));
  const parts = await fetchRawParts(store, base, indices);
  return { indices, parts };
}

/**
 * Load and merge every part of a document
 * @throws BaseNotFoundError if no part exists
 */
export async function readDocument(store: PartStore, baseName: string): Promise<LoadedDocument> {
  const base = validateBaseName(baseName);
  const { indices, parts } = await loadParts(store, base);
  if (indices.length === 0) {
    throw new BaseNotFoundError(base);
  }
  return { document: mergeParts(parts), indices };
}

/**
 * Apply a mutation and redistribute the document across its parts
 *
 * @param store - Part store collaborator
 * @param baseName - Base secret name (a part name such as "x-2" is rejected)
 * @param request - Change set, optional nested path and conflict policy
 * @param options - Size limit, overflow cap, tags, dry run
 * @returns Final key count, part count and the names written
 *
 * @example
 * ```typescript
 * const result = await runMutation(store, "app/config", {
 *   values: { Pass: "test-secret" },
 *   path: "Db",
 *   forceUpdate: false,
 * });
 * console.log(`Total keys: ${result.keyCount}, Total parts: ${result.partCount}`);
 * ```
 */
export async function runMutation(
  store: PartStore,
  baseName: string,
  request: MutationRequest,
  options: MutationOptions = {}
): Promise<MutationResult> {
  const base = validateBaseName(baseName);
  const { indices, parts } = await loadParts(store, base);

  if (!indices.includes(0) && !options.createIfMissing) {
    throw new BaseNotFoundError(base);
  }

  const current = mergeParts(parts);
  logger.info("mutation.loaded", {
    baseName: base,
    indices,
    keyCount: Object.keys(current).length,
  });

  const outcome = applyMutation(current, request);
  const chunks = partitionDocument(outcome.document, options);
  const plan = allocateSlots(base, indices, chunks, options);
  const dryRun = options.dryRun ?? false;

  logger.info("mutation.planned", {
    baseName: base,
    parts: plan.map(({ name, payload }) => ({ name, bytes: byteSize(payload) })),
    dryRun,
  });

  if (!dryRun) {
    const tags = options.tags ?? {};
    for (const assignment of plan) {
      await store.upsertPart(assignment.name, assignment.payload, tags);
      logger.debug("part.written", { name: assignment.name, index: assignment.index });
    }
  }

  const result: MutationResult = {
    keyCount: Object.keys(outcome.document).length,
    partCount: plan.length,
    parts: plan.map(({ name }) => name),
    added: outcome.added,
    updated: outcome.updated,
    dryRun,
  };
  logger.info("mutation.completed", {
    baseName: base,
    keyCount: result.keyCount,
    partCount: result.partCount,
  });
  return result;
}

/**
 * Find the first part, in ascending index order, where a dot path resolves
 * @returns The part and the value found, or null if no part has the path
 */
export async function runFind(
  store: PartStore,
  baseName: string,
  dotPath: string
): Promise<FindResult | null> {
  const base = validateBaseName(baseName);
  const { parts } = await loadParts(store, base);

  for (const { index, raw } of parts) {
    const parsed = parseJsonObject(raw);
    if (!parsed.success) {
      throw new MalformedPartError(index, parsed.error);
    }

    const value = getPath(parsed.data, dotPath);
    if (value !== undefined) {
      logger.debug("find.scanned", { baseName: base, path: dotPath, found: index });
      return { index, name: partName(base, index), value };
    }
  }

  logger.debug("find.scanned", { baseName: base, path: dotPath, found: null });
  return null;
}

/**
 * Per-part key counts and sizes of a document
 */
export async function describeDocument(
  store: PartStore,
  baseName: string,
  options: EncodingOptions = {}
): Promise<DocumentStats> {
  const base = validateBaseName(baseName);
  const { indices, parts } = await loadParts(store, base);
  if (indices.length === 0) {
    throw new BaseNotFoundError(base);
  }

  const document = mergeParts(parts);
  return {
    keyCount: Object.keys(document).length,
    parts: parts.map((part) => {
      const chunk = mergeParts([part]);
      return {
        index: part.index,
        name: partName(base, part.index),
        keyCount: Object.keys(chunk).length,
        bytes: byteSize(part.raw),
        canonicalBytes: encodedSize(chunk, options),
      };
    }),
  };
}
