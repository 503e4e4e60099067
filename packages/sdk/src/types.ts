/**
 * Core types for splitsecret
 */

/**
 * Any JSON value
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

/**
 * A JSON object; also the shape of a logical document and of every chunk
 */
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Discriminator returned by `jsonKind()`
 */
export type JsonKind = "string" | "number" | "boolean" | "null" | "array" | "object";

/**
 * Identifies a physical record: 0 is the base record, 1..K are overflow records
 */
export type PartIndex = number;

/**
 * Flat provenance tags applied to newly created records
 */
export type TagSet = Record<string, string>;

/**
 * Raw payload of one part as fetched from the store
 */
export interface RawPart {
  index: PartIndex;
  raw: string;
}

/**
 * A requested change to the logical document
 */
export interface MutationRequest {
  /** Key/value pairs to merge at the target object */
  values: JsonObject;
  /** Dot-separated path of the target object; absent or empty targets the root */
  path?: string;
  /** When true every key must already exist; when false none may */
  forceUpdate: boolean;
}

/**
 * Outcome of applying a mutation in memory
 */
export interface MutationOutcome {
  document: JsonObject;
  /** Keys written that were absent before (dotted when a path was used) */
  added: string[];
  /** Keys overwritten (dotted when a path was used) */
  updated: string[];
}

/**
 * Canonical encoding options
 */
export interface EncodingOptions {
  /** Spaces of indentation; 0 writes compact JSON (default: 2) */
  indent?: number;
}

/**
 * Options for the partitioner
 */
export interface PartitionOptions extends EncodingOptions {
  /** Maximum encoded size of one part in bytes (default: 51200) */
  maxPartBytes?: number;
}

/**
 * Options for the slot allocator
 */
export interface AllocationOptions extends EncodingOptions {
  /** Highest overflow index that may be allocated (default: 5) */
  maxOverflowParts?: number;
}

/**
 * One entry of a redistribution plan
 */
export interface PartAssignment {
  index: PartIndex;
  name: string;
  chunk: JsonObject;
  /** Canonical encoding of `chunk`, exactly as it will be written */
  payload: string;
}

/**
 * Store collaborator holding the physical parts
 *
 * Implementations must make `upsertPart` idempotent: overwrite when the record
 * exists, create it with `tags` otherwise.
 */
export interface PartStore {
  /**
   * List indices of the parts that belong to a base name
   */
  listPartIndices(baseName: string): Promise<PartIndex[]>;

  /**
   * Fetch raw payloads for the given indices
   * @throws PartNotFoundError if any requested part is missing
   */
  fetchParts(baseName: string, indices: readonly PartIndex[]): Promise<Map<PartIndex, string>>;

  /**
   * Create or overwrite a part
   */
  upsertPart(name: string, payload: string, tags: TagSet): Promise<void>;
}

/**
 * Options for `runMutation`
 */
export interface MutationOptions extends PartitionOptions, AllocationOptions {
  /** Tags applied to records created by this run */
  tags?: TagSet;
  /** Allow starting a document when the base record does not exist (default: false) */
  createIfMissing?: boolean;
  /** Plan the redistribution without writing (default: false) */
  dryRun?: boolean;
}

/**
 * Result of `runMutation`
 */
export interface MutationResult {
  keyCount: number;
  partCount: number;
  /** Part names in write order */
  parts: string[];
  added: string[];
  updated: string[];
  dryRun: boolean;
}

/**
 * Result of a successful `runFind`
 */
export interface FindResult {
  index: PartIndex;
  name: string;
  value: JsonValue;
}

/**
 * Merged view of a logical document
 */
export interface LoadedDocument {
  document: JsonObject;
  /** Part indices that made up the document, ascending */
  indices: PartIndex[];
}

/**
 * Per-part statistics
 */
export interface PartStats {
  index: PartIndex;
  name: string;
  keyCount: number;
  /** Size of the stored payload in bytes */
  bytes: number;
  /** Size after canonical re-encoding in bytes */
  canonicalBytes: number;
}

export interface DocumentStats {
  keyCount: number;
  parts: PartStats[];
}
