/**
 * splitsecret SDK
 *
 * Stores a key-value secret larger than one record of the secret store by
 * spreading it over several records and reassembling it on read
 */

// Re-export types
export type {
  JsonValue,
  JsonObject,
  JsonKind,
  PartIndex,
  TagSet,
  RawPart,
  MutationRequest,
  MutationOutcome,
  EncodingOptions,
  PartitionOptions,
  AllocationOptions,
  PartAssignment,
  PartStore,
  MutationOptions,
  MutationResult,
  FindResult,
  LoadedDocument,
  PartStats,
  DocumentStats,
} from "./types.js";

// Engine
export { runMutation, runFind, readDocument, describeDocument } from "./engine.js";

// Building blocks
export { mergeParts } from "./merge.js";
export { applyMutation, parseMutationPath } from "./mutate.js";
export { partitionDocument, DEFAULT_MAX_PART_BYTES } from "./partition.js";
export { allocateSlots, normalizeIndices, DEFAULT_MAX_OVERFLOW_PARTS } from "./allocate.js";
export { partName, parsePartName, validateBaseName } from "./naming.js";
export { encodePart, encodedSize, byteSize, compareKeys, DEFAULT_INDENT } from "./format.js";
export { jsonKind, isJsonObject, parseJsonObject, JsonValueSchema, JsonObjectSchema } from "./json.js";
export { getPath } from "./query.js";

// AWS Secrets Manager store
export {
  SecretsManagerPartStore,
  createSecretsManagerApi,
  openSecretsManagerStore,
  BATCH_GET_LIMIT,
} from "./secrets-manager.js";
export type { SecretsManagerApi, SecretsManagerPartStoreOptions } from "./secrets-manager.js";

// Logging
export { logger, Logger, levelFromEnv } from "./observability/logs.js";
export type { LogLevel, LogEvent } from "./observability/logs.js";

// Errors
export {
  SplitSecretError,
  MalformedPartError,
  EmptyPartError,
  DuplicateKeyError,
  KeyExistsError,
  KeyMissingError,
  PathSegmentMissingError,
  PathSegmentNotObjectError,
  InvalidMutationError,
  KeyTooLargeError,
  InsufficientChunksError,
  PartLimitExceededError,
  InvalidBaseNameError,
  BaseNotFoundError,
  PartNotFoundError,
  StoreUnavailableError,
} from "./errors.js";
