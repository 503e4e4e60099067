/**
 * Error types for multipart secret operations
 *
 * Invariants:
 * - Every error names the offending key, path or part in its message
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

import type { PartIndex } from "./types.js";

/**
 * Base class for all splitsecret errors
 */
export abstract class SplitSecretError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// ---------------------------------------------------------------------------
// Merge-time
// ---------------------------------------------------------------------------

/**
 * Thrown when a part payload is not valid JSON or not a JSON object
 */
export class MalformedPartError extends SplitSecretError {
  readonly code = "MALFORMED_PART";

  constructor(
    public readonly index: PartIndex,
    public readonly reason: string,
    options?: ErrorOptions
  ) {
    super(`Malformed part ${index}: ${reason}`, options);
  }
}

/**
 * Thrown when a part payload is an empty object
 */
export class EmptyPartError extends SplitSecretError {
  readonly code = "EMPTY_PART";

  constructor(
    public readonly index: PartIndex,
    options?: ErrorOptions
  ) {
    super(`Part ${index} contains an empty JSON object`, options);
  }
}

/**
 * Thrown when the same key is stored in two different parts
 */
export class DuplicateKeyError extends SplitSecretError {
  readonly code = "DUPLICATE_KEY";

  constructor(
    public readonly key: string,
    public readonly firstIndex: PartIndex,
    public readonly secondIndex: PartIndex,
    options?: ErrorOptions
  ) {
    super(`Duplicate key "${key}" found in part ${secondIndex} (already in part ${firstIndex})`, options);
  }
}

// ---------------------------------------------------------------------------
// Mutation-time
// ---------------------------------------------------------------------------

/**
 * Thrown when adding a key that is already present
 */
export class KeyExistsError extends SplitSecretError {
  readonly code = "KEY_EXISTS";

  constructor(
    public readonly key: string,
    options?: ErrorOptions
  ) {
    super(`Key already exists: ${key}`, options);
  }
}

/**
 * Thrown when force-updating a key that is absent
 */
export class KeyMissingError extends SplitSecretError {
  readonly code = "KEY_MISSING";

  constructor(
    public readonly key: string,
    options?: ErrorOptions
  ) {
    super(`Key does not exist: ${key}`, options);
  }
}

export class PathSegmentMissingError extends SplitSecretError {
  readonly code = "PATH_SEGMENT_MISSING";

  constructor(
    public readonly segment: string,
    public readonly path: string,
    options?: ErrorOptions
  ) {
    super(`Path segment "${segment}" does not exist (path: ${path})`, options);
  }
}

export class PathSegmentNotObjectError extends SplitSecretError {
  readonly code = "PATH_SEGMENT_NOT_OBJECT";

  constructor(
    public readonly segment: string,
    public readonly path: string,
    public readonly kind: string,
    options?: ErrorOptions
  ) {
    super(`Path segment "${segment}" is not an object: found ${kind} (path: ${path})`, options);
  }
}

/**
 * Thrown when a mutation request itself is unusable (empty change set, bad path)
 */
export class InvalidMutationError extends SplitSecretError {
  readonly code = "INVALID_MUTATION";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Invalid mutation: ${reason}`, options);
  }
}

// ---------------------------------------------------------------------------
// Partition and allocation
// ---------------------------------------------------------------------------

/**
 * Thrown when a single key-value pair cannot fit in any part
 */
export class KeyTooLargeError extends SplitSecretError {
  readonly code = "KEY_TOO_LARGE";

  constructor(
    public readonly key: string,
    public readonly size: number,
    public readonly limit: number,
    options?: ErrorOptions
  ) {
    super(`Key "${key}" exceeds max part size (${limit} bytes): got ${size}`, options);
  }
}

/**
 * Thrown when redistribution would leave stale parts behind
 */
export class InsufficientChunksError extends SplitSecretError {
  readonly code = "INSUFFICIENT_CHUNKS";

  constructor(
    public readonly chunkCount: number,
    public readonly partCount: number,
    options?: ErrorOptions
  ) {
    super(
      `Number of new chunks (${chunkCount}) is less than existing parts (${partCount}). ` +
        `This would leave duplicated keys in extra parts; delete them manually first`,
      options
    );
  }
}

export class PartLimitExceededError extends SplitSecretError {
  readonly code = "PART_LIMIT_EXCEEDED";

  constructor(
    public readonly index: PartIndex,
    public readonly maxOverflowParts: number,
    options?: ErrorOptions
  ) {
    super(`Part index ${index} exceeds the overflow part limit (${maxOverflowParts})`, options);
  }
}

// ---------------------------------------------------------------------------
// Naming and store
// ---------------------------------------------------------------------------

export class InvalidBaseNameError extends SplitSecretError {
  readonly code = "INVALID_BASE_NAME";

  constructor(
    public readonly baseName: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid secret name "${baseName}": ${reason}`, options);
  }
}

export class BaseNotFoundError extends SplitSecretError {
  readonly code = "BASE_NOT_FOUND";

  constructor(
    public readonly baseName: string,
    options?: ErrorOptions
  ) {
    super(`Base secret "${baseName}" does not exist`, options);
  }
}

/**
 * Thrown by a store when a requested part is absent
 */
export class PartNotFoundError extends SplitSecretError {
  readonly code = "PART_NOT_FOUND";

  constructor(
    public readonly partName: string,
    options?: ErrorOptions
  ) {
    super(`Part not found: ${partName}`, options);
  }
}

/**
 * Thrown by a store for any other I/O failure
 */
export class StoreUnavailableError extends SplitSecretError {
  readonly code = "STORE_UNAVAILABLE";

  constructor(
    public readonly operation: string,
    target: string,
    options?: ErrorOptions
  ) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Store operation ${operation} failed for ${target}${detail}`, options);
  }
}
