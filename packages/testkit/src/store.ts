/**
 * In-memory part store for engine and CLI tests
 */

import {
  encodePart,
  parseJsonObject,
  parsePartName,
  partName,
  PartNotFoundError,
  type JsonObject,
  type PartIndex,
  type PartStore,
  type TagSet,
} from "@splitsecret/sdk";

export interface StoredRecord {
  payload: string;
  tags: TagSet;
}

/**
 * One upsert, in call order
 */
export interface WriteRecord {
  name: string;
  payload: string;
  tags: TagSet;
  created: boolean;
}

/**
 * PartStore keeping records in a Map
 *
 * Every successful upsert is appended to `writes`, so tests can assert that a
 * failed operation issued none.
 */
export class InMemoryPartStore implements PartStore {
  readonly records = new Map<string, StoredRecord>();
  readonly writes: WriteRecord[] = [];
  #failures = new Map<string, Error>();

  /**
   * @param seed - Record name to raw payload, or to an object encoded canonically
   */
  constructor(seed: Record<string, string | JsonObject> = {}) {
    for (const [name, payload] of Object.entries(seed)) {
      this.seed(name, payload);
    }
  }

  /**
   * Put a record in place without counting it as a write
   */
  seed(name: string, payload: string | JsonObject, tags: TagSet = {}): void {
    const raw = typeof payload === "string" ? payload : encodePart(payload);
    this.records.set(name, { payload: raw, tags: { ...tags } });
  }

  /**
   * Make the next upsert of `name` fail with `error`
   */
  failOn(name: string, error: Error): void {
    this.#failures.set(name, error);
  }

  /**
   * Parsed content of a record
   */
  read(name: string): JsonObject {
    const record = this.records.get(name);
    if (!record) {
      throw new Error(`No record named ${name}`);
    }
    const parsed = parseJsonObject(record.payload);
    if (!parsed.success) {
      throw new Error(`Record ${name} is not a JSON object: ${parsed.error}`);
    }
    return parsed.data;
  }

  async listPartIndices(baseName: string): Promise<PartIndex[]> {
    const indices: PartIndex[] = [];
    for (const name of this.records.keys()) {
      const index = parsePartName(baseName, name);
      if (index !== null) {
        indices.push(index);
      }
    }
    return indices.sort((a, b) => a - b);
  }

  async fetchParts(baseName: string, indices: readonly PartIndex[]): Promise<Map<PartIndex, string>> {
    const result = new Map<PartIndex, string>();
    for (const index of indices) {
      const name = partName(baseName, index);
      const record = this.records.get(name);
      if (!record) {
        throw new PartNotFoundError(name);
      }
      result.set(index, record.payload);
    }
    return result;
  }

  async upsertPart(name: string, payload: string, tags: TagSet): Promise<void> {
    const failure = this.#failures.get(name);
    if (failure) {
      this.#failures.delete(name);
      throw failure;
    }

    const existing = this.records.get(name);
    this.records.set(name, { payload, tags: existing ? existing.tags : { ...tags } });
    this.writes.push({ name, payload, tags: { ...tags }, created: !existing });
  }
}
