/**
 * AWS Secrets Manager implementation of the part store
 *
 * The store talks to AWS through `SecretsManagerApi`, a narrow slice of the
 * Secrets Manager API. `createSecretsManagerApi()` builds it from an SDK client;
 * tests substitute an in-memory implementation.
 */

import {
  SecretsManagerClient,
  ListSecretsCommand,
  BatchGetSecretValueCommand,
  DescribeSecretCommand,
  CreateSecretCommand,
  UpdateSecretCommand,
  ResourceNotFoundException,
  type SecretsManagerClientConfig,
  type ListSecretsCommandInput,
  type ListSecretsCommandOutput,
  type BatchGetSecretValueCommandInput,
  type BatchGetSecretValueCommandOutput,
  type DescribeSecretCommandInput,
  type DescribeSecretCommandOutput,
  type CreateSecretCommandInput,
  type CreateSecretCommandOutput,
  type UpdateSecretCommandInput,
  type UpdateSecretCommandOutput,
} from "@aws-sdk/client-secrets-manager";
import { normalizeIndices } from "./allocate.js";
import { MalformedPartError, PartNotFoundError, StoreUnavailableError } from "./errors.js";
import { partName, parsePartName } from "./naming.js";
import { logger } from "./observability/logs.js";
import type { PartIndex, PartStore, TagSet } from "./types.js";

/** Maximum number of secret ids BatchGetSecretValue accepts per call */
export const BATCH_GET_LIMIT = 20;

/**
 * Secrets Manager operations used by the part store
 */
export interface SecretsManagerApi {
  listSecrets(input: ListSecretsCommandInput): Promise<ListSecretsCommandOutput>;
  batchGetSecretValue(input: BatchGetSecretValueCommandInput): Promise<BatchGetSecretValueCommandOutput>;
  describeSecret(input: DescribeSecretCommandInput): Promise<DescribeSecretCommandOutput>;
  createSecret(input: CreateSecretCommandInput): Promise<CreateSecretCommandOutput>;
  updateSecret(input: UpdateSecretCommandInput): Promise<UpdateSecretCommandOutput>;
}

/**
 * Bind the API to an SDK client
 */
export function createSecretsManagerApi(client: SecretsManagerClient): SecretsManagerApi {
  return {
    listSecrets: (input) => client.send(new ListSecretsCommand(input)),
    batchGetSecretValue: (input) => client.send(new BatchGetSecretValueCommand(input)),
    describeSecret: (input) => client.send(new DescribeSecretCommand(input)),
    createSecret: (input) => client.send(new CreateSecretCommand(input)),
    updateSecret: (input) => client.send(new UpdateSecretCommand(input)),
  };
}

function isNotFound(err: unknown): boolean {
  return (
    err instanceof ResourceNotFoundException ||
    (err instanceof Error && err.name === "ResourceNotFoundException")
  );
}

export interface SecretsManagerPartStoreOptions {
  /** Secret ids per BatchGetSecretValue call (default and maximum: 20) */
  batchSize?: number;
}

/**
 * Part store backed by AWS Secrets Manager
 *
 * @example
 * ```typescript
 * const store = openSecretsManagerStore({ region: "eu-west-1" });
 * const result = await runMutation(store, "payments/api", {
 *   values: { STRIPE_KEY: "test-secret" },
 *   forceUpdate: false,
 * });
 * ```
 */
export class SecretsManagerPartStore implements PartStore {
  readonly #api: SecretsManagerApi;
  readonly #batchSize: number;

  constructor(api: SecretsManagerApi, options: SecretsManagerPartStoreOptions = {}) {
    this.#api = api;
    this.#batchSize = Math.max(1, Math.min(BATCH_GET_LIMIT, options.batchSize ?? BATCH_GET_LIMIT));
  }

  async listPartIndices(baseName: string): Promise<PartIndex[]> {
    const indices: PartIndex[] = [];
    let nextToken: string | undefined;

    do {
      const response = await this.#call("ListSecrets", baseName, () =>
        this.#api.listSecrets({
          Filters: [{ Key: "name", Values: [baseName] }],
          NextToken: nextToken,
        })
      );

      for (const secret of response.SecretList ?? []) {
        const index = secret.Name === undefined ? null : parsePartName(baseName, secret.Name);
        if (index !== null) {
          indices.push(index);
        }
      }

      nextToken = response.NextToken;
    } while (nextToken);

    logger.debug("store.listed", { baseName, indices });
    return normalizeIndices(indices);
  }

  async fetchParts(baseName: string, indices: readonly PartIndex[]): Promise<Map<PartIndex, string>> {
    const byName = new Map<string, PartIndex>();
    for (const index of indices) {
      byName.set(partName(baseName, index), index);
    }

    const names = [...byName.keys()];
    const payloads = new Map<PartIndex, string>();

    for (let offset = 0; offset < names.length; offset += this.#batchSize) {
      const batch = names.slice(offset, offset + this.#batchSize);
      let nextToken: string | undefined;

      do {
        const response = await this.#call("BatchGetSecretValue", batch.join(", "), () =>
          this.#api.batchGetSecretValue({ SecretIdList: batch, NextToken: nextToken })
        );

        for (const failure of response.Errors ?? []) {
          const target = failure.SecretId ?? batch.join(", ");
          if (failure.ErrorCode === "ResourceNotFoundException") {
            throw new PartNotFoundError(target);
          }
          throw new StoreUnavailableError("BatchGetSecretValue", target, {
            cause: new Error(failure.Message ?? failure.ErrorCode ?? "unknown error"),
          });
        }

        for (const entry of response.SecretValues ?? []) {
          const index = entry.Name === undefined ? undefined : byName.get(entry.Name);
          if (index === undefined) {
            continue;
          }
          if (entry.SecretString === undefined) {
            throw new MalformedPartError(index, "secret has no string value");
          }
          payloads.set(index, entry.SecretString);
        }

        nextToken = response.NextToken;
      } while (nextToken);
    }

    for (const [name, index] of byName) {
      if (!payloads.has(index)) {
        throw new PartNotFoundError(name);
      }
    }

    logger.debug("store.fetched", { baseName, parts: names.length });
    return payloads;
  }

  async upsertPart(name: string, payload: string, tags: TagSet): Promise<void> {
    let exists = true;
    try {
      await this.#api.describeSecret({ SecretId: name });
    } catch (err) {
      if (!isNotFound(err)) {
        throw new StoreUnavailableError("DescribeSecret", name, { cause: err });
      }
      exists = false;
    }

    if (exists) {
      await this.#call("UpdateSecret", name, () =>
        this.#api.updateSecret({ SecretId: name, SecretString: payload })
      );
      logger.debug("store.updated", { name });
      return;
    }

    await this.#call("CreateSecret", name, () =>
      this.#api.createSecret({
        Name: name,
        SecretString: payload,
        Tags: Object.entries(tags).map(([Key, Value]) => ({ Key, Value })),
      })
    );
    logger.debug("store.created", { name, tags: Object.keys(tags).length });
  }

  /**
   * Run an API call, wrapping SDK failures in StoreUnavailableError
   */
  async #call<T>(operation: string, target: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new StoreUnavailableError(operation, target, { cause: err });
    }
  }
}

/**
 * Open a part store using the default AWS credential chain
 */
export function openSecretsManagerStore(
  config: Pick<SecretsManagerClientConfig, "region"> = {},
  options?: SecretsManagerPartStoreOptions
): SecretsManagerPartStore {
  const client = new SecretsManagerClient(config);
  return new SecretsManagerPartStore(createSecretsManagerApi(client), options);
}
