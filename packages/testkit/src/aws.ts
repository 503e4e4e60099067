/**
 * In-memory stand-in for the Secrets Manager API
 */

import {
  ResourceExistsException,
  ResourceNotFoundException,
  type Tag,
  type SecretListEntry,
  type SecretValueEntry,
  type APIErrorType,
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
import type { SecretsManagerApi } from "@splitsecret/sdk";

export interface FakeSecret {
  secretString?: string;
  tags: Tag[];
}

export type FakeOperation =
  | "ListSecrets"
  | "BatchGetSecretValue"
  | "DescribeSecret"
  | "CreateSecret"
  | "UpdateSecret";

export interface FakeCall {
  operation: FakeOperation;
  input: unknown;
}

function arnFor(name: string): string {
  return `arn:aws:secretsmanager:us-east-1:000000000000:secret:${name}`;
}

function notFound(name: string): ResourceNotFoundException {
  return new ResourceNotFoundException({
    $metadata: { httpStatusCode: 400 },
    message: `Secrets Manager can't find the specified secret: ${name}`,
  });
}

/**
 * Secrets Manager API backed by a Map
 *
 * ListSecrets honours `name` filters as case-sensitive prefixes and pages its
 * results `pageSize` at a time. Every call is recorded in `calls`.
 */
export class FakeSecretsManagerApi implements SecretsManagerApi {
  readonly secrets = new Map<string, FakeSecret>();
  readonly calls: FakeCall[] = [];
  readonly pageSize: number;
  #failures = new Map<FakeOperation, Error>();

  constructor(options: { pageSize?: number; secrets?: Record<string, string> } = {}) {
    this.pageSize = options.pageSize ?? 100;
    for (const [name, secretString] of Object.entries(options.secrets ?? {})) {
      this.secrets.set(name, { secretString, tags: [] });
    }
  }

  /**
   * Make the next call of `operation` reject with `error`
   */
  failNext(operation: FakeOperation, error: Error): void {
    this.#failures.set(operation, error);
  }

  /**
   * Calls of one operation, in order
   */
  callsOf(operation: FakeOperation): unknown[] {
    return this.calls.filter((call) => call.operation === operation).map((call) => call.input);
  }

  #record(operation: FakeOperation, input: unknown): void {
    this.calls.push({ operation, input });
    const failure = this.#failures.get(operation);
    if (failure) {
      this.#failures.delete(operation);
      throw failure;
    }
  }

  async listSecrets(input: ListSecretsCommandInput): Promise<ListSecretsCommandOutput> {
    this.#record("ListSecrets", input);

    const prefixes = (input.Filters ?? [])
      .filter((filter) => filter.Key === "name")
      .flatMap((filter) => filter.Values ?? []);

    const names = [...this.secrets.keys()]
      .filter((name) => prefixes.length === 0 || prefixes.some((prefix) => name.startsWith(prefix)))
      .sort();

    const offset = input.NextToken ? Number.parseInt(input.NextToken, 10) : 0;
    const page = names.slice(offset, offset + this.pageSize);
    const nextOffset = offset + page.length;

    const SecretList: SecretListEntry[] = page.map((name) => ({ Name: name, ARN: arnFor(name) }));
    return {
      $metadata: {},
      SecretList,
      NextToken: nextOffset < names.length ? String(nextOffset) : undefined,
    };
  }

  async batchGetSecretValue(
    input: BatchGetSecretValueCommandInput
  ): Promise<BatchGetSecretValueCommandOutput> {
    this.#record("BatchGetSecretValue", input);

    const SecretValues: SecretValueEntry[] = [];
    const Errors: APIErrorType[] = [];

    for (const id of input.SecretIdList ?? []) {
      const secret = this.secrets.get(id);
      if (!secret) {
        Errors.push({
          SecretId: id,
          ErrorCode: "ResourceNotFoundException",
          Message: "Secrets Manager can't find the specified secret.",
        });
        continue;
      }
      SecretValues.push({ Name: id, ARN: arnFor(id), SecretString: secret.secretString });
    }

    return { $metadata: {}, SecretValues, Errors };
  }

  async describeSecret(input: DescribeSecretCommandInput): Promise<DescribeSecretCommandOutput> {
    this.#record("DescribeSecret", input);

    const name = input.SecretId ?? "";
    const secret = this.secrets.get(name);
    if (!secret) {
      throw notFound(name);
    }
    return { $metadata: {}, Name: name, ARN: arnFor(name), Tags: secret.tags };
  }

  async createSecret(input: CreateSecretCommandInput): Promise<CreateSecretCommandOutput> {
    this.#record("CreateSecret", input);

    const name = input.Name ?? "";
    if (this.secrets.has(name)) {
      throw new ResourceExistsException({
        $metadata: { httpStatusCode: 400 },
        message: `The operation failed because the secret ${name} already exists.`,
      });
    }
    this.secrets.set(name, { secretString: input.SecretString, tags: input.Tags ?? [] });
    return { $metadata: {}, Name: name, ARN: arnFor(name) };
  }

  async updateSecret(input: UpdateSecretCommandInput): Promise<UpdateSecretCommandOutput> {
    this.#record("UpdateSecret", input);

    const name = input.SecretId ?? "";
    const secret = this.secrets.get(name);
    if (!secret) {
      throw notFound(name);
    }
    secret.secretString = input.SecretString;
    return { $metadata: {}, Name: name, ARN: arnFor(name) };
  }
}
