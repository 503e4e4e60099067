/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { parseJsonObject, type JsonObject } from "@splitsecret/sdk";

/**
 * Parse a change set: a non-empty JSON object
 */
export function parseJson(value: string, source: string): JsonObject {
  const parsed = parseJsonObject(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Invalid JSON in ${source}: ${parsed.error}`);
  }

  if (Object.keys(parsed.data).length === 0) {
    throw new InvalidArgumentError(`Invalid JSON in ${source}: object has no keys`);
  }

  return parsed.data;
}

/**
 * Parse a `key=value` tag; the value may itself contain "="
 */
export function parseTag(value: string): [string, string] {
  const separator = value.indexOf("=");
  if (separator <= 0) {
    throw new InvalidArgumentError(`Tag "${value}" must have the form key=value`);
  }

  return [value.slice(0, separator).trim(), value.slice(separator + 1)];
}

/**
 * Accumulate a repeatable option
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}
