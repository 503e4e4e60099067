/**
 * JSON value model: kind discrimination and validated parsing
 */

import { z } from "zod";
import type { JsonKind, JsonObject, JsonValue } from "./types.js";

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

export const JsonObjectSchema = z.record(z.string(), JsonValueSchema);

/**
 * Classify a JSON value
 */
export function jsonKind(value: JsonValue): JsonKind {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  switch (typeof value) {
    case "string":
      return "string";
    case "number":
      return "number";
    case "boolean":
      return "boolean";
    default:
      return "object";
  }
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return value !== undefined && jsonKind(value) === "object";
}

/**
 * Describe an arbitrary parsed value for error messages
 */
function describeUnknown(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function conformsToJsonObject(value: unknown): value is JsonObject {
  return JsonObjectSchema.safeParse(value).success;
}

/**
 * Parse text as a JSON object with structured error information
 * @param raw - Raw JSON text (a leading BOM is ignored)
 * @returns Parsed object or a reason it was rejected
 */
export function parseJsonObject(
  raw: string
): { success: true; data: JsonObject } | { success: false; error: string } {
  const cleaned = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, error: `invalid JSON: ${message}` };
  }

  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    return { success: false, error: `expected a JSON object, got ${describeUnknown(parsed)}` };
  }

  if (conformsToJsonObject(parsed)) {
    // zod rebuilds records without "__proto__" keys, so hand back JSON.parse's own object
    return { success: true, data: parsed };
  }

  const issue = JsonObjectSchema.safeParse(parsed).error?.issues[0];
  const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
  return { success: false, error: `unsupported value${where}` };
}
