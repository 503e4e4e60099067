/**
 * Mutator: applies an add/update request to a logical document
 *
 * Invariants:
 * - The input document is never modified; changed objects are copied along the path
 * - Every key is validated before any key is written (all-or-nothing)
 * - Add never overwrites, update never creates
 */

import {
  InvalidMutationError,
  KeyExistsError,
  KeyMissingError,
  PathSegmentMissingError,
  PathSegmentNotObjectError,
} from "./errors.js";
import { isJsonObject, jsonKind } from "./json.js";
import type { JsonObject, MutationOutcome, MutationRequest } from "./types.js";

/**
 * Split a dot path into segments
 * @returns An empty array for an absent or blank path
 * @throws InvalidMutationError if the path has an empty segment ("a..b", ".a")
 */
export function parseMutationPath(path: string | undefined): string[] {
  const trimmed = path?.trim() ?? "";
  if (trimmed === "") {
    return [];
  }

  const segments = trimmed.split(".");
  if (segments.some((segment) => segment === "")) {
    throw new InvalidMutationError(`path "${trimmed}" contains an empty segment`);
  }
  return segments;
}

/**
 * Resolve the chain of objects from the root to the target of `segments`
 * @returns Objects visited, root first and target last
 */
function resolveTrail(document: JsonObject, segments: string[]): JsonObject[] {
  const trail: JsonObject[] = [document];
  const fullPath = segments.join(".");
  let current = document;

  for (const segment of segments) {
    if (!Object.hasOwn(current, segment)) {
      throw new PathSegmentMissingError(segment, fullPath);
    }
    const next = current[segment];
    if (!isJsonObject(next)) {
      throw new PathSegmentNotObjectError(segment, fullPath, jsonKind(next));
    }
    trail.push(next);
    current = next;
  }

  return trail;
}

/**
 * Apply a mutation request
 * @param document - Current logical document (left untouched)
 * @param request - Change set, optional target path and conflict policy
 * @returns The new document with the keys that were added and updated
 */
export function applyMutation(document: JsonObject, request: MutationRequest): MutationOutcome {
  const keys = Object.keys(request.values);
  if (keys.length === 0) {
    throw new InvalidMutationError("change set is empty");
  }

  const segments = parseMutationPath(request.path);
  const trail = resolveTrail(document, segments);
  const target = trail[trail.length - 1];
  const prefix = segments.length > 0 ? `${segments.join(".")}.` : "";

  const added: string[] = [];
  const updated: string[] = [];

  // Validate everything first
  for (const key of keys) {
    const exists = Object.hasOwn(target, key);
    if (!request.forceUpdate && exists) {
      throw new KeyExistsError(prefix + key);
    }
    if (request.forceUpdate && !exists) {
      throw new KeyMissingError(prefix + key);
    }
    (exists ? updated : added).push(prefix + key);
  }

  // Rebuild from the target back up to the root
  let replacement: JsonObject = { ...target, ...request.values };
  for (let depth = segments.length - 1; depth >= 0; depth--) {
    replacement = { ...trail[depth], [segments[depth]]: replacement };
  }

  return { document: replacement, added, updated };
}
