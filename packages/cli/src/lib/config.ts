/**
 * Environment and configuration resolution
 *
 * Priority for every setting: CLI option > environment variable > default
 */

import { z } from "zod";
import {
  DEFAULT_INDENT,
  DEFAULT_MAX_OVERFLOW_PARTS,
  DEFAULT_MAX_PART_BYTES,
  type TagSet,
} from "@splitsecret/sdk";
import { parseTag } from "./arg.js";
import { CliError, EXIT_CODE } from "./errors.js";

/**
 * Global options as commander hands them over
 */
const GlobalOptionsSchema = z.object({
  env: z.string().optional(),
  region: z.string().optional(),
  maxPartBytes: z.string().optional(),
  maxOverflowParts: z.string().optional(),
  indent: z.string().optional(),
  verbose: z.boolean().optional(),
  quiet: z.boolean().optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

const CliConfigSchema = z.object({
  env: z.string().optional(),
  region: z.string().optional(),
  maxPartBytes: z.coerce.number().int().positive(),
  maxOverflowParts: z.coerce.number().int().nonnegative(),
  indent: z.coerce.number().int().min(0).max(10),
  verbose: z.boolean(),
  quiet: z.boolean(),
});

export type CliConfig = z.infer<typeof CliConfigSchema>;

const FIELD_LABELS: Record<string, string> = {
  maxPartBytes: "--max-part-bytes",
  maxOverflowParts: "--max-overflow-parts",
  indent: "--indent",
};

/**
 * First value that is set and not blank
 */
function pick(...values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    if (value !== undefined && value.trim() !== "") {
      return value.trim();
    }
  }
  return undefined;
}

/**
 * Resolve the configuration of one invocation
 * @param options - Raw global options from commander
 * @param env - Environment variables
 * @throws CliError (exit 3) when a value does not validate
 */
export function resolveConfig(options: unknown, env: NodeJS.ProcessEnv = process.env): CliConfig {
  const parsedOptions = GlobalOptionsSchema.safeParse(options);
  if (!parsedOptions.success) {
    throw new CliError("Invalid global options", {
      exitCode: EXIT_CODE.INVALID_ARGS,
      cause: parsedOptions.error,
    });
  }
  const opts = parsedOptions.data;

  const result = CliConfigSchema.safeParse({
    env: pick(opts.env, env.SPLITSECRET_ENV),
    region: pick(opts.region, env.AWS_REGION),
    maxPartBytes: pick(opts.maxPartBytes, env.SPLITSECRET_MAX_PART_BYTES) ?? DEFAULT_MAX_PART_BYTES,
    maxOverflowParts:
      pick(opts.maxOverflowParts, env.SPLITSECRET_MAX_OVERFLOW_PARTS) ?? DEFAULT_MAX_OVERFLOW_PARTS,
    indent: pick(opts.indent, env.SPLITSECRET_INDENT) ?? DEFAULT_INDENT,
    verbose: opts.verbose ?? env.SPLITSECRET_CLI_DEBUG === "1",
    quiet: opts.quiet ?? false,
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    const field = String(issue?.path[0] ?? "config");
    throw new CliError(`Invalid ${FIELD_LABELS[field] ?? field}: ${issue?.message ?? "invalid value"}`, {
      exitCode: EXIT_CODE.INVALID_ARGS,
      cause: result.error,
    });
  }

  return result.data;
}

/**
 * Environment name, required before any write
 */
export function requireEnv(config: CliConfig): string {
  if (config.env === undefined) {
    throw new CliError("An environment is required: pass --env or set SPLITSECRET_ENV", {
      exitCode: EXIT_CODE.INVALID_ARGS,
    });
  }
  return config.env;
}

/**
 * Tags applied to records created by a write
 */
export function buildTags(envName: string, extra: readonly string[] = []): TagSet {
  const tags: TagSet = {
    "splitsecret:env": envName,
    "splitsecret:feature": "multipart_secret",
    "splitsecret:managed-by": "splitsecret",
  };

  for (const entry of extra) {
    const [key, value] = parseTag(entry);
    tags[key] = value;
  }

  return tags;
}
