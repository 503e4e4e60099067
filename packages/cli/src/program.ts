/**
 * splitsecret command definitions
 */

import { Command, CommanderError } from "commander";
import { z } from "zod";
import {
  describeDocument,
  encodePart,
  logger,
  readDocument,
  runFind,
  runMutation,
  type MutationResult,
} from "@splitsecret/sdk";
import { collect, parseJson } from "./lib/arg.js";
import { buildTags, requireEnv, resolveConfig, type CliConfig } from "./lib/config.js";
import { CliError, EXIT_CODE, formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";
import { readChangeSet, type CliIO } from "./lib/io.js";
import { printJson, printLines, renderStats } from "./lib/render.js";
import type { StoreFactory } from "./lib/store.js";
import { withTiming, type MetricSink } from "./lib/telemetry.js";

/**
 * Everything an invocation touches outside the process
 */
export interface CliDeps {
  io: CliIO;
  env: NodeJS.ProcessEnv;
  openStore: StoreFactory;
  version: string;
}

const MutationCommandOptionsSchema = z.object({
  data: z.string().optional(),
  file: z.string().optional(),
  path: z.string().optional(),
  create: z.boolean().optional(),
  dryRun: z.boolean().optional(),
  tag: z.array(z.string()).optional(),
});

const JsonFlagSchema = z.object({ json: z.boolean().optional() });
const RawFlagSchema = z.object({ raw: z.boolean().optional() });

// Errors commander has already written to stderr
const reportedErrors = new WeakSet<Error>();

function parseOptions<T extends z.ZodTypeAny>(schema: T, value: unknown): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new CliError("Invalid command options", {
      exitCode: EXIT_CODE.INVALID_ARGS,
      cause: result.error,
    });
  }
  return result.data;
}

function summarize(verb: string, result: MutationResult): string {
  const totals = `Total keys: ${result.keyCount}, Total parts: ${result.partCount}`;
  if (result.dryRun) {
    return `Dry run: would write ${result.parts.join(", ")}. ${totals}`;
  }
  return `${verb} operation completed successfully. ${totals}`;
}

/**
 * Build the commander program for one invocation
 */
export function createProgram(deps: CliDeps): Command {
  const { io } = deps;
  const program = new Command();

  // Must be configured before subcommands are added so they inherit it
  program
    .configureOutput({
      writeOut: (str) => io.out(str),
      writeErr: (str) => io.err(str),
    })
    .exitOverride((err) => {
      reportedErrors.add(err);
      throw err;
    });

  // Global options
  program
    .name("splitsecret")
    .description("Store key-value secrets larger than one AWS Secrets Manager record")
    .version(deps.version)
    .option("--env <name>", "Environment tag for created records")
    .option("--region <region>", "AWS region")
    .option("--max-part-bytes <n>", "Maximum encoded size of one part")
    .option("--max-overflow-parts <n>", "Highest part index that may be allocated")
    .option("--indent <n>", "Indentation of stored JSON (0 for compact)")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  const loadConfig = (): { config: CliConfig; sink: MetricSink } => {
    const config = resolveConfig(program.opts(), deps.env);
    if (config.verbose) {
      logger.setLevel("debug");
    }
    return { config, sink: config.verbose ? (line) => io.err(line) : undefined };
  };

  const mutate = async (secret: string, rawOptions: unknown, forceUpdate: boolean): Promise<void> => {
    const { config, sink } = loadConfig();
    const label = forceUpdate ? "cli.update" : "cli.add";

    await withTiming(sink, label, async () => {
      const options = parseOptions(MutationCommandOptionsSchema, rawOptions);
      const tags = buildTags(requireEnv(config), options.tag);
      const { text, source } = await readChangeSet(options, io);
      const values = parseJson(text, source);

      const result = await runMutation(
        deps.openStore(config),
        secret,
        { values, path: options.path, forceUpdate },
        {
          maxPartBytes: config.maxPartBytes,
          maxOverflowParts: config.maxOverflowParts,
          indent: config.indent,
          tags,
          createIfMissing: options.create ?? false,
          dryRun: options.dryRun ?? false,
        }
      );

      if (!config.quiet) {
        printLines(io, [summarize(forceUpdate ? "Update" : "Add", result)]);
      }
    });
  };

  // Add command
  program
    .command("add <secret>")
    .description("Add new keys; fails if any key already exists")
    .option("--data <json>", "Inline JSON object")
    .option("--file <path>", "Read JSON object from file")
    .option("--path <dot.path>", "Nested object to add keys under")
    .option("--create", "Create the base secret if it does not exist")
    .option("--dry-run", "Plan the write without touching the store")
    .option("--tag <key=value>", "Extra tag for created records (repeatable)", collect)
    .action(async (secret: string, options: unknown) => {
      await mutate(secret, options, false);
    });

  // Update command
  program
    .command("update <secret>")
    .description("Overwrite existing keys; fails if any key is missing")
    .option("--data <json>", "Inline JSON object")
    .option("--file <path>", "Read JSON object from file")
    .option("--path <dot.path>", "Nested object whose keys are updated")
    .option("--dry-run", "Plan the write without touching the store")
    .action(async (secret: string, options: unknown) => {
      await mutate(secret, options, true);
    });

  // Find command
  program
    .command("find <secret> <path>")
    .description("Report which part holds a dot path")
    .option("--json", "Output JSON")
    .action(async (secret: string, dotPath: string, rawOptions: unknown) => {
      const { config, sink } = loadConfig();

      await withTiming(sink, "cli.find", async () => {
        const options = parseOptions(JsonFlagSchema, rawOptions);
        const found = await runFind(deps.openStore(config), secret, dotPath);

        if (found === null) {
          throw new CliError(`Path not found: ${dotPath}`, { exitCode: EXIT_CODE.NOT_FOUND });
        }

        if (options.json) {
          printJson(io, { part: found.name, index: found.index, value: found.value });
        } else {
          printLines(io, [`Found "${dotPath}" in ${found.name}`]);
        }
      });
    });

  // Get command
  program
    .command("get <secret>")
    .description("Print the merged document")
    .option("--raw", "Output compact JSON")
    .action(async (secret: string, rawOptions: unknown) => {
      const { config, sink } = loadConfig();

      await withTiming(sink, "cli.get", async () => {
        const options = parseOptions(RawFlagSchema, rawOptions);
        const { document } = await readDocument(deps.openStore(config), secret);
        io.out(encodePart(document, { indent: options.raw ? 0 : config.indent }) + "\n");
      });
    });

  // Stats command
  program
    .command("stats <secret>")
    .description("Show key counts and sizes per part")
    .option("--json", "Output JSON")
    .action(async (secret: string, rawOptions: unknown) => {
      const { config, sink } = loadConfig();

      await withTiming(sink, "cli.stats", async () => {
        const options = parseOptions(JsonFlagSchema, rawOptions);
        const stats = await describeDocument(deps.openStore(config), secret, {
          indent: config.indent,
        });

        if (options.json) {
          printJson(io, stats);
        } else {
          printLines(io, renderStats(stats));
        }
      });
    });

  return program;
}

/**
 * Run one invocation
 * @param args - User arguments, without the node and script entries
 * @returns Process exit code
 */
export async function run(args: readonly string[], deps: CliDeps): Promise<number> {
  const program = createProgram(deps);
  const previousLevel = logger.level;

  try {
    await program.parseAsync([...args], { from: "user" });
    return EXIT_CODE.SUCCESS;
  } catch (err) {
    if (err instanceof CommanderError && reportedErrors.has(err)) {
      return err.exitCode === 0 ? EXIT_CODE.SUCCESS : EXIT_CODE.INVALID_ARGS;
    }

    const verbose = program.opts().verbose === true || deps.env.SPLITSECRET_CLI_DEBUG === "1";
    deps.io.err(`Error: ${formatCliError(err, verbose)}\n`);
    return mapSdkErrorToExitCode(err);
  } finally {
    logger.setLevel(previousLevel);
  }
}
