#!/usr/bin/env -S node --import tsx

/**
 * splitsecret CLI entry point
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { z } from "zod";
import { processIO } from "./lib/io.js";
import { openCliStore } from "./lib/store.js";
import { run } from "./program.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

// Read package.json for version
const PackageJsonSchema = z.object({ version: z.string() });
const packageJson = PackageJsonSchema.parse(
  JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"))
);

async function main(): Promise<void> {
  process.exitCode = await run(process.argv.slice(2), {
    io: processIO,
    env: process.env,
    openStore: openCliStore,
    version: packageJson.version,
  });
}

main().catch((err: unknown) => {
  process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exitCode = 1;
});
