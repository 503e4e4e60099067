/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";
import { CliError, EXIT_CODE } from "./errors.js";

export const MAX_STDIN_BYTES = 10 * 1024 * 1024;

/**
 * Streams the CLI reads from and writes to
 */
export interface CliIO {
  stdin: NodeJS.ReadableStream & { isTTY?: boolean };
  out(text: string): void;
  err(text: string): void;
}

/**
 * Standard process streams
 */
export const processIO: CliIO = {
  stdin: process.stdin,
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
};

/**
 * Read from stdin with size limit (default 10MB)
 * @throws CliError if input exceeds size limit
 */
export async function readStdin(
  stream: NodeJS.ReadableStream,
  maxBytes = MAX_STDIN_BYTES
): Promise<string> {
  const chunks: Buffer[] = [];
  let bytesRead = 0;

  for await (const chunk of stream) {
    const buffer = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    bytesRead += buffer.length;

    // Enforce size limit during streaming to prevent memory exhaustion
    if (bytesRead > maxBytes) {
      throw new CliError(`stdin too large (max ${Math.floor(maxBytes / (1024 * 1024))}MB)`, {
        exitCode: EXIT_CODE.INVALID_ARGS,
      });
    }

    chunks.push(buffer);
  }

  return Buffer.concat(chunks).toString("utf8");
}

/**
 * Read a file as UTF-8 text
 */
export async function readTextFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw new CliError(`Cannot read file ${filePath}`, {
      exitCode: EXIT_CODE.INVALID_ARGS,
      cause: err,
    });
  }
}

/**
 * Resolve the change set text from --data, --file or stdin, in that order
 * @returns The text and a label naming where it came from
 */
export async function readChangeSet(
  options: { data?: string; file?: string },
  io: CliIO
): Promise<{ text: string; source: string }> {
  if (options.data !== undefined && options.file !== undefined) {
    throw new CliError("Use either --data or --file, not both", {
      exitCode: EXIT_CODE.INVALID_ARGS,
    });
  }

  if (options.data !== undefined) {
    return { text: options.data, source: "--data" };
  }

  if (options.file !== undefined) {
    return { text: await readTextFile(options.file), source: `file ${options.file}` };
  }

  if (io.stdin.isTTY ?? false) {
    throw new CliError("No input provided: pass --data, --file or pipe JSON on stdin", {
      exitCode: EXIT_CODE.INVALID_ARGS,
    });
  }

  return { text: await readStdin(io.stdin), source: "stdin" };
}
