/**
 * Output rendering helpers
 */

import type { DocumentStats } from "@splitsecret/sdk";
import type { CliIO } from "./io.js";

/**
 * Print JSON to stdout
 * @param data - Data to serialize
 */
export function printJson(io: CliIO, data: unknown): void {
  io.out(JSON.stringify(data, null, 2) + "\n");
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(io: CliIO, lines: string[]): void {
  lines.forEach((line) => io.out(line + "\n"));
}

/**
 * Format bytes to human-readable string
 * @param bytes - Number of bytes
 * @returns Formatted string (e.g., "1.23 KB")
 */
export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) return "0 B";

  const k = 1024;
  const sizes = ["B", "KB", "MB", "GB"];
  const magnitude = Math.floor(Math.log(bytes) / Math.log(k));
  const i = Math.min(Math.max(magnitude, 0), sizes.length - 1);
  const value = bytes / Math.pow(k, i);

  return `${value.toFixed(2)} ${sizes[i]}`;
}

/**
 * Human-readable part table for `stats`
 */
export function renderStats(stats: DocumentStats): string[] {
  const lines = [`Total keys: ${stats.keyCount}, Total parts: ${stats.parts.length}`];
  for (const part of stats.parts) {
    lines.push(`  ${part.name}: ${part.keyCount} keys, ${formatBytes(part.bytes)}`);
  }
  return lines;
}
