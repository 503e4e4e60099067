/**
 * Store adapter for CLI
 */

import { openSecretsManagerStore, type PartStore } from "@splitsecret/sdk";
import type { CliConfig } from "./config.js";

/**
 * Builds the part store an invocation talks to
 */
export type StoreFactory = (config: CliConfig) => PartStore;

/**
 * Open a part store backed by AWS Secrets Manager
 * Region falls back to the SDK's default resolution when not configured
 */
export const openCliStore: StoreFactory = (config) =>
  openSecretsManagerStore(config.region !== undefined ? { region: config.region } : {});
