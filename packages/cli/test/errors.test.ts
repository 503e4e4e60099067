/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import {
  BaseNotFoundError,
  InsufficientChunksError,
  InvalidBaseNameError,
  KeyExistsError,
  PartNotFoundError,
  StoreUnavailableError,
} from "@splitsecret/sdk";
import { CliError, EXIT_CODE, mapSdkErrorToExitCode, formatCliError } from "../src/lib/errors.js";

describe("error handling", () => {
  describe("CliError", () => {
    it("should create error with default exit code 1", () => {
      const err = new CliError("test error");
      expect(err.message).toBe("test error");
      expect(err.exitCode).toBe(1);
      expect(err.name).toBe("CliError");
    });

    it("should create error with custom exit code", () => {
      const err = new CliError("not found", { exitCode: EXIT_CODE.NOT_FOUND });
      expect(err.exitCode).toBe(2);
    });

    it("should support cause", () => {
      const cause = new Error("underlying error");
      const err = new CliError("wrapper", { cause });
      expect(err.cause).toBe(cause);
    });
  });

  describe("mapSdkErrorToExitCode", () => {
    it("should map missing base and parts to exit code 2", () => {
      expect(mapSdkErrorToExitCode(new BaseNotFoundError("app/config"))).toBe(2);
      expect(mapSdkErrorToExitCode(new PartNotFoundError("app/config-1"))).toBe(2);
    });

    it("should map argument errors to exit code 3", () => {
      expect(mapSdkErrorToExitCode(new InvalidArgumentError("bad"))).toBe(3);
      expect(mapSdkErrorToExitCode(new InvalidBaseNameError("x-1", "suffix"))).toBe(3);
    });

    it("should map conflicts and store failures to exit code 1", () => {
      expect(mapSdkErrorToExitCode(new KeyExistsError("a"))).toBe(1);
      expect(mapSdkErrorToExitCode(new InsufficientChunksError(1, 2))).toBe(1);
      expect(mapSdkErrorToExitCode(new StoreUnavailableError("ListSecrets", "app"))).toBe(1);
    });

    it("should prefer the exit code carried by CliError", () => {
      expect(mapSdkErrorToExitCode(new CliError("x", { exitCode: 3 }))).toBe(3);
    });

    it("should default to exit code 1 for unknown errors", () => {
      expect(mapSdkErrorToExitCode(new Error("unknown"))).toBe(1);
      expect(mapSdkErrorToExitCode("string error")).toBe(1);
      expect(mapSdkErrorToExitCode(null)).toBe(1);
    });
  });

  describe("formatCliError", () => {
    it("should format error message", () => {
      const err = new Error("test error");
      expect(formatCliError(err)).toBe("test error");
    });

    it("should truncate long messages", () => {
      const err = new Error("x".repeat(3000));
      const formatted = formatCliError(err);
      expect(formatted).toBe("x".repeat(2000) + "... (truncated)");
    });

    it("should include cause in verbose mode", () => {
      const err = new CliError("wrapper", { cause: new Error("underlying") });
      const formatted = formatCliError(err, true);
      expect(formatted.split("\n")[1]).toBe("  Cause: underlying");
    });

    it("should not include stack in non-verbose mode", () => {
      const err = new CliError("test", { cause: new Error("underlying") });
      expect(formatCliError(err, false)).toBe("test");
    });

    it("should handle non-Error values", () => {
      expect(formatCliError("string error")).toBe("string error");
      expect(formatCliError(42)).toBe("42");
      expect(formatCliError(null)).toBe("null");
    });
  });
});
