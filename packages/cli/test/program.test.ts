/**
 * In-process tests for CLI commands
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { Readable } from "node:stream";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { logger } from "@splitsecret/sdk";
import { InMemoryPartStore } from "@splitsecret/testkit";
import { run, type CliDeps } from "../src/program.js";

interface Harness {
  store: InMemoryPartStore;
  run(args: string[]): Promise<number>;
  stdout(): string;
  stderr(): string;
}

function createHarness(
  options: { store?: InMemoryPartStore; stdin?: string; env?: NodeJS.ProcessEnv } = {}
): Harness {
  const store = options.store ?? new InMemoryPartStore();
  const out: string[] = [];
  const err: string[] = [];
  const stdin = Object.assign(Readable.from(options.stdin === undefined ? [] : [options.stdin]), {
    isTTY: options.stdin === undefined,
  });

  const deps: CliDeps = {
    io: {
      stdin,
      out: (text) => out.push(text),
      err: (text) => err.push(text),
    },
    env: options.env ?? { SPLITSECRET_ENV: "test" },
    openStore: () => store,
    version: "0.1.0",
  };

  return {
    store,
    run: (args) => run(args, deps),
    stdout: () => out.join(""),
    stderr: () => err.join(""),
  };
}

describe("splitsecret CLI", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("add", () => {
    it("should add keys to an existing secret", async () => {
      const cli = createHarness({ store: new InMemoryPartStore({ "app/config": { a: "1" } }) });

      const code = await cli.run(["add", "app/config", "--data", '{"b":"2"}']);

      expect(code).toBe(0);
      expect(cli.stdout()).toBe("Add operation completed successfully. Total keys: 2, Total parts: 1\n");
      expect(cli.store.read("app/config")).toEqual({ a: "1", b: "2" });
      expect(cli.store.writes.map((w) => [w.name, w.created])).toEqual([["app/config", false]]);
    });

    it("should add keys under a nested path", async () => {
      const cli = createHarness({
        store: new InMemoryPartStore({ "app/config": { Db: { User: "x" } } }),
      });

      const code = await cli.run(["add", "app/config", "--path", "Db", "--data", '{"Pass":"y"}']);

      expect(code).toBe(0);
      expect(cli.store.read("app/config")).toEqual({ Db: { User: "x", Pass: "y" } });
    });

    it("should read the change set from stdin", async () => {
      const cli = createHarness({
        store: new InMemoryPartStore({ "app/config": { a: "1" } }),
        stdin: '{"b":"2"}\n',
      });

      expect(await cli.run(["add", "app/config"])).toBe(0);
      expect(cli.store.read("app/config")).toEqual({ a: "1", b: "2" });
    });

    it("should read the change set from a file", async () => {
      const dir = await fs.mkdtemp(path.join(os.tmpdir(), "splitsecret-cli-"));
      const file = path.join(dir, "changes.json");
      await fs.writeFile(file, '{"b":"2"}', "utf8");

      try {
        const cli = createHarness({ store: new InMemoryPartStore({ "app/config": { a: "1" } }) });
        expect(await cli.run(["add", "app/config", "--file", file])).toBe(0);
        expect(cli.store.read("app/config")).toEqual({ a: "1", b: "2" });
      } finally {
        await fs.rm(dir, { recursive: true, force: true });
      }
    });

    it("should reject a key that already exists without writing", async () => {
      const cli = createHarness({ store: new InMemoryPartStore({ "app/config": { a: "1" } }) });

      const code = await cli.run(["add", "app/config", "--data", '{"a":"2"}']);

      expect(code).toBe(1);
      expect(cli.stderr()).toBe("Error: Key already exists: a\n");
      expect(cli.store.writes).toEqual([]);
    });

    it("should exit 2 when the base secret does not exist", async () => {
      const cli = createHarness();

      const code = await cli.run(["add", "app/config", "--data", '{"a":"1"}']);

      expect(code).toBe(2);
      expect(cli.stderr()).toBe('Error: Base secret "app/config" does not exist\n');
    });

    it("should create the base secret with provenance tags when asked", async () => {
      const cli = createHarness();

      const code = await cli.run([
        "add",
        "app/config",
        "--create",
        "--tag",
        "team=payments",
        "--data",
        '{"a":"1"}',
      ]);

      expect(code).toBe(0);
      expect(cli.store.writes).toHaveLength(1);
      expect(cli.store.writes[0]?.created).toBe(true);
      expect(cli.store.records.get("app/config")?.tags).toEqual({
        "splitsecret:env": "test",
        "splitsecret:feature": "multipart_secret",
        "splitsecret:managed-by": "splitsecret",
        team: "payments",
      });
    });

    it("should spread the document over new parts when it outgrows one", async () => {
      const cli = createHarness({ store: new InMemoryPartStore({ "app/config": '{"a":"1"}' }) });

      const code = await cli.run([
        "--max-part-bytes",
        "12",
        "--indent",
        "0",
        "add",
        "app/config",
        "--data",
        '{"b":"2"}',
      ]);

      expect(code).toBe(0);
      expect(cli.stdout()).toBe("Add operation completed successfully. Total keys: 2, Total parts: 2\n");
      expect(cli.store.records.get("app/config")?.payload).toBe('{"a":"1"}');
      expect(cli.store.records.get("app/config-1")?.payload).toBe('{"b":"2"}');
    });

    it("should refuse to allocate past the overflow limit", async () => {
      const cli = createHarness({ store: new InMemoryPartStore({ "app/config": '{"a":"1"}' }) });

      const code = await cli.run([
        "--max-part-bytes",
        "12",
        "--indent",
        "0",
        "--max-overflow-parts",
        "0",
        "add",
        "app/config",
        "--data",
        '{"b":"2"}',
      ]);

      expect(code).toBe(1);
      expect(cli.stderr()).toBe("Error: Part index 1 exceeds the overflow part limit (0)\n");
      expect(cli.store.writes).toEqual([]);
    });

    it("should plan without writing on --dry-run", async () => {
      const cli = createHarness({ store: new InMemoryPartStore({ "app/config": { a: "1" } }) });

      const code = await cli.run(["add", "app/config", "--dry-run", "--data", '{"b":"2"}']);

      expect(code).toBe(0);
      expect(cli.stdout()).toBe("Dry run: would write app/config. Total keys: 2, Total parts: 1\n");
      expect(cli.store.writes).toEqual([]);
    });

    it("should print nothing on success with --quiet", async () => {
      const cli = createHarness({ store: new InMemoryPartStore({ "app/config": { a: "1" } }) });

      expect(await cli.run(["--quiet", "add", "app/config", "--data", '{"b":"2"}'])).toBe(0);
      expect(cli.stdout()).toBe("");
    });

    it("should require an environment", async () => {
      const cli = createHarness({
        store: new InMemoryPartStore({ "app/config": { a: "1" } }),
        env: {},
      });

      const code = await cli.run(["add", "app/config", "--data", '{"b":"2"}']);

      expect(code).toBe(3);
      expect(cli.stderr()).toBe(
        "Error: An environment is required: pass --env or set SPLITSECRET_ENV\n"
      );
    });

    it("should reject a part name given as the base name", async () => {
      const cli = createHarness();

      const code = await cli.run(["add", "app/config-2", "--data", '{"a":"1"}']);

      expect(code).toBe(3);
      expect(cli.stderr()).toBe(
        'Error: Invalid secret name "app/config-2": this is a multipart part name; provide the base secret name instead\n'
      );
    });

    it("should reject input that is not a JSON object", async () => {
      const cli = createHarness({ store: new InMemoryPartStore({ "app/config": { a: "1" } }) });

      const code = await cli.run(["add", "app/config", "--data", "[1]"]);

      expect(code).toBe(3);
      expect(cli.stderr()).toBe("Error: Invalid JSON in --data: expected a JSON object, got array\n");
    });

    it("should fail when no input is provided on a terminal", async () => {
      const cli = createHarness({ store: new InMemoryPartStore({ "app/config": { a: "1" } }) });

      const code = await cli.run(["add", "app/config"]);

      expect(code).toBe(3);
      expect(cli.stderr()).toBe(
        "Error: No input provided: pass --data, --file or pipe JSON on stdin\n"
      );
    });

    it("should reject --data together with --file", async () => {
      const cli = createHarness({ store: new InMemoryPartStore({ "app/config": { a: "1" } }) });

      const code = await cli.run(["add", "app/config", "--data", "{}", "--file", "x.json"]);

      expect(code).toBe(3);
      expect(cli.stderr()).toBe("Error: Use either --data or --file, not both\n");
    });
  });

  describe("update", () => {
    it("should overwrite existing keys", async () => {
      const cli = createHarness({ store: new InMemoryPartStore({ "app/config": { a: "1" } }) });

      const code = await cli.run(["update", "app/config", "--data", '{"a":"2"}']);

      expect(code).toBe(0);
      expect(cli.stdout()).toBe(
        "Update operation completed successfully. Total keys: 1, Total parts: 1\n"
      );
      expect(cli.store.read("app/config")).toEqual({ a: "2" });
    });

    it("should reject keys that do not exist", async () => {
      const cli = createHarness({ store: new InMemoryPartStore({ "app/config": { a: "1" } }) });

      const code = await cli.run(["update", "app/config", "--data", '{"b":"2"}']);

      expect(code).toBe(1);
      expect(cli.stderr()).toBe("Error: Key does not exist: b\n");
      expect(cli.store.writes).toEqual([]);
    });
  });

  describe("find", () => {
    const seed = (): InMemoryPartStore =>
      new InMemoryPartStore({
        "app/config": { a: "1" },
        "app/config-1": { Db: { Host: "db.internal" } },
      });

    it("should report the part holding a path", async () => {
      const cli = createHarness({ store: seed() });

      expect(await cli.run(["find", "app/config", "Db.Host"])).toBe(0);
      expect(cli.stdout()).toBe('Found "Db.Host" in app/config-1\n');
    });

    it("should print JSON with --json", async () => {
      const cli = createHarness({ store: seed() });

      expect(await cli.run(["find", "app/config", "Db.Host", "--json"])).toBe(0);
      expect(JSON.parse(cli.stdout())).toEqual({
        part: "app/config-1",
        index: 1,
        value: "db.internal",
      });
    });

    it("should exit 2 when no part has the path", async () => {
      const cli = createHarness({ store: seed() });

      expect(await cli.run(["find", "app/config", "Db.Port"])).toBe(2);
      expect(cli.stderr()).toBe("Error: Path not found: Db.Port\n");
    });
  });

  describe("get", () => {
    const seed = (): InMemoryPartStore =>
      new InMemoryPartStore({ "app/config": { b: "2" }, "app/config-1": { a: "1" } });

    it("should print the merged document canonically", async () => {
      const cli = createHarness({ store: seed() });

      expect(await cli.run(["get", "app/config"])).toBe(0);
      expect(cli.stdout()).toBe('{\n  "a": "1",\n  "b": "2"\n}\n');
    });

    it("should print compact JSON with --raw", async () => {
      const cli = createHarness({ store: seed() });

      expect(await cli.run(["get", "app/config", "--raw"])).toBe(0);
      expect(cli.stdout()).toBe('{"a":"1","b":"2"}\n');
    });

    it("should exit 2 for a missing secret", async () => {
      const cli = createHarness();

      expect(await cli.run(["get", "app/config"])).toBe(2);
    });

    it("should fail on keys duplicated across parts", async () => {
      const cli = createHarness({
        store: new InMemoryPartStore({ "app/config": { a: "1" }, "app/config-1": { a: "2" } }),
      });

      expect(await cli.run(["get", "app/config"])).toBe(1);
      expect(cli.stderr()).toBe('Error: Duplicate key "a" found in part 1 (already in part 0)\n');
    });
  });

  describe("stats", () => {
    const seed = (): InMemoryPartStore =>
      new InMemoryPartStore({ "app/config": { b: "2" }, "app/config-1": { a: "1" } });

    it("should list parts with key counts and sizes", async () => {
      const cli = createHarness({ store: seed() });

      expect(await cli.run(["stats", "app/config"])).toBe(0);
      expect(cli.stdout()).toBe(
        [
          "Total keys: 2, Total parts: 2",
          "  app/config: 1 keys, 14.00 B",
          "  app/config-1: 1 keys, 14.00 B",
          "",
        ].join("\n")
      );
    });

    it("should print JSON with --json", async () => {
      const cli = createHarness({ store: seed() });

      expect(await cli.run(["stats", "app/config", "--json"])).toBe(0);
      expect(JSON.parse(cli.stdout())).toEqual({
        keyCount: 2,
        parts: [
          { index: 0, name: "app/config", keyCount: 1, bytes: 14, canonicalBytes: 14 },
          { index: 1, name: "app/config-1", keyCount: 1, bytes: 14, canonicalBytes: 14 },
        ],
      });
    });
  });

  describe("global behavior", () => {
    it("should print the version", async () => {
      const cli = createHarness();

      expect(await cli.run(["--version"])).toBe(0);
      expect(cli.stdout()).toBe("0.1.0\n");
    });

    it("should exit 3 for an unknown command", async () => {
      const cli = createHarness();

      expect(await cli.run(["frobnicate"])).toBe(3);
      expect(cli.stderr()).toContain("unknown command 'frobnicate'");
    });

    it("should exit 3 for an invalid size limit", async () => {
      const cli = createHarness();

      expect(await cli.run(["--max-part-bytes", "abc", "get", "app/config"])).toBe(3);
      expect(cli.stderr()).toBe("Error: Invalid --max-part-bytes: Expected number, received nan\n");
    });

    it("should emit timing metrics and restore the log level with --verbose", async () => {
      vi.spyOn(console, "error").mockImplementation(() => undefined);
      const before = logger.level;
      const cli = createHarness({ store: new InMemoryPartStore({ "app/config": { a: "1" } }) });

      expect(await cli.run(["--verbose", "get", "app/config"])).toBe(0);
      expect(cli.stderr()).toMatch(/^metric cli\.get duration_ms=\d+ success=true\n$/);
      expect(logger.level).toBe(before);
    });
  });
});
