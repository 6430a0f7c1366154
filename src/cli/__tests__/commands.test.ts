/**
 * Tests for CLI commands
 *
 * Commands run in-process against a temp MIRRORWATCH_HOME; console
 * output and process.exit are intercepted.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";

import { createTempDir } from "../../__tests__/helpers.js";
import { config, parseValue, setConfigValue, unsetConfigValue } from "../commands/config.js";
import { init } from "../commands/init.js";
import { parseStatusResponse } from "../commands/status.js";
import { flagsToOverrides, parseCount } from "../shared.js";

describe("CLI commands", () => {
  let homeDir: string;
  let configPath: string;

  beforeEach(async () => {
    homeDir = await createTempDir("cli-test");
    configPath = path.join(homeDir, "config.json");
    vi.stubEnv("MIRRORWATCH_HOME", homeDir);
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("process.exit");
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    await fs.rm(homeDir, { recursive: true, force: true });
  });

  async function readConfig(): Promise<Record<string, unknown>> {
    return JSON.parse(await fs.readFile(configPath, "utf-8"));
  }

  describe("init", () => {
    it("should write a starter config pointing at the given root", async () => {
      const watchRoot = path.join(homeDir, "site");
      await init(watchRoot, {});

      expect(await readConfig()).toEqual({
        watchRoot,
        layout: "flat",
        mappings: [],
        policy: { autoConfirm: true, autoSync: true, autoDelete: true },
        transport: { type: "directory", path: path.join(homeDir, "mirror") },
      });
    });

    it("should leave an existing config alone without --force", async () => {
      await fs.writeFile(configPath, JSON.stringify({ watchRoot: "/srv/old" }));

      await init(path.join(homeDir, "site"), {});

      expect(await readConfig()).toEqual({ watchRoot: "/srv/old" });
      expect(console.log).toHaveBeenCalledWith("Use --force to overwrite");
    });
  });

  describe("config --set / --unset", () => {
    beforeEach(async () => {
      await init(path.join(homeDir, "site"), {});
    });

    it("should set a nested value parsed as JSON", async () => {
      await config({ config: configPath, set: "policy.autoDelete=false" });

      const saved = await readConfig();
      expect(saved.policy).toEqual({ autoConfirm: true, autoSync: true, autoDelete: false });
    });

    it("should unset a value", async () => {
      await config({ config: configPath, unset: "transport" });

      expect(await readConfig()).not.toHaveProperty("transport");
    });

    it("should refuse an edit that makes the config invalid", async () => {
      const before = await readConfig();

      await expect(config({ config: configPath, set: "layout=diagonal" })).rejects.toThrow(
        "process.exit"
      );
      expect(await readConfig()).toEqual(before);
    });

    it("should refuse a --set without a key", async () => {
      await expect(config({ config: configPath, set: "=true" })).rejects.toThrow("process.exit");
      expect(console.error).toHaveBeenCalledWith("Error: --set requires format: key.path=value");
    });
  });

  describe("status", () => {
    const live = {
      status: "running",
      monitoring: true,
      last_event: "2026-03-01T10:00:00.000Z",
      last_sync: null,
      pending: 2,
      awaiting_confirmation: 1,
      failed: 0,
      error: null,
      transport: "directory",
      policy: "auto-sync on, auto-confirm on, auto-delete on",
    };

    it("should accept a well-formed status body", () => {
      expect(parseStatusResponse(live)).toEqual(live);
    });

    it("should reject bodies that are not a status", () => {
      expect(parseStatusResponse({ ...live, pending: "2" })).toBeUndefined();
      expect(parseStatusResponse({ ...live, status: "paused" })).toBeUndefined();
      expect(parseStatusResponse({ error: "Not found" })).toBeUndefined();
      expect(parseStatusResponse(null)).toBeUndefined();
    });
  });

  describe("helpers", () => {
    it("should parse JSON values and keep anything else as a string", () => {
      expect(parseValue("false")).toBe(false);
      expect(parseValue("8090")).toBe(8090);
      expect(parseValue('["**/tmp/**"]')).toEqual(["**/tmp/**"]);
      expect(parseValue("dated")).toBe("dated");
    });

    it("should set and unset nested keys without touching the input", () => {
      const original = { server: { port: 8085 } };

      const updated = setConfigValue(original, "server.host", "0.0.0.0");
      expect(updated).toEqual({ server: { port: 8085, host: "0.0.0.0" } });
      expect(original).toEqual({ server: { port: 8085 } });

      expect(unsetConfigValue(updated, "server.port")).toEqual({ server: { host: "0.0.0.0" } });
      expect(unsetConfigValue(updated, "watch.quietPeriodMs")).toBe(updated);
    });

    it("should turn flags into a config layer", () => {
      expect(flagsToOverrides({ root: "/srv/www", logLevel: "debug" }, { server: { port: 9000 } })).toEqual({
        watchRoot: "/srv/www",
        logLevel: "debug",
        server: { port: 9000 },
      });
      expect(flagsToOverrides({})).toEqual({});
    });

    it("should parse counts and exit on bad ones", () => {
      expect(parseCount(undefined, 50, "--lines")).toBe(50);
      expect(parseCount("20", 50, "--lines")).toBe(20);
      expect(() => parseCount("zero", 50, "--lines")).toThrow("process.exit");
    });
  });
});
