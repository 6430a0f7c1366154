import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";

import {
  DEFAULT_EXCLUDE,
  environmentLayer,
  expandPath,
  getInitConfig,
  loadConfig,
  loadConfigFile,
  mergeConfigLayers,
  parseConfig,
  redactConfig,
  saveConfig,
} from "../config.js";
import { FatalConfigError } from "../errors.js";
import { createTempDir } from "./helpers.js";

describe("config", () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await createTempDir("config-test");
    configPath = path.join(tempDir, "config.json");
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("parseConfig", () => {
    it("should fill in defaults", () => {
      const config = parseConfig({ watchRoot: "/srv/www" });

      expect(config).toEqual({
        watchRoot: path.resolve("/srv/www"),
        layout: "flat",
        mappings: [],
        exclude: DEFAULT_EXCLUDE,
        policy: { autoConfirm: true, autoSync: true, autoDelete: true },
        watch: { quietPeriodMs: 2000, usePolling: false, pollIntervalMs: 1000 },
        dispatch: { concurrency: 4, maxAttempts: 5, cycleDelayMs: 500, retryIntervalMs: 30000 },
        server: { host: "127.0.0.1", port: 8085 },
        logLevel: "info",
      });
    });

    it("should normalize mapping prefixes", () => {
      const config = parseConfig({
        watchRoot: "/srv/www",
        mappings: [{ sourcePrefix: "./usr\\local/httpd/", targetPrefix: "/htdocs/" }],
      });

      expect(config.mappings).toEqual([{ sourcePrefix: "usr/local/httpd", targetPrefix: "htdocs" }]);
    });

    it("should expand ~ in paths", () => {
      expect(parseConfig({ watchRoot: "~/site" }).watchRoot).toBe(path.join(os.homedir(), "site"));
      expect(expandPath("~")).toBe(os.homedir());
      expect(expandPath("/abs")).toBe("/abs");
    });

    it("should default the gitlab branch", () => {
      const config = parseConfig({
        watchRoot: "/srv/www",
        transport: { type: "gitlab", baseUrl: "https://gitlab.example.com", projectId: "42" },
      });

      expect(config.transport).toEqual({
        type: "gitlab",
        baseUrl: "https://gitlab.example.com",
        projectId: "42",
        branch: "main",
      });
    });

    it("should report every problem at once", () => {
      let caught: unknown;
      try {
        parseConfig({ layout: "diagonal", policy: { autoPush: true } });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(FatalConfigError);
      expect(caught).toMatchObject({
        issues: [
          "watchRoot: watchRoot is required",
          "layout: Invalid enum value. Expected 'flat' | 'dated', received 'diagonal'",
          "policy: Unrecognized key(s) in object: 'autoPush'",
        ],
      });
    });
  });

  describe("layers", () => {
    it("should merge objects deeply and replace arrays", () => {
      expect(
        mergeConfigLayers(
          { watch: { quietPeriodMs: 2000, usePolling: false }, exclude: ["a"] },
          { watch: { usePolling: true }, exclude: ["b"], logLevel: undefined }
        )
      ).toEqual({ watch: { quietPeriodMs: 2000, usePolling: true }, exclude: ["b"] });
    });

    it("should read the watch root and log level from the environment", () => {
      expect(
        environmentLayer({ MIRRORWATCH_ROOT: "/srv/www", MIRRORWATCH_LOG_LEVEL: "debug" })
      ).toEqual({ watchRoot: "/srv/www", logLevel: "debug" });
      expect(environmentLayer({ MIRRORWATCH_LOG_LEVEL: "loud" })).toEqual({});
    });

    it("should apply file, environment and flags in order", async () => {
      await saveConfig(configPath, { watchRoot: "/from/file", layout: "dated", logLevel: "warn" });

      const config = await loadConfig({
        configPath,
        env: { MIRRORWATCH_ROOT: "/from/env", MIRRORWATCH_LOG_LEVEL: "error" },
        overrides: { logLevel: "debug" },
      });

      expect(config.watchRoot).toBe(path.resolve("/from/env"));
      expect(config.layout).toBe("dated");
      expect(config.logLevel).toBe("debug");
    });
  });

  describe("loadConfigFile", () => {
    it("should treat a missing file as empty", async () => {
      expect(await loadConfigFile(configPath)).toEqual({});
    });

    it("should fail on malformed JSON", async () => {
      await fs.writeFile(configPath, "{ not json");
      await expect(loadConfigFile(configPath)).rejects.toThrow(FatalConfigError);
    });

    it("should fail when the file is not an object", async () => {
      await fs.writeFile(configPath, "[]");
      await expect(loadConfigFile(configPath)).rejects.toThrow(`${configPath} must contain a JSON object`);
    });
  });

  it("should save atomically without leaving temp files", async () => {
    await saveConfig(configPath, getInitConfig("/srv/www", tempDir));

    expect(await fs.readdir(tempDir)).toEqual(["config.json"]);
    expect(parseConfig(await loadConfigFile(configPath)).transport).toEqual({
      type: "directory",
      path: path.join(tempDir, "mirror"),
    });
  });

  it("should hide the gitlab token", () => {
    const config = parseConfig({
      watchRoot: "/srv/www",
      transport: {
        type: "gitlab",
        baseUrl: "https://gitlab.example.com",
        projectId: "42",
        token: "test-secret",
      },
    });

    expect(redactConfig(config).transport).toMatchObject({ token: "***" });
    expect(config.transport).toMatchObject({ token: "test-secret" });
  });
});
