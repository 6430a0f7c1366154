import fs from "node:fs/promises";
import path from "node:path";
import type { FastifyInstance } from "fastify";
import { afterEach, beforeEach, describe, it, expect } from "vitest";

import {
  MemoryTransport,
  createManualEventSource,
  createTempDir,
  writeFile,
} from "../../__tests__/helpers.js";
import { DEFAULT_EXCLUDE, parseConfig } from "../../config.js";
import { MemoryConfigStore } from "../../config-store.js";
import { createLogger, type Logger } from "../../logger.js";
import { SyncOrchestrator } from "../../sync/orchestrator.js";
import { createControlServer } from "../http.js";

describe("control server", () => {
  let tempDir: string;
  let watchRoot: string;
  let transport: MemoryTransport;
  let store: MemoryConfigStore;
  let logger: Logger;
  let orchestrator: SyncOrchestrator;
  let server: FastifyInstance;

  async function build(root: string): Promise<void> {
    store = new MemoryConfigStore(
      parseConfig({
        watchRoot: root,
        watch: { quietPeriodMs: 1000 },
        dispatch: { cycleDelayMs: 60_000, retryIntervalMs: 60_000 },
      })
    );
    logger = createLogger({ file: path.join(tempDir, "mirrorwatch.log"), console: false });
    orchestrator = new SyncOrchestrator({
      store,
      transport,
      stateDir: path.join(tempDir, "state"),
      logger,
      createEventSource: () => createManualEventSource(),
    });
    server = await createControlServer({ orchestrator, store, logger });
  }

  beforeEach(async () => {
    tempDir = await createTempDir("http-test");
    watchRoot = path.join(tempDir, "watch");
    await writeFile(watchRoot, "htdocs/a.php", "a");
    transport = new MemoryTransport();
    await build(watchRoot);
  });

  afterEach(async () => {
    await orchestrator.stop();
    await server.close();
    await logger.flush();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("GET /status", () => {
    it("should report an idle engine before monitoring starts", async () => {
      const res = await server.inject({ method: "GET", url: "/status" });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        status: "idle",
        monitoring: false,
        last_event: null,
        last_sync: null,
        pending: 0,
        awaiting_confirmation: 0,
        failed: 0,
        error: null,
        transport: "memory",
        policy: "auto-confirm on, auto-sync on, auto-delete on",
      });
    });
  });

  describe("POST /control", () => {
    it("should start monitoring with an initial scan and stop it", async () => {
      const started = await server.inject({ method: "POST", url: "/control", payload: { action: "start" } });

      expect(started.statusCode).toBe(200);
      expect(started.json()).toMatchObject({ status: "running", monitoring: true });
      expect(transport.files.get("data/htdocs/a.php")).toBe("a");

      const stopped = await server.inject({ method: "POST", url: "/control", payload: { action: "stop" } });

      expect(stopped.json()).toMatchObject({ status: "stopped", monitoring: false });
    });

    it("should answer 409 with the error when the watch root is missing", async () => {
      const missing = path.join(tempDir, "missing");
      await server.close();
      await build(missing);

      const res = await server.inject({ method: "POST", url: "/control", payload: { action: "start" } });

      expect(res.statusCode).toBe(409);
      expect(res.json()).toMatchObject({
        status: "error",
        error: `Watch root does not exist: ${missing}`,
      });
    });

    it("should reject an unknown action", async () => {
      const res = await server.inject({ method: "POST", url: "/control", payload: { action: "pause" } });

      expect(res.statusCode).toBe(400);
      const body = res.json();
      expect(body.error).toBe("Validation Error");
      expect(body.details[0].path).toBe("action");
    });
  });

  describe("POST /config", () => {
    it("should merge a policy change into the live config", async () => {
      const res = await server.inject({
        method: "POST",
        url: "/config",
        payload: { policy: { autoSync: false } },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        policy: { autoConfirm: true, autoSync: false, autoDelete: true },
        mappings: [],
        layout: "flat",
        exclude: DEFAULT_EXCLUDE,
      });
      expect(store.current().revision).toBe(2);
      expect(store.current().config.policy.autoSync).toBe(false);
    });

    it("should replace the mapping rules", async () => {
      const res = await server.inject({
        method: "POST",
        url: "/config",
        payload: { mappings: [{ sourcePrefix: "site/", targetPrefix: "web" }] },
      });

      expect(res.json().mappings).toEqual([{ sourcePrefix: "site", targetPrefix: "web" }]);
      expect(store.current().rules).toEqual([{ sourcePrefix: "site", targetPrefix: "web" }]);
    });

    it("should refuse an empty patch", async () => {
      const res = await server.inject({ method: "POST", url: "/config", payload: {} });

      expect(res.statusCode).toBe(400);
      expect(res.json().details).toEqual([{ path: "", message: "Nothing to update" }]);
    });

    it("should refuse unknown keys", async () => {
      const res = await server.inject({
        method: "POST",
        url: "/config",
        payload: { policy: { autoPush: true } },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe("Validation Error");
    });

    it("should report a patch the full config rejects", async () => {
      const res = await server.inject({
        method: "POST",
        url: "/config",
        payload: { mappings: [{ sourcePrefix: "/", targetPrefix: "x" }] },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        statusCode: 400,
        error: "Invalid Configuration",
        message: "Invalid configuration: mappings.0.sourcePrefix: sourcePrefix must not be empty",
        code: "CONFIG",
      });
      expect(store.current().revision).toBe(1);
    });
  });

  describe("POST /scan", () => {
    it("should scan and dispatch", async () => {
      const res = await server.inject({ method: "POST", url: "/scan" });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        scan: { scanned: 1, queued: 1, unchanged: 0, ignored: 0, unmapped: 0, deletes: 0 },
        cycle: { executed: 1, succeeded: 1, failed: 0, awaitingConfirmation: 0 },
      });
    });
  });

  describe("pending changes", () => {
    beforeEach(async () => {
      await store.update({ policy: { autoConfirm: false, autoSync: false } });
      await server.inject({ method: "POST", url: "/scan" });
    });

    it("should list changes awaiting confirmation", async () => {
      const res = await server.inject({ method: "GET", url: "/pending" });

      expect(res.json().pending).toMatchObject([
        {
          targetPath: "data/htdocs/a.php",
          sourcePath: "htdocs/a.php",
          kind: "create",
          state: "awaiting-confirmation",
          attempts: 0,
        },
      ]);
    });

    it("should confirm selected changes", async () => {
      const res = await server.inject({
        method: "POST",
        url: "/confirm",
        payload: { targets: ["data/htdocs/a.php"] },
      });

      expect(res.json()).toEqual({ confirmed: ["data/htdocs/a.php"] });
      expect(orchestrator.pending()[0].state).toBe("approved");
    });

    it("should reject every held change without targets", async () => {
      const res = await server.inject({ method: "POST", url: "/reject", payload: {} });

      expect(res.json()).toEqual({ rejected: ["data/htdocs/a.php"] });
      expect(orchestrator.pending()).toEqual([]);
    });
  });

  describe("POST /resolve", () => {
    it("should show the target of a local path", async () => {
      const res = await server.inject({
        method: "POST",
        url: "/resolve",
        payload: { path: "script/deploy.sh" },
      });

      expect(res.json()).toEqual({
        sourcePath: "script/deploy.sh",
        targetPath: "data/script/deploy.sh",
        rule: { sourcePrefix: "script", targetPrefix: "script" },
      });
    });
  });

  describe("GET /logs", () => {
    it("should return the last lines of the log file", async () => {
      logger.info("first");
      logger.warn("second");
      logger.info("third");
      await logger.flush();

      const res = await server.inject({ method: "GET", url: "/logs?lines=2" });

      const { logs } = res.json();
      expect(logs).toHaveLength(2);
      expect(logs[0]).toMatch(/^\[.+\] \[WARN\] second$/);
      expect(logs[1]).toMatch(/^\[.+\] \[INFO\] third$/);
    });

    it("should refuse an out-of-range line count", async () => {
      const res = await server.inject({ method: "GET", url: "/logs?lines=0" });
      expect(res.statusCode).toBe(400);
    });
  });

  it("should answer 404 for unknown routes", async () => {
    const res = await server.inject({ method: "GET", url: "/nope" });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({
      statusCode: 404,
      error: "Not Found",
      message: "Route GET /nope not found",
    });
  });
});
