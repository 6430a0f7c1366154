/**
 * Sync orchestrator
 *
 * Owns the pending queue and the last-synced snapshot and drives
 * detection → classification → resolution → decision → dispatch.
 *
 * Everything that writes detections to the queue (the watcher loop,
 * quiet-period rechecks, scans) runs on one ingestion chain, so intents
 * land in the order they were detected. Dispatch cycles are chained the
 * same way: a cycle requested while another runs starts after it. Within
 * a cycle every target path appears once, so two dispatches for one path
 * are never in flight.
 */

import fs from "node:fs/promises";
import path from "node:path";

import type { ConfigSnapshot, ConfigStore } from "../config-store.js";
import type { MirrorwatchConfig } from "../config.js";
import { FatalConfigError, MappingError, errorMessage, isRetryable } from "../errors.js";
import { createSilentLogger, type Logger } from "../logger.js";
import type { CommitContext, RepositoryTransport } from "../transport/types.js";
import {
  classify,
  classifyMissing,
  toWatchRelative,
  type Classification,
  type ClassifierContext,
} from "./classifier.js";
import { applyLayout } from "./layout.js";
import { explainResolution, normalizeRelativePath, toRepositoryPath } from "./mapper.js";
import { applyAutoConfirm, decide, describePolicy } from "./policy.js";
import { mapWithConcurrency } from "./pool.js";
import { PendingQueue, type PendingState } from "./queue.js";
import { listWatchedFiles } from "./scanner.js";
import {
  computeContentHash,
  computeFileHash,
  createEmptySnapshot,
  loadSnapshot,
  recordDeleted,
  recordSynced,
  saveSnapshot,
} from "./state.js";
import type { IntentKind, MappingRule, RawFsEvent, SyncIntent, SyncSnapshot } from "./types.js";
import { createFileWatcher, type EventSource, type WatcherOptions } from "./watcher.js";

export type OrchestratorState = "idle" | "running" | "draining" | "stopped" | "error";

export type OrchestratorOptions = {
  store: ConfigStore;
  transport: RepositoryTransport;
  /** Directory holding the snapshot file */
  stateDir: string;
  logger?: Logger;
  /** Replaces the chokidar watcher (tests) */
  createEventSource?: (root: string, options: WatcherOptions) => EventSource;
  now?: () => number;
};

export type StartOptions = {
  /** Rescan the tree once monitoring is up */
  initialScan?: boolean;
};

export type ScanOptions = {
  /** Ignore snapshot hashes and requeue every mapped file */
  force?: boolean;
  /** Run a dispatch cycle once the scan has queued its intents */
  dispatch?: boolean;
};

export type ScanReport = {
  scanned: number;
  /** Creates and updates queued */
  queued: number;
  unchanged: number;
  ignored: number;
  unmapped: number;
  /** Deletes queued for synced files no longer present */
  deletes: number;
};

export type CycleReport = {
  executed: number;
  succeeded: number;
  failed: number;
  awaitingConfirmation: number;
};

export type OrchestratorStatus = {
  status: OrchestratorState;
  monitoring: boolean;
  last_event: string | null;
  last_sync: string | null;
  pending: number;
  awaiting_confirmation: number;
  failed: number;
  error: string | null;
  transport: string;
  policy: string;
};

export type PendingView = {
  targetPath: string;
  sourcePath: string;
  kind: IntentKind;
  state: PendingState;
  attempts: number;
  detectedAt: string;
  batch?: string;
  lastError?: string;
};

export type ResolveResult = {
  sourcePath: string;
  targetPath: string | null;
  rule: MappingRule | null;
  batch?: string;
  reason?: "outside-root" | "layout" | "no-mapping";
};

type DispatchOutcome = "succeeded" | "retry" | "failed" | "dropped";

const RECHECK_MARGIN_MS = 50;

export class SyncOrchestrator {
  private readonly store: ConfigStore;
  private readonly transport: RepositoryTransport;
  private readonly stateDir: string;
  private readonly logger: Logger;
  private readonly createEventSource: (root: string, options: WatcherOptions) => EventSource;
  private readonly now: () => number;

  private readonly queue = new PendingQueue();
  private snapshot: SyncSnapshot | null = null;
  private state: OrchestratorState = "idle";
  private lastError: string | null = null;
  private lastEventAt: number | null = null;

  private source: EventSource | null = null;
  private loop: Promise<void> | null = null;
  private ingestChain: Promise<void> = Promise.resolve();
  private cycleChain: Promise<void> = Promise.resolve();
  private saveChain: Promise<void> = Promise.resolve();
  private cycleTimer: NodeJS.Timeout | null = null;
  private retryTimer: NodeJS.Timeout | null = null;
  private readonly rechecks = new Map<string, NodeJS.Timeout>();
  private unsubscribe: (() => void) | null = null;
  /** Bumped by stop(); work started under an older run stops writing */
  private runId = 0;

  constructor(options: OrchestratorOptions) {
    this.store = options.store;
    this.transport = options.transport;
    this.stateDir = options.stateDir;
    this.logger = options.logger ?? createSilentLogger();
    this.createEventSource = options.createEventSource ?? createFileWatcher;
    this.now = options.now ?? Date.now;
  }

  get running(): boolean {
    return this.state === "running";
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  async start(options: StartOptions = {}): Promise<void> {
    if (this.state === "running" || this.state === "draining") {
      return;
    }

    const { config } = this.store.current();

    try {
      await assertWatchRoot(config.watchRoot);
      await this.ensureSnapshot(config.watchRoot);
    } catch (error) {
      this.state = "error";
      this.lastError = errorMessage(error);
      this.logger.error(`Cannot start monitoring: ${this.lastError}`);
      throw error;
    }

    const source = this.createEventSource(config.watchRoot, {
      quietPeriodMs: config.watch.quietPeriodMs,
      exclude: config.exclude,
      usePolling: config.watch.usePolling,
      pollInterval: config.watch.pollIntervalMs,
      onError: (error) => this.logger.error(`Watcher error: ${errorMessage(error)}`),
    });

    this.source = source;
    this.state = "running";
    this.lastError = null;
    this.loop = this.consume(source).catch((error: unknown) => {
      this.logger.error(`Event loop stopped: ${errorMessage(error)}`);
    });

    this.retryTimer = setInterval(() => {
      if (this.hasDispatchable()) {
        this.requestCycle();
      }
    }, config.dispatch.retryIntervalMs);

    // Held entries are re-decided under the new policy
    this.unsubscribe = this.store.subscribe(() => {
      const held = this.queue.countByState("awaiting-confirmation");
      if (this.running && (held > 0 || this.hasDispatchable())) {
        this.requestCycle();
      }
    });

    this.logger.info(
      `Monitoring ${config.watchRoot} (${config.layout} layout; ${describePolicy(config.policy)}) → ${this.transport.name}`
    );

    if (options.initialScan) {
      try {
        await this.scan({ dispatch: true });
      } catch (error) {
        this.lastError = errorMessage(error);
        this.logger.error(`Initial scan failed: ${this.lastError}`);
      }
    } else if (this.hasDispatchable()) {
      this.scheduleCycle();
    }
  }

  /**
   * Stop detection, let in-flight dispatches finish and discard whatever
   * was not dispatched
   */
  async stop(): Promise<void> {
    if (this.state !== "running") {
      if (this.state === "error") {
        this.state = "stopped";
      }
      return;
    }

    this.state = "draining";
    this.runId++;
    this.logger.info("Stopping: draining in-flight dispatches");

    this.clearTimers();
    this.unsubscribe?.();
    this.unsubscribe = null;

    const source = this.source;
    this.source = null;
    if (source) {
      await source.close();
    }
    await this.loop;
    this.loop = null;

    // Cycles queued behind the in-flight one see "draining" and do nothing
    await this.ingestChain;
    await this.cycleChain;
    const discarded = this.queue.clear();
    await this.saveChain;

    this.state = "stopped";
    this.logger.info(
      discarded > 0 ? `Stopped; discarded ${discarded} undispatched intent(s)` : "Stopped"
    );
  }

  private async consume(source: EventSource): Promise<void> {
    for await (const event of source.events()) {
      try {
        await this.ingest(event);
      } catch (error) {
        this.logger.error(`Failed to process ${event.type} ${event.path}: ${errorMessage(error)}`);
      }
    }
  }

  private clearTimers(): void {
    if (this.cycleTimer) {
      clearTimeout(this.cycleTimer);
      this.cycleTimer = null;
    }
    if (this.retryTimer) {
      clearInterval(this.retryTimer);
      this.retryTimer = null;
    }
    for (const timer of this.rechecks.values()) {
      clearTimeout(timer);
    }
    this.rechecks.clear();
  }

  // ---------------------------------------------------------------------------
  // Detection
  // ---------------------------------------------------------------------------

  /**
   * Run a queue-writing task after every task already on the ingestion
   * chain
   */
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const next = this.ingestChain.then(task);
    this.ingestChain = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  /**
   * Classify one raw event and fold the result into the queue
   */
  ingest(event: RawFsEvent): Promise<Classification> {
    return this.serialize(() => this.processEvent(event));
  }

  private async processEvent(event: RawFsEvent): Promise<Classification> {
    const current = this.store.current();
    const snapshot = await this.ensureSnapshot(current.config.watchRoot);
    this.lastEventAt = event.at;

    const result = await this.classifyWithHash(snapshot, event, this.contextFor(current));
    this.apply(result);

    if (result.type === "ignore" && result.reason === "unstable" && this.running) {
      this.scheduleRecheck(event, current.config.watch.quietPeriodMs);
    }
    if (result.type === "intent") {
      this.scheduleCycle();
    }

    return result;
  }

  /**
   * Classify without reading the file, then hash only the events that can
   * still become a create or update
   */
  private async classifyWithHash(
    snapshot: SyncSnapshot,
    event: RawFsEvent,
    context: ClassifierContext
  ): Promise<Classification> {
    const first = classify(snapshot, event, context);
    if (
      first.type !== "intent" ||
      first.intent.kind === "delete" ||
      event.contentHash !== undefined
    ) {
      return first;
    }

    let contentHash: string;
    try {
      contentHash = await computeFileHash(event.path);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return {
          type: "ignore",
          reason: "missing",
          sourcePath: first.intent.sourcePath,
          targetPath: first.intent.targetPath,
        };
      }
      throw error;
    }

    return classify(snapshot, { ...event, contentHash }, context);
  }

  private apply(result: Classification): void {
    switch (result.type) {
      case "intent": {
        const { intent } = result;
        const previous = this.queue.enqueue(intent);
        this.logger.debug(
          previous
            ? `Queued ${intent.kind} ${intent.targetPath} (supersedes ${previous.kind})`
            : `Queued ${intent.kind} ${intent.targetPath}`
        );
        return;
      }
      case "unmapped":
        this.logger.warn(`Skipped ${result.change.kind}: ${new MappingError(result.change.sourcePath).message}`);
        return;
      case "ignore":
        if (result.reason === "unchanged" && result.targetPath !== undefined) {
          if (this.queue.remove(result.targetPath)) {
            this.logger.debug(`Dropped pending ${result.targetPath}: content matches last sync`);
          }
        }
        return;
    }
  }

  private scheduleRecheck(event: RawFsEvent, quietPeriodMs: number): void {
    const existing = this.rechecks.get(event.path);
    if (existing) {
      clearTimeout(existing);
    }

    const timer = setTimeout(() => {
      this.rechecks.delete(event.path);
      this.recheck(event.path).catch((error: unknown) => {
        this.logger.error(`Re-check of ${event.path} failed: ${errorMessage(error)}`);
      });
    }, quietPeriodMs + RECHECK_MARGIN_MS);
    this.rechecks.set(event.path, timer);
  }

  private async recheck(filePath: string): Promise<void> {
    if (!this.running) return;

    let mtimeMs: number;
    try {
      mtimeMs = (await fs.stat(filePath)).mtimeMs;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") return;
      throw error;
    }
    if (!this.running) return;

    await this.ingest({ type: "change", path: filePath, at: this.now(), origin: "watch", mtimeMs });
  }

  /**
   * Walk the whole tree and diff it against the snapshot. Scan events
   * skip the quiet-period check.
   */
  async scan(options: ScanOptions = {}): Promise<ScanReport & { cycle?: CycleReport }> {
    const runId = this.runId;
    const report = await this.serialize(() => this.collect(options, runId));

    // Stopped meanwhile: whatever was queued has been discarded
    if (this.runId !== runId) {
      return report;
    }
    if (options.dispatch) {
      return { ...report, cycle: await this.runCycle() };
    }
    this.scheduleCycle();
    return report;
  }

  private async collect(options: ScanOptions, runId: number): Promise<ScanReport> {
    const current = this.store.current();
    const { config } = current;
    await assertWatchRoot(config.watchRoot);
    const snapshot = await this.ensureSnapshot(config.watchRoot);

    const files = await listWatchedFiles(config.watchRoot, config.exclude);
    const context = this.contextFor(current, options.force);
    const at = this.now();
    const present = new Set<string>();
    const report: ScanReport = {
      scanned: files.length,
      queued: 0,
      unchanged: 0,
      ignored: 0,
      unmapped: 0,
      deletes: 0,
    };

    for (const file of files) {
      const result = await this.classifyWithHash(
        snapshot,
        { type: "add", path: file.absolutePath, at, origin: "scan", mtimeMs: file.mtimeMs },
        context
      );
      if (this.runId !== runId) {
        return report;
      }
      this.apply(result);

      if (result.type === "intent") {
        present.add(result.intent.targetPath);
        report.queued++;
      } else if (result.type === "unmapped") {
        report.unmapped++;
      } else if (result.reason === "unchanged" && result.targetPath !== undefined) {
        present.add(result.targetPath);
        report.unchanged++;
      } else {
        report.ignored++;
      }
    }

    if (this.runId !== runId) {
      return report;
    }
    for (const intent of classifyMissing(snapshot, present, at)) {
      this.queue.enqueue(intent);
      report.deletes++;
    }

    this.logger.info(
      `Scan${options.force ? " (forced)" : ""}: ${report.scanned} file(s), ${report.queued} queued, ` +
        `${report.deletes} delete(s), ${report.unchanged} unchanged, ${report.unmapped} unmapped`
    );
    return report;
  }

  // ---------------------------------------------------------------------------
  // Dispatch
  // ---------------------------------------------------------------------------

  private scheduleCycle(): void {
    if (!this.running || this.cycleTimer) return;

    const delay = this.store.current().config.dispatch.cycleDelayMs;
    this.cycleTimer = setTimeout(() => {
      this.cycleTimer = null;
      this.requestCycle();
    }, delay);
  }

  private requestCycle(): void {
    this.runCycle().catch((error: unknown) => {
      this.logger.error(`Dispatch cycle failed: ${errorMessage(error)}`);
    });
  }

  private hasDispatchable(): boolean {
    return this.queue.countByState("queued") + this.queue.countByState("approved") > 0;
  }

  /**
   * Run one dispatch cycle after any cycle already in progress
   */
  runCycle(): Promise<CycleReport> {
    const next = this.cycleChain.then(() => this.executeCycle());
    this.cycleChain = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  private async executeCycle(): Promise<CycleReport> {
    const report: CycleReport = { executed: 0, succeeded: 0, failed: 0, awaitingConfirmation: 0 };
    if (this.state === "draining") {
      return report;
    }

    const { config } = this.store.current();
    await this.ensureSnapshot(config.watchRoot);

    const batch: SyncIntent[] = [];

    for (const [targetPath, entry] of this.queue.entriesInOrder()) {
      if (entry.state === "failed") continue;

      const decision =
        entry.state === "approved"
          ? "execute"
          : applyAutoConfirm(decide(entry.intent, config.policy), config.policy);

      if (decision === "suppress") {
        this.queue.remove(targetPath, entry.intent);
        continue;
      }

      if (decision === "require-confirmation") {
        if (entry.state !== "awaiting-confirmation") {
          this.queue.setState(targetPath, "awaiting-confirmation");
          this.logger.info(`Awaiting confirmation: ${entry.intent.kind} ${targetPath}`);
        }
        report.awaitingConfirmation++;
        continue;
      }

      if (entry.state === "awaiting-confirmation") {
        this.queue.setState(targetPath, "queued");
      }
      batch.push(entry.intent);
    }

    if (batch.length === 0) {
      return report;
    }

    const outcomes = await mapWithConcurrency(batch, config.dispatch.concurrency, (intent) =>
      this.dispatch(intent, config)
    );

    for (const outcome of outcomes) {
      if (outcome === "dropped") continue;
      report.executed++;
      if (outcome === "succeeded") {
        report.succeeded++;
      } else {
        report.failed++;
      }
    }

    await this.persist();

    if (report.executed > 0) {
      this.logger.info(
        `Dispatched ${report.executed}: ${report.succeeded} succeeded, ${report.failed} failed`
      );
    }
    return report;
  }

  /**
   * Push one intent. Never throws: failures are recorded on the entry.
   */
  private async dispatch(intent: SyncIntent, config: MirrorwatchConfig): Promise<DispatchOutcome> {
    const { targetPath } = intent;
    const context: CommitContext = {
      kind: intent.kind,
      sourcePath: intent.sourcePath,
      ...(intent.batch ? { batch: intent.batch } : {}),
    };

    try {
      if (intent.kind === "delete") {
        const result = await this.transport.deleteFile(targetPath, context);
        this.snapshot = recordDeleted(this.requireSnapshot(config), targetPath, new Date(this.now()));
        this.logger.info(`${result.status} ${targetPath}`);
      } else {
        let content: Buffer;
        try {
          content = await fs.readFile(path.join(config.watchRoot, intent.sourcePath));
        } catch (error) {
          if ((error as NodeJS.ErrnoException).code === "ENOENT") {
            this.queue.remove(targetPath, intent);
            this.logger.info(`Dropped ${intent.kind} ${targetPath}: source file is gone`);
            return "dropped";
          }
          throw error;
        }

        const result = await this.transport.commitFile(targetPath, content, context);
        this.snapshot = recordSynced(
          this.requireSnapshot(config),
          targetPath,
          intent.sourcePath,
          computeContentHash(content),
          new Date(this.now())
        );
        this.logger.info(`${result.status} ${targetPath}`);
      }

      this.queue.remove(targetPath, intent);
      return "succeeded";
    } catch (error) {
      const message = errorMessage(error);
      const entry = this.queue.recordFailure(targetPath, intent, message);

      if (entry && (!isRetryable(error) || entry.attempts >= config.dispatch.maxAttempts)) {
        this.queue.setState(targetPath, "failed");
        this.logger.error(
          `Giving up on ${intent.kind} ${targetPath} after ${entry.attempts} attempt(s): ${message}`
        );
        return "failed";
      }

      this.logger.warn(`${intent.kind} ${targetPath} failed, will retry: ${message}`);
      return "retry";
    }
  }

  // ---------------------------------------------------------------------------
  // Operator actions
  // ---------------------------------------------------------------------------

  /**
   * Approve entries awaiting confirmation (or failed). Without targets,
   * approves all of them. Returns the approved target paths.
   */
  confirm(targets?: readonly string[]): string[] {
    const approved = this.selectTargets(targets).filter((target) => this.queue.approve(target));
    if (approved.length > 0) {
      this.logger.info(`Confirmed ${approved.length} pending change(s)`);
      this.scheduleCycle();
    }
    return approved;
  }

  /**
   * Discard entries awaiting confirmation (or failed). Returns the
   * discarded target paths.
   */
  reject(targets?: readonly string[]): string[] {
    const rejected = this.selectTargets(targets).filter((target) => {
      const entry = this.queue.get(target);
      if (!entry || (entry.state !== "awaiting-confirmation" && entry.state !== "failed")) {
        return false;
      }
      return this.queue.remove(target, entry.intent);
    });
    if (rejected.length > 0) {
      this.logger.info(`Rejected ${rejected.length} pending change(s)`);
    }
    return rejected;
  }

  private selectTargets(targets?: readonly string[]): string[] {
    if (targets) {
      return targets.map(normalizeRelativePath);
    }
    return this.queue.entriesInOrder().map(([target]) => target);
  }

  // ---------------------------------------------------------------------------
  // Views
  // ---------------------------------------------------------------------------

  pending(): PendingView[] {
    return this.queue.entriesInOrder().map(([targetPath, entry]) => ({
      targetPath,
      sourcePath: entry.intent.sourcePath,
      kind: entry.intent.kind,
      state: entry.state,
      attempts: entry.attempts,
      detectedAt: new Date(entry.intent.detectedAt).toISOString(),
      ...(entry.intent.batch ? { batch: entry.intent.batch } : {}),
      ...(entry.lastError ? { lastError: entry.lastError } : {}),
    }));
  }

  status(): OrchestratorStatus {
    const { config } = this.store.current();
    return {
      status: this.state,
      monitoring: this.state === "running",
      last_event: this.lastEventAt === null ? null : new Date(this.lastEventAt).toISOString(),
      last_sync: this.snapshot?.lastSync ?? null,
      pending: this.queue.size,
      awaiting_confirmation: this.queue.countByState("awaiting-confirmation"),
      failed: this.queue.countByState("failed"),
      error: this.lastError,
      transport: this.transport.name,
      policy: describePolicy(config.policy),
    };
  }

  /**
   * Show how a local path would be mapped under the current config.
   * Accepts a watch-relative or an absolute path.
   */
  resolve(localPath: string): ResolveResult {
    const { config, rules } = this.store.current();

    let sourcePath: string | undefined = normalizeRelativePath(localPath);
    if (path.isAbsolute(localPath)) {
      sourcePath = toWatchRelative(config.watchRoot, localPath);
      if (sourcePath === undefined) {
        return { sourcePath: localPath, targetPath: null, rule: null, reason: "outside-root" };
      }
    }

    const layoutMatch = applyLayout(config.layout, sourcePath);
    if (!layoutMatch) {
      return { sourcePath, targetPath: null, rule: null, reason: "layout" };
    }

    const batch = layoutMatch.batch ? { batch: layoutMatch.batch } : {};
    const resolution = explainResolution(rules, layoutMatch.mappablePath);
    if (!resolution) {
      return { sourcePath, targetPath: null, rule: null, ...batch, reason: "no-mapping" };
    }

    return {
      sourcePath,
      targetPath: toRepositoryPath(resolution.targetPath),
      rule: resolution.rule,
      ...batch,
    };
  }

  // ---------------------------------------------------------------------------
  // Snapshot
  // ---------------------------------------------------------------------------

  private contextFor(current: ConfigSnapshot, forceResync = false): ClassifierContext {
    const { config, rules } = current;
    return {
      watchRoot: config.watchRoot,
      layout: config.layout,
      rules,
      exclude: config.exclude,
      quietPeriodMs: config.watch.quietPeriodMs,
      forceResync,
    };
  }

  private async ensureSnapshot(watchRoot: string): Promise<SyncSnapshot> {
    if (!this.snapshot || this.snapshot.watchRoot !== watchRoot) {
      this.snapshot = await loadSnapshot(this.stateDir, watchRoot);
    }
    return this.snapshot;
  }

  private requireSnapshot(config: MirrorwatchConfig): SyncSnapshot {
    return this.snapshot ?? createEmptySnapshot(config.watchRoot);
  }

  /**
   * Write the current snapshot. Saves are chained so an older snapshot
   * never lands after a newer one.
   */
  private persist(): Promise<void> {
    this.saveChain = this.saveChain.then(async () => {
      if (!this.snapshot) return;
      try {
        await saveSnapshot(this.stateDir, this.snapshot);
      } catch (error) {
        this.logger.error(`Failed to save sync state: ${errorMessage(error)}`);
      }
    });
    return this.saveChain;
  }
}

async function assertWatchRoot(watchRoot: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await fs.stat(watchRoot)).isDirectory();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      throw new FatalConfigError(`Watch root does not exist: ${watchRoot}`);
    }
    throw error;
  }
  if (!isDirectory) {
    throw new FatalConfigError(`Watch root is not a directory: ${watchRoot}`);
  }
}
