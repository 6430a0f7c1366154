/**
 * File watcher producing normalized raw events
 *
 * chokidar's awaitWriteFinish holds an event back until the file size
 * has been stable for the quiet period, so files still being written
 * are not reported. Events are exposed as an async iterable; closing
 * the watcher ends the iteration. A new watcher restarts the sequence.
 */

import chokidar, { type FSWatcher } from "chokidar";
import path from "node:path";
import type { Stats } from "node:fs";

import { isExcluded } from "./classifier.js";
import { normalizeRelativePath } from "./mapper.js";
import type { RawEventType, RawFsEvent } from "./types.js";

export type WatcherOptions = {
  /** Quiet period before a written file is reported (default: 2000) */
  quietPeriodMs?: number;
  /** Globs relative to the watch root that are never reported */
  exclude?: readonly string[];
  /** Use polling instead of native events (for network drives) */
  usePolling?: boolean;
  /** Polling interval in milliseconds (default: 1000) */
  pollInterval?: number;
  onError?: (error: unknown) => void;
};

export type EventSource = {
  /** Events in arrival order; ends once the source is closed */
  events: () => AsyncIterable<RawFsEvent>;
  /** Stop watching and end the iteration */
  close: () => Promise<void>;
  /** Whether the initial directory crawl has finished */
  readonly ready: boolean;
};

const DEFAULT_QUIET_PERIOD_MS = 2000;
const DEFAULT_POLL_INTERVAL = 1000;

/**
 * Create a watcher for a watch root
 */
export function createFileWatcher(root: string, options: WatcherOptions = {}): EventSource {
  const quietPeriodMs = options.quietPeriodMs ?? DEFAULT_QUIET_PERIOD_MS;
  const exclude = options.exclude ?? [];

  const buffer: RawFsEvent[] = [];
  let wake: (() => void) | null = null;
  let closed = false;
  let ready = false;

  const push = (event: RawFsEvent) => {
    if (closed) return;
    buffer.push(event);
    wake?.();
    wake = null;
  };

  const handleEvent = (type: RawEventType, filePath: string, stats?: Stats) => {
    push({
      type,
      path: filePath,
      at: Date.now(),
      origin: "watch",
      ...(stats ? { mtimeMs: stats.mtimeMs } : {}),
    });
  };

  const ignored = (filePath: string): boolean => {
    const relative = path.relative(root, filePath);
    if (relative === "" || relative.startsWith("..")) return false;
    const normalized = normalizeRelativePath(relative);
    return isExcluded(normalized, exclude);
  };

  let watcher: FSWatcher | null = chokidar.watch(root, {
    ignored,
    persistent: true,
    ignoreInitial: true,
    alwaysStat: true,
    usePolling: options.usePolling ?? false,
    interval: options.pollInterval ?? DEFAULT_POLL_INTERVAL,
    awaitWriteFinish: {
      stabilityThreshold: quietPeriodMs,
      pollInterval: Math.min(100, quietPeriodMs),
    },
  });

  watcher
    .on("add", (filePath, stats) => handleEvent("add", filePath, stats))
    .on("change", (filePath, stats) => handleEvent("change", filePath, stats))
    .on("unlink", (filePath) => handleEvent("unlink", filePath))
    .on("addDir", (filePath) => handleEvent("addDir", filePath))
    .on("unlinkDir", (filePath) => handleEvent("unlinkDir", filePath))
    .on("ready", () => {
      ready = true;
    })
    .on("error", (error) => {
      if (options.onError) {
        options.onError(error);
      } else {
        console.error(`Watcher error: ${error}`);
      }
    });

  async function* events(): AsyncGenerator<RawFsEvent> {
    while (true) {
      const next = buffer.shift();
      if (next) {
        yield next;
        continue;
      }
      if (closed) return;
      await new Promise<void>((resolve) => {
        wake = resolve;
      });
    }
  }

  return {
    events,

    close: async () => {
      closed = true;
      wake?.();
      wake = null;
      if (watcher) {
        await watcher.close();
        watcher = null;
      }
    },

    get ready() {
      return ready;
    },
  };
}
