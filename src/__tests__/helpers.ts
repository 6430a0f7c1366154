/**
 * Shared test utilities
 *
 * In-process stand-ins for the repository and the filesystem watcher,
 * plus temp-directory helpers.
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type { EventSource } from "../sync/watcher.js";
import type { RawFsEvent } from "../sync/types.js";
import type { RepositoryTransport, TransportResult } from "../transport/types.js";

export type Deferred = {
  promise: Promise<void>;
  resolve: () => void;
};

export function createDeferred(): Deferred {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/**
 * Repository held in a Map. Calls are recorded; failures queued with
 * failNext() are thrown by the next calls in order; while `gate` is set,
 * calls wait for it before doing anything.
 */
export class MemoryTransport implements RepositoryTransport {
  readonly name = "memory";
  readonly files = new Map<string, string>();
  readonly calls: string[] = [];
  gate: Promise<void> | null = null;
  private failures: unknown[] = [];

  failNext(...errors: unknown[]): void {
    this.failures.push(...errors);
  }

  private async enter(call: string): Promise<void> {
    this.calls.push(call);
    if (this.gate) {
      await this.gate;
    }
    if (this.failures.length > 0) {
      throw this.failures.shift();
    }
  }

  async commitFile(targetPath: string, content: Buffer): Promise<TransportResult> {
    await this.enter(`commit ${targetPath}`);
    const text = content.toString("utf-8");
    const previous = this.files.get(targetPath);
    this.files.set(targetPath, text);
    return {
      status: previous === undefined ? "created" : previous === text ? "unchanged" : "updated",
      targetPath,
    };
  }

  async deleteFile(targetPath: string): Promise<TransportResult> {
    await this.enter(`delete ${targetPath}`);
    return { status: this.files.delete(targetPath) ? "deleted" : "absent", targetPath };
  }
}

/**
 * Event source fed by hand
 */
export function createManualEventSource(): EventSource & {
  push: (event: RawFsEvent) => void;
  readonly closed: boolean;
} {
  const buffer: RawFsEvent[] = [];
  let wake: (() => void) | null = null;
  let closed = false;

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
    push: (event) => {
      buffer.push(event);
      wake?.();
      wake = null;
    },
    close: async () => {
      closed = true;
      wake?.();
      wake = null;
    },
    get ready() {
      return true;
    },
    get closed() {
      return closed;
    },
  };
}

export async function createTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `mirrorwatch-${prefix}-`));
}

/**
 * Write a file below `root`, creating parent directories
 */
export async function writeFile(root: string, relative: string, content: string): Promise<string> {
  const filePath = path.join(root, relative);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
  return filePath;
}
