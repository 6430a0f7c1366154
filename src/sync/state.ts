/**
 * Last-synced state with content hashing
 *
 * Records which repository paths have been pushed and the SHA-256 of
 * the content that was pushed, so a restart followed by a rescan does
 * not resend unchanged files.
 */

import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";

import type { SyncSnapshot } from "./types.js";

const STATE_FILENAME = "sync-state.json";
const STATE_VERSION = 1;

/**
 * Get the snapshot file path inside a state directory
 */
export function getSnapshotPath(stateDir: string): string {
  return path.join(stateDir, STATE_FILENAME);
}

export function createEmptySnapshot(watchRoot: string): SyncSnapshot {
  return {
    version: STATE_VERSION,
    lastSync: null,
    watchRoot,
    files: {},
  };
}

/**
 * Load the snapshot. A missing or unreadable file yields an empty one,
 * as does a snapshot recorded for a different watch root.
 */
export async function loadSnapshot(stateDir: string, watchRoot: string): Promise<SyncSnapshot> {
  const snapshotPath = getSnapshotPath(stateDir);

  let content: string;
  try {
    content = await fs.readFile(snapshotPath, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return createEmptySnapshot(watchRoot);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return createEmptySnapshot(watchRoot);
  }

  if (!isSnapshot(parsed) || parsed.watchRoot !== watchRoot) {
    return createEmptySnapshot(watchRoot);
  }

  return parsed;
}

function isSnapshot(value: unknown): value is SyncSnapshot {
  if (typeof value !== "object" || value === null) return false;
  const candidate = value as Partial<SyncSnapshot>;
  return (
    typeof candidate.version === "number" &&
    typeof candidate.watchRoot === "string" &&
    (candidate.lastSync === null || typeof candidate.lastSync === "string") &&
    typeof candidate.files === "object" &&
    candidate.files !== null
  );
}

/**
 * Save the snapshot atomically (temp file, then rename)
 */
export async function saveSnapshot(stateDir: string, snapshot: SyncSnapshot): Promise<void> {
  const snapshotPath = getSnapshotPath(stateDir);
  const tempPath = `${snapshotPath}.${crypto.randomBytes(4).toString("hex")}.tmp`;

  await fs.mkdir(stateDir, { recursive: true });
  await fs.writeFile(tempPath, JSON.stringify(snapshot, null, 2), "utf-8");
  await fs.rename(tempPath, snapshotPath);
}

/**
 * Compute SHA-256 hash of string or buffer content
 */
export function computeContentHash(content: string | Buffer): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}

/**
 * Compute SHA-256 hash of a file's content
 */
export async function computeFileHash(filePath: string): Promise<string> {
  const content = await fs.readFile(filePath);
  return computeContentHash(content);
}

export function recordSynced(
  snapshot: SyncSnapshot,
  targetPath: string,
  sourcePath: string,
  hash: string,
  now: Date = new Date()
): SyncSnapshot {
  const syncedAt = now.toISOString();
  return {
    ...snapshot,
    lastSync: syncedAt,
    files: {
      ...snapshot.files,
      [targetPath]: { sourcePath, hash, syncedAt },
    },
  };
}

export function recordDeleted(
  snapshot: SyncSnapshot,
  targetPath: string,
  now: Date = new Date()
): SyncSnapshot {
  const { [targetPath]: _removed, ...remaining } = snapshot.files;
  return {
    ...snapshot,
    lastSync: now.toISOString(),
    files: remaining,
  };
}
