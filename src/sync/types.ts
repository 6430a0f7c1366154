/**
 * Shared types for the change-detection pipeline
 */

export type MappingRule = {
  /** Watch-relative directory prefix, e.g. "usr/local/httpd/htdocs" */
  sourcePrefix: string;
  /** Repository directory the prefix maps to, below data/ */
  targetPrefix: string;
};

export type AutomationPolicy = {
  /** Skip the operator confirmation step */
  autoConfirm: boolean;
  /** Push creates and updates without confirmation */
  autoSync: boolean;
  /** Push deletes without confirmation */
  autoDelete: boolean;
};

export type Layout = "flat" | "dated";

export type IntentKind = "create" | "update" | "delete";

export type SyncIntent = {
  kind: IntentKind;
  /** Watch-root-relative local path */
  sourcePath: string;
  /** Repository path, always under data/ */
  targetPath: string;
  /** Epoch ms */
  detectedAt: number;
  contentHash?: string;
  /** Dated batch folder the file came from (dated layout only) */
  batch?: string;
};

/**
 * A relevant change for which no mapping rule exists
 */
export type UnmappedChange = {
  kind: IntentKind;
  sourcePath: string;
  detectedAt: number;
};

export type RawEventType = "add" | "change" | "unlink" | "addDir" | "unlinkDir";

export type RawFsEvent = {
  type: RawEventType;
  /** Absolute path */
  path: string;
  /** When the event was observed (epoch ms) */
  at: number;
  /** Watcher events are debounced; scan events are assumed stable */
  origin: "watch" | "scan";
  /** Last modification time of the file, when known */
  mtimeMs?: number;
  /** SHA-256 of the file content, when known */
  contentHash?: string;
};

export type SnapshotEntry = {
  sourcePath: string;
  hash: string;
  syncedAt: string;
};

export type SyncSnapshot = {
  version: number;
  /** Last successful dispatch (ISO) */
  lastSync: string | null;
  watchRoot: string;
  /** Keyed by repository path */
  files: Record<string, SnapshotEntry>;
};
