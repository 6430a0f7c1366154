/**
 * Raw filesystem event → sync intent
 *
 * Stateless: everything it needs (rules, layout, the last synced
 * snapshot) is passed in. The orchestrator does the I/O (stat, hashing)
 * before calling in.
 */

import path from "node:path";
import { minimatch } from "minimatch";

import { applyLayout } from "./layout.js";
import { normalizeRelativePath, resolvePath, toRepositoryPath } from "./mapper.js";
import type {
  IntentKind,
  Layout,
  MappingRule,
  RawFsEvent,
  SyncIntent,
  SyncSnapshot,
  UnmappedChange,
} from "./types.js";

export type IgnoreReason =
  | "outside-root"
  | "directory"
  | "transient"
  | "excluded"
  | "layout"
  | "unstable"
  | "unchanged"
  | "missing";

export type Classification =
  | { type: "intent"; intent: SyncIntent }
  | { type: "unmapped"; change: UnmappedChange }
  | { type: "ignore"; reason: IgnoreReason; sourcePath?: string; targetPath?: string };

export type ClassifierContext = {
  /** Absolute watch root */
  watchRoot: string;
  layout: Layout;
  /** Rules ordered by sortRules */
  rules: readonly MappingRule[];
  /** Minimatch globs relative to the watch root */
  exclude: readonly string[];
  /** Quiet period a watched file must have before it is classified */
  quietPeriodMs: number;
  /** Treat every file as changed, ignoring snapshot hashes */
  forceResync?: boolean;
};

const TRANSIENT_PREFIXES = [".", "~$", ".#"];
const TRANSIENT_SUFFIXES = [
  ".tmp",
  ".temp",
  ".swp",
  ".swo",
  ".swx",
  ".bak",
  "~",
  ".part",
  ".crdownload",
];

/**
 * Editor swap files, office lock files, partial downloads and dotfiles
 */
export function isTransientName(fileName: string): boolean {
  const lower = fileName.toLowerCase();
  return (
    TRANSIENT_PREFIXES.some((prefix) => lower.startsWith(prefix)) ||
    TRANSIENT_SUFFIXES.some((suffix) => lower.endsWith(suffix))
  );
}

/**
 * Watch-root-relative path, or undefined when the path lies outside
 */
export function toWatchRelative(watchRoot: string, absolutePath: string): string | undefined {
  const relative = path.relative(watchRoot, absolutePath);
  if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) {
    return undefined;
  }
  return normalizeRelativePath(relative);
}

export function isExcluded(relativePath: string, exclude: readonly string[]): boolean {
  return exclude.some((pattern) => minimatch(relativePath, pattern, { dot: true }));
}

export function classify(
  snapshot: SyncSnapshot,
  event: RawFsEvent,
  context: ClassifierContext
): Classification {
  const sourcePath = toWatchRelative(context.watchRoot, event.path);
  if (sourcePath === undefined) {
    return { type: "ignore", reason: "outside-root" };
  }

  if (event.type === "addDir" || event.type === "unlinkDir") {
    return { type: "ignore", reason: "directory", sourcePath };
  }

  if (isTransientName(path.posix.basename(sourcePath))) {
    return { type: "ignore", reason: "transient", sourcePath };
  }

  if (isExcluded(sourcePath, context.exclude)) {
    return { type: "ignore", reason: "excluded", sourcePath };
  }

  const layoutMatch = applyLayout(context.layout, sourcePath);
  if (!layoutMatch) {
    return { type: "ignore", reason: "layout", sourcePath };
  }

  const kindIfUnknown: IntentKind = event.type === "unlink" ? "delete" : "create";
  const resolved = resolvePath(context.rules, layoutMatch.mappablePath);
  if (resolved === undefined) {
    return {
      type: "unmapped",
      change: { kind: kindIfUnknown, sourcePath, detectedAt: event.at },
    };
  }

  const targetPath = toRepositoryPath(resolved);
  const base = {
    sourcePath,
    targetPath,
    detectedAt: event.at,
    ...(layoutMatch.batch ? { batch: layoutMatch.batch } : {}),
  };

  if (event.type === "unlink") {
    return { type: "intent", intent: { kind: "delete", ...base } };
  }

  if (
    event.origin === "watch" &&
    event.mtimeMs !== undefined &&
    event.at - event.mtimeMs < context.quietPeriodMs
  ) {
    return { type: "ignore", reason: "unstable", sourcePath, targetPath };
  }

  const known = snapshot.files[targetPath];
  if (
    known &&
    !context.forceResync &&
    event.contentHash !== undefined &&
    known.hash === event.contentHash
  ) {
    return { type: "ignore", reason: "unchanged", sourcePath, targetPath };
  }

  return {
    type: "intent",
    intent: {
      kind: known ? "update" : "create",
      ...base,
      ...(event.contentHash !== undefined ? { contentHash: event.contentHash } : {}),
    },
  };
}

/**
 * Delete intents for every synced target the current scan no longer
 * produced
 */
export function classifyMissing(
  snapshot: SyncSnapshot,
  presentTargets: ReadonlySet<string>,
  at: number
): SyncIntent[] {
  return Object.entries(snapshot.files)
    .filter(([targetPath]) => !presentTargets.has(targetPath))
    .map(([targetPath, entry]) => ({
      kind: "delete" as const,
      sourcePath: entry.sourcePath,
      targetPath,
      detectedAt: at,
    }));
}
