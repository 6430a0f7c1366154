/**
 * Local path → repository path resolution
 *
 * Rules are matched on whole path segments and the rule with the most
 * segments wins. Equal-length rules keep their configuration order
 * (Array.prototype.sort is stable), so the first listed one wins.
 */

import type { MappingRule } from "./types.js";

/** Every target path lives below this repository directory */
export const REPOSITORY_ROOT = "data";

export const DEFAULT_MAPPING_RULES: readonly MappingRule[] = [
  { sourcePrefix: "usr/local/asterisk/etc/asterisk/script", targetPrefix: "script" },
  { sourcePrefix: "usr/local/httpd/htdocs", targetPrefix: "htdocs" },
  { sourcePrefix: "home/storage/local", targetPrefix: "home/storage/local" },
  { sourcePrefix: "htdocs", targetPrefix: "htdocs" },
  { sourcePrefix: "script", targetPrefix: "script" },
];

export type Resolution = {
  rule: MappingRule;
  /** Path below data/, without the data/ prefix */
  targetPath: string;
};

/**
 * Canonicalize a relative path: forward slashes, no empty or "."
 * segments, no leading or trailing separator
 */
export function normalizeRelativePath(input: string): string {
  return input
    .replace(/\\/g, "/")
    .split("/")
    .filter((segment) => segment !== "" && segment !== ".")
    .join("/");
}

function segmentCount(prefix: string): number {
  return prefix === "" ? 0 : prefix.split("/").length;
}

/**
 * Normalize and order rules longest-first. An empty list falls back to
 * the built-in rules.
 */
export function sortRules(rules: readonly MappingRule[]): MappingRule[] {
  const source = rules.length > 0 ? rules : DEFAULT_MAPPING_RULES;

  return source
    .map((rule) => ({
      sourcePrefix: normalizeRelativePath(rule.sourcePrefix),
      targetPrefix: normalizeRelativePath(rule.targetPrefix),
    }))
    .sort((a, b) => segmentCount(b.sourcePrefix) - segmentCount(a.sourcePrefix));
}

function matchesPrefix(localPath: string, prefix: string): boolean {
  if (prefix === "") return true;
  return localPath === prefix || localPath.startsWith(`${prefix}/`);
}

function joinSegments(...parts: string[]): string {
  return parts.filter((part) => part !== "").join("/");
}

/**
 * Resolve with the matched rule. Expects rules already passed through
 * sortRules.
 */
export function explainResolution(
  sortedRules: readonly MappingRule[],
  localPath: string
): Resolution | undefined {
  const normalized = normalizeRelativePath(localPath);
  const rule = sortedRules.find((r) => matchesPrefix(normalized, r.sourcePrefix));

  if (!rule) {
    return undefined;
  }

  const remainder = normalized.slice(rule.sourcePrefix.length).replace(/^\//, "");
  return {
    rule,
    targetPath: joinSegments(rule.targetPrefix, remainder),
  };
}

/**
 * Resolve a local relative path to its target below data/, or undefined
 * when no rule matches
 */
export function resolvePath(
  sortedRules: readonly MappingRule[],
  localPath: string
): string | undefined {
  return explainResolution(sortedRules, localPath)?.targetPath;
}

/**
 * Compose the full repository path for a resolved target
 */
export function toRepositoryPath(targetPath: string): string {
  return joinSegments(REPOSITORY_ROOT, targetPath);
}

export type PathMapper = {
  readonly rules: readonly MappingRule[];
  resolve: (localPath: string) => string | undefined;
};

export function createPathMapper(rules: readonly MappingRule[]): PathMapper {
  const sorted = sortRules(rules);
  return {
    rules: sorted,
    resolve: (localPath) => resolvePath(sorted, localPath),
  };
}
