import path from "node:path";

import type { CommitContext } from "./types.js";

export type CommitAction = "Add" | "Update" | "Delete";

/**
 * Build a commit message:
 *
 *   Add index.php from 20240115 via mirrorwatch
 *
 *   Source: 20240115/to/usr/local/httpd/htdocs/index.php
 *   Target: data/htdocs/index.php
 */
export function buildCommitMessage(
  action: CommitAction,
  targetPath: string,
  context?: CommitContext
): string {
  const fileName = path.posix.basename(targetPath);
  const origin = context?.batch ? ` from ${context.batch}` : "";
  const title = `${action} ${fileName}${origin} via mirrorwatch`;

  const body: string[] = [];
  if (context?.sourcePath) {
    body.push(`Source: ${context.sourcePath}`);
  }
  body.push(`Target: ${targetPath}`);

  return `${title}\n\n${body.join("\n")}`;
}
