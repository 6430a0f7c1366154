/**
 * Repository transport contract
 *
 * Implementations must be idempotent under retry: committing content the
 * repository already holds reports "unchanged", deleting a path that is
 * already gone reports "absent".
 */

import type { IntentKind } from "../sync/types.js";

export type TransportStatus = "created" | "updated" | "unchanged" | "deleted" | "absent";

export type TransportResult = {
  status: TransportStatus;
  targetPath: string;
};

/**
 * Where a change came from, for commit messages
 */
export type CommitContext = {
  kind: IntentKind;
  sourcePath: string;
  batch?: string;
};

export interface RepositoryTransport {
  readonly name: string;
  commitFile(targetPath: string, content: Buffer, context?: CommitContext): Promise<TransportResult>;
  deleteFile(targetPath: string, context?: CommitContext): Promise<TransportResult>;
}
