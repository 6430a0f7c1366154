import path from "node:path";

import { getHomeDir, type TransportConfig } from "../config.js";
import { FatalConfigError } from "../errors.js";
import { DirectoryTransport } from "./directory.js";
import { GitlabTransport } from "./gitlab.js";
import type { RepositoryTransport } from "./types.js";

export { DirectoryTransport } from "./directory.js";
export { GitlabTransport, type GitlabTransportOptions } from "./gitlab.js";
export { buildCommitMessage, type CommitAction } from "./commit-message.js";
export type {
  CommitContext,
  RepositoryTransport,
  TransportResult,
  TransportStatus,
} from "./types.js";

/**
 * Build the transport named by the config. Without a transport section
 * files are mirrored into ~/.mirrorwatch/mirror. A GitLab token missing
 * from the config is taken from MIRRORWATCH_GITLAB_TOKEN.
 */
export function createTransport(
  config: TransportConfig | undefined,
  env: NodeJS.ProcessEnv = process.env
): RepositoryTransport {
  if (!config) {
    return new DirectoryTransport(path.join(getHomeDir(), "mirror"));
  }

  switch (config.type) {
    case "directory":
      return new DirectoryTransport(config.path);
    case "gitlab": {
      const token = config.token ?? env.MIRRORWATCH_GITLAB_TOKEN?.trim();
      if (!token) {
        throw new FatalConfigError(
          "GitLab transport needs a token",
          ["set transport.token or MIRRORWATCH_GITLAB_TOKEN"]
        );
      }
      return new GitlabTransport({
        baseUrl: config.baseUrl,
        projectId: config.projectId,
        token,
        branch: config.branch,
        authorName: config.authorName,
        authorEmail: config.authorEmail,
      });
    }
  }
}
