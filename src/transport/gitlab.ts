/**
 * GitLab repository-files API transport
 *
 * Each change becomes one commit on the configured branch:
 *   GET    /projects/:id/repository/files/:path?ref=:branch
 *   POST   (create) / PUT (update) / DELETE the same resource
 */

import { TransientTransportError, TransportError } from "../errors.js";
import { computeContentHash } from "../sync/state.js";
import { buildCommitMessage } from "./commit-message.js";
import type { CommitContext, RepositoryTransport, TransportResult } from "./types.js";

export type GitlabTransportOptions = {
  /** Instance URL, e.g. https://gitlab.example.com */
  baseUrl: string;
  /** Numeric id or URL-encoded "group/project" path */
  projectId: string;
  token: string;
  branch?: string;
  authorName?: string;
  authorEmail?: string;
  /** Injected for tests */
  fetch?: typeof fetch;
};

type RemoteFile = {
  content_sha256?: string;
};

function toRemoteFile(body: unknown): RemoteFile {
  if (
    typeof body === "object" &&
    body !== null &&
    "content_sha256" in body &&
    typeof body.content_sha256 === "string"
  ) {
    return { content_sha256: body.content_sha256 };
  }
  return {};
}

const DEFAULT_BRANCH = "main";

export class GitlabTransport implements RepositoryTransport {
  readonly name = "gitlab";
  private readonly apiBase: string;
  private readonly headers: Record<string, string>;
  private readonly branch: string;
  private readonly author: { author_name?: string; author_email?: string };
  private readonly fetchImpl: typeof fetch;

  constructor(options: GitlabTransportOptions) {
    const baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.apiBase = `${baseUrl}/api/v4/projects/${encodeURIComponent(options.projectId)}/repository/files`;
    this.headers = {
      "PRIVATE-TOKEN": options.token,
      "Content-Type": "application/json",
    };
    this.branch = options.branch ?? DEFAULT_BRANCH;
    this.author = {
      ...(options.authorName ? { author_name: options.authorName } : {}),
      ...(options.authorEmail ? { author_email: options.authorEmail } : {}),
    };
    this.fetchImpl = options.fetch ?? fetch;
  }

  fileUrl(targetPath: string): string {
    return `${this.apiBase}/${encodeURIComponent(targetPath)}`;
  }

  private async request(
    method: string,
    targetPath: string,
    body?: Record<string, unknown>
  ): Promise<Response> {
    const query = method === "GET" ? `?ref=${encodeURIComponent(this.branch)}` : "";
    try {
      return await this.fetchImpl(`${this.fileUrl(targetPath)}${query}`, {
        method,
        headers: this.headers,
        ...(body ? { body: JSON.stringify(body) } : {}),
      });
    } catch (error) {
      throw new TransientTransportError(`gitlab ${method} ${targetPath} failed: ${error}`, {
        cause: error,
      });
    }
  }

  private async fail(method: string, targetPath: string, res: Response): Promise<never> {
    const text = (await res.text()).slice(0, 500);
    const message = `gitlab ${method} ${targetPath} failed: ${res.status} ${text}`;
    if (res.status === 429 || res.status >= 500) {
      throw new TransientTransportError(message, { status: res.status });
    }
    throw new TransportError(message, { status: res.status });
  }

  private async fetchRemote(targetPath: string): Promise<RemoteFile | undefined> {
    const res = await this.request("GET", targetPath);
    if (res.status === 404) return undefined;
    if (!res.ok) return this.fail("GET", targetPath, res);
    return toRemoteFile(await res.json());
  }

  async commitFile(
    targetPath: string,
    content: Buffer,
    context?: CommitContext
  ): Promise<TransportResult> {
    const remote = await this.fetchRemote(targetPath);

    if (remote?.content_sha256 === computeContentHash(content)) {
      return { status: "unchanged", targetPath };
    }

    const method = remote ? "PUT" : "POST";
    const res = await this.request(method, targetPath, {
      branch: this.branch,
      content: content.toString("base64"),
      encoding: "base64",
      commit_message: buildCommitMessage(remote ? "Update" : "Add", targetPath, context),
      ...this.author,
    });

    if (!res.ok) return this.fail(method, targetPath, res);
    return { status: remote ? "updated" : "created", targetPath };
  }

  async deleteFile(targetPath: string, context?: CommitContext): Promise<TransportResult> {
    const remote = await this.fetchRemote(targetPath);
    if (!remote) {
      return { status: "absent", targetPath };
    }

    const res = await this.request("DELETE", targetPath, {
      branch: this.branch,
      commit_message: buildCommitMessage("Delete", targetPath, context),
      ...this.author,
    });

    if (res.status === 404) return { status: "absent", targetPath };
    if (!res.ok) return this.fail("DELETE", targetPath, res);
    return { status: "deleted", targetPath };
  }
}
