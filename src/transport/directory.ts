/**
 * Transport that mirrors into a local directory
 *
 * Keeps a plain copy of everything that would be pushed, laid out by
 * repository path. Useful as a dry-run target and as the stand-in
 * repository in tests.
 */

import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";

import { TransportError } from "../errors.js";
import type { CommitContext, RepositoryTransport, TransportResult } from "./types.js";

export class DirectoryTransport implements RepositoryTransport {
  readonly name = "directory";
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  private resolveTarget(targetPath: string): string {
    const resolved = path.resolve(this.root, targetPath);
    if (resolved !== this.root && !resolved.startsWith(this.root + path.sep)) {
      throw new TransportError(`Target path escapes the mirror directory: ${targetPath}`);
    }
    return resolved;
  }

  async commitFile(
    targetPath: string,
    content: Buffer,
    _context?: CommitContext
  ): Promise<TransportResult> {
    const dest = this.resolveTarget(targetPath);

    let existing: Buffer | undefined;
    try {
      existing = await fs.readFile(dest);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
        throw error;
      }
    }

    if (existing && existing.equals(content)) {
      return { status: "unchanged", targetPath };
    }

    await fs.mkdir(path.dirname(dest), { recursive: true });

    // Write via temp file so readers never see a partial copy
    const tempDest = `${dest}.${crypto.randomBytes(4).toString("hex")}.tmp`;
    try {
      await fs.writeFile(tempDest, content);
      await fs.rename(tempDest, dest);
    } catch (error) {
      await fs.rm(tempDest, { force: true });
      throw error;
    }

    return { status: existing ? "updated" : "created", targetPath };
  }

  async deleteFile(targetPath: string, _context?: CommitContext): Promise<TransportResult> {
    const dest = this.resolveTarget(targetPath);

    try {
      await fs.unlink(dest);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return { status: "absent", targetPath };
      }
      throw error;
    }

    await this.pruneEmptyParents(path.dirname(dest));
    return { status: "deleted", targetPath };
  }

  private async pruneEmptyParents(dir: string): Promise<void> {
    let current = dir;
    while (current !== this.root && current.startsWith(this.root + path.sep)) {
      const entries = await fs.readdir(current);
      if (entries.length > 0) return;
      await fs.rmdir(current);
      current = path.dirname(current);
    }
  }
}
