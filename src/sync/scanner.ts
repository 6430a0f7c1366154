/**
 * Full-tree walk of the watch root
 */

import fs from "node:fs/promises";
import path from "node:path";

import { isExcluded } from "./classifier.js";

export type ScannedFile = {
  absolutePath: string;
  /** Watch-root-relative, forward slashes */
  relativePath: string;
  mtimeMs: number;
};

/**
 * List every regular file under `root`, skipping hidden directories and
 * files matching the exclude globs. Sorted by relative path.
 */
export async function listWatchedFiles(
  root: string,
  exclude: readonly string[] = []
): Promise<ScannedFile[]> {
  const files: ScannedFile[] = [];

  async function walkDir(currentDir: string, relativePath: string = ""): Promise<void> {
    const entries = await fs.readdir(currentDir, { withFileTypes: true });

    for (const entry of entries) {
      const entryPath = path.join(currentDir, entry.name);
      const relPath = relativePath ? `${relativePath}/${entry.name}` : entry.name;

      if (entry.isDirectory()) {
        if (entry.name.startsWith(".")) continue;
        await walkDir(entryPath, relPath);
      } else if (entry.isFile()) {
        if (isExcluded(relPath, exclude)) continue;

        try {
          const stat = await fs.stat(entryPath);
          files.push({ absolutePath: entryPath, relativePath: relPath, mtimeMs: stat.mtimeMs });
        } catch (error) {
          // Removed between readdir and stat
          if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
            throw error;
          }
        }
      }
    }
  }

  await walkDir(root);

  return files.sort((a, b) => a.relativePath.localeCompare(b.relativePath));
}
