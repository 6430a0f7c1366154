import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { listWatchedFiles } from "../scanner.js";

describe("listWatchedFiles", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "mirrorwatch-scan-test-"));
    await fs.mkdir(path.join(tempDir, "htdocs", "admin"), { recursive: true });
    await fs.mkdir(path.join(tempDir, ".git"), { recursive: true });
    await fs.mkdir(path.join(tempDir, "htdocs", "node_modules"), { recursive: true });
    await fs.writeFile(path.join(tempDir, "htdocs", "index.php"), "a");
    await fs.writeFile(path.join(tempDir, "htdocs", "admin", "login.php"), "b");
    await fs.writeFile(path.join(tempDir, ".git", "HEAD"), "c");
    await fs.writeFile(path.join(tempDir, "htdocs", "node_modules", "x.js"), "d");
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should list files sorted by relative path, skipping hidden directories", async () => {
    const files = await listWatchedFiles(tempDir);
    expect(files.map((f) => f.relativePath)).toEqual([
      "htdocs/admin/login.php",
      "htdocs/index.php",
      "htdocs/node_modules/x.js",
    ]);
    expect(files[1].absolutePath).toBe(path.join(tempDir, "htdocs", "index.php"));
  });

  it("should skip excluded files", async () => {
    const files = await listWatchedFiles(tempDir, ["**/node_modules/**"]);
    expect(files.map((f) => f.relativePath)).toEqual(["htdocs/admin/login.php", "htdocs/index.php"]);
  });
});
