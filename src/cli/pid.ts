/**
 * PID file for the foreground `run` process
 */

import fs from "node:fs/promises";
import path from "node:path";

const PID_FILE = "mirrorwatch.pid";

export function getPidFilePath(homeDir: string): string {
  return path.join(homeDir, PID_FILE);
}

/**
 * PID of the running instance, or undefined. A stale PID file is removed.
 */
export async function readRunningPid(homeDir: string): Promise<number | undefined> {
  const pidFile = getPidFilePath(homeDir);

  let content: string;
  try {
    content = await fs.readFile(pidFile, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") return undefined;
    throw error;
  }

  const pid = parseInt(content.trim(), 10);
  if (isNaN(pid)) {
    return undefined;
  }

  // Signal 0 only checks that the process exists
  try {
    process.kill(pid, 0);
    return pid;
  } catch {
    await fs.rm(pidFile, { force: true });
    return undefined;
  }
}

export async function writePidFile(homeDir: string): Promise<void> {
  await fs.mkdir(homeDir, { recursive: true });
  await fs.writeFile(getPidFilePath(homeDir), String(process.pid));
}

export async function removePidFile(homeDir: string): Promise<void> {
  await fs.rm(getPidFilePath(homeDir), { force: true });
}
