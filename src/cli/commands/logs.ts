/**
 * mirrorwatch logs - Show the log file
 */

import fs from "node:fs/promises";

import { getHomeDir, getLogPath } from "../../config.js";
import { readLogTail } from "../../logger.js";
import { exitWithError, parseCount } from "../shared.js";
import { errorMessage } from "../../errors.js";

export type LogsOptions = {
  lines?: string;
  follow?: boolean;
};

export async function logs(options: LogsOptions): Promise<void> {
  const logPath = getLogPath(getHomeDir());
  const count = parseCount(options.lines, 50, "--lines");

  let lines: string[];
  try {
    lines = await readLogTail(logPath, count);
  } catch (error) {
    exitWithError(`Error reading log: ${errorMessage(error)}`);
  }

  if (lines.length === 0 && !options.follow) {
    console.log("No log entries found.");
    return;
  }
  for (const line of lines) {
    console.log(line);
  }

  if (!options.follow) return;

  console.log("\n--- Following log (Ctrl+C to stop) ---\n");

  // Polling follow; a shrinking file means it was rotated
  let lastSize = await fileSize(logPath);

  const poll = async () => {
    const size = await fileSize(logPath);
    if (size < lastSize) {
      lastSize = 0;
    }
    if (size > lastSize) {
      const fd = await fs.open(logPath, "r");
      try {
        const buffer = Buffer.alloc(size - lastSize);
        await fd.read(buffer, 0, buffer.length, lastSize);
        process.stdout.write(buffer.toString());
      } finally {
        await fd.close();
      }
      lastSize = size;
    }
  };

  const interval = setInterval(() => {
    poll().catch((error: unknown) => {
      console.error(`Failed to read log: ${errorMessage(error)}`);
    });
  }, 1000);

  process.on("SIGINT", () => {
    clearInterval(interval);
    process.exit(0);
  });
}

async function fileSize(filePath: string): Promise<number> {
  try {
    return (await fs.stat(filePath)).size;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") return 0;
    throw error;
  }
}
