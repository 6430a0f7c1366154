/**
 * Line-oriented log writer
 *
 * Every entry is written as `[ISO timestamp] [LEVEL] message` to an
 * optional log file (rotated to `<file>.old` past a size limit) and,
 * unless disabled, to the console. File writes are chained so lines
 * land in the order they were logged.
 */

import fs from "node:fs/promises";
import path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const MAX_LOG_SIZE = 1024 * 1024; // 1MB

export type LoggerOptions = {
  /** Log file path; no file output when omitted */
  file?: string;
  /** Minimum level written (default: info) */
  level?: LogLevel;
  /** Mirror entries to stdout/stderr (default: true) */
  console?: boolean;
  /** Rotate the file once it grows past this many bytes */
  maxSize?: number;
};

export type Logger = {
  readonly file?: string;
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  /** Resolves once every queued line has been written */
  flush: () => Promise<void>;
};

export function formatLogLine(level: LogLevel, message: string, now: Date = new Date()): string {
  return `[${now.toISOString()}] [${level.toUpperCase()}] ${message}`;
}

async function appendWithRotation(file: string, line: string, maxSize: number): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });

  try {
    const stats = await fs.stat(file);
    if (stats.size > maxSize) {
      await fs.rename(file, `${file}.old`);
    }
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
      throw error;
    }
  }

  await fs.appendFile(file, `${line}\n`, "utf-8");
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? "info");
  const toConsole = options.console ?? true;
  const maxSize = options.maxSize ?? MAX_LOG_SIZE;
  const file = options.file;

  let writes: Promise<void> = Promise.resolve();

  const write = (level: LogLevel, message: string) => {
    if (LOG_LEVELS.indexOf(level) < threshold) return;

    const line = formatLogLine(level, message);

    if (toConsole) {
      if (level === "error" || level === "warn") {
        console.error(line);
      } else {
        console.log(line);
      }
    }

    if (file) {
      writes = writes
        .then(() => appendWithRotation(file, line, maxSize))
        .catch((error: unknown) => {
          console.error(`Failed to write log: ${error}`);
        });
    }
  };

  return {
    file,
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
    flush: () => writes,
  };
}

/**
 * Logger that discards everything (tests, dry runs)
 */
export function createSilentLogger(): Logger {
  return createLogger({ console: false, level: "error" });
}

/**
 * Read the last `lines` non-empty lines of a log file.
 * A missing file yields an empty list.
 */
export async function readLogTail(file: string, lines = 50): Promise<string[]> {
  try {
    const content = await fs.readFile(file, "utf-8");
    return content.split("\n").filter(Boolean).slice(-lines);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return [];
    }
    throw error;
  }
}
