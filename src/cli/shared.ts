/**
 * Shared CLI utilities
 *
 * Config flag handling, runtime construction and error reporting used
 * by every command.
 */

import * as os from "node:os";

import type { PlainObject } from "../config.js";
import { FatalConfigError, errorMessage } from "../errors.js";
import { createRuntime, type Runtime, type RuntimeOptions } from "../runtime.js";

/**
 * Flags accepted by every command that loads the config
 */
export type ConfigFlags = {
  config?: string;
  root?: string;
  logLevel?: string;
};

/**
 * Turn CLI flags into the highest-priority config layer
 */
export function flagsToOverrides(flags: ConfigFlags, extra: PlainObject = {}): PlainObject {
  return {
    ...(flags.root ? { watchRoot: flags.root } : {}),
    ...(flags.logLevel ? { logLevel: flags.logLevel } : {}),
    ...extra,
  };
}

/**
 * Build the runtime or exit with the reason it could not be built
 */
export async function loadRuntime(
  flags: ConfigFlags,
  options: Omit<RuntimeOptions, "configPath"> = {}
): Promise<Runtime> {
  try {
    return await createRuntime({
      ...options,
      configPath: flags.config,
      overrides: { ...flagsToOverrides(flags), ...options.overrides },
    });
  } catch (error) {
    if (error instanceof FatalConfigError) {
      exitWithError(error.message, "Run 'mirrorwatch init <root>' or check the config file");
    }
    exitWithError(errorMessage(error));
  }
}

/**
 * Exit with an error message and optional suggestion.
 *
 * All CLI errors should use this for consistent formatting.
 */
export function exitWithError(message: string, suggestion?: string): never {
  console.error(`Error: ${message}`);
  if (suggestion) {
    console.error(`  Suggestion: ${suggestion}`);
  }
  process.exit(1);
}

/**
 * Print a warning message (non-fatal).
 */
export function warn(message: string): void {
  console.error(`Warning: ${message}`);
}

/**
 * Shorten paths under the home directory to ~
 */
export function formatPath(filePath: string): string {
  const home = os.homedir();
  if (filePath.startsWith(home)) {
    return "~" + filePath.slice(home.length);
  }
  return filePath;
}

/**
 * Parse a positive integer flag, or exit
 */
export function parseCount(value: string | undefined, fallback: number, flag: string): number {
  if (value === undefined) return fallback;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    exitWithError(`${flag} must be a positive number, got '${value}'`);
  }
  return parsed;
}
