/**
 * Version management for the CLI
 *
 * Reads the version from package.json at runtime for consistency.
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

function getPackageVersion(): string {
  try {
    // src/cli/ and dist/cli/ both sit two levels below the package root
    const here = dirname(fileURLToPath(import.meta.url));
    const packageJson: unknown = JSON.parse(readFileSync(join(here, "../../package.json"), "utf-8"));
    if (
      typeof packageJson === "object" &&
      packageJson !== null &&
      "version" in packageJson &&
      typeof packageJson.version === "string"
    ) {
      return packageJson.version;
    }
    return "0.0.0";
  } catch {
    return "0.0.0";
  }
}

export const VERSION = getPackageVersion();
