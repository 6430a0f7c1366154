/**
 * mirrorwatch init - Write a starter config
 */

import fs from "node:fs/promises";
import path from "node:path";

import { getConfigPath, getHomeDir, getInitConfig, saveConfig } from "../../config.js";
import { exitWithError, formatPath, warn } from "../shared.js";

export type InitOptions = {
  config?: string;
  force?: boolean;
};

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function init(root: string | undefined, options: InitOptions): Promise<void> {
  const homeDir = getHomeDir();
  const configPath = options.config ? path.resolve(options.config) : getConfigPath(homeDir);
  const watchRoot = path.resolve(root ?? process.cwd());

  if (!options.force && (await exists(configPath))) {
    console.log(`Already initialized: ${formatPath(configPath)}`);
    console.log("Use --force to overwrite");
    return;
  }

  if (!(await exists(watchRoot))) {
    warn(`Watch root ${formatPath(watchRoot)} does not exist yet`);
  }

  try {
    await fs.mkdir(homeDir, { recursive: true });
    await saveConfig(configPath, getInitConfig(watchRoot, homeDir));
  } catch (error) {
    exitWithError(`Cannot write ${formatPath(configPath)}: ${error}`);
  }

  console.log(`Created ${formatPath(configPath)}`);
  console.log();
  console.log(`  Watch root: ${formatPath(watchRoot)}`);
  console.log(`  Mirror:     ${formatPath(path.join(homeDir, "mirror"))}`);
  console.log();
  console.log("Next steps:");
  console.log("  1. Add mapping rules, or keep the built-in ones:");
  console.log("     mirrorwatch config --set 'mappings=[{\"sourcePrefix\":\"site\",\"targetPrefix\":\"htdocs\"}]'");
  console.log("  2. Point the transport at GitLab (token via MIRRORWATCH_GITLAB_TOKEN):");
  console.log("     mirrorwatch config --set 'transport={\"type\":\"gitlab\",\"baseUrl\":\"https://gitlab.example.com\",\"projectId\":\"group/project\"}'");
  console.log("  3. Start monitoring:");
  console.log("     mirrorwatch run");
}
