#!/usr/bin/env node
/**
 * Mirrorwatch CLI
 *
 * Mirrors a local folder into a remote repository.
 */

import { program } from "commander";

import { config, init, logs, resolve, run, scan, status } from "./commands/index.js";
import { VERSION } from "./version.js";

program
  .name("mirrorwatch")
  .description("Mirror a local folder into a remote repository")
  .version(VERSION);

// mirrorwatch run
program
  .command("run")
  .description("Watch the folder and dispatch changes until stopped")
  .option("-c, --config <path>", "Config file (default: ~/.mirrorwatch/config.json)")
  .option("-r, --root <path>", "Watch root (overrides the config file)")
  .option("--host <host>", "Control surface host")
  .option("-p, --port <number>", "Control surface port")
  .option("--no-server", "Do not start the HTTP control surface")
  .option("--no-scan", "Skip the initial full scan")
  .option("--log-level <level>", "debug, info, warn or error")
  .action(run);

// mirrorwatch scan
program
  .command("scan")
  .description("Rescan the folder once and dispatch what changed")
  .option("-c, --config <path>", "Config file")
  .option("-r, --root <path>", "Watch root")
  .option("-f, --force", "Resend every mapped file, ignoring the sync state")
  .option("--dry-run", "Show what would be dispatched without sending anything")
  .option("--log-level <level>", "debug, info, warn or error")
  .option("--json", "Output as JSON")
  .action(scan);

// mirrorwatch resolve <path>
program
  .command("resolve <path>")
  .description("Show the repository path a local file maps to")
  .option("-c, --config <path>", "Config file")
  .option("-r, --root <path>", "Watch root")
  .option("--json", "Output as JSON")
  .action(resolve);

// mirrorwatch status
program
  .command("status")
  .description("Show monitoring state and sync statistics")
  .option("-c, --config <path>", "Config file")
  .option("--json", "Output as JSON")
  .action(status);

// mirrorwatch logs
program
  .command("logs")
  .description("Show the log")
  .option("-n, --lines <number>", "Number of lines to show (default: 50)")
  .option("-f, --follow", "Follow log output")
  .action(logs);

// mirrorwatch init [root]
program
  .command("init [root]")
  .description("Write a starter config watching [root] (default: current directory)")
  .option("-c, --config <path>", "Config file to write")
  .option("-f, --force", "Overwrite an existing config")
  .action(init);

// mirrorwatch config
program
  .command("config")
  .description("View or modify configuration")
  .option("-c, --config <path>", "Config file")
  .option("--json", "Output as JSON")
  .option("--set <key=value>", "Set a config value (e.g., policy.autoDelete=false)")
  .option("--unset <key>", "Remove a config value")
  .action(config);

program.parseAsync().catch((error: unknown) => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
