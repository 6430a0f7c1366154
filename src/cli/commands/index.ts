/**
 * CLI Commands
 */

export { run, type RunOptions } from "./run.js";
export { scan, type ScanOptions } from "./scan.js";
export { resolve, type ResolveOptions } from "./resolve.js";
export { status, type StatusOptions } from "./status.js";
export { logs, type LogsOptions } from "./logs.js";
export { init, type InitOptions } from "./init.js";
export { config, type ConfigOptions } from "./config.js";
