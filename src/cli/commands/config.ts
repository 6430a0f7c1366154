/**
 * mirrorwatch config - View and edit configuration
 */

import path from "node:path";

import {
  getConfigPath,
  getHomeDir,
  loadConfigFile,
  parseConfig,
  redactConfig,
  saveConfig,
  type PlainObject,
} from "../../config.js";
import { sortRules } from "../../sync/mapper.js";
import { describePolicy } from "../../sync/policy.js";
import { errorMessage } from "../../errors.js";
import { exitWithError, formatPath, loadRuntime, type ConfigFlags } from "../shared.js";

export type ConfigOptions = ConfigFlags & {
  json?: boolean;
  set?: string;
  unset?: string;
};

export async function config(options: ConfigOptions): Promise<void> {
  if (options.set || options.unset) {
    await editConfig(options);
    return;
  }
  await showConfig(options);
}

async function showConfig(options: ConfigOptions): Promise<void> {
  const runtime = await loadRuntime(options, { console: false });
  const effective = redactConfig(runtime.config);

  if (options.json) {
    console.log(JSON.stringify(effective, null, 2));
    return;
  }

  console.log("Mirrorwatch Configuration");
  console.log("=========================");
  console.log();
  console.log(`Config file: ${formatPath(runtime.configPath)}`);
  console.log("(merged from defaults → config file → environment → flags)");
  console.log();

  printSection("Monitoring", {
    watchRoot: formatPath(effective.watchRoot),
    layout: effective.layout,
    exclude: effective.exclude.join(", ") || "(none)",
    quietPeriodMs: effective.watch.quietPeriodMs,
    usePolling: effective.watch.usePolling,
  });

  printSection("Policy", { policy: describePolicy(effective.policy) });

  console.log("  Mappings (resolution order):");
  if (effective.mappings.length === 0) {
    console.log("    (built-in rules)");
  }
  for (const rule of sortRules(effective.mappings)) {
    console.log(`    ${rule.sourcePrefix} → data/${rule.targetPrefix}`);
  }

  printSection("Dispatch", {
    concurrency: effective.dispatch.concurrency,
    maxAttempts: effective.dispatch.maxAttempts,
  });

  const transport = effective.transport;
  printSection(
    "Transport",
    transport === undefined
      ? { type: "directory", path: formatPath(path.join(runtime.homeDir, "mirror")) }
      : transport.type === "directory"
        ? { type: transport.type, path: formatPath(transport.path) }
        : {
            type: transport.type,
            baseUrl: transport.baseUrl,
            projectId: transport.projectId,
            branch: transport.branch,
            token: transport.token ? "(set)" : "(from MIRRORWATCH_GITLAB_TOKEN)",
          }
  );

  printSection("Control surface", {
    listen: `${effective.server.host}:${effective.server.port}`,
  });
}

function printSection(title: string, values: Record<string, unknown>): void {
  console.log(`  ${title}:`);
  for (const [key, value] of Object.entries(values)) {
    console.log(`    ${key}: ${String(value)}`);
  }
  console.log();
}

async function editConfig(options: ConfigOptions): Promise<void> {
  const configPath = options.config ? path.resolve(options.config) : getConfigPath(getHomeDir());

  let current: PlainObject;
  try {
    current = await loadConfigFile(configPath);
  } catch (error) {
    exitWithError(errorMessage(error));
  }

  let next = current;
  let summary: string;

  if (options.set) {
    const separator = options.set.indexOf("=");
    if (separator <= 0) {
      exitWithError("--set requires format: key.path=value", "--set policy.autoDelete=false");
    }
    const keyPath = options.set.slice(0, separator);
    const value = options.set.slice(separator + 1);
    next = setConfigValue(current, keyPath, parseValue(value));
    summary = `Set ${keyPath}=${value}`;
  } else {
    const keyPath = options.unset ?? "";
    next = unsetConfigValue(current, keyPath);
    summary = `Unset ${keyPath}`;
  }

  // Refuse to write a file that would no longer load
  try {
    parseConfig(next);
  } catch (error) {
    exitWithError(errorMessage(error));
  }

  await saveConfig(configPath, next);
  console.log(`${summary} in ${formatPath(configPath)}`);
}

/**
 * JSON when it parses (booleans, numbers, arrays), otherwise the raw string
 */
export function parseValue(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function setConfigValue(config: PlainObject, keyPath: string, value: unknown): PlainObject {
  const [key, ...rest] = keyPath.split(".");
  if (rest.length === 0) {
    return { ...config, [key]: value };
  }
  const child = config[key];
  return {
    ...config,
    [key]: setConfigValue(isPlainObject(child) ? child : {}, rest.join("."), value),
  };
}

export function unsetConfigValue(config: PlainObject, keyPath: string): PlainObject {
  const [key, ...rest] = keyPath.split(".");
  if (rest.length === 0) {
    const { [key]: _removed, ...remaining } = config;
    return remaining;
  }
  const child = config[key];
  if (!isPlainObject(child)) {
    return config;
  }
  return { ...config, [key]: unsetConfigValue(child, rest.join(".")) };
}
