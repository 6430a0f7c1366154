/**
 * Configuration loading and validation
 *
 * Resolution order (later overrides earlier):
 * 1. Built-in defaults
 * 2. Config file (~/.mirrorwatch/config.json, or --config)
 * 3. Environment variables
 * 4. CLI flags
 */

import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import crypto from "node:crypto";
import { z } from "zod";

import { FatalConfigError } from "./errors.js";
import { normalizeRelativePath } from "./sync/mapper.js";
import { LOG_LEVELS } from "./logger.js";

const HOME_DIRNAME = ".mirrorwatch";
const CONFIG_FILENAME = "config.json";
const LOG_FILENAME = "mirrorwatch.log";

export const DEFAULT_EXCLUDE = ["**/.*/**", "**/node_modules/**"];

/**
 * Expand a leading ~ to the home directory
 */
export function expandPath(filePath: string): string {
  if (filePath === "~") return os.homedir();
  if (filePath.startsWith("~/")) return path.join(os.homedir(), filePath.slice(2));
  return filePath;
}

const mappingRuleSchema = z.object({
  sourcePrefix: z
    .string()
    .transform(normalizeRelativePath)
    .refine((value) => value !== "", { message: "sourcePrefix must not be empty" }),
  targetPrefix: z.string().transform(normalizeRelativePath),
});

export const policySchema = z
  .object({
    autoConfirm: z.boolean().default(true),
    autoSync: z.boolean().default(true),
    autoDelete: z.boolean().default(true),
  })
  .strict();

const transportSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("gitlab"),
    baseUrl: z.string().url(),
    projectId: z.string().min(1),
    token: z.string().min(1).optional(),
    branch: z.string().min(1).default("main"),
    authorName: z.string().optional(),
    authorEmail: z.string().email().optional(),
  }),
  z.object({
    type: z.literal("directory"),
    path: z.string().min(1).transform((p) => path.resolve(expandPath(p))),
  }),
]);

export const configSchema = z.object({
  watchRoot: z
    .string({ required_error: "watchRoot is required" })
    .min(1, "watchRoot is required")
    .transform((p) => path.resolve(expandPath(p))),
  layout: z.enum(["flat", "dated"]).default("flat"),
  mappings: z.array(mappingRuleSchema).default([]),
  exclude: z.array(z.string()).default(DEFAULT_EXCLUDE),
  policy: policySchema.default({}),
  watch: z
    .object({
      quietPeriodMs: z.number().int().nonnegative().default(2000),
      usePolling: z.boolean().default(false),
      pollIntervalMs: z.number().int().positive().default(1000),
    })
    .default({}),
  dispatch: z
    .object({
      concurrency: z.number().int().min(1).max(32).default(4),
      maxAttempts: z.number().int().min(1).default(5),
      cycleDelayMs: z.number().int().nonnegative().default(500),
      retryIntervalMs: z.number().int().positive().default(30_000),
    })
    .default({}),
  transport: transportSchema.optional(),
  server: z
    .object({
      host: z.string().default("127.0.0.1"),
      port: z.number().int().min(0).max(65535).default(8085),
    })
    .default({}),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type MirrorwatchConfig = z.infer<typeof configSchema>;
export type TransportConfig = NonNullable<MirrorwatchConfig["transport"]>;

/**
 * Directory holding config, state and logs (~/.mirrorwatch, or
 * MIRRORWATCH_HOME)
 */
export function getHomeDir(): string {
  const envHome = process.env.MIRRORWATCH_HOME;
  if (envHome) {
    return path.resolve(expandPath(envHome));
  }
  return path.join(os.homedir(), HOME_DIRNAME);
}

export function getConfigPath(homeDir: string = getHomeDir()): string {
  return path.join(homeDir, CONFIG_FILENAME);
}

export function getLogPath(homeDir: string = getHomeDir()): string {
  return path.join(homeDir, LOG_FILENAME);
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

/**
 * Validate a raw config object, filling in defaults
 */
export function parseConfig(raw: unknown): MirrorwatchConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new FatalConfigError("Invalid configuration", formatIssues(result.error));
  }
  return result.data;
}

export type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge config layers (source overrides target, arrays replace)
 */
export function mergeConfigLayers(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    const existing = result[key];
    result[key] =
      isPlainObject(existing) && isPlainObject(value) ? mergeConfigLayers(existing, value) : value;
  }

  return result;
}

/**
 * Read a config file. A missing file is an empty layer; unreadable JSON
 * is fatal.
 */
export async function loadConfigFile(configPath: string): Promise<PlainObject> {
  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return {};
    }
    throw new FatalConfigError(`Cannot read ${configPath}: ${error}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new FatalConfigError(`Malformed JSON in ${configPath}: ${error}`);
  }

  if (!isPlainObject(parsed)) {
    throw new FatalConfigError(`${configPath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Overrides taken from the environment
 */
export function environmentLayer(env: NodeJS.ProcessEnv = process.env): PlainObject {
  const layer: PlainObject = {};

  if (env.MIRRORWATCH_ROOT) {
    layer.watchRoot = env.MIRRORWATCH_ROOT;
  }
  const logLevel = LOG_LEVELS.find((level) => level === env.MIRRORWATCH_LOG_LEVEL);
  if (logLevel) {
    layer.logLevel = logLevel;
  }

  return layer;
}

export type LoadConfigOptions = {
  configPath?: string;
  /** Highest-priority layer (CLI flags) */
  overrides?: PlainObject;
  env?: NodeJS.ProcessEnv;
};

export async function loadConfig(options: LoadConfigOptions = {}): Promise<MirrorwatchConfig> {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? getConfigPath();

  const fileLayer = await loadConfigFile(configPath);
  const merged = mergeConfigLayers(
    mergeConfigLayers(fileLayer, environmentLayer(env)),
    options.overrides ?? {}
  );

  return parseConfig(merged);
}

/**
 * Save config atomically
 */
export async function saveConfig(
  configPath: string,
  config: MirrorwatchConfig | PlainObject
): Promise<void> {
  const tempPath = `${configPath}.${crypto.randomBytes(4).toString("hex")}.tmp`;

  await fs.mkdir(path.dirname(configPath), { recursive: true });
  await fs.writeFile(tempPath, JSON.stringify(config, null, 2), "utf-8");
  await fs.rename(tempPath, configPath);
}

/**
 * Minimal config written by `mirrorwatch init`
 */
export function getInitConfig(watchRoot: string, homeDir: string = getHomeDir()): PlainObject {
  return {
    watchRoot,
    layout: "flat",
    mappings: [],
    policy: { autoConfirm: true, autoSync: true, autoDelete: true },
    transport: { type: "directory", path: path.join(homeDir, "mirror") },
  };
}

/**
 * Copy of the config safe to print or return over HTTP
 */
export function redactConfig(config: MirrorwatchConfig): MirrorwatchConfig {
  if (config.transport?.type === "gitlab" && config.transport.token) {
    return { ...config, transport: { ...config.transport, token: "***" } };
  }
  return config;
}
