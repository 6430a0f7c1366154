/**
 * Wires config, logger, transport and orchestrator together for the CLI
 * and for embedding the engine in another program.
 */

import {
  getConfigPath,
  getHomeDir,
  getLogPath,
  loadConfig,
  type MirrorwatchConfig,
  type PlainObject,
} from "./config.js";
import { FileConfigStore } from "./config-store.js";
import { createLogger, type Logger } from "./logger.js";
import { SyncOrchestrator } from "./sync/orchestrator.js";
import { createTransport, type RepositoryTransport } from "./transport/index.js";

export type RuntimeOptions = {
  /** Directory for config, state and logs (default: getHomeDir()) */
  homeDir?: string;
  configPath?: string;
  /** CLI flag layer */
  overrides?: PlainObject;
  /** Mirror log lines to the console (default: true) */
  console?: boolean;
  /** Replaces the configured transport */
  transport?: RepositoryTransport;
};

export type Runtime = {
  homeDir: string;
  configPath: string;
  config: MirrorwatchConfig;
  logger: Logger;
  store: FileConfigStore;
  transport: RepositoryTransport;
  orchestrator: SyncOrchestrator;
};

export async function createRuntime(options: RuntimeOptions = {}): Promise<Runtime> {
  const homeDir = options.homeDir ?? getHomeDir();
  const configPath = options.configPath ?? getConfigPath(homeDir);

  const config = await loadConfig({ configPath, overrides: options.overrides });
  const logger = createLogger({
    file: getLogPath(homeDir),
    level: config.logLevel,
    console: options.console ?? true,
  });
  const store = new FileConfigStore(configPath, config);
  const transport = options.transport ?? createTransport(config.transport);
  const orchestrator = new SyncOrchestrator({ store, transport, stateDir: homeDir, logger });

  return { homeDir, configPath, config, logger, store, transport, orchestrator };
}
