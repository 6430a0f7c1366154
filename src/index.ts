// Orchestration
export {
  SyncOrchestrator,
  type OrchestratorOptions,
  type OrchestratorState,
  type OrchestratorStatus,
  type CycleReport,
  type ScanReport,
  type ScanOptions,
  type StartOptions,
  type PendingView,
  type ResolveResult,
} from "./sync/orchestrator.js";
export { createRuntime, type Runtime, type RuntimeOptions } from "./runtime.js";

// Path mapping and classification
export {
  DEFAULT_MAPPING_RULES,
  REPOSITORY_ROOT,
  createPathMapper,
  explainResolution,
  normalizeRelativePath,
  resolvePath,
  sortRules,
  toRepositoryPath,
  type PathMapper,
  type Resolution,
} from "./sync/mapper.js";
export { applyLayout, isDateFolder, type LayoutMatch } from "./sync/layout.js";
export {
  classify,
  classifyMissing,
  isTransientName,
  type Classification,
  type ClassifierContext,
  type IgnoreReason,
} from "./sync/classifier.js";
export { decide, applyAutoConfirm, describePolicy, DEFAULT_POLICY, type Decision } from "./sync/policy.js";
export { PendingQueue, type PendingEntry, type PendingState } from "./sync/queue.js";
export { createFileWatcher, type EventSource, type WatcherOptions } from "./sync/watcher.js";
export type {
  AutomationPolicy,
  IntentKind,
  Layout,
  MappingRule,
  RawFsEvent,
  SyncIntent,
  SyncSnapshot,
  UnmappedChange,
} from "./sync/types.js";

// Transports
export {
  createTransport,
  DirectoryTransport,
  GitlabTransport,
  buildCommitMessage,
  type GitlabTransportOptions,
  type RepositoryTransport,
  type TransportResult,
  type TransportStatus,
  type CommitContext,
} from "./transport/index.js";

// Configuration
export {
  loadConfig,
  parseConfig,
  saveConfig,
  getHomeDir,
  getConfigPath,
  getLogPath,
  type MirrorwatchConfig,
  type TransportConfig,
} from "./config.js";
export {
  MemoryConfigStore,
  FileConfigStore,
  type ConfigStore,
  type ConfigSnapshot,
  type ConfigPatch,
} from "./config-store.js";

// Control surface
export { createControlServer, controlRoutes, type ControlServerOptions } from "./server/http.js";

// Errors and logging
export {
  MirrorwatchError,
  MappingError,
  TransportError,
  TransientTransportError,
  FatalConfigError,
  isRetryable,
  type ErrorCode,
} from "./errors.js";
export { createLogger, createSilentLogger, readLogTail, type Logger, type LogLevel } from "./logger.js";
