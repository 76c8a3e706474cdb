// packages/shard-targets/src/index.ts
//
// Public exports for @shard-sidecar/targets.

export { TargetsManager } from './manager.js';
export type { TargetsManagerOptions } from './config.js';

export { FileBackedTargetsStore } from './filestore.js';
export type { FileBackedTargetsStoreOptions, LoadedTargets } from './filestore.js';

export {
  DEFAULT_STORE_FILENAME,
  DEFAULT_LEGACY_STORE_FILENAME,
  currentFormat,
  legacyFormat,
  encodeCurrent,
  parseTargetsByJob,
} from './formats.js';
export type { StoreFormat, StoreFormatName, CurrentFile } from './formats.js';
export { parseJson, stringifyJson } from './json.js';

export { reconcileStatus, beginsTransfer, targetUrl } from './reconcile.js';
export type { ReconcileResult, TransferTransition } from './reconcile.js';

export { nextIdleAt } from './idle.js';
export { UpdateCallbacks } from './callbacks.js';
export { TargetsMetrics } from './metrics.js';

export { ScrapeStatus } from './scrape_status.js';
export type { ScrapeHealth, ScrapeResult } from './scrape_status.js';

export { ShardTargetsError } from './errors.js';
export type { ShardTargetsStage } from './errors.js';

export { createConsoleLogger, formatLogLine } from './logger.js';
export type { Logger, LogLevel, LogData, ConsoleLoggerOptions } from './logger.js';

export { TargetState } from './types.js';
export type {
  Target,
  TargetHash,
  TargetsByJob,
  TargetsSnapshot,
  StoredTargets,
  UpdateCallback,
} from './types.js';
