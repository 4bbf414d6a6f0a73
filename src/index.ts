/**
 * collection-sync - Schema-driven API collection generation and sync.
 */

// Entry point
export { CollectionGenerator } from './generator.js';
export type { GenerationResult, GenerationFailure, GenerateAndSyncResult } from './generator.js';
export { MemoryKeyValueStore, RecordStatus } from './records.js';
export type { GeneratorRecord, KeyValueStore } from './records.js';
export { CancelToken } from './cancel.js';

// Config
export {
  Config,
  resolveSyncSettings,
  resolveGeneratorSettings,
  DEFAULT_SYNC_SETTINGS,
  DEFAULT_GENERATOR_SETTINGS,
  SyncSettingsSchema,
  GeneratorSettingsSchema,
} from './config.js';
export type { SyncSettings, GeneratorSettings } from './config.js';

// Errors
export {
  SyncError,
  ConfigNotFoundError,
  ConfigError,
  InvalidInputError,
  NotFoundError,
  ConflictError,
  TransientRemoteError,
  RateLimitError,
  RemoteTimeoutError,
  RemoteApplyError,
  RemoteFetchError,
  SyncCancelledError,
} from './errors.js';
export type { ErrorOptions } from './errors.js';

// Registry
export * from './registry/index.js';

// Extraction and building
export * from './extractor/index.js';
export * from './descriptors/index.js';
export * from './tree/index.js';

// Sync
export * from './sync/index.js';
export * from './remote/index.js';

// Observability
export { ContextLogger, MemoryOutput, silentLogger } from './observability/index.js';
export type { ContextLoggerOptions, WritableOutput } from './observability/index.js';

// Utils
export { matchPattern, matchAny, contentHash, canonicalJson, compareNames } from './utils/index.js';

export const VERSION = '0.1.0';
