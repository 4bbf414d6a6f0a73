export { diffTrees, planOps, isNoop, ownerTypesOf } from './diff.js';
export type { DiffOptions } from './diff.js';
export { SyncEngine } from './engine.js';
export type { SyncOptions, PlannedSync } from './engine.js';
export { callWithRetry, backoffDelay, withTimeout } from './retry.js';
export type { RetryPolicy, RetryHooks } from './retry.js';
export { WorkerPool } from './pool.js';
export type {
  ParentRef,
  CreateOp,
  UpdateOp,
  DeleteOp,
  KeepOp,
  DiffOp,
  MutatingOp,
  OpKind,
  IgnoredEntry,
  ConflictEntry,
  DiffUnit,
  DiffPlan,
  SyncPhase,
  SyncStatus,
  OpOutcome,
  OpErrorInfo,
  OpResult,
  OpCounts,
  SyncReport,
} from './types.js';
