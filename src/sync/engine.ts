/**
 * Sync engine: fetch the remote tree, diff it against the canonical tree,
 * and apply the edit script unit by unit on a bounded worker pool.
 */

import { v4 as uuidv4 } from 'uuid';
import type { CancelToken } from '../cancel.js';
import { resolveSyncSettings, type Config, type SyncSettings } from '../config.js';
import { RemoteFetchError, SyncCancelledError, SyncError, toError } from '../errors.js';
import { silentLogger, type ContextLogger } from '../observability/context-logger.js';
import type { RemoteCollectionStore } from '../remote/store.js';
import type { FolderNode } from '../tree/types.js';
import { diffTrees, type DiffOptions } from './diff.js';
import { WorkerPool } from './pool.js';
import { callWithRetry, type RetryHooks, type RetryPolicy } from './retry.js';
import type {
  DiffOp,
  DiffPlan,
  DiffUnit,
  MutatingOp,
  OpCounts,
  OpErrorInfo,
  OpOutcome,
  OpResult,
  SyncPhase,
  SyncReport,
} from './types.js';

export interface SyncOptions extends DiffOptions {
  cancelToken?: CancelToken;
}

export interface PlannedSync {
  readonly runId: string;
  readonly remote: FolderNode;
  readonly plan: DiffPlan;
}

/** Mutable bookkeeping for one run, shared by all units. */
class RunState {
  readonly outcomes = new Map<number, OpOutcome>();
  readonly results: OpResult[] = [];
  readonly createdIds = new Map<number, string>();
  mutatingCalls = 0;

  record(op: MutatingOp, outcome: OpOutcome, remoteId: string | null, error: OpErrorInfo | null): void {
    this.outcomes.set(op.id, outcome);
    this.results.push({
      id: op.id,
      op: op.op,
      key: op.key,
      nodeKind: op.node.kind,
      outcome,
      remoteId,
      error,
    });
  }
}

function errorInfo(error: Error): OpErrorInfo {
  return {
    kind: error.name,
    code: error instanceof SyncError ? error.code : null,
    message: error.message,
  };
}

function emptyCounts(): OpCounts {
  return { planned: 0, applied: 0, failed: 0, skipped: 0, notAttempted: 0 };
}

export class SyncEngine {
  private readonly _store: RemoteCollectionStore;
  private readonly _settings: SyncSettings;
  private readonly _logger: ContextLogger;
  private readonly _sleep: RetryHooks['sleep'];

  constructor(options: {
    store: RemoteCollectionStore;
    config?: Config | null;
    settings?: Partial<SyncSettings>;
    logger?: ContextLogger;
    sleep?: (ms: number) => Promise<void>;
  }) {
    this._store = options.store;
    this._settings = { ...resolveSyncSettings(options.config), ...options.settings };
    this._logger = options.logger ?? silentLogger();
    this._sleep = options.sleep;
  }

  get settings(): Readonly<SyncSettings> {
    return this._settings;
  }

  private get _policy(): RetryPolicy {
    return {
      maxAttempts: this._settings.maxAttempts,
      baseDelayMs: this._settings.baseDelayMs,
      maxDelayMs: this._settings.maxDelayMs,
      callTimeoutMs: this._settings.callTimeoutMs,
    };
  }

  private _hooks(logger: ContextLogger, cancelToken: CancelToken | undefined): RetryHooks {
    return {
      sleep: this._sleep,
      cancelToken,
      onRetry: ({ operation, attempt, delayMs, error }) => {
        logger.warn('Retrying remote call', { operation, attempt, delay_ms: delayMs, error: error.message });
      },
    };
  }

  /** Fetch and diff without mutating the remote. */
  async plan(canonical: FolderNode, options?: SyncOptions): Promise<PlannedSync> {
    const runId = uuidv4();
    options?.cancelToken?.check();
    const remote = await this._fetch(runId, this._logger.child({ runId }), options?.cancelToken);
    return { runId, remote, plan: diffTrees(canonical, remote, options) };
  }

  /**
   * Bring the remote collection in line with `canonical`.
   *
   * Throws SyncCancelledError when cancelled before the fetch and
   * RemoteFetchError when the remote tree cannot be read; nothing has been
   * mutated in either case. Every other failure is reported per op, and
   * a run with failed ops ends in the `failed` phase instead of `done`.
   */
  async sync(canonical: FolderNode, options?: SyncOptions): Promise<SyncReport> {
    const runId = uuidv4();
    const logger = this._logger.child({ runId });
    const startedAt = new Date().toISOString();
    const phases: SyncPhase[] = ['fetching'];
    const token = options?.cancelToken;

    token?.check();
    logger.info('Sync started');
    const remote = await this._fetch(runId, logger, token);

    phases.push('diffing');
    const plan = diffTrees(canonical, remote, options);
    for (const entry of plan.ignored) {
      logger.info('Remote node left in place', { key: entry.key, reason: entry.reason });
    }
    for (const conflict of plan.conflicts) {
      logger.warn('Tree conflict', { key: conflict.key, canonical: conflict.canonicalKind, remote: conflict.remoteKind });
    }

    phases.push('applying');
    const state = new RunState();
    const pool = new WorkerPool(this._settings.concurrency);
    await pool.run(plan.units.map((unit) => () => this._applyUnit(unit, state, logger, token)));
    phases.push(state.results.some((r) => r.outcome === 'failed') ? 'failed' : 'done');

    const report = this._report(runId, plan, state, phases, token?.isCancelled ?? false, startedAt);
    logger.info('Sync finished', {
      status: report.status,
      applied: report.results.filter((r) => r.outcome === 'applied').length,
      failed: report.failures.length,
      mutating_calls: report.mutatingCalls,
    });
    return report;
  }

  private async _fetch(runId: string, logger: ContextLogger, token: CancelToken | undefined): Promise<FolderNode> {
    try {
      return await callWithRetry('fetchTree', () => this._store.fetchTree(), this._policy, this._hooks(logger, token));
    } catch (e) {
      if (e instanceof SyncCancelledError) throw e;
      const error = toError(e);
      logger.error('Failed to fetch remote collection', { error: error.message });
      throw new RemoteFetchError(`Failed to fetch remote collection: ${error.message}`, { cause: error, runId });
    }
  }

  /** Ops within a unit run in plan order, so parents exist before children. */
  private async _applyUnit(
    unit: DiffUnit,
    state: RunState,
    logger: ContextLogger,
    token: CancelToken | undefined,
  ): Promise<void> {
    for (const op of unit.ops) {
      if (op.op === 'keep') continue;

      if (token?.isCancelled) {
        state.record(op, 'not_attempted', initialRemoteId(op), null);
        continue;
      }

      const deps = op.dependsOn.map((id) => state.outcomes.get(id) ?? 'not_attempted');
      if (deps.some((o) => o !== 'applied')) {
        const outcome = deps.some((o) => o === 'failed' || o === 'skipped') ? 'skipped' : 'not_attempted';
        state.record(op, outcome, initialRemoteId(op), null);
        continue;
      }

      try {
        const remoteId = await callWithRetry(
          `${op.op} ${op.key}`,
          () => {
            state.mutatingCalls++;
            return this._dispatch(op, state);
          },
          this._policy,
          this._hooks(logger, token),
        );
        if (op.op === 'create') state.createdIds.set(op.id, remoteId);
        state.record(op, 'applied', remoteId, null);
        logger.debug('Applied', { op: op.op, key: op.key, remote_id: remoteId });
      } catch (e) {
        if (e instanceof SyncCancelledError) {
          state.record(op, 'not_attempted', initialRemoteId(op), null);
          logger.info('Cancelled while retrying', { op: op.op, key: op.key });
          continue;
        }
        const error = toError(e);
        state.record(op, 'failed', initialRemoteId(op), errorInfo(error));
        logger.warn('Operation failed', { op: op.op, key: op.key, error: error.message });
      }
    }
  }

  /** One remote call for `op`; resolves with the id of the node touched. */
  private async _dispatch(op: MutatingOp, state: RunState): Promise<string> {
    switch (op.op) {
      case 'create': {
        const parentId = op.parent.kind === 'remote' ? op.parent.remoteId : state.createdIds.get(op.parent.opId);
        if (parentId === undefined) {
          throw new SyncError('PARENT_NOT_CREATED', `Parent of ${op.key} was not created`);
        }
        return op.node.kind === 'folder'
          ? this._store.createFolder(parentId, op.node.name)
          : this._store.createLeaf(parentId, op.node.descriptor);
      }
      case 'update':
        await this._store.updateLeaf(op.remoteId, op.node.descriptor);
        return op.remoteId;
      case 'delete':
        if (op.node.kind === 'folder') {
          await this._store.deleteFolder(op.remoteId);
        } else {
          await this._store.deleteLeaf(op.remoteId);
        }
        return op.remoteId;
    }
  }

  private _report(
    runId: string,
    plan: DiffPlan,
    state: RunState,
    phases: SyncPhase[],
    cancelled: boolean,
    startedAt: string,
  ): SyncReport {
    const counts = { create: emptyCounts(), update: emptyCounts(), delete: emptyCounts() };
    let keep = 0;
    for (const unit of plan.units) {
      for (const op of unit.ops) {
        if (op.op === 'keep') {
          keep++;
        } else {
          counts[op.op].planned++;
        }
      }
    }

    const results = [...state.results].sort((a, b) => a.id - b.id);
    for (const result of results) {
      const c = counts[result.op];
      switch (result.outcome) {
        case 'applied':
          c.applied++;
          break;
        case 'failed':
          c.failed++;
          break;
        case 'skipped':
          c.skipped++;
          break;
        case 'not_attempted':
          c.notAttempted++;
          break;
      }
    }

    const failures = results.filter((r) => r.outcome === 'failed');
    const notAttempted = results.filter((r) => r.outcome === 'not_attempted');
    const complete = results.every((r) => r.outcome === 'applied');

    return {
      runId,
      status: complete ? 'succeeded' : 'partially_succeeded',
      phases,
      cancelled,
      counts: { ...counts, keep, ignored: plan.ignored.length, conflict: plan.conflicts.length },
      results,
      failures,
      notAttempted,
      ignored: plan.ignored,
      conflicts: plan.conflicts,
      mutatingCalls: state.mutatingCalls,
      startedAt,
      finishedAt: new Date().toISOString(),
    };
  }
}

function initialRemoteId(op: DiffOp): string | null {
  return op.op === 'create' ? null : op.remoteId;
}
