/**
 * Edit-script and report types for collection sync.
 */

import type { ConflictError } from '../errors.js';
import type { LeafNode, TreeNode } from '../tree/types.js';

/** Where a created node goes: an existing remote folder (null = collection root) or a folder created earlier in the same run. */
export type ParentRef =
  | { readonly kind: 'remote'; readonly remoteId: string | null }
  | { readonly kind: 'pending'; readonly opId: number };

interface OpBase {
  /** Position in the plan; also the order results are reported in. */
  readonly id: number;
  /** Slash-joined names from the root. */
  readonly key: string;
  /** Ops that must have been applied before this one may run. */
  readonly dependsOn: readonly number[];
}

export interface CreateOp extends OpBase {
  readonly op: 'create';
  readonly parent: ParentRef;
  /** Canonical node. For a folder only the folder itself is created; children have their own ops. */
  readonly node: TreeNode;
}

export interface UpdateOp extends OpBase {
  readonly op: 'update';
  readonly remoteId: string;
  readonly node: LeafNode;
  readonly previousHash: string;
}

export interface DeleteOp extends OpBase {
  readonly op: 'delete';
  readonly remoteId: string;
  /** Remote node being removed. */
  readonly node: TreeNode;
}

export interface KeepOp extends OpBase {
  readonly op: 'keep';
  readonly remoteId: string;
  readonly node: LeafNode;
}

export type DiffOp = CreateOp | UpdateOp | DeleteOp | KeepOp;
export type MutatingOp = CreateOp | UpdateOp | DeleteOp;
export type OpKind = DiffOp['op'];

export interface IgnoredEntry {
  readonly key: string;
  readonly remoteId: string | null;
  readonly kind: TreeNode['kind'];
  readonly reason: string;
}

export interface ConflictEntry {
  readonly key: string;
  readonly canonicalKind: TreeNode['kind'];
  readonly remoteKind: TreeNode['kind'];
  readonly remoteId: string | null;
  readonly error: ConflictError;
}

/** Ops for one top-level subtree. Units share no remote nodes and may run concurrently. */
export interface DiffUnit {
  readonly key: string;
  readonly ops: readonly DiffOp[];
}

export interface DiffPlan {
  readonly units: readonly DiffUnit[];
  readonly ignored: readonly IgnoredEntry[];
  readonly conflicts: readonly ConflictEntry[];
}

/** A run ends in `failed` when at least one op failed, otherwise in `done`. */
export type SyncPhase = 'fetching' | 'diffing' | 'applying' | 'done' | 'failed';
export type SyncStatus = 'succeeded' | 'partially_succeeded';
export type OpOutcome = 'applied' | 'failed' | 'skipped' | 'not_attempted';

export interface OpErrorInfo {
  /** Error class name, e.g. RemoteApplyError. */
  readonly kind: string;
  readonly code: string | null;
  readonly message: string;
}

export interface OpResult {
  readonly id: number;
  readonly op: MutatingOp['op'];
  readonly key: string;
  readonly nodeKind: TreeNode['kind'];
  readonly outcome: OpOutcome;
  /** Id of the remote node touched; for creates, the new id once applied. */
  readonly remoteId: string | null;
  readonly error: OpErrorInfo | null;
}

export interface OpCounts {
  planned: number;
  applied: number;
  failed: number;
  skipped: number;
  notAttempted: number;
}

export interface SyncReport {
  readonly runId: string;
  readonly status: SyncStatus;
  readonly phases: readonly SyncPhase[];
  readonly cancelled: boolean;
  readonly counts: {
    readonly create: OpCounts;
    readonly update: OpCounts;
    readonly delete: OpCounts;
    readonly keep: number;
    readonly ignored: number;
    readonly conflict: number;
  };
  /** Every non-keep op with its outcome, in plan order. */
  readonly results: readonly OpResult[];
  readonly failures: readonly OpResult[];
  readonly notAttempted: readonly OpResult[];
  readonly ignored: readonly IgnoredEntry[];
  readonly conflicts: readonly ConflictEntry[];
  /** Remote mutation calls dispatched, retries included. */
  readonly mutatingCalls: number;
  readonly startedAt: string;
  readonly finishedAt: string;
}

