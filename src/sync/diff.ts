/**
 * Lock-step diff of the canonical tree against a remote snapshot.
 *
 * Neither tree is modified. Ops are numbered in plan order; within a unit,
 * folder creates precede their children's creates and child deletes
 * precede their folder's delete.
 */

import { ownerTypeOfPath } from '../descriptors/paths.js';
import { ConflictError } from '../errors.js';
import { compareNames } from '../utils/index.js';
import { joinKey, type FolderNode, type LeafNode, type TreeNode } from '../tree/types.js';
import type {
  ConflictEntry,
  DiffOp,
  DiffPlan,
  DiffUnit,
  IgnoredEntry,
  ParentRef,
} from './types.js';

export interface DiffOptions {
  /** Owner types whose convention-named remote leaves may be deleted, in addition to those in the canonical tree. */
  knownOwnerTypes?: Iterable<string>;
}

/** Owner types referenced by any leaf of the tree. */
export function ownerTypesOf(root: TreeNode): Set<string> {
  const owners = new Set<string>();
  const visit = (node: TreeNode): void => {
    if (node.kind === 'leaf') {
      const owner = ownerTypeOfPath(node.descriptor.pathTemplate);
      if (owner !== null) owners.add(owner);
      return;
    }
    for (const child of node.children) visit(child);
  };
  visit(root);
  return owners;
}

type RemovalResult = 'deleted' | 'kept';

class PlanBuilder {
  private _nextId = 0;
  readonly ignored: IgnoredEntry[] = [];
  readonly conflicts: ConflictEntry[] = [];

  constructor(private readonly _knownOwners: ReadonlySet<string>) {}

  private _id(): number {
    return this._nextId++;
  }

  /** Diff one name under a folder that exists on both sides. */
  diffChild(
    canonical: TreeNode | undefined,
    remote: TreeNode | undefined,
    key: string,
    parentRemoteId: string | null,
    ops: DiffOp[],
  ): void {
    if (canonical !== undefined && remote === undefined) {
      this.createSubtree(canonical, key, { kind: 'remote', remoteId: parentRemoteId }, [], ops);
      return;
    }
    if (canonical === undefined && remote !== undefined) {
      this.removeRemote(remote, key, ops);
      return;
    }
    if (canonical === undefined || remote === undefined) return;

    if (canonical.kind !== remote.kind) {
      this.conflicts.push({
        key,
        canonicalKind: canonical.kind,
        remoteKind: remote.kind,
        remoteId: remote.remoteId,
        error: new ConflictError(key, canonical.kind, remote.kind),
      });
      return;
    }

    if (canonical.kind === 'folder' && remote.kind === 'folder') {
      this.diffFolder(canonical, remote, key, ops);
      return;
    }

    if (canonical.kind === 'leaf' && remote.kind === 'leaf') {
      this.diffLeaf(canonical, remote, key, ops);
    }
  }

  diffFolder(canonical: FolderNode, remote: FolderNode, key: string, ops: DiffOp[]): void {
    const { matched, extras } = indexChildren(remote);
    const canonicalByName = new Map(canonical.children.map((c) => [c.name, c]));
    for (const name of mergedNames(canonicalByName, matched)) {
      this.diffChild(canonicalByName.get(name), matched.get(name), joinKey(key, name), remote.remoteId, ops);
    }
    for (const extra of extras) {
      this.removeRemote(extra, joinKey(key, extra.name), ops);
    }
  }

  private diffLeaf(canonical: LeafNode, remote: LeafNode, key: string, ops: DiffOp[]): void {
    const remoteId = remote.remoteId;
    if (remoteId === null) {
      this.ignored.push({ key, remoteId: null, kind: 'leaf', reason: 'remote node has no id' });
      return;
    }
    if (canonical.descriptor.contentHash === remote.descriptor.contentHash) {
      ops.push({ op: 'keep', id: this._id(), key, dependsOn: [], remoteId, node: canonical });
    } else {
      ops.push({
        op: 'update',
        id: this._id(),
        key,
        dependsOn: [],
        remoteId,
        node: canonical,
        previousHash: remote.descriptor.contentHash,
      });
    }
  }

  createSubtree(node: TreeNode, key: string, parent: ParentRef, dependsOn: number[], ops: DiffOp[]): void {
    const id = this._id();
    ops.push({ op: 'create', id, key, dependsOn, parent, node });
    if (node.kind === 'folder') {
      for (const child of node.children) {
        this.createSubtree(child, joinKey(key, child.name), { kind: 'pending', opId: id }, [id], ops);
      }
    }
  }

  /**
   * Remote-only content. Convention-named leaves of known owners are
   * deleted; anything else is left alone and reported as ignored. A folder
   * goes only when it had children and every one of them was deleted.
   */
  removeRemote(node: TreeNode, key: string, ops: DiffOp[]): RemovalResult {
    if (node.kind === 'leaf') {
      const owner = ownerTypeOfPath(node.descriptor.pathTemplate);
      if (owner === null || !this._knownOwners.has(owner) || node.remoteId === null) {
        this.ignored.push({
          key,
          remoteId: node.remoteId,
          kind: 'leaf',
          reason: owner === null ? 'path does not follow the generated naming convention' : `owner type '${owner}' is not known`,
        });
        return 'kept';
      }
      ops.push({ op: 'delete', id: this._id(), key, dependsOn: [], remoteId: node.remoteId, node });
      return 'deleted';
    }

    if (node.children.length === 0) {
      this.ignored.push({ key, remoteId: node.remoteId, kind: 'folder', reason: 'empty folder not created by this generator' });
      return 'kept';
    }

    const childDeletes: number[] = [];
    let allDeleted = true;
    for (const child of node.children) {
      const result = this.removeRemote(child, joinKey(key, child.name), ops);
      if (result === 'deleted') {
        // The child's own delete is the last op it pushed.
        childDeletes.push(ops[ops.length - 1].id);
      } else {
        allDeleted = false;
      }
    }

    if (!allDeleted || node.remoteId === null) return 'kept';
    ops.push({ op: 'delete', id: this._id(), key, dependsOn: childDeletes, remoteId: node.remoteId, node });
    return 'deleted';
  }
}

function indexChildren(folder: FolderNode): { matched: Map<string, TreeNode>; extras: TreeNode[] } {
  const matched = new Map<string, TreeNode>();
  const extras: TreeNode[] = [];
  for (const child of folder.children) {
    if (matched.has(child.name)) {
      extras.push(child);
    } else {
      matched.set(child.name, child);
    }
  }
  return { matched, extras };
}

function mergedNames(a: ReadonlyMap<string, unknown>, b: ReadonlyMap<string, unknown>): string[] {
  return [...new Set([...a.keys(), ...b.keys()])].sort(compareNames);
}

/**
 * Compute the edit script taking `remote` to `canonical`. The two roots are
 * matched to each other regardless of name; each top-level child (and each
 * duplicate-named remote extra) becomes its own unit.
 */
export function diffTrees(canonical: FolderNode, remote: FolderNode, options?: DiffOptions): DiffPlan {
  const known = ownerTypesOf(canonical);
  for (const owner of options?.knownOwnerTypes ?? []) {
    known.add(owner);
  }

  const builder = new PlanBuilder(known);
  const units: DiffUnit[] = [];
  const { matched, extras } = indexChildren(remote);
  const canonicalByName = new Map(canonical.children.map((c) => [c.name, c]));

  for (const name of mergedNames(canonicalByName, matched)) {
    const ops: DiffOp[] = [];
    builder.diffChild(canonicalByName.get(name), matched.get(name), name, remote.remoteId, ops);
    if (ops.length > 0) units.push({ key: name, ops });
  }
  for (const extra of extras) {
    const ops: DiffOp[] = [];
    builder.removeRemote(extra, extra.name, ops);
    if (ops.length > 0) units.push({ key: extra.name, ops });
  }

  return { units, ignored: builder.ignored, conflicts: builder.conflicts };
}

/** All ops of a plan in plan order. */
export function planOps(plan: DiffPlan): DiffOp[] {
  return plan.units.flatMap((u) => u.ops).sort((a, b) => a.id - b.id);
}

export function isNoop(plan: DiffPlan): boolean {
  return plan.units.every((u) => u.ops.every((op) => op.op === 'keep'));
}
