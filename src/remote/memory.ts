/**
 * In-process collection store with call recording and fault injection.
 */

import type { EndpointDescriptor } from '../descriptors/types.js';
import { RemoteApplyError } from '../errors.js';
import { folderNode, leafNode, type FolderNode, type TreeNode } from '../tree/types.js';
import { sleep } from '../utils/index.js';
import { MUTATING_OPERATIONS, type RemoteCollectionStore, type StoreOperation } from './store.js';

interface MemFolder {
  kind: 'folder';
  id: string;
  name: string;
  parentId: string | null;
  childIds: string[];
}

interface MemLeaf {
  kind: 'leaf';
  id: string;
  name: string;
  parentId: string;
  descriptor: EndpointDescriptor;
}

type MemNode = MemFolder | MemLeaf;

export interface StoreCall {
  operation: StoreOperation;
  /** Parent id for creates, node id for updates and deletes, null for fetches. */
  target: string | null;
  name: string | null;
}

export interface FaultRule {
  operation: StoreOperation;
  /** Restrict the fault to calls whose node or leaf name matches. */
  name?: string;
  /** How many matching calls fail; Infinity for all of them. */
  times?: number;
  error: () => Error;
}

export class InMemoryCollectionStore implements RemoteCollectionStore {
  private readonly _nodes: Map<string, MemNode> = new Map();
  private readonly _rootId: string;
  private _nextId = 1;
  private _faults: Array<FaultRule & { remaining: number }> = [];
  private _inFlight = 0;
  private _peakInFlight = 0;
  private readonly _latencyMs: number;
  readonly calls: StoreCall[] = [];

  constructor(options?: { collectionId?: string; collectionName?: string; latencyMs?: number }) {
    this._rootId = options?.collectionId ?? 'collection';
    this._latencyMs = options?.latencyMs ?? 0;
    this._nodes.set(this._rootId, {
      kind: 'folder',
      id: this._rootId,
      name: options?.collectionName ?? 'API',
      parentId: null,
      childIds: [],
    });
  }

  get rootId(): string {
    return this._rootId;
  }

  get mutatingCalls(): number {
    return this.calls.filter((c) => MUTATING_OPERATIONS.has(c.operation)).length;
  }

  get peakInFlight(): number {
    return this._peakInFlight;
  }

  resetCalls(): void {
    this.calls.length = 0;
  }

  injectFault(rule: FaultRule): void {
    this._faults.push({ ...rule, remaining: rule.times ?? 1 });
  }

  clearFaults(): void {
    this._faults = [];
  }

  /** Add a folder without recording a call. */
  seedFolder(parentId: string | null, name: string): string {
    return this._insertFolder(parentId ?? this._rootId, name);
  }

  /** Add a leaf without recording a call. */
  seedLeaf(parentId: string | null, descriptor: EndpointDescriptor, name?: string): string {
    return this._insertLeaf(parentId ?? this._rootId, descriptor, name ?? descriptor.name);
  }

  /** Copy of the current tree, without recording a call. */
  snapshot(): FolderNode {
    return this._toTree(this._rootId);
  }

  async fetchTree(): Promise<FolderNode> {
    return this._call('fetchTree', null, null, () => this._toTree(this._rootId));
  }

  async createFolder(parentId: string | null, name: string): Promise<string> {
    const target = parentId ?? this._rootId;
    return this._call('createFolder', target, name, () => this._insertFolder(target, name));
  }

  async createLeaf(parentId: string | null, descriptor: EndpointDescriptor): Promise<string> {
    const target = parentId ?? this._rootId;
    return this._call('createLeaf', target, descriptor.name, () => this._insertLeaf(target, descriptor, descriptor.name));
  }

  async updateLeaf(remoteId: string, descriptor: EndpointDescriptor): Promise<void> {
    return this._call('updateLeaf', remoteId, descriptor.name, () => {
      const node = this._require(remoteId);
      if (node.kind !== 'leaf') throw new RemoteApplyError(`Not a request: ${remoteId}`, 400);
      node.descriptor = descriptor;
      node.name = descriptor.name;
    });
  }

  async deleteFolder(remoteId: string): Promise<void> {
    return this._call('deleteFolder', remoteId, this._nodes.get(remoteId)?.name ?? null, () => {
      const node = this._require(remoteId);
      if (node.kind !== 'folder' || node.parentId === null) {
        throw new RemoteApplyError(`Not a deletable folder: ${remoteId}`, 400);
      }
      this._remove(node);
    });
  }

  async deleteLeaf(remoteId: string): Promise<void> {
    return this._call('deleteLeaf', remoteId, this._nodes.get(remoteId)?.name ?? null, () => {
      const node = this._require(remoteId);
      if (node.kind !== 'leaf') throw new RemoteApplyError(`Not a request: ${remoteId}`, 400);
      this._remove(node);
    });
  }

  private async _call<T>(operation: StoreOperation, target: string | null, name: string | null, body: () => T): Promise<T> {
    this.calls.push({ operation, target, name });
    this._inFlight++;
    this._peakInFlight = Math.max(this._peakInFlight, this._inFlight);
    try {
      if (this._latencyMs > 0) await sleep(this._latencyMs);
      const fault = this._faults.find(
        (f) => f.operation === operation && f.remaining > 0 && (f.name === undefined || f.name === name),
      );
      if (fault !== undefined) {
        fault.remaining--;
        throw fault.error();
      }
      return body();
    } finally {
      this._inFlight--;
    }
  }

  private _newId(): string {
    return `node-${this._nextId++}`;
  }

  private _require(id: string): MemNode {
    const node = this._nodes.get(id);
    if (node === undefined) throw new RemoteApplyError(`Remote node not found: ${id}`, 404);
    return node;
  }

  private _requireFolder(id: string): MemFolder {
    const node = this._require(id);
    if (node.kind !== 'folder') throw new RemoteApplyError(`Not a folder: ${id}`, 400);
    return node;
  }

  private _insertFolder(parentId: string, name: string): string {
    const parent = this._requireFolder(parentId);
    const id = this._newId();
    this._nodes.set(id, { kind: 'folder', id, name, parentId, childIds: [] });
    parent.childIds.push(id);
    return id;
  }

  private _insertLeaf(parentId: string, descriptor: EndpointDescriptor, name: string): string {
    const parent = this._requireFolder(parentId);
    const id = this._newId();
    this._nodes.set(id, { kind: 'leaf', id, name, parentId, descriptor });
    parent.childIds.push(id);
    return id;
  }

  private _remove(node: MemNode): void {
    if (node.kind === 'folder') {
      for (const childId of [...node.childIds]) {
        const child = this._nodes.get(childId);
        if (child !== undefined) this._remove(child);
      }
    }
    if (node.parentId !== null) {
      const parent = this._nodes.get(node.parentId);
      if (parent !== undefined && parent.kind === 'folder') {
        parent.childIds = parent.childIds.filter((id) => id !== node.id);
      }
    }
    this._nodes.delete(node.id);
  }

  private _toTree(id: string): FolderNode {
    const node = this._requireFolder(id);
    const children: TreeNode[] = [];
    for (const childId of node.childIds) {
      const child = this._nodes.get(childId);
      if (child === undefined) continue;
      children.push(child.kind === 'folder' ? this._toTree(child.id) : leafNode(child.descriptor, child.id, child.name));
    }
    return folderNode(node.name, children, node.id);
  }
}
