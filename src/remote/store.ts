/**
 * Remote collection store capability.
 */

import type { EndpointDescriptor } from '../descriptors/types.js';
import type { FolderNode } from '../tree/types.js';

/**
 * Every call may fail with TransientRemoteError (including RateLimitError
 * with a retry-after hint) or RemoteApplyError. A null parent id addresses
 * the collection root.
 */
export interface RemoteCollectionStore {
  /** The whole collection as a tree; every node carries its remote id. */
  fetchTree(): Promise<FolderNode>;
  createFolder(parentId: string | null, name: string): Promise<string>;
  createLeaf(parentId: string | null, descriptor: EndpointDescriptor): Promise<string>;
  updateLeaf(remoteId: string, descriptor: EndpointDescriptor): Promise<void>;
  deleteFolder(remoteId: string): Promise<void>;
  deleteLeaf(remoteId: string): Promise<void>;
}

export type StoreOperation = 'fetchTree' | 'createFolder' | 'createLeaf' | 'updateLeaf' | 'deleteFolder' | 'deleteLeaf';

export const MUTATING_OPERATIONS: ReadonlySet<StoreOperation> = new Set([
  'createFolder',
  'createLeaf',
  'updateLeaf',
  'deleteFolder',
  'deleteLeaf',
]);
