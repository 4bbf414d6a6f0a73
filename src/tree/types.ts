/**
 * Descriptor tree nodes, shared by the canonical and remote trees.
 */

import type { EndpointDescriptor } from '../descriptors/types.js';

export interface FolderNode {
  readonly kind: 'folder';
  readonly name: string;
  readonly children: readonly TreeNode[];
  /** Set once matched to a remote node; null means pending creation. */
  readonly remoteId: string | null;
}

export interface LeafNode {
  readonly kind: 'leaf';
  readonly name: string;
  readonly descriptor: EndpointDescriptor;
  readonly remoteId: string | null;
}

export type TreeNode = FolderNode | LeafNode;

export type Grouping = 'flat' | 'module';

export interface OwnerDescriptors {
  readonly ownerType: string;
  readonly module: string;
  readonly descriptors: readonly EndpointDescriptor[];
}

export function folderNode(name: string, children: readonly TreeNode[], remoteId: string | null = null): FolderNode {
  return { kind: 'folder', name, children, remoteId };
}

export function leafNode(descriptor: EndpointDescriptor, remoteId: string | null = null, name?: string): LeafNode {
  return { kind: 'leaf', name: name ?? descriptor.name, descriptor, remoteId };
}

export function countLeaves(node: TreeNode): number {
  if (node.kind === 'leaf') return 1;
  let total = 0;
  for (const child of node.children) {
    total += countLeaves(child);
  }
  return total;
}

/** Depth-first, parent before children. Yields each node with its slash-joined key. */
export function* walkTree(node: TreeNode, key: string = ''): Generator<{ key: string; node: TreeNode }> {
  yield { key, node };
  if (node.kind === 'folder') {
    for (const child of node.children) {
      yield* walkTree(child, joinKey(key, child.name));
    }
  }
}

export function joinKey(parentKey: string, name: string): string {
  return parentKey === '' ? name : `${parentKey}/${name}`;
}
