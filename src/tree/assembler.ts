/**
 * Descriptor tree assembler.
 */

import { InvalidInputError } from '../errors.js';
import { compareNames, deepFreeze } from '../utils/index.js';
import { folderNode, leafNode, type FolderNode, type Grouping, type LeafNode, type OwnerDescriptors } from './types.js';

export const DEFAULT_ROOT_NAME = 'API';

function ownerFolder(group: OwnerDescriptors): FolderNode {
  const leaves: LeafNode[] = group.descriptors.map((d) => leafNode(d));
  leaves.sort((a, b) => compareNames(a.name, b.name));
  for (let i = 1; i < leaves.length; i++) {
    if (leaves[i].name === leaves[i - 1].name) {
      throw new InvalidInputError(`Duplicate endpoint name '${leaves[i].name}' under '${group.ownerType}'`);
    }
  }
  return folderNode(group.ownerType, leaves);
}

/**
 * Build the canonical tree. With `flat` grouping the root holds one folder
 * per owner type; with `module` it holds one folder per module, each holding
 * its owners' folders. Every level is ordered by name, so the result does
 * not depend on the order of `groups`. The returned tree is frozen.
 */
export function assembleTree(
  groups: readonly OwnerDescriptors[],
  grouping: Grouping,
  rootName: string = DEFAULT_ROOT_NAME,
): FolderNode {
  const seen = new Set<string>();
  for (const group of groups) {
    if (seen.has(group.ownerType)) {
      throw new InvalidInputError(`Duplicate owner type '${group.ownerType}'`);
    }
    seen.add(group.ownerType);
  }

  const owners = groups.map(ownerFolder).sort((a, b) => compareNames(a.name, b.name));

  if (grouping === 'flat') {
    return deepFreeze(folderNode(rootName, owners));
  }

  const byModule = new Map<string, FolderNode[]>();
  const moduleOf = new Map(groups.map((g) => [g.ownerType, g.module]));
  for (const owner of owners) {
    const module = moduleOf.get(owner.name) ?? '';
    const list = byModule.get(module);
    if (list === undefined) {
      byModule.set(module, [owner]);
    } else {
      list.push(owner);
    }
  }

  const modules = [...byModule.entries()]
    .map(([module, children]) => folderNode(module, children))
    .sort((a, b) => compareNames(a.name, b.name));
  return deepFreeze(folderNode(rootName, modules));
}
