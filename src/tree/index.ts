export { assembleTree, DEFAULT_ROOT_NAME } from './assembler.js';
export { folderNode, leafNode, countLeaves, walkTree, joinKey } from './types.js';
export type { FolderNode, LeafNode, TreeNode, Grouping, OwnerDescriptors } from './types.js';
