export { ContainmentIndex } from './containment-index';
export {
  buildContainmentTree,
  sortNodesSpatially,
} from './containment-tree-builder';
export { buildGlobalReadingOrder } from './global-reading-order';
export { TreeNode } from './tree-node';
