export {
  buildPathMappings,
  clonePathElementMap,
  createEmptyPathMappings,
  findPathContainers,
  mapPathToElements,
  withReadingOrder,
} from './path-mappings';
export { resolveReadingOrderConflicts } from './reading-order-conflict-resolver';
export type { ConflictResolutionOptions } from './reading-order-conflict-resolver';
export { promoteTableCrossBoundaryReadingOrder } from './table-boundary-promoter';
