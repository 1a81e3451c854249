/**
 * Reading-order resolution for annotated document pages.
 *
 * Builds a containment tree from element boxes, maps drawn paths onto the
 * elements they cross, and merges per-path orders into one page order.
 *
 * @packageDocumentation
 */

export { READING_ORDER } from './config/constants';
export {
  bboxArea,
  bboxEnclosingRotatedRect,
  bboxHeight,
  bboxVerticalRange,
  bboxVisualTop,
  bboxWidth,
  containsAllPoints,
  containsBBox,
  containsPoint,
} from './geometry';
export {
  buildPathMappings,
  clonePathElementMap,
  createEmptyPathMappings,
  findPathContainers,
  mapPathToElements,
  promoteTableCrossBoundaryReadingOrder,
  resolveReadingOrderConflicts,
  withReadingOrder,
} from './mappings';
export type { ConflictResolutionOptions } from './mappings';
export {
  AnnotationParseError,
  AnnotationParser,
  annotationBoxSchema,
  annotationPageSchema,
  annotationPathSchema,
  createAnnotationElement,
  createAnnotationPath,
  pointSchema,
} from './parsers';
export type {
  AnnotationBoxInput,
  AnnotationPageInput,
  AnnotationPathInput,
  ParsedAnnotationPage,
} from './parsers';
export { ReadingOrderResolver } from './reading-order-resolver';
export type { ReadingOrderResolverOptions } from './reading-order-resolver';
export {
  ContainmentIndex,
  TreeNode,
  buildContainmentTree,
  buildGlobalReadingOrder,
  sortNodesSpatially,
} from './tree';
export type { AnnotationPage, ReadingOrderResolution } from './types';
export { isReadingOrderPath, isTableLabel } from './utils';
