export type { BoundingBox, CoordOrigin, Point } from './bounding-box';
export { CONTENT_LAYERS, DOC_ITEM_LABELS } from './doc-item-label';
export type { ContentLayer, DocItemLabel } from './doc-item-label';
export { PATH_LABELS } from './annotation';
export type {
  AnnotationElement,
  AnnotationPath,
  PathElementMap,
  PathLabel,
  PathMappings,
} from './annotation';
