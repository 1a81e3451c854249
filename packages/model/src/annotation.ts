import type { BoundingBox, Point } from './bounding-box';
import type { ContentLayer, DocItemLabel } from './doc-item-label';

/**
 * Annotated page region
 */
export interface AnnotationElement {
  /**
   * Unique id within the page
   */
  id: number;

  label: DocItemLabel;

  /**
   * Axis-aligned box. For rotated regions this is the box enclosing
   * `bboxUnrotated` after rotation about its center.
   */
  bbox: BoundingBox;

  contentLayer: ContentLayer;

  /**
   * Rotation in degrees, clockwise on a top-left page. Unset when the region
   * was drawn without rotation.
   */
  rotationDeg?: number;

  /**
   * Box as drawn, before conversion to the enclosing box
   */
  bboxUnrotated?: BoundingBox;
}

/**
 * Labels a drawn path can carry
 */
export const PATH_LABELS = [
  'reading_order',
  'merge',
  'group',
  'to_caption',
  'to_footnote',
  'to_value',
] as const;

export type PathLabel = (typeof PATH_LABELS)[number];

/**
 * Polyline drawn across page elements
 */
export interface AnnotationPath {
  id: number;
  label: PathLabel;

  /**
   * At least two points, in drawing order
   */
  points: Point[];

  /**
   * Nesting depth. 1 is the outermost (page-wide) path; higher levels scope
   * to a container such as a table.
   */
  level: number;
}

// Path id -> element ids, in path order
export type PathElementMap = Record<number, number[]>;

/**
 * Relations derived from the paths of one page.
 * Only `readingOrder` is rewritten during resolution; the rest pass through.
 */
export interface PathMappings {
  readingOrder: PathElementMap;
  merge: PathElementMap;
  group: PathElementMap;
  toCaption: PathElementMap;
  toFootnote: PathElementMap;
  toValue: PathElementMap;
}
