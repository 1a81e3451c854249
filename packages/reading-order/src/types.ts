import type {
  AnnotationElement,
  AnnotationPath,
  PathMappings,
} from '@layoutkit/model';

import type { TreeNode } from './tree';

/**
 * One annotated page
 */
export interface AnnotationPage {
  elements: AnnotationElement[];
  paths: AnnotationPath[];

  /**
   * Precomputed path relations; derived from the paths when absent
   */
  mappings?: PathMappings;
}

/**
 * Outcome of resolving a page's reading order
 */
export interface ReadingOrderResolution {
  /** Containment forest, spatially sorted */
  treeRoots: TreeNode[];

  /** Relations after conflict resolution and table promotion */
  mappings: PathMappings;

  /** Path id to the element the path is scoped to */
  pathToContainer: Record<number, number>;

  /** Every element id, exactly once, in reading order */
  order: number[];
}
