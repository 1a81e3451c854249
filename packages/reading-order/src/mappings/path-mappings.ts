import type {
  AnnotationElement,
  AnnotationPath,
  PathElementMap,
  PathLabel,
  PathMappings,
} from '@layoutkit/model';

import type { TreeNode } from '../tree';

import { sortBy } from 'es-toolkit';

import { READING_ORDER } from '../config/constants';
import { bboxArea, containsAllPoints, containsPoint } from '../geometry';
import { ContainmentIndex } from '../tree';

const MAPPING_KEYS: Record<PathLabel, keyof PathMappings> = {
  reading_order: 'readingOrder',
  merge: 'merge',
  group: 'group',
  to_caption: 'toCaption',
  to_footnote: 'toFootnote',
  to_value: 'toValue',
};

export function createEmptyPathMappings(): PathMappings {
  return {
    readingOrder: {},
    merge: {},
    group: {},
    toCaption: {},
    toFootnote: {},
    toValue: {},
  };
}

/**
 * Copy of `mappings` with `readingOrder` replaced; the other relations are
 * carried over as-is
 */
export function withReadingOrder(
  mappings: PathMappings,
  readingOrder: PathElementMap,
): PathMappings {
  return { ...mappings, readingOrder };
}

export function clonePathElementMap(map: PathElementMap): PathElementMap {
  const result: PathElementMap = {};
  for (const [pathId, elementIds] of Object.entries(map)) {
    result[Number(pathId)] = [...elementIds];
  }
  return result;
}

/**
 * Elements a path threads through, in first-visit order.
 *
 * Each point resolves to the smallest element under it (lowest id on ties);
 * points over empty page space are skipped.
 */
export function mapPathToElements(
  path: AnnotationPath,
  elements: AnnotationElement[],
  tolerance: number = READING_ORDER.POINT_TOLERANCE,
): number[] {
  const result: number[] = [];

  for (const point of path.points) {
    const hit = sortBy(
      elements.filter((e) => containsPoint(e.bbox, point, tolerance)),
      [(e) => bboxArea(e.bbox), (e) => e.id],
    )[0];
    if (hit && !result.includes(hit.id)) {
      result.push(hit.id);
    }
  }

  return result;
}

/**
 * Resolve every path of a page into its relation bucket
 */
export function buildPathMappings(
  elements: AnnotationElement[],
  paths: AnnotationPath[],
  tolerance: number = READING_ORDER.POINT_TOLERANCE,
): PathMappings {
  const mappings = createEmptyPathMappings();

  for (const path of paths) {
    const elementIds = mapPathToElements(path, elements, tolerance);
    if (elementIds.length > 0) {
      mappings[MAPPING_KEYS[path.label]][path.id] = elementIds;
    }
  }

  return mappings;
}

/**
 * Container element of each nested (level > 1) reading-order path: the
 * smallest element whose box holds every point of the path and which the
 * path does not list itself
 */
export function findPathContainers(
  paths: AnnotationPath[],
  readingOrder: PathElementMap,
  treeRoots: TreeNode[],
  tolerance: number = READING_ORDER.CONTAINMENT_TOLERANCE,
): Record<number, number> {
  const index = new ContainmentIndex(treeRoots);
  const candidates = index
    .preorder()
    .map((id) => index.element(id))
    .filter((element): element is AnnotationElement => element !== undefined);

  const result: Record<number, number> = {};

  for (const path of paths) {
    const elementIds = readingOrder[path.id];
    if (path.level <= 1 || elementIds === undefined) {
      continue;
    }

    const container = sortBy(
      candidates.filter(
        (element) =>
          !elementIds.includes(element.id) &&
          containsAllPoints(element.bbox, path.points, tolerance),
      ),
      [(e) => bboxArea(e.bbox), (e) => e.id],
    )[0];

    if (container) {
      result[path.id] = container.id;
    }
  }

  return result;
}
