import type {
  AnnotationElement,
  AnnotationPath,
  PathElementMap,
  Point,
} from '@layoutkit/model';

import { uniq } from 'es-toolkit';

import { READING_ORDER } from '../config/constants';
import { containsAllPoints } from '../geometry';
import { ContainmentIndex, buildContainmentTree } from '../tree';
import { clonePathElementMap } from './path-mappings';

export interface ConflictResolutionOptions {
  /**
   * Slack for box containment and for testing path points against
   * containers (default: READING_ORDER.CONTAINMENT_TOLERANCE)
   */
  tolerance?: number;
}

/**
 * Let outer paths defer to the deeper paths that order the same elements.
 *
 * When a path lists an element that a deeper-level path also orders, the
 * deeper path's container takes its place: the tightest ancestor of the
 * element whose box holds the deeper path. The container must not hold the
 * whole outer path; otherwise the outer order is kept. Other entries under
 * the same container collapse into it, and the container keeps the position
 * of the first of them. Entries outside every container stay where they are.
 *
 * @returns A new mapping; the input is left untouched
 */
export function resolveReadingOrderConflicts(
  readingOrder: PathElementMap,
  paths: AnnotationPath[],
  elements: AnnotationElement[],
  options: ConflictResolutionOptions = {},
): PathElementMap {
  const tolerance = options.tolerance ?? READING_ORDER.CONTAINMENT_TOLERANCE;
  const index = new ContainmentIndex(
    buildContainmentTree(elements, tolerance),
  );
  const result = clonePathElementMap(readingOrder);

  const holds = (id: number, points: Point[]): boolean => {
    const bbox = index.element(id)?.bbox;
    return bbox !== undefined && containsAllPoints(bbox, points, tolerance);
  };

  for (const path of paths) {
    const elementIds = readingOrder[path.id];
    if (elementIds === undefined) {
      continue;
    }

    const subsumers = new Set<number>();
    for (const deeper of paths) {
      if (deeper.level <= path.level) {
        continue;
      }
      for (const id of readingOrder[deeper.id] ?? []) {
        if (!elementIds.includes(id)) {
          continue;
        }
        const container = index
          .ancestorsOf(id)
          .find((ancestor) => holds(ancestor, deeper.points));
        if (container !== undefined && !holds(container, path.points)) {
          subsumers.add(container);
        }
      }
    }
    if (subsumers.size === 0) {
      continue;
    }

    const substitute = (id: number): number => {
      const outermost = index
        .ancestorsOf(id)
        .reverse()
        .find((ancestor) => subsumers.has(ancestor));
      return outermost ?? id;
    };

    result[path.id] = uniq(elementIds.map(substitute));
  }

  return result;
}
