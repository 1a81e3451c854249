import type { AnnotationPath, PathMappings } from '@layoutkit/model';

import type { TreeNode } from '../tree';

import { READING_ORDER } from '../config/constants';
import { containsAllPoints } from '../geometry';
import { ContainmentIndex } from '../tree';
import { isTableLabel } from '../utils/labels';
import { clonePathElementMap, withReadingOrder } from './path-mappings';

/**
 * Register tables that a reading-order path crosses into.
 *
 * A path may step into a table to order one of its cells without listing the
 * table itself. For every table with descendants in a path's list, the table
 * is inserted right before the first of them unless the whole path stays
 * inside the table box (grown by `tolerance`) or the table is already listed.
 * Outer tables are handled before the tables nested in them.
 *
 * Running it again on its own output changes nothing.
 *
 * @returns New mappings; only `readingOrder` differs from the input
 */
export function promoteTableCrossBoundaryReadingOrder(
  mappings: PathMappings,
  paths: AnnotationPath[],
  treeRoots: TreeNode[],
  tolerance: number = READING_ORDER.TABLE_BOUNDARY_TOLERANCE,
): PathMappings {
  const index = new ContainmentIndex(treeRoots);
  const readingOrder = clonePathElementMap(mappings.readingOrder);

  const tables = index
    .preorder()
    .map((id) => index.get(id))
    .filter(
      (node): node is TreeNode =>
        node !== undefined && isTableLabel(node.element.label),
    );

  for (const table of tables) {
    const descendants = index.descendantIdsOf(table.id);
    if (descendants.size === 0) {
      continue;
    }

    for (const path of paths) {
      const elementIds = readingOrder[path.id];
      if (elementIds === undefined || elementIds.includes(table.id)) {
        continue;
      }

      const firstDescendant = elementIds.findIndex((id) =>
        descendants.has(id),
      );
      if (firstDescendant === -1) {
        continue;
      }

      if (containsAllPoints(table.element.bbox, path.points, tolerance)) {
        continue;
      }

      elementIds.splice(firstDescendant, 0, table.id);
    }
  }

  return withReadingOrder(mappings, readingOrder);
}
