import type { AnnotationPath, PathElementMap } from '@layoutkit/model';

import type { TreeNode } from './tree-node';

import { ContainmentIndex } from './containment-index';

/**
 * Growing element order. Appends by default; `insertAfter` redirects every
 * placement made inside its callback to a contiguous run after an anchor.
 */
class OrderBuilder {
  private readonly order: number[] = [];
  private readonly placed = new Set<number>();
  private cursor: number | null = null;

  has(id: number): boolean {
    return this.placed.has(id);
  }

  positionOf(id: number): number {
    return this.order.indexOf(id);
  }

  place(id: number): void {
    if (this.cursor === null) {
      this.order.push(id);
    } else {
      this.order.splice(this.cursor, 0, id);
      this.cursor++;
    }
    this.placed.add(id);
  }

  insertAfter(anchorId: number | null, placeFn: () => void): void {
    this.cursor = anchorId === null ? 0 : this.positionOf(anchorId) + 1;
    placeFn();
    this.cursor = null;
  }

  toArray(): number[] {
    return [...this.order];
  }
}

/**
 * Container a path is scoped to: the explicit mapping when usable, otherwise
 * (for nested levels) the nearest common ancestor of its elements that it
 * does not list itself.
 */
function resolvePathContainer(
  path: AnnotationPath,
  elementIds: number[],
  pathToContainer: Record<number, number>,
  index: ContainmentIndex,
): number | undefined {
  const explicit = pathToContainer[path.id];
  if (
    explicit !== undefined &&
    index.has(explicit) &&
    !elementIds.includes(explicit)
  ) {
    return explicit;
  }

  if (path.level <= 1 || elementIds.length === 0) {
    return undefined;
  }

  return index
    .ancestorsOf(elementIds[0])
    .find(
      (candidate) =>
        !elementIds.includes(candidate) &&
        elementIds.every((id) => index.isAncestor(candidate, id)),
    );
}

/**
 * Merge the per-path orders of one page into a single reading order.
 *
 * - Top-level paths are emitted by level, then input order.
 * - A path scoped to a container is emitted right after that container.
 * - A container that no path lists is placed before the first element its
 *   nested paths order.
 * - When a path steps from A to B, unlisted ancestors of A that do not
 *   contain B are placed after A, and unlisted ancestors of B that do not
 *   contain A are placed before B.
 * - Everything still missing is inserted in forest pre-order, after its
 *   parent and the subtrees of its earlier siblings.
 *
 * @param paths - All paths of the page
 * @param pathToElements - Path id to ordered element ids
 * @param pathToContainer - Path id to the element the path is scoped to
 * @param treeRoots - Containment forest
 * @returns Every element id of the forest, exactly once
 */
export function buildGlobalReadingOrder(
  paths: AnnotationPath[],
  pathToElements: PathElementMap,
  pathToContainer: Record<number, number>,
  treeRoots: TreeNode[],
): number[] {
  const index = new ContainmentIndex(treeRoots);
  const builder = new OrderBuilder();

  const listOf = (pathId: number): number[] =>
    (pathToElements[pathId] ?? []).filter((id) => index.has(id));

  const orderedPaths = paths
    .filter((path) => pathToElements[path.id] !== undefined)
    .sort((a, b) => a.level - b.level);

  const listed = new Set<number>();
  for (const path of orderedPaths) {
    for (const id of listOf(path.id)) {
      listed.add(id);
    }
  }

  const topLevelPaths: AnnotationPath[] = [];
  const nestedPaths = new Map<number, AnnotationPath[]>();
  const bracketingContainers = new Map<number, number[]>();

  for (const path of orderedPaths) {
    const elementIds = listOf(path.id);
    const container = resolvePathContainer(
      path,
      elementIds,
      pathToContainer,
      index,
    );
    if (container === undefined) {
      topLevelPaths.push(path);
      continue;
    }
    nestedPaths.set(container, [...(nestedPaths.get(container) ?? []), path]);
    for (const id of elementIds) {
      bracketingContainers.set(id, [
        ...(bracketingContainers.get(id) ?? []),
        container,
      ]);
    }
  }

  const emittedPaths = new Set<number>();

  const placeWithNested = (id: number): void => {
    if (builder.has(id)) {
      return;
    }
    builder.place(id);
    for (const nested of nestedPaths.get(id) ?? []) {
      emitPath(nested);
    }
  };

  const placeUnlisted = (id: number): void => {
    if (!listed.has(id)) {
      placeWithNested(id);
    }
  };

  const placeElement = (id: number): void => {
    for (const container of bracketingContainers.get(id) ?? []) {
      placeUnlisted(container);
    }
    placeWithNested(id);
  };

  const crossBoundaries = (from: number, to: number): void => {
    for (const ancestor of index.ancestorsOf(from)) {
      if (ancestor !== to && !index.isAncestor(ancestor, to)) {
        placeUnlisted(ancestor);
      }
    }

    const entering = index
      .ancestorsOf(to)
      .filter(
        (ancestor) => ancestor !== from && !index.isAncestor(ancestor, from),
      )
      .reverse();
    for (const ancestor of entering) {
      placeUnlisted(ancestor);
    }
  };

  function emitPath(path: AnnotationPath): void {
    if (emittedPaths.has(path.id)) {
      return;
    }
    emittedPaths.add(path.id);

    let previous: number | null = null;
    for (const id of listOf(path.id)) {
      if (previous !== null) {
        crossBoundaries(previous, id);
      }
      placeElement(id);
      previous = id;
    }
  }

  for (const path of topLevelPaths) {
    emitPath(path);
  }

  for (const id of index.preorder()) {
    if (builder.has(id)) {
      continue;
    }
    builder.insertAfter(fallbackAnchor(id, index, builder), () =>
      placeElement(id),
    );
  }

  return builder.toArray();
}

/**
 * Placed element an unordered node should follow: the latest of its parent
 * and everything under its earlier siblings
 */
function fallbackAnchor(
  id: number,
  index: ContainmentIndex,
  builder: OrderBuilder,
): number | null {
  const siblings = index.siblingsOf(id);
  const candidates: number[] = [];

  const parentId = index.parentOf(id);
  if (parentId !== undefined) {
    candidates.push(parentId);
  }
  for (const sibling of siblings.slice(0, siblings.indexOf(id))) {
    candidates.push(sibling, ...index.descendantIdsOf(sibling));
  }

  let anchor: number | null = null;
  let anchorPosition = -1;
  for (const candidate of candidates) {
    const position = builder.positionOf(candidate);
    if (position > anchorPosition) {
      anchor = candidate;
      anchorPosition = position;
    }
  }
  return anchor;
}
