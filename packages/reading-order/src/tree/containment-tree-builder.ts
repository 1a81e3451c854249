import type { AnnotationElement } from '@layoutkit/model';

import { sortBy } from 'es-toolkit';

import { READING_ORDER } from '../config/constants';
import { bboxArea, bboxVisualTop, containsBBox } from '../geometry';
import { TreeNode } from './tree-node';

/**
 * Whether `candidate` may be the parent of `child`.
 *
 * Larger boxes rank above smaller ones; equal areas fall back to the lower
 * id, which keeps identical boxes from containing each other.
 */
function ranksAbove(
  candidate: AnnotationElement,
  child: AnnotationElement,
): boolean {
  const candidateArea = bboxArea(candidate.bbox);
  const childArea = bboxArea(child.bbox);
  if (candidateArea !== childArea) {
    return candidateArea > childArea;
  }
  return candidate.id < child.id;
}

function findParent(
  child: AnnotationElement,
  elements: AnnotationElement[],
  tolerance: number,
): AnnotationElement | undefined {
  const candidates = elements.filter(
    (candidate) =>
      candidate.id !== child.id &&
      ranksAbove(candidate, child) &&
      containsBBox(candidate.bbox, child.bbox, tolerance),
  );

  return sortBy(candidates, [(e) => bboxArea(e.bbox), (e) => e.id])[0];
}

/**
 * Sort nodes top-to-bottom, then left-to-right, then by element id
 */
export function sortNodesSpatially(nodes: TreeNode[]): TreeNode[] {
  return sortBy(nodes, [
    (n) => bboxVisualTop(n.element.bbox),
    (n) => Math.min(n.element.bbox.l, n.element.bbox.r),
    (n) => n.id,
  ]);
}

/**
 * Build the containment forest for one page.
 *
 * Each element is attached to the smallest element whose box contains its
 * own (within `tolerance`); elements with no container become roots.
 * Siblings and roots are ordered spatially.
 *
 * @returns Root nodes in spatial order
 */
export function buildContainmentTree(
  elements: AnnotationElement[],
  tolerance: number = READING_ORDER.CONTAINMENT_TOLERANCE,
): TreeNode[] {
  const sorted = sortBy(elements, [(e) => e.id]);
  const nodes = new Map<number, TreeNode>();
  for (const element of sorted) {
    if (!nodes.has(element.id)) {
      nodes.set(element.id, new TreeNode(element));
    }
  }

  const roots: TreeNode[] = [];
  const children = new Map<number, TreeNode[]>();

  for (const node of nodes.values()) {
    const parent = findParent(node.element, sorted, tolerance);
    if (parent === undefined) {
      roots.push(node);
      continue;
    }
    const siblings = children.get(parent.id) ?? [];
    siblings.push(node);
    children.set(parent.id, siblings);
  }

  for (const [parentId, childNodes] of children) {
    const parent = nodes.get(parentId);
    if (!parent) {
      continue;
    }
    for (const child of sortNodesSpatially(childNodes)) {
      parent.addChild(child);
    }
  }

  return sortNodesSpatially(roots);
}
