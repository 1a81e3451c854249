import type { AnnotationElement } from '@layoutkit/model';

import type { TreeNode } from './tree-node';

/**
 * Lookup tables over a containment forest.
 *
 * Built once per resolution call from the roots; the forest itself is not
 * modified.
 */
export class ContainmentIndex {
  private readonly nodes = new Map<number, TreeNode>();
  private readonly parents = new Map<number, number>();
  private readonly order: number[] = [];
  private readonly rootIds: number[] = [];

  constructor(roots: TreeNode[]) {
    const visit = (node: TreeNode, parentId: number | null): void => {
      if (this.nodes.has(node.id)) {
        return;
      }
      this.nodes.set(node.id, node);
      this.order.push(node.id);
      if (parentId !== null) {
        this.parents.set(node.id, parentId);
      }
      for (const child of node.children) {
        visit(child, node.id);
      }
    };

    for (const root of roots) {
      if (!this.nodes.has(root.id)) {
        this.rootIds.push(root.id);
      }
      visit(root, null);
    }
  }

  has(id: number): boolean {
    return this.nodes.has(id);
  }

  get(id: number): TreeNode | undefined {
    return this.nodes.get(id);
  }

  element(id: number): AnnotationElement | undefined {
    return this.nodes.get(id)?.element;
  }

  parentOf(id: number): number | undefined {
    return this.parents.get(id);
  }

  /**
   * Ancestor ids, nearest first
   */
  ancestorsOf(id: number): number[] {
    const result: number[] = [];
    let current = this.parents.get(id);
    while (current !== undefined) {
      result.push(current);
      current = this.parents.get(current);
    }
    return result;
  }

  /**
   * Whether `ancestorId` is a strict ancestor of `id`
   */
  isAncestor(ancestorId: number, id: number): boolean {
    let current = this.parents.get(id);
    while (current !== undefined) {
      if (current === ancestorId) {
        return true;
      }
      current = this.parents.get(current);
    }
    return false;
  }

  descendantIdsOf(id: number): Set<number> {
    const node = this.nodes.get(id);
    return new Set(node ? node.descendants().map((d) => d.id) : []);
  }

  /**
   * Ids sharing the parent of `id` (roots for a root), in tree order,
   * including `id` itself
   */
  siblingsOf(id: number): number[] {
    const parentId = this.parents.get(id);
    if (parentId === undefined) {
      return this.rootIds.includes(id) ? [...this.rootIds] : [];
    }
    return (this.nodes.get(parentId)?.children ?? []).map((c) => c.id);
  }

  /**
   * Every node id in forest pre-order
   */
  preorder(): number[] {
    return [...this.order];
  }
}
