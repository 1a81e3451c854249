import type { AnnotationElement } from '@layoutkit/model';

/**
 * Node of the containment forest.
 *
 * Each node owns its children; there are no parent pointers. Use
 * `ContainmentIndex` for upward lookups.
 */
export class TreeNode {
  readonly element: AnnotationElement;
  readonly children: TreeNode[] = [];

  constructor(element: AnnotationElement) {
    this.element = element;
  }

  get id(): number {
    return this.element.id;
  }

  addChild(child: TreeNode): void {
    this.children.push(child);
  }

  /**
   * All nodes below this one, in pre-order
   */
  descendants(): TreeNode[] {
    const result: TreeNode[] = [];

    const collect = (nodes: TreeNode[]): void => {
      for (const node of nodes) {
        result.push(node);
        collect(node.children);
      }
    };

    collect(this.children);
    return result;
  }
}
