import type { AnnotationElement } from '@layoutkit/model';

import { beforeEach, describe, expect, test } from 'vitest';

import { ContainmentIndex } from './containment-index';
import { TreeNode } from './tree-node';

const createNode = (id: number): TreeNode => {
  const element: AnnotationElement = {
    id,
    label: 'text',
    bbox: { l: 0, t: 0, r: 10, b: 10, coordOrigin: 'TOPLEFT' },
    contentLayer: 'body',
  };
  return new TreeNode(element);
};

describe('ContainmentIndex', () => {
  let index: ContainmentIndex;

  // 1 ─┬─ 2 ── 3
  //    └─ 4
  // 5
  beforeEach(() => {
    const root = createNode(1);
    const child = createNode(2);
    const grandchild = createNode(3);
    const sibling = createNode(4);
    root.addChild(child);
    child.addChild(grandchild);
    root.addChild(sibling);

    index = new ContainmentIndex([root, createNode(5)]);
  });

  test('looks up nodes and elements by id', () => {
    expect(index.has(3)).toBe(true);
    expect(index.has(99)).toBe(false);
    expect(index.get(2)?.id).toBe(2);
    expect(index.element(4)?.id).toBe(4);
    expect(index.element(99)).toBeUndefined();
  });

  test('resolves parents and ancestors nearest first', () => {
    expect(index.parentOf(3)).toBe(2);
    expect(index.parentOf(1)).toBeUndefined();
    expect(index.ancestorsOf(3)).toEqual([2, 1]);
    expect(index.ancestorsOf(5)).toEqual([]);
  });

  test('answers strict ancestry', () => {
    expect(index.isAncestor(1, 3)).toBe(true);
    expect(index.isAncestor(2, 3)).toBe(true);
    expect(index.isAncestor(3, 3)).toBe(false);
    expect(index.isAncestor(4, 3)).toBe(false);
  });

  test('collects descendant ids', () => {
    expect([...index.descendantIdsOf(1)]).toEqual([2, 3, 4]);
    expect(index.descendantIdsOf(5).size).toBe(0);
    expect(index.descendantIdsOf(99).size).toBe(0);
  });

  test('returns siblings in tree order', () => {
    expect(index.siblingsOf(4)).toEqual([2, 4]);
    expect(index.siblingsOf(5)).toEqual([1, 5]);
    expect(index.siblingsOf(99)).toEqual([]);
  });

  test('walks the forest in pre-order', () => {
    expect(index.preorder()).toEqual([1, 2, 3, 4, 5]);
  });
});
