import type { AnnotationElement, DocItemLabel } from '@layoutkit/model';

import { describe, expect, test } from 'vitest';

import { buildContainmentTree } from './containment-tree-builder';
import { TreeNode } from './tree-node';

const createElement = (
  id: number,
  [l, t, r, b]: [number, number, number, number],
  label: DocItemLabel = 'text',
): AnnotationElement => ({
  id,
  label,
  bbox: { l, t, r, b, coordOrigin: 'TOPLEFT' },
  contentLayer: 'body',
});

interface Shape {
  id: number;
  children: Shape[];
}

const shapeOf = (nodes: TreeNode[]): Shape[] =>
  nodes.map((node) => ({ id: node.id, children: shapeOf(node.children) }));

describe('buildContainmentTree', () => {
  test('nests a cell under its table and keeps unrelated elements as roots', () => {
    const roots = buildContainmentTree([
      createElement(1, [0, 0, 100, 100], 'table'),
      createElement(2, [10, 10, 90, 40], 'list_item'),
      createElement(3, [0, 150, 100, 180]),
    ]);

    expect(shapeOf(roots)).toEqual([
      { id: 1, children: [{ id: 2, children: [] }] },
      { id: 3, children: [] },
    ]);
  });

  test('attaches each element to the tightest container', () => {
    const roots = buildContainmentTree([
      createElement(3, [20, 20, 50, 50]),
      createElement(1, [0, 0, 200, 200]),
      createElement(2, [10, 10, 150, 150]),
    ]);

    expect(shapeOf(roots)).toEqual([
      {
        id: 1,
        children: [{ id: 2, children: [{ id: 3, children: [] }] }],
      },
    ]);
  });

  test('leaves overlapping boxes unlinked', () => {
    const roots = buildContainmentTree([
      createElement(2, [40, 40, 100, 100]),
      createElement(1, [0, 0, 60, 60]),
    ]);

    expect(shapeOf(roots)).toEqual([
      { id: 1, children: [] },
      { id: 2, children: [] },
    ]);
  });

  test('breaks ties between identical boxes by id', () => {
    const roots = buildContainmentTree([
      createElement(5, [0, 0, 10, 10]),
      createElement(3, [0, 0, 10, 10]),
    ]);

    expect(shapeOf(roots)).toEqual([
      { id: 3, children: [{ id: 5, children: [] }] },
    ]);
  });

  test('absorbs small overhang with the default tolerance only', () => {
    const elements = [
      createElement(1, [0, 0, 100, 100]),
      createElement(2, [-0.5, 10, 50, 20]),
    ];

    expect(shapeOf(buildContainmentTree(elements))).toEqual([
      { id: 1, children: [{ id: 2, children: [] }] },
    ]);
    expect(shapeOf(buildContainmentTree(elements, 0))).toEqual([
      { id: 1, children: [] },
      { id: 2, children: [] },
    ]);
  });

  test('orders siblings top-to-bottom, left-to-right, then by id', () => {
    const roots = buildContainmentTree([
      createElement(1, [0, 0, 200, 200]),
      createElement(2, [10, 60, 90, 90]),
      createElement(3, [10, 10, 90, 50]),
      createElement(4, [110, 10, 190, 50]),
      createElement(6, [10, 100, 50, 130]),
      createElement(5, [10, 100, 60, 110]),
    ]);

    expect(roots).toHaveLength(1);
    expect(roots[0].children.map((n) => n.id)).toEqual([3, 4, 2, 5, 6]);
  });

  test('handles bottom-left pages', () => {
    const roots = buildContainmentTree([
      {
        id: 1,
        label: 'text',
        bbox: { l: 0, t: 20, r: 100, b: 0, coordOrigin: 'BOTTOMLEFT' },
        contentLayer: 'body',
      },
      {
        id: 2,
        label: 'text',
        bbox: { l: 0, t: 100, r: 100, b: 80, coordOrigin: 'BOTTOMLEFT' },
        contentLayer: 'body',
      },
    ]);

    expect(roots.map((n) => n.id)).toEqual([2, 1]);
  });

  test('returns an empty forest for no elements', () => {
    expect(buildContainmentTree([])).toEqual([]);
  });
});
