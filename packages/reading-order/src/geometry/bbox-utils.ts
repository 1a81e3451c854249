import type { BoundingBox, Point } from '@layoutkit/model';

/**
 * Vertical extent of a box as [min y, max y], regardless of coordinate origin
 */
export function bboxVerticalRange(bbox: BoundingBox): [number, number] {
  return bbox.t <= bbox.b ? [bbox.t, bbox.b] : [bbox.b, bbox.t];
}

export function bboxWidth(bbox: BoundingBox): number {
  return Math.abs(bbox.r - bbox.l);
}

export function bboxHeight(bbox: BoundingBox): number {
  return Math.abs(bbox.b - bbox.t);
}

export function bboxArea(bbox: BoundingBox): number {
  return bboxWidth(bbox) * bboxHeight(bbox);
}

/**
 * Sort key for the visual top edge: smaller means higher on the page.
 * On a bottom-left page the top edge has the larger y, so it is negated.
 */
export function bboxVisualTop(bbox: BoundingBox): number {
  const [minY, maxY] = bboxVerticalRange(bbox);
  return bbox.coordOrigin === 'BOTTOMLEFT' ? -maxY : minY;
}

/**
 * Whether `inner` lies inside `outer` grown by `tolerance` on every side
 */
export function containsBBox(
  outer: BoundingBox,
  inner: BoundingBox,
  tolerance: number = 0,
): boolean {
  const [outerTop, outerBottom] = bboxVerticalRange(outer);
  const [innerTop, innerBottom] = bboxVerticalRange(inner);

  return (
    inner.l >= Math.min(outer.l, outer.r) - tolerance &&
    inner.r <= Math.max(outer.l, outer.r) + tolerance &&
    innerTop >= outerTop - tolerance &&
    innerBottom <= outerBottom + tolerance
  );
}

/**
 * Whether a point lies inside `bbox` grown by `tolerance` on every side
 */
export function containsPoint(
  bbox: BoundingBox,
  point: Point,
  tolerance: number = 0,
): boolean {
  const [x, y] = point;
  const [minY, maxY] = bboxVerticalRange(bbox);

  return (
    x >= Math.min(bbox.l, bbox.r) - tolerance &&
    x <= Math.max(bbox.l, bbox.r) + tolerance &&
    y >= minY - tolerance &&
    y <= maxY + tolerance
  );
}

export function containsAllPoints(
  bbox: BoundingBox,
  points: Point[],
  tolerance: number = 0,
): boolean {
  return points.every((point) => containsPoint(bbox, point, tolerance));
}
