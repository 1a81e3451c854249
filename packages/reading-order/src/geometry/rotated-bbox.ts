import type { BoundingBox, Point } from '@layoutkit/model';

/**
 * Minimal axis-aligned box enclosing `bbox` after rotating it by
 * `rotationDeg` degrees about its center.
 *
 * Positive angles turn clockwise on a top-left page. The result keeps the
 * input's coordinate origin. Multiples of 360 (and non-finite angles) return
 * the input box itself, so no rounding noise is introduced.
 *
 * @example
 * ```typescript
 * bboxEnclosingRotatedRect(
 *   { l: 30, t: 10, r: 70, b: 90, coordOrigin: 'TOPLEFT' },
 *   90,
 * );
 * // ≈ { l: 10, t: 30, r: 90, b: 70, coordOrigin: 'TOPLEFT' }
 * ```
 */
export function bboxEnclosingRotatedRect(
  bbox: BoundingBox,
  rotationDeg: number,
): BoundingBox {
  if (!Number.isFinite(rotationDeg) || rotationDeg % 360 === 0) {
    return bbox;
  }

  const cx = (bbox.l + bbox.r) / 2;
  const cy = (bbox.t + bbox.b) / 2;
  const radians = (rotationDeg * Math.PI) / 180;
  const cos = Math.cos(radians);
  const sin = Math.sin(radians);

  const corners: Point[] = [
    [bbox.l, bbox.t],
    [bbox.r, bbox.t],
    [bbox.r, bbox.b],
    [bbox.l, bbox.b],
  ];

  const rotated = corners.map(([x, y]): Point => {
    const dx = x - cx;
    const dy = y - cy;
    return [cx + dx * cos - dy * sin, cy + dx * sin + dy * cos];
  });

  const xs = rotated.map(([x]) => x);
  const ys = rotated.map(([, y]) => y);
  const minY = Math.min(...ys);
  const maxY = Math.max(...ys);

  return {
    l: Math.min(...xs),
    t: bbox.coordOrigin === 'BOTTOMLEFT' ? maxY : minY,
    r: Math.max(...xs),
    b: bbox.coordOrigin === 'BOTTOMLEFT' ? minY : maxY,
    coordOrigin: bbox.coordOrigin,
  };
}
