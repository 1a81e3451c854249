/**
 * Coordinate origin of a page.
 *
 * - `TOPLEFT`: y grows downwards, so `t < b`
 * - `BOTTOMLEFT`: y grows upwards, so `t > b`
 */
export type CoordOrigin = 'TOPLEFT' | 'BOTTOMLEFT';

// Axis-aligned rectangle in page coordinates
export interface BoundingBox {
  l: number;
  t: number;
  r: number;
  b: number;
  coordOrigin: CoordOrigin;
}

// 2-D point in page coordinates: [x, y]
export type Point = [number, number];
