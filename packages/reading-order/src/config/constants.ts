/**
 * Default tolerances for reading-order resolution, in page-coordinate units
 */
export const READING_ORDER = {
  /**
   * Slack allowed when deciding whether one box (or a path point) lies inside
   * another during tree construction and conflict resolution
   */
  CONTAINMENT_TOLERANCE: 1.0,

  /**
   * Slack allowed when resolving a path point to the element under it
   */
  POINT_TOLERANCE: 0.0,

  /**
   * A path whose points all lie within this distance of a table's box is
   * treated as drawn inside the table
   */
  TABLE_BOUNDARY_TOLERANCE: 0.0,
} as const;
