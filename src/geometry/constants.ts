// src/geometry/constants.ts

/**
 * Default paste deposit thickness: 150 µm, expressed in millimetres so it
 * matches pad areas from metric Gerbers.
 */
export const DEFAULT_THICKNESS_MM = 0.15;

/**
 * Coordinate scale used until a %FS statement is seen.
 */
export const DEFAULT_COORDINATE_SCALE = 1.0;

/**
 * Segment count used when a circular pad is approximated by a polygon.
 */
export const DEFAULT_CIRCLE_SEGMENTS = 32;

/**
 * Overlaps below this area (file units squared) are treated as touching.
 */
export const OVERLAP_AREA_EPS = 1e-9;
