// src/geometry/boolean-ops.ts

import * as polygonClipping from "polygon-clipping";
import type { Pad, Polygon, Vec2 } from "../types/pad-model";
import { boundingBox, boxesOverlap } from "./shapes";
import { DEFAULT_CIRCLE_SEGMENTS, OVERLAP_AREA_EPS } from "./constants";
import { componentLogger } from "../core/logger";

const log = componentLogger("boolean-ops");

/**
 * polygon-clipping uses nested arrays:
 * - Point: [x, y]
 * - Ring: Point[]
 * - Polygon: Ring[]           // [outer, hole1, hole2, ...]
 * - MultiPolygon: Polygon[]   // [polygon1, polygon2, ...]
 */

type Point2D = [number, number];
type Ring = Point2D[];
type PolygonCoords = Ring[];
type MultiPolygonCoords = PolygonCoords[];

export interface PadOverlap {
  a: number;
  b: number;
  /** Shared area, in file units squared */
  area: number;
}

/**
 * Outline of a pad as a polygon. Circles are approximated by a regular
 * polygon with `segments` corners, so its area is slightly below π r².
 */
export function padOutline(pad: Pad, segments: number = DEFAULT_CIRCLE_SEGMENTS): Polygon {
  const g = pad.geometry;
  if (g.kind === "circle") {
    return approximateCircle(g.center, g.radius, segments);
  }
  return {
    outer: [
      { x: g.minX, y: g.minY },
      { x: g.maxX, y: g.minY },
      { x: g.maxX, y: g.maxY },
      { x: g.minX, y: g.maxY },
    ],
    holes: [],
  };
}

/**
 * Pairs of pads whose outlines share a positive area, ordered by ids.
 * Bounding boxes are used to skip pairs that cannot touch.
 */
export function findOverlappingPads(
  pads: readonly Pad[],
  segments: number = DEFAULT_CIRCLE_SEGMENTS
): PadOverlap[] {
  const items = pads
    .map((pad) => ({ pad, box: boundingBox(pad.geometry) }))
    .sort((p, q) => p.box.minX - q.box.minX);

  const outlines = new Map<number, PolygonCoords>();
  const coordsOf = (pad: Pad): PolygonCoords => {
    let coords = outlines.get(pad.id);
    if (!coords) {
      coords = polygonToCoords(padOutline(pad, segments));
      outlines.set(pad.id, coords);
    }
    return coords;
  };

  const overlaps: PadOverlap[] = [];

  for (let i = 0; i < items.length; i++) {
    const a = items[i];
    for (let j = i + 1; j < items.length; j++) {
      const b = items[j];
      // sorted by minX, nothing further right can overlap a
      if (b.box.minX >= a.box.maxX) break;
      if (!boxesOverlap(a.box, b.box)) continue;

      const shared = safeIntersection(coordsOf(a.pad), coordsOf(b.pad));
      const area = shared ? multiPolygonArea(shared) : 0;
      if (area > OVERLAP_AREA_EPS) {
        const [lo, hi] = a.pad.id < b.pad.id ? [a.pad, b.pad] : [b.pad, a.pad];
        overlaps.push({ a: lo.id, b: hi.id, area });
      }
    }
  }

  return overlaps.sort((p, q) => p.a - q.a || p.b - q.b);
}

/**
 * Area of the union of all pad outlines. Equals the sum of pad areas
 * (up to circle approximation) when no openings overlap.
 */
export function coveredArea(
  pads: readonly Pad[],
  segments: number = DEFAULT_CIRCLE_SEGMENTS
): number {
  if (!pads.length) return 0;

  const coords = pads.map((pad) => polygonToCoords(padOutline(pad, segments)));
  if (coords.length === 1) return multiPolygonArea([coords[0]]);

  const [first, ...rest] = coords;
  const merged = polygonClipping.union(first, ...rest);
  return multiPolygonArea(merged);
}

/**
 * Convert our Polygon to polygon-clipping coordinates.
 */
function polygonToCoords(poly: Polygon): PolygonCoords {
  const outer: Ring = poly.outer.map((p): Point2D => [p.x, p.y]);
  const holes: Ring[] = poly.holes
    .filter((h) => h.length >= 3)
    .map((hole) => hole.map((p): Point2D => [p.x, p.y]));
  return [outer, ...holes];
}

function safeIntersection(
  a: PolygonCoords,
  b: PolygonCoords
): MultiPolygonCoords | null {
  try {
    return polygonClipping.intersection(a, b);
  } catch (err) {
    log.warn({ err }, "polygon-clipping failed in intersection");
    return null;
  }
}

function multiPolygonArea(multi: MultiPolygonCoords): number {
  let total = 0;
  for (const [outer, ...holes] of multi) {
    total += Math.abs(ringArea(outer));
    for (const hole of holes) {
      total -= Math.abs(ringArea(hole));
    }
  }
  return total;
}

// Shoelace; rings may or may not repeat their first point
function ringArea(ring: Ring): number {
  let sum = 0;
  for (let i = 0; i < ring.length; i++) {
    const [x1, y1] = ring[i];
    const [x2, y2] = ring[(i + 1) % ring.length];
    sum += x1 * y2 - x2 * y1;
  }
  return sum / 2;
}

function approximateCircle(center: Vec2, radius: number, segments: number): Polygon {
  const outer: Vec2[] = [];
  // clockwise winding
  for (let i = 0; i < segments; i++) {
    const theta = -(i / segments) * Math.PI * 2;
    outer.push({
      x: center.x + Math.cos(theta) * radius,
      y: center.y + Math.sin(theta) * radius,
    });
  }
  return { outer, holes: [] };
}
