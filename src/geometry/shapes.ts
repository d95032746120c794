// src/geometry/shapes.ts

import type {
  BoundingBox,
  CircleGeometry,
  PadGeometry,
  RectangleGeometry,
  Vec2,
} from "../types/pad-model";

/**
 * Disc centred at `center`.
 */
export function makeCircle(center: Vec2, radius: number): CircleGeometry {
  return {
    kind: "circle",
    center: { x: center.x, y: center.y },
    radius,
  };
}

/**
 * Axis aligned rectangle centred at `center`.
 */
export function makeRectangle(
  center: Vec2,
  width: number,
  height: number
): RectangleGeometry {
  const halfW = width / 2;
  const halfH = height / 2;
  return {
    kind: "rectangle",
    minX: center.x - halfW,
    minY: center.y - halfH,
    maxX: center.x + halfW,
    maxY: center.y + halfH,
  };
}

export function shapeArea(geometry: PadGeometry): number {
  if (geometry.kind === "circle") {
    return Math.PI * geometry.radius * geometry.radius;
  }
  return (geometry.maxX - geometry.minX) * (geometry.maxY - geometry.minY);
}

export function boundingBox(geometry: PadGeometry): BoundingBox {
  if (geometry.kind === "circle") {
    const { center, radius } = geometry;
    return {
      minX: center.x - radius,
      minY: center.y - radius,
      maxX: center.x + radius,
      maxY: center.y + radius,
    };
  }
  return {
    minX: geometry.minX,
    minY: geometry.minY,
    maxX: geometry.maxX,
    maxY: geometry.maxY,
  };
}

/**
 * Longest and shortest bounding extents. For a circle both are the
 * diameter.
 */
export function shapeExtents(geometry: PadGeometry): {
  length: number;
  width: number;
} {
  const bbox = boundingBox(geometry);
  const dx = bbox.maxX - bbox.minX;
  const dy = bbox.maxY - bbox.minY;
  return { length: Math.max(dx, dy), width: Math.min(dx, dy) };
}

/**
 * Union of bounding boxes, or null for an empty list.
 */
export function mergeBoundingBoxes(boxes: BoundingBox[]): BoundingBox | null {
  if (!boxes.length) return null;

  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;

  for (const b of boxes) {
    if (b.minX < minX) minX = b.minX;
    if (b.minY < minY) minY = b.minY;
    if (b.maxX > maxX) maxX = b.maxX;
    if (b.maxY > maxY) maxY = b.maxY;
  }

  return { minX, minY, maxX, maxY };
}

/**
 * True when the boxes share interior area; touching edges do not count.
 */
export function boxesOverlap(a: BoundingBox, b: BoundingBox): boolean {
  return a.minX < b.maxX && b.minX < a.maxX && a.minY < b.maxY && b.minY < a.maxY;
}
