import { makeCircle, makeRectangle, shapeArea, shapeExtents } from "../geometry/shapes";
import { DEFAULT_THICKNESS_MM } from "../geometry/constants";
import type { Pad, PadGeometry } from "../types/pad-model";

function padFrom(id: number, geometry: PadGeometry, x: number, y: number, thickness: number): Pad {
  const area = shapeArea(geometry);
  const { length, width } = shapeExtents(geometry);
  return {
    id,
    shape: geometry.kind,
    position: { x, y },
    geometry,
    area,
    defaultThickness: thickness,
    defaultVolume: area * thickness,
    length,
    width,
    apertureId: 10,
    line: id,
  };
}

export function rectPad(
  id: number,
  x: number,
  y: number,
  w: number,
  h: number,
  thickness = DEFAULT_THICKNESS_MM
): Pad {
  return padFrom(id, makeRectangle({ x, y }, w, h), x, y, thickness);
}

export function circlePad(
  id: number,
  x: number,
  y: number,
  radius: number,
  thickness = DEFAULT_THICKNESS_MM
): Pad {
  return padFrom(id, makeCircle({ x, y }, radius), x, y, thickness);
}
