// src/types/pad-model.ts

export interface Vec2 {
  x: number;
  y: number;
}

/**
 * Closed polygon, outer ring plus optional holes. Rings are not repeated
 * at the end (first point is not duplicated as last).
 */
export interface Polygon {
  outer: Vec2[];
  holes: Vec2[][];
}

export interface BoundingBox {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

/**
 * Shape tag exposed to consumers. "polygon" is reserved for aperture
 * kinds the interpreter does not produce yet.
 */
export type PadShapeKind = "circle" | "rectangle" | "polygon";

export interface CircleGeometry {
  kind: "circle";
  center: Vec2;
  radius: number;
}

export interface RectangleGeometry {
  kind: "rectangle";
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export type PadGeometry = CircleGeometry | RectangleGeometry;

/**
 * A single flashed pad. Pads are created once by the interpreter and
 * frozen; thickness overrides live in the ThicknessManager.
 */
export interface Pad {
  /** 1-based, assigned in creation order without gaps */
  readonly id: number;
  readonly shape: PadShapeKind;
  /** Flash position, in file units */
  readonly position: Vec2;
  readonly geometry: PadGeometry;
  readonly area: number;
  readonly defaultThickness: number;
  /** area * defaultThickness */
  readonly defaultVolume: number;
  /** Longest bounding extent */
  readonly length: number;
  /** Shortest bounding extent */
  readonly width: number;
  /** Aperture the pad was flashed with */
  readonly apertureId: number;
  /** Source line number (1-based) of the flash */
  readonly line: number;
}

export type LengthUnit = "mm" | "in";
