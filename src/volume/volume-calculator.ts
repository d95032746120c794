// src/volume/volume-calculator.ts

import type { Pad, PadShapeKind, Vec2 } from "../types/pad-model";
import { VolumeInputError } from "../core/errors";

/**
 * Source of per-pad thickness overrides. ThicknessManager implements it.
 */
export interface ThicknessOverrides {
  getThickness(padId: number, defaultThickness: number): number;
  hasOverride?(padId: number): boolean;
}

export interface PadVolumeSummary {
  id: number;
  shape: PadShapeKind;
  area: number;
  thickness: number;
  volume: number;
  position: Vec2;
  isOverridden: boolean;
}

export interface VolumeSummary {
  padCount: number;
  overriddenCount: number;
  totalArea: number;
  totalVolume: number;
}

/**
 * Thickness used for `pad`: the override when there is one, the pad's
 * default otherwise.
 */
export function effectiveThickness(pad: Pad, overrides?: ThicknessOverrides): number {
  const thickness = overrides
    ? overrides.getThickness(pad.id, pad.defaultThickness)
    : pad.defaultThickness;

  if (!Number.isFinite(thickness) || thickness < 0) {
    throw new VolumeInputError(pad.id, `pad ${pad.id} has invalid thickness ${thickness}`);
  }
  return thickness;
}

/**
 * area * effective thickness. Zero area gives zero volume.
 */
export function padVolume(pad: Pad, overrides?: ThicknessOverrides): number {
  if (!Number.isFinite(pad.area) || pad.area < 0) {
    throw new VolumeInputError(pad.id, `pad ${pad.id} has invalid area ${pad.area}`);
  }
  return pad.area * effectiveThickness(pad, overrides);
}

export function totalVolume(
  pads: Iterable<Pad>,
  overrides?: ThicknessOverrides
): number {
  let sum = 0;
  for (const pad of pads) {
    sum += padVolume(pad, overrides);
  }
  return sum;
}

export function padSummary(pad: Pad, overrides?: ThicknessOverrides): PadVolumeSummary {
  const thickness = effectiveThickness(pad, overrides);
  return {
    id: pad.id,
    shape: pad.shape,
    area: pad.area,
    thickness,
    volume: padVolume(pad, overrides),
    position: { x: pad.position.x, y: pad.position.y },
    isOverridden: isOverridden(pad, overrides),
  };
}

export function summarizeVolumes(
  pads: Iterable<Pad>,
  overrides?: ThicknessOverrides
): VolumeSummary {
  const summary: VolumeSummary = {
    padCount: 0,
    overriddenCount: 0,
    totalArea: 0,
    totalVolume: 0,
  };

  for (const pad of pads) {
    summary.padCount += 1;
    summary.totalArea += pad.area;
    summary.totalVolume += padVolume(pad, overrides);
    if (isOverridden(pad, overrides)) summary.overriddenCount += 1;
  }

  return summary;
}

function isOverridden(pad: Pad, overrides?: ThicknessOverrides): boolean {
  if (!overrides) return false;
  if (overrides.hasOverride) return overrides.hasOverride(pad.id);
  return overrides.getThickness(pad.id, pad.defaultThickness) !== pad.defaultThickness;
}
