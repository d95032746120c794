import { describe, expect, test } from "vitest";
import pino from "pino";
import { VolumeInputError } from "../core/errors";
import { ThicknessManager } from "../thickness/thickness-manager";
import { circlePad, rectPad } from "../test-utils/pads";
import type { Pad } from "../types/pad-model";
import {
  effectiveThickness,
  padSummary,
  padVolume,
  summarizeVolumes,
  totalVolume,
} from "./volume-calculator";

function overrides(entries: Record<number, number>) {
  return {
    getThickness: (id: number, fallback: number) => entries[id] ?? fallback,
  };
}

describe("volume calculator", () => {
  test("uses the pad default without overrides", () => {
    const pad = rectPad(1, 0, 0, 2, 0.5);
    expect(effectiveThickness(pad)).toBe(0.15);
    expect(padVolume(pad)).toBeCloseTo(0.15, 12);
  });

  test("uses an override when present", () => {
    const pad = rectPad(1, 0, 0, 2, 0.5);
    expect(padVolume(pad, overrides({ 1: 0.2 }))).toBeCloseTo(0.2, 12);
  });

  test("zero area gives zero volume", () => {
    const pad: Pad = { ...rectPad(1, 0, 0, 1, 1), area: 0 };
    expect(padVolume(pad)).toBe(0);
  });

  test("rejects negative area and thickness", () => {
    const negativeArea: Pad = { ...rectPad(4, 0, 0, 1, 1), area: -1 };
    expect(() => padVolume(negativeArea)).toThrow(VolumeInputError);

    const pad = rectPad(5, 0, 0, 1, 1);
    expect(() => padVolume(pad, overrides({ 5: -0.1 }))).toThrow(VolumeInputError);
    expect(() => effectiveThickness(pad, overrides({ 5: Number.NaN }))).toThrow(
      "pad 5 has invalid thickness NaN"
    );
  });

  test("totals add up per pad volumes", () => {
    const pads = [rectPad(1, 0, 0, 1, 1), rectPad(2, 5, 0, 2, 1), circlePad(3, 10, 0, 0.5)];
    const expected = 1 * 0.15 + 2 * 0.15 + Math.PI * 0.25 * 0.3;

    expect(totalVolume(pads, overrides({ 3: 0.3 }))).toBeCloseTo(expected, 12);
    expect(totalVolume([])).toBe(0);
  });

  test("summaries report overridden pads", () => {
    const manager = new ThicknessManager({ logger: pino({ level: "silent" }) });
    manager.setThickness([2], 0.1);
    const pads = [rectPad(1, 0, 0, 1, 1), rectPad(2, 3, 4, 1, 2)];

    const summary = summarizeVolumes(pads, manager);
    expect(summary.padCount).toBe(2);
    expect(summary.overriddenCount).toBe(1);
    expect(summary.totalArea).toBe(3);
    expect(summary.totalVolume).toBeCloseTo(0.15 + 0.2, 12);

    expect(padSummary(pads[1], manager)).toEqual({
      id: 2,
      shape: "rectangle",
      area: 2,
      thickness: 0.1,
      volume: 0.2,
      position: { x: 3, y: 4 },
      isOverridden: true,
    });
  });

  test("without hasOverride a differing thickness counts as overridden", () => {
    const pads = [rectPad(1, 0, 0, 1, 1), rectPad(2, 3, 0, 1, 1)];
    const summary = summarizeVolumes(pads, overrides({ 1: 0.15, 2: 0.12 }));
    expect(summary.overriddenCount).toBe(1);
  });
});
