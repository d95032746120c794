import { describe, expect, test } from "vitest";
import { circlePad, rectPad } from "../test-utils/pads";
import { coveredArea, findOverlappingPads, padOutline } from "./boolean-ops";

describe("pad outlines", () => {
  test("rectangles keep their corners", () => {
    expect(padOutline(rectPad(1, 1, 1, 2, 1)).outer).toEqual([
      { x: 0, y: 0.5 },
      { x: 2, y: 0.5 },
      { x: 2, y: 1.5 },
      { x: 0, y: 1.5 },
    ]);
  });

  test("circles are approximated with the requested segment count", () => {
    const outline = padOutline(circlePad(1, 0, 0, 1), 16);
    expect(outline.outer).toHaveLength(16);
    expect(outline.outer[0].x).toBeCloseTo(1, 12);
    expect(outline.outer[0].y).toBeCloseTo(0, 12);
  });
});

describe("overlap detection", () => {
  test("reports shared area of overlapping rectangles", () => {
    const pads = [rectPad(2, 0.5, 0, 1, 1), rectPad(1, 0, 0, 1, 1)];
    const overlaps = findOverlappingPads(pads);

    expect(overlaps).toHaveLength(1);
    expect(overlaps[0].a).toBe(1);
    expect(overlaps[0].b).toBe(2);
    expect(overlaps[0].area).toBeCloseTo(0.5, 9);
    expect(coveredArea(pads)).toBeCloseTo(1.5, 9);
  });

  test("touching pads do not overlap", () => {
    const pads = [rectPad(1, 0, 0, 1, 1), rectPad(2, 1, 0, 1, 1)];
    expect(findOverlappingPads(pads)).toEqual([]);
    expect(coveredArea(pads)).toBeCloseTo(2, 9);
  });

  test("distant pads are skipped", () => {
    const pads = [circlePad(1, 0, 0, 0.5), circlePad(2, 10, 0, 0.5), rectPad(3, 20, 20, 1, 1)];
    expect(findOverlappingPads(pads)).toEqual([]);
  });

  test("overlapping circles share a positive area", () => {
    const pads = [circlePad(1, 0, 0, 1), circlePad(2, 1, 0, 1)];
    const [overlap] = findOverlappingPads(pads, 64);

    expect(overlap.a).toBe(1);
    expect(overlap.b).toBe(2);
    // lens of two unit circles one radius apart: 2π/3 - √3/2
    expect(overlap.area).toBeCloseTo((2 * Math.PI) / 3 - Math.sqrt(3) / 2, 1);
  });

  test("covered area of a single pad is its outline area", () => {
    expect(coveredArea([rectPad(1, 0, 0, 2, 3)])).toBeCloseTo(6, 12);
    expect(coveredArea([])).toBe(0);
  });
});
