import { describe, expect, it } from "vitest";
import {
  colorDifference,
  compareFrames,
  continuityScore,
} from "../compare-frames";
import { fail, ok } from "../../result";
import type { DominantColor, FrameFeatures } from "../../types";

const BLACK: DominantColor = { rgb: [0, 0, 0], score: 1, pixelFraction: 0.5 };
const WHITE: DominantColor = { rgb: [255, 255, 255], score: 1, pixelFraction: 0.5 };
const RED: DominantColor = { rgb: [255, 0, 0], score: 0.8, pixelFraction: 0.4 };
const BLUE: DominantColor = { rgb: [0, 0, 255], score: 0.5, pixelFraction: 0.2 };

function features(names: string[], colors: DominantColor[] = [BLACK]): FrameFeatures {
  return {
    objects: names.map((name) => ({ name, confidence: 0.9, boundingBox: [] })),
    labels: [],
    colors,
  };
}

describe("colorDifference", () => {
  it("is exactly 1 when either side has no colors", () => {
    expect(colorDifference([], [BLACK])).toBe(1);
    expect(colorDifference([BLACK], [])).toBe(1);
    expect(colorDifference([], [])).toBe(1);
  });

  it("is 0 for a single identical color", () => {
    expect(colorDifference([RED], [RED])).toBe(0);
  });

  it("weights the channel distance by both scores", () => {
    expect(colorDifference([BLACK], [WHITE])).toBe(1);
    expect(colorDifference([{ ...BLACK, score: 0.5 }], [{ ...WHITE, score: 0.5 }])).toBe(0.25);
  });

  it("averages over all cross pairs rather than the best match", () => {
    // (black,black)=0 and (white,black)=1
    expect(colorDifference([BLACK, WHITE], [BLACK])).toBe(0.5);
  });

  it("only looks at the first three colors of each side", () => {
    expect(colorDifference([BLACK, BLACK, BLACK, WHITE], [BLACK])).toBe(0);
  });

  it("stays within [0, 1]", () => {
    const diff = colorDifference([RED, BLUE, WHITE], [BLACK, BLUE]);
    expect(diff).toBeGreaterThanOrEqual(0);
    expect(diff).toBeLessThanOrEqual(1);
  });
});

describe("continuityScore", () => {
  it("is 1 with no differences", () => {
    expect(continuityScore(0, 0, 0)).toBe(1);
  });

  it("applies the 0.4 / 0.3 / 0.3 weights", () => {
    expect(continuityScore(5, 0, 0.5)).toBeCloseTo(0.65, 10);
    expect(continuityScore(0, 10, 0)).toBeCloseTo(0.7, 10);
  });

  it("clamps large object counts", () => {
    expect(continuityScore(100, 0, 0)).toBeCloseTo(0.6, 10);
    const worst = continuityScore(100, 100, 1);
    expect(worst).toBeGreaterThanOrEqual(0);
    expect(worst).toBeCloseTo(0, 10);
  });
});

describe("compareFrames", () => {
  it("lists missing and new objects once each in first-seen order", () => {
    const result = compareFrames(
      ok(features(["chair", "lamp", "chair", "table"])),
      ok(features(["table", "cup", "sofa", "cup"]))
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.missingObjects).toEqual(["chair", "lamp"]);
    expect(result.value.newObjects).toEqual(["cup", "sofa"]);
  });

  it("scores identical single-color frames as perfectly continuous", () => {
    const frame = features(["chair", "lamp"]);
    const result = compareFrames(ok(frame), ok(frame));

    expect(result).toEqual(
      ok({ missingObjects: [], newObjects: [], colorDifference: 0, continuityScore: 1 })
    );
  });

  it("scores identical multi-color frames as 1 - 0.3 * color difference", () => {
    const frame = features(["chair"], [RED, BLUE]);
    const result = compareFrames(ok(frame), ok(frame));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    // red/blue cross pairs: (510 / 765) * 0.8 * 0.5 each, over 4 pairs
    expect(result.value.colorDifference).toBeCloseTo(0.4 / 3, 10);
    expect(result.value.continuityScore).toBeCloseTo(0.96, 10);
  });

  it("refuses to compare when either side failed", () => {
    const broken = fail<FrameFeatures>("service_error", "quota exceeded");

    expect(compareFrames(broken, ok(features([])))).toEqual(
      fail("incomparable_input", "Cannot compare frames due to analysis errors")
    );
    expect(compareFrames(ok(features([])), broken).ok).toBe(false);
  });
});
