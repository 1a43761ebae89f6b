import { fail, ok, type Result } from "../result";
import type { DetectedObject, DominantColor, FrameComparison, FrameFeatures } from "../types";

export const CONTINUITY_WEIGHTS = {
  missing: 0.4,
  new: 0.3,
  color: 0.3,
} as const;

// 10+ differing objects counts as a complete break in continuity
export const OBJECT_COUNT_NORMALIZER = 10;

export const TOP_COLOR_COUNT = 3;

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

/** Object names in first-seen order, each listed once. */
function objectNames(objects: readonly DetectedObject[]): string[] {
  return [...new Set(objects.map((obj) => obj.name))];
}

/**
 * Mean weighted channel distance over every cross pair of the top colors of
 * each frame. Returns 1.0 when either side has no colors.
 */
export function colorDifference(
  colorsA: readonly DominantColor[],
  colorsB: readonly DominantColor[]
): number {
  if (colorsA.length === 0 || colorsB.length === 0) {
    return 1.0;
  }

  const topA = colorsA.slice(0, TOP_COLOR_COUNT);
  const topB = colorsB.slice(0, TOP_COLOR_COUNT);

  let total = 0;
  let count = 0;
  for (const a of topA) {
    for (const b of topB) {
      const distance =
        (Math.abs(a.rgb[0] - b.rgb[0]) +
          Math.abs(a.rgb[1] - b.rgb[1]) +
          Math.abs(a.rgb[2] - b.rgb[2])) /
        (3 * 255);
      total += distance * a.score * b.score;
      count++;
    }
  }

  return total / Math.max(1, count);
}

export function continuityScore(missingCount: number, newCount: number, colorDiff: number): number {
  const normalizedMissing = Math.min(1, missingCount / OBJECT_COUNT_NORMALIZER);
  const normalizedNew = Math.min(1, newCount / OBJECT_COUNT_NORMALIZER);

  return clamp01(
    1 -
      (CONTINUITY_WEIGHTS.missing * normalizedMissing +
        CONTINUITY_WEIGHTS.new * normalizedNew +
        CONTINUITY_WEIGHTS.color * colorDiff)
  );
}

/**
 * Compares two consecutive frames. Fails with `incomparable_input` when
 * either frame's features could not be extracted.
 */
export function compareFrames(
  a: Result<FrameFeatures>,
  b: Result<FrameFeatures>
): Result<FrameComparison> {
  if (!a.ok || !b.ok) {
    return fail("incomparable_input", "Cannot compare frames due to analysis errors");
  }

  const namesA = objectNames(a.value.objects);
  const namesB = objectNames(b.value.objects);
  const setA = new Set(namesA);
  const setB = new Set(namesB);

  const missingObjects = namesA.filter((name) => !setB.has(name));
  const newObjects = namesB.filter((name) => !setA.has(name));
  const colorDiff = colorDifference(a.value.colors, b.value.colors);

  return ok({
    missingObjects,
    newObjects,
    colorDifference: colorDiff,
    continuityScore: continuityScore(missingObjects.length, newObjects.length, colorDiff),
  });
}
