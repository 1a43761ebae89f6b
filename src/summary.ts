import type { Result } from "./result";
import type { CompositionJudgment, FrameComparison, ValidationSummary } from "./types";

export const MAX_LISTED_PROBLEM_FRAMES = 3;
export const REPEATED_ISSUE_MIN_COUNT = 2;
export const DEFAULT_RECOMMENDATION = "Scene appears to have good continuity and composition";

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * `overall_rating` as a number: a finite number, or a string holding a
 * decimal number. Anything else (missing, failed judgment) rates 0.
 */
export function readOverallRating(judgment: Result<CompositionJudgment> | undefined): number {
  if (!judgment?.ok) return 0;
  const rating = judgment.value.overall_rating;
  if (typeof rating === "number") {
    return Number.isFinite(rating) ? rating : 0;
  }
  if (typeof rating === "string" && DECIMAL.test(rating.trim())) {
    const parsed = Number(rating.trim());
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

export function averageContinuity(scores: readonly number[]): number {
  const total = scores.reduce((sum, score) => sum + score, 0);
  return total / Math.max(1, scores.length);
}

export function continuityScores(comparisons: readonly Result<FrameComparison>[]): number[] {
  return comparisons.map((c) => (c.ok ? c.value.continuityScore : 0));
}

export function sceneQuality(average: number, firstRating: number, lastRating: number): number {
  return average * 0.6 + ((firstRating + lastRating) / 20) * 0.4;
}

function compositionIssues(judgment: CompositionJudgment): string[] {
  const issues = judgment.composition_issues;
  if (!Array.isArray(issues)) return [];
  return issues.filter((issue): issue is string => typeof issue === "string");
}

export function generateRecommendations(
  problemFrames: readonly number[],
  analyses: Record<string, Result<CompositionJudgment>>
): string[] {
  const recommendations: string[] = [];

  if (problemFrames.length > 0) {
    let frames = problemFrames.slice(0, MAX_LISTED_PROBLEM_FRAMES).join(", ");
    if (problemFrames.length > MAX_LISTED_PROBLEM_FRAMES) {
      frames += ` and ${problemFrames.length - MAX_LISTED_PROBLEM_FRAMES} more`;
    }
    recommendations.push(`Review continuity in frames ${frames}`);
  }

  // Counted once per judgment; Map keeps first-seen order.
  const issueCounts = new Map<string, number>();
  for (const analysis of Object.values(analyses)) {
    if (!analysis.ok || !("composition_quality" in analysis.value)) continue;
    for (const issue of new Set(compositionIssues(analysis.value))) {
      issueCounts.set(issue, (issueCounts.get(issue) ?? 0) + 1);
    }
  }
  for (const [issue, count] of issueCounts) {
    if (count >= REPEATED_ISSUE_MIN_COUNT) {
      recommendations.push(`Fix ${issue} composition issue`);
    }
  }

  if (recommendations.length === 0) {
    recommendations.push(DEFAULT_RECOMMENDATION);
  }
  return recommendations;
}

export function summarize(params: {
  comparisons: readonly Result<FrameComparison>[];
  analyses: Record<string, Result<CompositionJudgment>>;
  problemFrames: readonly number[];
}): ValidationSummary {
  const { comparisons, analyses, problemFrames } = params;
  const average = averageContinuity(continuityScores(comparisons));

  return {
    overallContinuity: average,
    sceneQuality: sceneQuality(
      average,
      readOverallRating(analyses["first"]),
      readOverallRating(analyses["last"])
    ),
    issueCount: problemFrames.length,
    recommendations: generateRecommendations(problemFrames, analyses),
  };
}
