import type { Result } from "./result";
import type { FrameComparison, ValidationReport } from "./types";

function serializeResult<T>(result: Result<T>, serialize: (value: T) => unknown): unknown {
  return result.ok ? serialize(result.value) : { error: result.error.message };
}

function serializeComparison(comparison: FrameComparison): Record<string, unknown> {
  return {
    missing_objects: comparison.missingObjects,
    new_objects: comparison.newObjects,
    color_difference: comparison.colorDifference,
    continuity_score: comparison.continuityScore,
  };
}

/** The report in its snake_case JSON wire format. */
export function serializeReport(report: ValidationReport): Record<string, unknown> {
  const analyses: Record<string, unknown> = {};
  for (const [key, judgment] of Object.entries(report.compositionAnalyses)) {
    analyses[key] = serializeResult(judgment, (value) => value);
  }

  return {
    frame_count: report.frameCount,
    continuity_scores: report.continuityScores,
    average_continuity: report.averageContinuity,
    problem_frames: report.problemFrames,
    comparisons: report.comparisons.map((c) => serializeResult(c, serializeComparison)),
    composition_analyses: analyses,
    validation_summary: {
      overall_continuity: report.summary.overallContinuity,
      scene_quality: report.summary.sceneQuality,
      issue_count: report.summary.issueCount,
      recommendations: report.summary.recommendations,
    },
  };
}

/** Report JSON, or `{ "error": ... }` when validation could not run. */
export function renderResult(result: Result<ValidationReport>): string {
  const body = result.ok ? serializeReport(result.value) : { error: result.error.message };
  return JSON.stringify(body, null, 2);
}
