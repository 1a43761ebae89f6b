import type { Result } from "./result";

export interface NormalizedVertex {
  x: number;
  y: number;
}

export interface DetectedObject {
  name: string;
  confidence: number;           // 0.0-1.0
  boundingBox: NormalizedVertex[];
}

export interface DetectedLabel {
  description: string;
  confidence: number;           // 0.0-1.0
}

export type Rgb = readonly [number, number, number];  // 0-255 per channel

export interface DominantColor {
  rgb: Rgb;
  score: number;                // 0.0-1.0
  pixelFraction: number;        // 0.0-1.0
}

export interface FrameFeatures {
  readonly objects: readonly DetectedObject[];
  readonly labels: readonly DetectedLabel[];
  readonly colors: readonly DominantColor[];   // as ordered by the extractor, most dominant first
}

export interface FrameComparison {
  missingObjects: string[];     // in frame N, gone from frame N+1
  newObjects: string[];         // appeared in frame N+1
  colorDifference: number;      // 0 = identical, 1 = maximally different
  continuityScore: number;      // 1 = perfect continuity
}

/**
 * Critique returned by the composition critic. Opaque apart from
 * `overall_rating`, `composition_quality`, `composition_issues` and the
 * `raw_analysis` fallback.
 */
export type CompositionJudgment = Record<string, unknown>;

export interface FrameImage {
  path: string;
  data: Buffer;
  mimeType: string;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface FeatureExtractor {
  readonly name: string;
  extract(frame: FrameImage, options?: CallOptions): Promise<Result<FrameFeatures>>;
}

export interface CompositionCritic {
  readonly name: string;
  critique(frame: FrameImage, options?: CallOptions): Promise<Result<CompositionJudgment>>;
}

export interface ValidationSummary {
  overallContinuity: number;
  sceneQuality: number;
  issueCount: number;
  recommendations: string[];
}

export interface ValidationReport {
  frameCount: number;
  continuityScores: number[];
  averageContinuity: number;
  problemFrames: number[];      // index of the second frame of each low-continuity pair
  comparisons: Result<FrameComparison>[];
  compositionAnalyses: Record<string, Result<CompositionJudgment>>;  // "first", "last", "problem_<n>"
  summary: ValidationSummary;
}

export type CriticProvider = "gemini" | "claude";

export interface ValidatorConfig {
  geminiApiKey?: string;
  anthropicApiKey?: string;
  projectId?: string;
  credentialsFile?: string;
  critic: CriticProvider;
  criticModel?: string;
  concurrency: number;
  timeoutMs: number;
  minContinuity: number;        // 0.0-1.0
  logFile?: string;
  verbose: boolean;
}
