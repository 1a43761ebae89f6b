import { fail, failFromError, ok, type Result } from "./result";
import type { Logger } from "./logger";
import { compareFrames } from "./tools/compare-frames";
import { mapWithConcurrency, withTimeout } from "./tools/concurrency";
import { loadFrame as loadFrameFromDisk } from "./tools/load-frame";
import { continuityScores, averageContinuity, summarize } from "./summary";
import type {
  CompositionCritic,
  CompositionJudgment,
  FeatureExtractor,
  FrameComparison,
  FrameFeatures,
  FrameImage,
  ValidationReport,
} from "./types";

export const MIN_FRAMES = 2;
export const DEFAULT_MIN_CONTINUITY = 0.7;
export const MAX_PROBLEM_JUDGMENTS = 3;
export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_TIMEOUT_MS = 60_000;

export interface SequenceValidatorOptions {
  extractor: FeatureExtractor;
  critic: CompositionCritic;
  logger: Logger;
  concurrency?: number;
  timeoutMs?: number;
  /** Pairs scoring below this are problem frames. */
  minContinuity?: number;
  loadFrame?: (path: string) => Promise<FrameImage>;
}

interface JudgmentRequest {
  key: string;
  frameIndex: number;
}

/**
 * Scores a frame sequence: features for every frame, a comparison for every
 * consecutive pair, composition judgments for the first, last and up to three
 * low-continuity frames, then the aggregated summary.
 *
 * Failures of individual frames, pairs or judgments are recorded in the
 * report and do not stop the run. Holds no state between `validate` calls.
 */
export class SequenceValidator {
  private readonly extractor: FeatureExtractor;
  private readonly critic: CompositionCritic;
  private readonly logger: Logger;
  private readonly concurrency: number;
  private readonly timeoutMs: number;
  private readonly minContinuity: number;
  private readonly loadFrame: (path: string) => Promise<FrameImage>;

  constructor(options: SequenceValidatorOptions) {
    this.extractor = options.extractor;
    this.critic = options.critic;
    this.logger = options.logger;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.minContinuity = options.minContinuity ?? DEFAULT_MIN_CONTINUITY;
    this.loadFrame = options.loadFrame ?? loadFrameFromDisk;
  }

  async validate(framePaths: readonly string[]): Promise<Result<ValidationReport>> {
    if (framePaths.length < MIN_FRAMES) {
      return fail("insufficient_frames", "Need at least 2 frames to validate a sequence");
    }

    // Each frame is read at most once, shared by extraction and critique.
    const images = new Map<number, Promise<Result<FrameImage>>>();
    const image = (index: number): Promise<Result<FrameImage>> => {
      let pending = images.get(index);
      if (!pending) {
        pending = this.readFrame(framePaths[index]);
        images.set(index, pending);
      }
      return pending;
    };

    const features = await mapWithConcurrency(framePaths, this.concurrency, (_, index) =>
      this.extractFeatures(index, image)
    );

    const comparisons: Result<FrameComparison>[] = [];
    for (let i = 0; i < features.length - 1; i++) {
      const comparison = compareFrames(features[i], features[i + 1]);
      if (comparison.ok) {
        this.logger.info(`Frames ${i}-${i + 1} compared. Continuity score: ${comparison.value.continuityScore}`);
      } else {
        this.logger.warn(`Frames ${i}-${i + 1} not compared: ${comparison.error.message}`);
      }
      comparisons.push(comparison);
    }

    const requests: JudgmentRequest[] = [
      { key: "first", frameIndex: 0 },
      { key: "last", frameIndex: framePaths.length - 1 },
    ];

    const problemFrames: number[] = [];
    comparisons.forEach((comparison, i) => {
      if (comparison.ok && comparison.value.continuityScore < this.minContinuity) {
        const frameIndex = i + 1;
        problemFrames.push(frameIndex);
        if (problemFrames.length <= MAX_PROBLEM_JUDGMENTS) {
          requests.push({ key: `problem_${frameIndex}`, frameIndex });
        }
      }
    });

    const judgments = await mapWithConcurrency(requests, this.concurrency, (request) =>
      this.requestJudgment(request, image)
    );

    const compositionAnalyses: Record<string, Result<CompositionJudgment>> = {};
    requests.forEach((request, i) => {
      compositionAnalyses[request.key] = judgments[i];
    });

    const scores = continuityScores(comparisons);
    const report: ValidationReport = {
      frameCount: framePaths.length,
      continuityScores: scores,
      averageContinuity: averageContinuity(scores),
      problemFrames,
      comparisons,
      compositionAnalyses,
      summary: summarize({ comparisons, analyses: compositionAnalyses, problemFrames }),
    };

    this.logger.info(`Completed validation of ${framePaths.length} frames`, {
      averageContinuity: report.averageContinuity,
      problemFrames: problemFrames.length,
    });
    return ok(report);
  }

  private async readFrame(path: string): Promise<Result<FrameImage>> {
    try {
      return ok(await this.loadFrame(path));
    } catch (error) {
      return failFromError(error, "load_failed");
    }
  }

  private async extractFeatures(
    index: number,
    image: (index: number) => Promise<Result<FrameImage>>
  ): Promise<Result<FrameFeatures>> {
    const frame = await image(index);
    if (!frame.ok) {
      this.logger.error(`Error analyzing frame ${index}: ${frame.error.message}`);
      return frame;
    }

    let result: Result<FrameFeatures>;
    try {
      result = await withTimeout(`Feature extraction for ${frame.value.path}`, this.timeoutMs, (signal) =>
        this.extractor.extract(frame.value, { signal })
      );
    } catch (error) {
      result = failFromError(error);
    }

    if (result.ok) {
      this.logger.info(`Successfully analyzed frame: ${frame.value.path}`);
    } else {
      this.logger.error(`Error analyzing frame: ${result.error.message}`, { frame: frame.value.path });
    }
    return result;
  }

  private async requestJudgment(
    request: JudgmentRequest,
    image: (index: number) => Promise<Result<FrameImage>>
  ): Promise<Result<CompositionJudgment>> {
    const frame = await image(request.frameIndex);
    if (!frame.ok) {
      return frame;
    }

    let result: Result<CompositionJudgment>;
    try {
      result = await withTimeout(`Composition critique for ${frame.value.path}`, this.timeoutMs, (signal) =>
        this.critic.critique(frame.value, { signal })
      );
    } catch (error) {
      result = failFromError(error);
    }

    if (!result.ok) {
      this.logger.error(`Error getting composition analysis (${request.key}): ${result.error.message}`);
    }
    return result;
  }
}
