import { fail, ok, type Result } from "../result";
import type {
  CallOptions,
  CompositionCritic,
  CompositionJudgment,
  DominantColor,
  FeatureExtractor,
  FrameFeatures,
  FrameImage,
} from "../types";

export const BLACK: DominantColor = { rgb: [0, 0, 0], score: 1, pixelFraction: 0.6 };
export const HALF_WHITE: DominantColor = { rgb: [255, 255, 255], score: 0.5, pixelFraction: 0.4 };

export function features(names: string[], colors: DominantColor[] = [BLACK]): FrameFeatures {
  return {
    objects: names.map((name) => ({ name, confidence: 0.9, boundingBox: [] })),
    labels: [],
    colors,
  };
}

export async function fakeLoadFrame(path: string): Promise<FrameImage> {
  return { path, data: Buffer.from(path), mimeType: "image/png" };
}

/** Looks frames up by path; unknown paths fail with `service_error`. */
export class FakeExtractor implements FeatureExtractor {
  readonly name = "fake-vision";
  readonly calls: string[] = [];

  constructor(
    private readonly byPath: Record<string, FrameFeatures | Result<FrameFeatures>>,
    private readonly delays: Record<string, number> = {}
  ) {}

  async extract(frame: FrameImage): Promise<Result<FrameFeatures>> {
    this.calls.push(frame.path);
    const delay = this.delays[frame.path];
    if (delay) {
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
    const entry = this.byPath[frame.path];
    if (!entry) return fail("service_error", `no features for ${frame.path}`);
    return "ok" in entry ? entry : ok(entry);
  }
}

/** Returns the judgment registered for a path, `{}` otherwise. */
export class FakeCritic implements CompositionCritic {
  readonly name = "fake-critic";
  readonly calls: string[] = [];
  readonly signals: Array<AbortSignal | undefined> = [];

  constructor(private readonly byPath: Record<string, CompositionJudgment> = {}) {}

  async critique(frame: FrameImage, options: CallOptions = {}): Promise<Result<CompositionJudgment>> {
    this.calls.push(frame.path);
    this.signals.push(options.signal);
    return ok(this.byPath[frame.path] ?? {});
  }
}
