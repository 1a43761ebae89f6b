import { z } from "zod";
import type { GenerateContentParameters } from "@google/genai";
import { fail, failFromError, ok, type Result } from "../result";
import type { Logger } from "../logger";
import type {
  CallOptions,
  DominantColor,
  FeatureExtractor,
  FrameFeatures,
  FrameImage,
} from "../types";
import { extractJsonObject } from "./json-response";

// ---------------------------------------------------------------------------
// Cloud Vision
// ---------------------------------------------------------------------------

type Nullable<T> = T | null | undefined;

type VisionFeatureType = "OBJECT_LOCALIZATION" | "LABEL_DETECTION" | "IMAGE_PROPERTIES";

export interface VisionAnnotateResponse {
  localizedObjectAnnotations?: Nullable<Array<{
    name?: Nullable<string>;
    score?: Nullable<number>;
    boundingPoly?: Nullable<{ normalizedVertices?: Nullable<Array<{ x?: Nullable<number>; y?: Nullable<number> }>> }>;
  }>>;
  labelAnnotations?: Nullable<Array<{ description?: Nullable<string>; score?: Nullable<number> }>>;
  imagePropertiesAnnotation?: Nullable<{
    dominantColors?: Nullable<{
      colors?: Nullable<Array<{
        color?: Nullable<{ red?: Nullable<number>; green?: Nullable<number>; blue?: Nullable<number> }>;
        score?: Nullable<number>;
        pixelFraction?: Nullable<number>;
      }>>;
    }>;
  }>;
  error?: Nullable<{ message?: Nullable<string> }>;
}

/** The slice of ImageAnnotatorClient this extractor calls. */
export interface VisionAnnotator {
  batchAnnotateImages(request: {
    requests: Array<{
      image: { content: Uint8Array };
      features: Array<{ type: VisionFeatureType }>;
    }>;
  }): Promise<[{ responses?: Nullable<VisionAnnotateResponse[]> }, ...unknown[]]>;
}

/** gax hands back a CancellablePromise; cancelling it ends the gRPC call. */
function cancelCall(call: Promise<unknown>): void {
  if ("cancel" in call && typeof call.cancel === "function") {
    call.cancel();
  }
}

export function mapVisionResponse(response: VisionAnnotateResponse): FrameFeatures {
  return {
    objects: (response.localizedObjectAnnotations ?? []).map((obj) => ({
      name: obj.name ?? "",
      confidence: obj.score ?? 0,
      boundingBox: (obj.boundingPoly?.normalizedVertices ?? []).map((v) => ({
        x: v.x ?? 0,
        y: v.y ?? 0,
      })),
    })),
    labels: (response.labelAnnotations ?? []).map((label) => ({
      description: label.description ?? "",
      confidence: label.score ?? 0,
    })),
    colors: (response.imagePropertiesAnnotation?.dominantColors?.colors ?? []).map(
      (info): DominantColor => ({
        rgb: [info.color?.red ?? 0, info.color?.green ?? 0, info.color?.blue ?? 0],
        score: info.score ?? 0,
        pixelFraction: info.pixelFraction ?? 0,
      })
    ),
  };
}

/**
 * Object localization, labels and dominant colors from Google Cloud Vision,
 * fetched in a single annotate request.
 */
export class CloudVisionFeatureExtractor implements FeatureExtractor {
  readonly name = "cloud-vision";

  constructor(
    private readonly client: VisionAnnotator,
    private readonly logger: Logger
  ) {}

  async extract(frame: FrameImage, options: CallOptions = {}): Promise<Result<FrameFeatures>> {
    const { signal } = options;
    try {
      signal?.throwIfAborted();
      const call = this.client.batchAnnotateImages({
        requests: [
          {
            image: { content: frame.data },
            features: [
              { type: "OBJECT_LOCALIZATION" },
              { type: "LABEL_DETECTION" },
              { type: "IMAGE_PROPERTIES" },
            ],
          },
        ],
      });

      const cancel = (): void => cancelCall(call);
      signal?.addEventListener("abort", cancel, { once: true });
      let batch: Awaited<typeof call>[0];
      try {
        [batch] = await call;
      } finally {
        signal?.removeEventListener("abort", cancel);
      }

      const response = batch.responses?.[0];
      if (!response) {
        return fail("service_error", "Vision API returned no annotation");
      }
      if (response.error?.message) {
        return fail("service_error", response.error.message);
      }

      const features = mapVisionResponse(response);
      this.logger.debug("Vision annotation received", {
        frame: frame.path,
        objects: features.objects.length,
        labels: features.labels.length,
        colors: features.colors.length,
      });
      return ok(features);
    } catch (error) {
      return failFromError(error);
    }
  }
}

// ---------------------------------------------------------------------------
// Gemini
// ---------------------------------------------------------------------------

const unit = z.number().min(0).max(1);
const channel = z.number().min(0).max(255);

const geminiFeaturesSchema = z.object({
  objects: z.array(z.object({
    name: z.string(),
    confidence: unit,
    bounding_box: z.array(z.object({ x: unit, y: unit })).default([]),
  })).default([]),
  labels: z.array(z.object({
    description: z.string(),
    confidence: unit,
  })).default([]),
  colors: z.array(z.object({
    rgb: z.tuple([channel, channel, channel]),
    score: unit,
    pixel_fraction: unit,
  })).default([]),
});

const FEATURE_PROMPT = `You are an image annotation service. Analyze this video frame and return ONLY a JSON object with:
- "objects": distinct physical objects, each { "name": string (lowercase noun), "confidence": 0-1, "bounding_box": four normalized { "x": 0-1, "y": 0-1 } corners }
- "labels": scene-level labels, each { "description": string, "confidence": 0-1 }
- "colors": up to 10 dominant colors, most dominant first, each { "rgb": [r, g, b] with 0-255 integers, "score": 0-1, "pixel_fraction": 0-1 }`;

export const DEFAULT_GEMINI_FEATURE_MODEL = "gemini-2.5-flash";

/** The slice of GoogleGenAI.models this extractor calls. */
export interface GeminiModels {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
}

/**
 * Feature extraction through Gemini's JSON mode, used when no Cloud Vision
 * project is configured.
 */
export class GeminiFeatureExtractor implements FeatureExtractor {
  readonly name = "gemini";

  constructor(
    private readonly models: GeminiModels,
    private readonly logger: Logger,
    private readonly model: string = DEFAULT_GEMINI_FEATURE_MODEL
  ) {}

  async extract(frame: FrameImage, options: CallOptions = {}): Promise<Result<FrameFeatures>> {
    try {
      const response = await this.models.generateContent({
        model: this.model,
        contents: [
          {
            role: "user",
            parts: [
              { inlineData: { mimeType: frame.mimeType, data: frame.data.toString("base64") } },
              { text: FEATURE_PROMPT },
            ],
          },
        ],
        config: {
          temperature: 0,
          responseMimeType: "application/json",
          abortSignal: options.signal,
        },
      });

      const raw = response.text ?? "";
      const json = extractJsonObject(raw);
      if (!json) {
        return fail("service_error", "Gemini did not return a JSON object");
      }

      const parsed = geminiFeaturesSchema.safeParse(json);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => i.path.join(".") || "(root)").join(", ");
        return fail("service_error", `Gemini returned malformed features: ${issues}`);
      }

      this.logger.debug("Gemini annotation received", { frame: frame.path, model: this.model });
      return ok({
        objects: parsed.data.objects.map((obj) => ({
          name: obj.name,
          confidence: obj.confidence,
          boundingBox: obj.bounding_box,
        })),
        labels: parsed.data.labels,
        colors: parsed.data.colors.map((c) => ({
          rgb: c.rgb,
          score: c.score,
          pixelFraction: c.pixel_fraction,
        })),
      });
    } catch (error) {
      return failFromError(error);
    }
  }
}

// ---------------------------------------------------------------------------
// Not configured
// ---------------------------------------------------------------------------

export class UnavailableFeatureExtractor implements FeatureExtractor {
  readonly name = "unavailable";

  async extract(): Promise<Result<FrameFeatures>> {
    return fail("unavailable", "Vision API client not initialized");
  }
}
