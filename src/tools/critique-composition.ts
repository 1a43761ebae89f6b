import { generateText, type LanguageModel } from "ai";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createAnthropic } from "@ai-sdk/anthropic";
import { fail, failFromError, ok, type Result } from "../result";
import type { Logger } from "../logger";
import type {
  CallOptions,
  CompositionCritic,
  CompositionJudgment,
  CriticProvider,
  FrameImage,
} from "../types";
import { extractJsonObject } from "./json-response";

export const COMPOSITION_PROMPT = `Analyze this frame from a video and provide feedback on:
1. Scene composition quality (rule of thirds, balance, framing)
2. Lighting assessment
3. Depth and perspective
4. Potential continuity issues if this were part of a sequence
5. Overall visual quality rating (1-10 scale)

Respond with a single JSON object using these keys:
- "composition_quality": short assessment of framing and balance
- "lighting": short lighting assessment
- "depth_perspective": short depth and perspective assessment
- "continuity_risks": array of strings
- "composition_issues": array of short lowercase issue labels (e.g. "headroom", "tilted horizon"), empty if none
- "overall_rating": number from 1 to 10`;

export const DEFAULT_CRITIC_MODELS: Record<CriticProvider, string> = {
  gemini: "gemini-2.5-flash",
  claude: "claude-opus-4-6",
};

/**
 * Turns the model's reply into a judgment. Text that holds no JSON object is
 * kept under `raw_analysis` instead of being dropped.
 */
export function parseJudgment(text: string): CompositionJudgment {
  return extractJsonObject(text) ?? { raw_analysis: text };
}

export function createCriticModel(params: {
  provider: CriticProvider;
  apiKey: string;
  model?: string;
}): LanguageModel {
  const modelId = params.model ?? DEFAULT_CRITIC_MODELS[params.provider];
  switch (params.provider) {
    case "gemini":
      return createGoogleGenerativeAI({ apiKey: params.apiKey })(modelId);
    case "claude":
      return createAnthropic({ apiKey: params.apiKey })(modelId);
  }
}

/**
 * Composition critique from a vision-capable language model.
 */
export class AiCompositionCritic implements CompositionCritic {
  constructor(
    readonly name: string,
    private readonly model: LanguageModel,
    private readonly logger: Logger
  ) {}

  async critique(frame: FrameImage, options: CallOptions = {}): Promise<Result<CompositionJudgment>> {
    try {
      const { text } = await generateText({
        model: this.model,
        messages: [
          {
            role: "user",
            content: [
              { type: "text", text: COMPOSITION_PROMPT },
              { type: "image", image: frame.data, mediaType: frame.mimeType },
            ],
          },
        ],
        abortSignal: options.signal,
      });

      const judgment = parseJudgment(text);
      if ("raw_analysis" in judgment && Object.keys(judgment).length === 1) {
        this.logger.warn(`${this.name} did not return valid JSON. Using raw response.`, { frame: frame.path });
      } else {
        this.logger.info(`Got ${this.name} analysis`, { frame: frame.path });
      }
      return ok(judgment);
    } catch (error) {
      return failFromError(error);
    }
  }
}

const PROVIDER_LABELS: Record<CriticProvider, string> = {
  gemini: "Gemini",
  claude: "Claude",
};

export class UnavailableCompositionCritic implements CompositionCritic {
  readonly name = "unavailable";

  constructor(private readonly provider: CriticProvider) {}

  async critique(): Promise<Result<CompositionJudgment>> {
    return fail("unavailable", `${PROVIDER_LABELS[this.provider]} API not initialized`);
  }
}
