import { z } from "zod";
import { DEFAULT_CONCURRENCY, DEFAULT_MIN_CONTINUITY, DEFAULT_TIMEOUT_MS } from "./validator";
import type { ValidatorConfig } from "./types";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Options as commander hands them over: strings, flags, nothing coerced. */
export interface CliOptions {
  apiKey?: string;
  projectId?: string;
  credentials?: string;
  anthropicApiKey?: string;
  critic?: string;
  criticModel?: string;
  concurrency?: string;
  timeoutMs?: string;
  minContinuity?: string;
  logFile?: string;
  verbose?: boolean;
}

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const configSchema = z.object({
  geminiApiKey: optionalString,
  anthropicApiKey: optionalString,
  projectId: optionalString,
  credentialsFile: optionalString,
  critic: z.enum(["gemini", "claude"]).default("gemini"),
  criticModel: optionalString,
  concurrency: z.coerce.number().int().positive().default(DEFAULT_CONCURRENCY),
  timeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  minContinuity: z.coerce.number().min(0).max(1).default(DEFAULT_MIN_CONTINUITY),
  logFile: optionalString,
  verbose: z.boolean().default(false),
});

/**
 * Merges CLI options over environment variables and validates the result.
 */
export function loadConfig(
  options: CliOptions,
  env: Record<string, string | undefined> = process.env
): ValidatorConfig {
  const parsed = configSchema.safeParse({
    geminiApiKey: options.apiKey ?? env.GEMINI_API_KEY,
    anthropicApiKey: options.anthropicApiKey ?? env.ANTHROPIC_API_KEY,
    projectId: options.projectId ?? env.GOOGLE_CLOUD_PROJECT,
    credentialsFile: options.credentials ?? env.GOOGLE_APPLICATION_CREDENTIALS,
    critic: (options.critic ?? env.SCENE_VALIDATOR_CRITIC) || undefined,
    criticModel: options.criticModel,
    concurrency: options.concurrency,
    timeoutMs: options.timeoutMs,
    minContinuity: (options.minContinuity ?? env.SCENE_VALIDATOR_MIN_CONTINUITY) || undefined,
    logFile: options.logFile ?? env.SCENE_VALIDATOR_LOG_FILE,
    verbose: options.verbose ?? false,
  });

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}
