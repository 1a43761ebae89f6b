import { createGoogleClient, createVisionClient } from "./google-client";
import type { Logger } from "./logger";
import {
  CloudVisionFeatureExtractor,
  GeminiFeatureExtractor,
  UnavailableFeatureExtractor,
} from "./tools/extract-features";
import {
  AiCompositionCritic,
  UnavailableCompositionCritic,
  createCriticModel,
} from "./tools/critique-composition";
import type { CompositionCritic, FeatureExtractor, ValidatorConfig } from "./types";

/**
 * Cloud Vision when a project is configured, Gemini when only an API key is,
 * otherwise an extractor that reports every frame as unavailable.
 */
export function createFeatureExtractor(config: ValidatorConfig, logger: Logger): FeatureExtractor {
  if (config.projectId) {
    logger.info("Google Cloud Vision API initialized successfully", { projectId: config.projectId });
    return new CloudVisionFeatureExtractor(
      createVisionClient({ projectId: config.projectId, keyFilename: config.credentialsFile }),
      logger.child("vision")
    );
  }
  if (config.geminiApiKey) {
    logger.info("No Cloud project configured; extracting frame features with Gemini");
    return new GeminiFeatureExtractor(createGoogleClient(config.geminiApiKey).models, logger.child("vision"));
  }
  logger.warn("Google Cloud Vision API not initialized");
  return new UnavailableFeatureExtractor();
}

export function createCompositionCritic(config: ValidatorConfig, logger: Logger): CompositionCritic {
  const apiKey = config.critic === "claude" ? config.anthropicApiKey : config.geminiApiKey;
  if (!apiKey) {
    logger.warn(`${config.critic} critic not initialized: no API key`);
    return new UnavailableCompositionCritic(config.critic);
  }

  logger.info(`${config.critic} critic initialized successfully`, { model: config.criticModel ?? "default" });
  return new AiCompositionCritic(
    config.critic,
    createCriticModel({ provider: config.critic, apiKey, model: config.criticModel }),
    logger.child("critic")
  );
}
