import { writeFileSync } from "fs";
import { loadConfig, type CliOptions } from "./config";
import { createLogger, type Logger } from "./logger";
import { renderResult } from "./report";
import { createCompositionCritic, createFeatureExtractor } from "./services";
import { SequenceValidator } from "./validator";
import type { CompositionCritic, FeatureExtractor, FrameImage, ValidatorConfig } from "./types";

export interface RunOptions extends CliOptions {
  output?: string;
}

export interface RunDeps {
  env?: Record<string, string | undefined>;
  print?: (line: string) => void;
  createLogger?: (config: ValidatorConfig) => Logger;
  createExtractor?: (config: ValidatorConfig, logger: Logger) => FeatureExtractor;
  createCritic?: (config: ValidatorConfig, logger: Logger) => CompositionCritic;
  loadFrame?: (path: string) => Promise<FrameImage>;
}

/**
 * Validates the frames and prints the JSON report; also writes it to
 * `options.output` when set. A validation failure is printed as
 * `{ "error": ... }` and is not thrown. Bad configuration throws ConfigError.
 */
export async function runValidation(
  framePaths: string[],
  options: RunOptions,
  deps: RunDeps = {}
): Promise<string> {
  const print = deps.print ?? ((line: string) => console.log(line));
  const config = loadConfig(options, deps.env ?? process.env);
  const logger = (deps.createLogger ?? defaultLogger)(config);

  const validator = new SequenceValidator({
    extractor: (deps.createExtractor ?? createFeatureExtractor)(config, logger),
    critic: (deps.createCritic ?? createCompositionCritic)(config, logger),
    logger: logger.child("validator"),
    concurrency: config.concurrency,
    timeoutMs: config.timeoutMs,
    minContinuity: config.minContinuity,
    loadFrame: deps.loadFrame,
  });

  const result = await validator.validate(framePaths);
  const json = renderResult(result);

  print(json);
  if (options.output) {
    writeFileSync(options.output, json);
    print(`Results saved to ${options.output}`);
  }
  return json;
}

function defaultLogger(config: ValidatorConfig): Logger {
  return createLogger({ verbose: config.verbose, logFile: config.logFile });
}
