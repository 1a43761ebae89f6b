import { Command } from "commander";
import { runValidation, type RunOptions } from "./run";

export type CliRunOptions = RunOptions & { frames: string[] };

export interface ProgramDeps {
  run?: (framePaths: string[], options: CliRunOptions) => Promise<unknown>;
  error?: (line: string) => void;
  exit?: (code: number) => void;
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const run = deps.run ?? ((framePaths: string[], options: CliRunOptions) => runValidation(framePaths, options));
  const error = deps.error ?? ((line: string) => console.error(line));
  const exit = deps.exit ?? ((code: number) => process.exit(code));

  const program = new Command();

  program
    .name("scene-validator")
    .description("Validate scene composition and continuity across a sequence of frames")
    .version("0.1.0");

  program
    .requiredOption("--frames <paths...>", "Paths to frame images in sequence")
    .option("--output <file>", "Path to output JSON file")
    .option("--api-key <key>", "Gemini API key (default: $GEMINI_API_KEY)")
    .option("--project-id <id>", "Google Cloud project ID for Cloud Vision (default: $GOOGLE_CLOUD_PROJECT)")
    .option("--credentials <file>", "Service account key file for Cloud Vision")
    .option("--anthropic-api-key <key>", "Anthropic API key for the claude critic (default: $ANTHROPIC_API_KEY)")
    .option("--critic <provider>", "Composition critic: gemini or claude")
    .option("--critic-model <model>", "Override the critic model id")
    .option("--concurrency <n>", "Maximum concurrent service calls")
    .option("--timeout-ms <ms>", "Timeout for each service call")
    .option("--min-continuity <score>", "Flag frame pairs scoring below this (0-1, default: 0.7)")
    .option("--log-file <file>", "Also append logs to this file")
    .option("--verbose", "Show debug logs", false)
    .action(async (options: CliRunOptions) => {
      try {
        await run(options.frames, options);
      } catch (err) {
        if (err instanceof Error) {
          error(`Error: ${err.message}`);
        } else {
          error("An unknown error occurred");
        }
        exit(1);
      }
    });

  return program;
}
