import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { describe, expect, it } from "vitest";
import { createLogger, formatLogLine } from "../logger";

const AT = new Date("2026-01-02T03:04:05.000Z");

describe("formatLogLine", () => {
  it("formats timestamp, level, scope and message", () => {
    expect(formatLogLine("info", "scene-validator", "Frames 0-1 compared", undefined, AT)).toBe(
      "[2026-01-02T03:04:05.000Z] [INFO] [scene-validator] Frames 0-1 compared"
    );
  });

  it("appends metadata as JSON when present", () => {
    expect(formatLogLine("warn", "vision", "Slow", { frame: "a.png" }, AT)).toBe(
      '[2026-01-02T03:04:05.000Z] [WARN] [vision] Slow {"frame":"a.png"}'
    );
    expect(formatLogLine("warn", "vision", "Slow", {}, AT)).toBe("[2026-01-02T03:04:05.000Z] [WARN] [vision] Slow");
  });
});

describe("createLogger", () => {
  it("drops debug lines unless verbose", () => {
    const lines: string[] = [];
    const quiet = createLogger({ write: (line) => lines.push(line), now: () => AT });
    quiet.debug("hidden");
    quiet.error("shown");

    const loud = createLogger({ verbose: true, write: (line) => lines.push(line), now: () => AT });
    loud.debug("also shown");

    expect(lines).toEqual([
      "[2026-01-02T03:04:05.000Z] [ERROR] [scene-validator] shown",
      "[2026-01-02T03:04:05.000Z] [DEBUG] [scene-validator] also shown",
    ]);
  });

  it("nests child scopes", () => {
    const lines: string[] = [];
    const logger = createLogger({ scope: "root", write: (line) => lines.push(line), now: () => AT });

    logger.child("validator").child("vision").info("ready");

    expect(lines).toEqual(["[2026-01-02T03:04:05.000Z] [INFO] [root:validator:vision] ready"]);
  });

  it("appends every line to the log file", () => {
    const dir = mkdtempSync(join(tmpdir(), "scene-validator-log-"));
    try {
      const logFile = join(dir, "scene_validator.log");
      const logger = createLogger({ logFile, write: () => {}, now: () => AT });

      logger.info("one");
      logger.child("critic").warn("two");

      expect(readFileSync(logFile, "utf8")).toBe(
        "[2026-01-02T03:04:05.000Z] [INFO] [scene-validator] one\n" +
          "[2026-01-02T03:04:05.000Z] [WARN] [scene-validator:critic] two\n"
      );
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
