import { appendFileSync } from "fs";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  scope?: string;
  verbose?: boolean;
  logFile?: string;
  /** Line sink, stderr by default. Stdout is reserved for the report. */
  write?: (line: string) => void;
  now?: () => Date;
}

export function formatLogLine(
  level: LogLevel,
  scope: string,
  message: string,
  meta: LogMeta | undefined,
  timestamp: Date
): string {
  const head = `[${timestamp.toISOString()}] [${level.toUpperCase()}] [${scope}] ${message}`;
  return meta && Object.keys(meta).length > 0 ? `${head} ${JSON.stringify(meta)}` : head;
}

/**
 * Console logger with an optional file sink. Created once by the CLI and
 * passed down; nothing here is global.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const scope = options.scope ?? "scene-validator";
  const write = options.write ?? ((line: string) => console.error(line));
  const now = options.now ?? (() => new Date());

  const log = (level: LogLevel, message: string, meta?: LogMeta): void => {
    if (level === "debug" && !options.verbose) return;
    const line = formatLogLine(level, scope, message, meta, now());
    write(line);
    if (options.logFile) {
      appendFileSync(options.logFile, line + "\n");
    }
  };

  return {
    debug: (message, meta) => log("debug", message, meta),
    info: (message, meta) => log("info", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    error: (message, meta) => log("error", message, meta),
    child: (childScope) => createLogger({ ...options, scope: `${scope}:${childScope}` }),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
