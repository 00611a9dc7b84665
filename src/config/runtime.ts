import { LOG_LEVELS, type LogLevel } from "../logger.js";
import { readBool, readEnum, readOptionalString, type EnvSource } from "./env.js";

export const OUTPUT_FORMATS = ["text", "json"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/** Settings resolved from the environment before the command line runs. */
export interface RuntimeConfig {
  readonly logLevel: LogLevel;
  readonly logFile: string | null;
  readonly logRedact: boolean;
  readonly format: OutputFormat;
  /** Enables the negative-diagonal post-check of the all-pairs closure. */
  readonly checkNegativeCycles: boolean;
}

export function loadRuntimeConfig(env: EnvSource = process.env): RuntimeConfig {
  return {
    logLevel: readEnum("SHORTEST_PATHS_LOG_LEVEL", LOG_LEVELS, "warn", env),
    logFile: readOptionalString("SHORTEST_PATHS_LOG_FILE", env) ?? null,
    logRedact: readBool("SHORTEST_PATHS_LOG_REDACT", false, env),
    format: readEnum("SHORTEST_PATHS_FORMAT", OUTPUT_FORMATS, "text", env),
    checkNegativeCycles: readBool("SHORTEST_PATHS_CHECK_NEGATIVE_CYCLES", false, env),
  };
}
