import { config as loadDotenv } from "dotenv";

import {
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_ELEMENTS_PER_LEVEL,
} from "./parser/tree-walker.js";

export const LOG_LEVELS = [
  "error",
  "warning",
  "success",
  "info",
  "debug",
] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ScanConfig {
  logLevel: LogLevel;
  maxDepth: number;
  maxElementsPerLevel: number;
  /** Where `-s` writes the structure when no `-o` is given. */
  outputFile: string;
}

export const DEFAULT_OUTPUT_FILE = "signature.der";

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function positiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isSafeInteger(n) && n > 0 ? n : fallback;
}

/**
 * Resolve settings from the environment. Unset or unusable values fall back
 * to the defaults.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
): ScanConfig {
  const level = (env.LOG_LEVEL ?? "info").toLowerCase();
  return {
    logLevel: isLogLevel(level) ? level : "info",
    maxDepth: positiveInt(env.SIGSCAN_MAX_DEPTH, DEFAULT_MAX_DEPTH),
    maxElementsPerLevel: positiveInt(
      env.SIGSCAN_MAX_ELEMENTS,
      DEFAULT_MAX_ELEMENTS_PER_LEVEL,
    ),
    outputFile: env.SIGSCAN_OUTPUT?.trim() || DEFAULT_OUTPUT_FILE,
  };
}

/** Read `.env` into `process.env` (existing variables win), then resolve. */
export function loadEnvConfig(): ScanConfig {
  loadDotenv();
  return loadConfig(process.env);
}
