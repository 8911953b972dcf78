import winston from "winston";

import { isLogLevel } from "./config.js";
import type { LogLevel } from "./config.js";

/** Custom levels so "success" & "warning" are first-class */
const customLevels: Record<LogLevel, number> = {
  error: 0,
  warning: 1,
  success: 2,
  info: 3,
  debug: 4,
};

winston.addColors({
  error: "red",
  warning: "yellow",
  success: "green",
  info: "blue",
  debug: "gray",
});

const baseFormat = winston.format.printf((info) => {
  const ts =
    typeof info.timestamp === "string"
      ? info.timestamp
      : new Date().toISOString();
  const lvl = info.level.toUpperCase();
  const msg =
    typeof info.message === "string" ? info.message : String(info.message);
  return `${ts} [${lvl}] ${msg}`;
});

/**
 * Diagnostics go to stderr so stdout carries only the scan report.
 */
export function createLogger(level: LogLevel = "info"): winston.Logger {
  return winston.createLogger({
    levels: customLevels,
    level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
    ),
    transports: [
      new winston.transports.Console({
        level,
        stderrLevels: [...Object.keys(customLevels)],
        format: winston.format.combine(
          baseFormat,
          winston.format.colorize({ all: true }),
        ),
      }),
    ],
    exitOnError: false,
  });
}

/** Shared instance; level from LOG_LEVEL at load time. */
export const logger = createLogger(
  ((): LogLevel => {
    const raw = (process.env.LOG_LEVEL ?? "info").toLowerCase();
    return isLogLevel(raw) ? raw : "info";
  })(),
);
