export * from "./common/index.js";
export * from "./parser/index.js";
export * from "./extract/index.js";
export * from "./format/index.js";
export * from "./locator/index.js";
export * from "./display/index.js";
export * from "./io/index.js";
export { loadConfig, loadEnvConfig } from "./config.js";
export type { LogLevel, ScanConfig } from "./config.js";
export { createLogger, logger } from "./logger.js";
