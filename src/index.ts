/**
 * mq-topology library entry
 *
 * @module
 */

export * from "./core/index.js";
export { loadConfig, resolvePaths, type ResolvedConfig, type ResolvedPaths } from "./utils/config.js";
export { PipelineConfigSchema, type PipelineConfig } from "./utils/validation.js";
export { createLogger, type Logger } from "./utils/logger.js";
