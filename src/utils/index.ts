/**
 * Shared utilities
 */

export * from "./logger.js";
export * from "./fs.js";
export * from "./validation.js";
export * from "./config.js";
