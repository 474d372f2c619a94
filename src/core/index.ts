/**
 * Core module - shared by the CLI and library consumers
 */

export * from "./errors.js";

export * from "./extraction/index.js";
export * from "./graph-builder/index.js";
export * from "./hierarchy/index.js";
export * from "./changes/index.js";
export * from "./analytics/index.js";
export * from "./reference/index.js";
export * from "./pipeline/index.js";

export * from "../types/index.js";
