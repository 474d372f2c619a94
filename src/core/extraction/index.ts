/**
 * Extraction module: CMDB rows to the directed manager graph.
 *
 * @module
 */

export * from "./types.js";
export * from "./asset-parser.js";
export * from "./reference-index.js";
export * from "./manager-index.js";
export * from "./relationship-extractor.js";
export * from "./deduplication.js";
