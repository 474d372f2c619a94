/**
 * Hierarchy module: manager graph to the organizational tree.
 *
 * @module
 */

export * from "./types.js";
export * from "./hierarchy-enricher.js";
export * from "./tree-walk.js";
export * from "./tree-filters.js";
export * from "./tree-summary.js";
export * from "./tree-schema.js";
