/**
 * Graph builder module: the directed manager graph and its snapshot form.
 *
 * @module
 */

export * from "./types.js";
export * from "./manager-graph.js";
