export * from "./types.js";
export * from "./gateway-analyzer.js";
