export * from "./types.js";
export * from "./change-detector.js";
