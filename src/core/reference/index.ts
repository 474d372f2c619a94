export * from "./reference-loader.js";
