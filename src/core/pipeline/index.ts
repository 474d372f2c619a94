export * from "./topology-pipeline.js";
