export * from "./request.js";
export * from "./pipeline.js";
export * from "./generator.js";
