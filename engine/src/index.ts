export * from "./types.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./config.js";
export * from "./classify.js";
export * from "./context.js";
export * from "./theme/index.js";
export * from "./geometry.js";
export * from "./fonts.js";
export * from "./labels.js";
export * from "./render.js";
export * from "./raster.js";
export * from "./postprocess/index.js";
export * from "./export.js";
