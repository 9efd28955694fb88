export * from "./color.js";
export * from "./constants.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./result.js";
export * from "./schemas.js";
export * from "./types.js";
