export * from "./config.js";
export * from "./logger.js";
export * from "./markdown.js";
export * from "./utils.js";
export * from "./version.js";
