export * from "./chapters.js";
export * from "./config.js";
export * from "./conversationCache.js";
export * from "./defaults.js";
export * from "./discovery.js";
export * from "./errors.js";
export * from "./extractor.js";
export * from "./logger.js";
export * from "./messageSearch.js";
export * from "./navigation.js";
export * from "./parsers/entries.js";
export * from "./queryEngine.js";
export * from "./snapshot.js";
export * from "./tools.js";
export { asErrorMessage, expandHome, fileIdFromPath, projectFromPath, toIsoString, truncate } from "./utils.js";
