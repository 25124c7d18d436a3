/**
 * Core module - the sorting pipeline
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./scanner/index.js";
export * from "./batching/index.js";
export * from "./prompts/index.js";
export * from "./inference/index.js";
export * from "./classification/index.js";
export * from "./executor/index.js";
export * from "./pipeline/index.js";

// Re-export types
export * from "../types/index.js";
