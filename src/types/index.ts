/**
 * Core type definitions for the content orchestrator.
 */

export * from "./pipeline.js";
export * from "./messages.js";
export * from "./memory.js";
export * from "./conflict.js";
export * from "./clock.js";
