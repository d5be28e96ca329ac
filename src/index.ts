/**
 * Content pipeline orchestrator.
 *
 * Coordinates specialised agents through a staged pipeline over a shared
 * message queue and memory store, resolving competing results per subject.
 */

export * from "./errors/index.js";
export * from "./types/index.js";
export * from "./config/index.js";
export * from "./logging/index.js";
export * from "./memory/index.js";
export * from "./queue/index.js";
export * from "./resolver/index.js";
export * from "./agents/index.js";
export * from "./scheduler/index.js";
export { retryWithBackoff, calculateDelay, sleep, isTransientError, type RetryOptions } from "./utils/retry.js";
