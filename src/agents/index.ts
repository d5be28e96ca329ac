/**
 * Agent adapter boundary and the worker loop that hosts adapters.
 */

export { defineAgent, type AgentAdapter, type AgentContext, type AgentResult } from "./adapter.js";
export { AgentWorker, type AgentWorkerOptions } from "./worker.js";
