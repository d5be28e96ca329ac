/**
 * Agent adapter contract.
 *
 * Each specialised worker (researcher, writer, editor, seo, image,
 * publisher, or any role named in config) implements AgentAdapter. The
 * orchestration core never calls search, language or image services
 * itself; those integrations live behind `handle()`.
 *
 * An adapter only returns a value or throws. The AgentWorker around it
 * stores the value, emits the single completion for the attempt and turns
 * a throw into a failure completion.
 */

import type { Logger } from "../logging/index.js";
import type { TaskMessage } from "../types/messages.js";
import type { StagePayload } from "../types/pipeline.js";

export interface AgentContext {
  /** Stage input seeded by the scheduler; undefined if it was evicted */
  readonly payload: StagePayload | undefined;
  /** Read any value of the task's run, e.g. a prior stage's authoritative output */
  read(key: string): Promise<unknown>;
  readonly logger: Logger;
  /** Fires when the worker is stopped */
  readonly signal: AbortSignal;
}

export interface AgentResult {
  /** "partial" marks a usable but incomplete result; defaults to "success" */
  readonly status?: "success" | "partial";
  readonly value: unknown;
}

export interface AgentAdapter {
  readonly role: string;
  handle(task: TaskMessage, context: AgentContext): Promise<AgentResult>;
}

/**
 * Build an adapter from a plain function.
 *
 * @example
 * const researcher = defineAgent("researcher", async (task, ctx) => ({
 *   value: { summary: `Notes on ${ctx.payload?.topic}` },
 * }));
 */
export function defineAgent(
  role: string,
  handle: (task: TaskMessage, context: AgentContext) => Promise<AgentResult>
): AgentAdapter {
  return { role, handle };
}
