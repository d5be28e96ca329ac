/**
 * AgentWorker: the queue-facing side of an agent.
 *
 * Per task delivery:
 *   1. ignore anything that is not a task, and repeats of an attempt
 *      already answered (at-least-once delivery)
 *   2. run the adapter
 *   3. store its value under candidate/<stage>/<subject>/<role>/<attempt>
 *   4. send exactly one completion to the task's replyTo destination
 *   5. ack
 *
 * If the completion cannot be sent the delivery stays unacknowledged, the
 * lease expires and the task comes back.
 */

import { z } from "zod";
import { errorMessage, isOrchestratorError } from "../errors/index.js";
import type { BackoffSettings } from "../config/orchestrator/schema.js";
import { createNullLogger, type Logger } from "../logging/index.js";
import { candidateKey } from "../memory/keys.js";
import type { MemoryStore } from "../memory/memory-store.js";
import type { Delivery, MessageQueue } from "../queue/message-queue.js";
import { systemClock, type Clock } from "../types/clock.js";
import { toRole, type CompletionMessage, type TaskMessage } from "../types/messages.js";
import { isWorkStage, type StagePayload, type WorkStage } from "../types/pipeline.js";
import type { AgentAdapter, AgentResult } from "./adapter.js";

const DEFAULT_POLL_TIMEOUT_MS = 1000;
const MAX_REMEMBERED_ATTEMPTS = 1000;

const StagePayloadSchema = z.object({
  topic: z.string(),
  stage: z.custom<WorkStage>((value) => typeof value === "string" && isWorkStage(value)),
  inputs: z.record(z.string()),
});

export interface AgentWorkerOptions {
  adapter: AgentAdapter;
  queue: MessageQueue;
  store: MemoryStore;
  /** Backoff for sending completions when the reply destination is full */
  replyBackoff: BackoffSettings;
  pollTimeoutMs?: number;
  logger?: Logger;
  clock?: Clock;
}

export class AgentWorker {
  private readonly adapter: AgentAdapter;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly pollTimeoutMs: number;
  /** `${taskId}#${attempt}` of attempts already answered, oldest first */
  private readonly answered = new Set<string>();
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(private readonly options: AgentWorkerOptions) {
    this.adapter = options.adapter;
    this.pollTimeoutMs = options.pollTimeoutMs ?? DEFAULT_POLL_TIMEOUT_MS;
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? createNullLogger()).child({
      component: `agent:${options.adapter.role}`,
    });
  }

  get role(): string {
    return this.adapter.role;
  }

  get running(): boolean {
    return this.loop !== null;
  }

  /**
   * Start consuming the role's destination in the background.
   */
  start(): void {
    if (this.loop) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.consume(controller.signal);
    this.logger.info("Worker started");
  }

  /**
   * Stop consuming and wait for the task in hand to finish.
   */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) {
      return;
    }
    this.controller?.abort(new Error(`Worker ${this.role} stopped`));
    await loop;
    this.loop = null;
    this.controller = null;
    this.logger.info("Worker stopped");
  }

  /**
   * Handle one delivery.
   *
   * @returns true when the delivery was a new task attempt
   */
  async handle(delivery: Delivery, signal: AbortSignal = new AbortController().signal): Promise<boolean> {
    const { message } = delivery;
    if (message.kind !== "task") {
      this.options.queue.ack(delivery.deliveryId);
      return false;
    }

    const attemptId = `${message.taskId}#${message.attempt}`;
    if (this.answered.has(attemptId)) {
      this.logger.debug("Duplicate delivery ignored", { runId: message.runId, attemptId });
      this.options.queue.ack(delivery.deliveryId);
      return false;
    }

    const completion = await this.execute(message, signal);

    try {
      await this.options.queue.enqueueWithBackoff(
        completion,
        toRole(message.replyTo),
        this.options.replyBackoff,
        signal
      );
    } catch (err) {
      // Leave the delivery unacknowledged so the lease brings it back
      this.logger.error("Completion not delivered", {
        runId: message.runId,
        attemptId,
        error: errorMessage(err),
      });
      return true;
    }

    this.remember(attemptId);
    this.options.queue.ack(delivery.deliveryId);
    return true;
  }

  private async consume(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let delivery: Delivery;
      try {
        delivery = await this.options.queue.dequeue(this.role, this.pollTimeoutMs, signal);
      } catch (err) {
        if (isOrchestratorError(err, "TIMEOUT")) {
          continue;
        }
        if (!signal.aborted) {
          this.logger.error("Dequeue failed, worker exiting", { error: errorMessage(err) });
        }
        return;
      }
      await this.handle(delivery, signal);
    }
  }

  private async execute(task: TaskMessage, signal: AbortSignal): Promise<CompletionMessage> {
    const base = {
      kind: "completion" as const,
      taskId: task.taskId,
      messageId: task.id,
      runId: task.runId,
      stage: task.stage,
      subject: task.subject,
      role: this.role,
      attempt: task.attempt,
    };
    const logger = this.logger.child({ runId: task.runId });

    let result: AgentResult;
    try {
      result = await this.adapter.handle(task, {
        payload: await this.readPayload(task),
        read: async (key) => (await this.options.store.tryGet(task.runId, key))?.value,
        logger,
        signal,
      });
    } catch (err) {
      logger.warn("Agent failed", {
        stage: task.stage,
        subject: task.subject,
        attempt: task.attempt,
        error: errorMessage(err),
      });
      return { ...base, status: "failure", error: errorMessage(err), timestamp: this.clock.now() };
    }

    const resultRef = candidateKey(task.stage, task.subject, this.role, task.attempt);
    try {
      await this.options.store.put(task.runId, resultRef, result.value, "short-term", this.role);
    } catch (err) {
      logger.error("Result not stored", { resultRef, error: errorMessage(err) });
      return { ...base, status: "failure", error: errorMessage(err), timestamp: this.clock.now() };
    }

    logger.debug("Agent finished", { subject: task.subject, attempt: task.attempt, resultRef });
    return {
      ...base,
      status: result.status ?? "success",
      resultRef,
      timestamp: this.clock.now(),
    };
  }

  private async readPayload(task: TaskMessage): Promise<StagePayload | undefined> {
    const entry = await this.options.store.tryGet(task.runId, task.payloadRef);
    const parsed = StagePayloadSchema.safeParse(entry?.value);
    return parsed.success ? parsed.data : undefined;
  }

  private remember(attemptId: string): void {
    this.answered.add(attemptId);
    if (this.answered.size > MAX_REMEMBERED_ATTEMPTS) {
      const oldest = this.answered.values().next();
      if (!oldest.done) {
        this.answered.delete(oldest.value);
      }
    }
  }
}
