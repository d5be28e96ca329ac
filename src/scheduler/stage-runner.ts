/**
 * Runs one work stage of one pipeline run.
 *
 * Dispatch: one task per (role, subject) in the stage roster.
 * Collect: completions arrive on the run's control destination until every
 * subject is settled or the stage deadline passes. The dequeue is the only
 * wait, and it is bounded by the deadline.
 *
 * Per contribution:
 *   failure  -> redispatch with attempt + 1 while attempts < maxAttempts,
 *               otherwise the role is a missing contributor
 *   success  -> candidate recorded in the subject's conflict record
 *   partial     (same as success)
 *
 * A subject is resolved as soon as none of its contributions is pending.
 * At the deadline pending contributions become missing and the remaining
 * subjects are resolved with whatever candidates exist.
 */

import { errorMessage, isOrchestratorError } from "../errors/index.js";
import type { OrchestratorConfig, StageRoster } from "../config/orchestrator/schema.js";
import type { Logger } from "../logging/index.js";
import { payloadKey } from "../memory/keys.js";
import type { MemoryStore } from "../memory/memory-store.js";
import type { MessageQueue } from "../queue/message-queue.js";
import type { ConflictLedger } from "../resolver/conflict-ledger.js";
import type { ConflictResolver } from "../resolver/conflict-resolver.js";
import type { Clock } from "../types/clock.js";
import type { ResolutionOutcome } from "../types/conflict.js";
import { toRole, type QueueMessage, type TaskMessage } from "../types/messages.js";
import {
  StageStatus,
  type PipelineRun,
  type StagePayload,
  type StageRecord,
  type SubjectReport,
  type WorkStage,
} from "../types/pipeline.js";
import { retryWithBackoff } from "../utils/retry.js";
import type { RunMonitor } from "./run-monitor.js";

/** Writer name recorded on entries the scheduler puts in memory */
export const SCHEDULER_WRITER = "orchestrator";

export type StageResult = "completed" | "failed" | "aborted";

export interface StageContext {
  readonly run: PipelineRun;
  readonly queue: MessageQueue;
  readonly store: MemoryStore;
  readonly resolver: ConflictResolver;
  readonly ledger: ConflictLedger;
  readonly monitor: RunMonitor;
  readonly logger: Logger;
  readonly clock: Clock;
  /** Destination agents reply to for this run */
  readonly controlDestination: string;
  /** Aborted when the operator cancels the run */
  readonly signal: AbortSignal;
}

interface Contribution {
  readonly taskId: string;
  readonly role: string;
  readonly subject: string;
  /** Attempt number of the last dispatched message; 0 before the first */
  attempt: number;
  state: "pending" | "delivered" | "missing";
}

export class StageRunner {
  private readonly contributions = new Map<string, Contribution>();
  private readonly subjects = new Map<string, Contribution[]>();
  /** Settled subjects; null when resolution failed */
  private readonly settled = new Map<string, ResolutionOutcome | null>();
  private readonly config: Readonly<OrchestratorConfig>;
  private degraded = false;

  constructor(
    private readonly ctx: StageContext,
    private readonly stage: WorkStage,
    private readonly roster: StageRoster,
    private readonly inputs: Record<string, string>
  ) {
    this.config = ctx.run.config;
  }

  async run(record: StageRecord): Promise<StageResult> {
    const { ctx } = this;
    const deadline = ctx.clock.now() + (this.roster.deadlineMs ?? this.config.stageDeadlineMs);

    await this.seedPayload();
    this.planContributions();

    for (const contribution of this.contributions.values()) {
      if (ctx.signal.aborted) {
        return "aborted";
      }
      await this.dispatch(contribution);
    }
    await this.resolveReadySubjects();

    while (this.settled.size < this.subjects.size) {
      if (ctx.signal.aborted) {
        return "aborted";
      }
      const remaining = deadline - ctx.clock.now();
      if (remaining <= 0) {
        break;
      }

      let message: QueueMessage;
      try {
        const delivery = await ctx.queue.dequeue(ctx.controlDestination, remaining, ctx.signal);
        ctx.queue.ack(delivery.deliveryId);
        message = delivery.message;
      } catch (err) {
        if (ctx.signal.aborted) {
          return "aborted";
        }
        if (isOrchestratorError(err, "TIMEOUT")) {
          break;
        }
        throw err;
      }
      await this.accept(message);
    }

    if (ctx.signal.aborted) {
      return "aborted";
    }

    for (const contribution of this.contributions.values()) {
      if (contribution.state === "pending") {
        this.markMissing(contribution, "stage deadline elapsed");
      }
    }
    await this.resolveReadySubjects();
    if (ctx.signal.aborted) {
      return "aborted";
    }

    return this.finish(record);
  }

  // ── dispatch ───────────────────────────────────────────────────────────

  private async seedPayload(): Promise<void> {
    const payload: StagePayload = {
      topic: this.ctx.run.topic,
      stage: this.stage,
      inputs: this.inputs,
    };
    const key = payloadKey(this.stage);
    await retryWithBackoff(
      () => this.ctx.store.put(this.ctx.run.runId, key, payload, "short-term", SCHEDULER_WRITER),
      { ...this.config.storeRetry, context: `seed ${key}`, logger: this.ctx.logger }
    );
  }

  private planContributions(): void {
    const { runId } = this.ctx.run;
    for (const assignment of this.roster.roles) {
      for (const subject of assignment.subjects) {
        const contribution: Contribution = {
          taskId: `${runId}/${this.stage}/${subject}/${assignment.role}`,
          role: assignment.role,
          subject,
          attempt: 0,
          state: "pending",
        };
        this.contributions.set(contribution.taskId, contribution);
        const list = this.subjects.get(subject) ?? [];
        list.push(contribution);
        this.subjects.set(subject, list);
        this.ctx.ledger.open(runId, this.stage, subject);
      }
    }
  }

  private async dispatch(contribution: Contribution): Promise<void> {
    const { ctx } = this;
    const attempt = contribution.attempt + 1;
    const message: TaskMessage = {
      kind: "task",
      id: `${contribution.taskId}#${attempt}`,
      taskId: contribution.taskId,
      runId: ctx.run.runId,
      stage: this.stage,
      role: contribution.role,
      subject: contribution.subject,
      payloadRef: payloadKey(this.stage),
      replyTo: ctx.controlDestination,
      createdAt: ctx.clock.now(),
      attempt,
    };

    try {
      await ctx.queue.enqueueWithBackoff(
        message,
        toRole(contribution.role),
        this.config.queue.dispatchBackoff,
        ctx.signal
      );
    } catch (err) {
      if (ctx.signal.aborted) {
        return;
      }
      if (isOrchestratorError(err, "QUEUE_FULL")) {
        this.markMissing(contribution, `dispatch failed: ${errorMessage(err)}`);
        return;
      }
      throw err;
    }

    contribution.attempt = attempt;
    ctx.run.taskLog.push({
      messageId: message.id,
      taskId: message.taskId,
      stage: this.stage,
      subject: message.subject,
      role: message.role,
      attempt,
      dispatchedAt: message.createdAt,
    });
    ctx.monitor.record(ctx.run.runId, ctx.logger, "task_dispatched", this.stage, {
      role: message.role,
      subject: message.subject,
      attempt,
      queueDepth: ctx.queue.stats(message.role).ready,
    });
  }

  // ── collection ─────────────────────────────────────────────────────────

  private async accept(message: QueueMessage): Promise<void> {
    const { ctx } = this;
    if (message.kind !== "completion" || message.runId !== ctx.run.runId || message.stage !== this.stage) {
      this.stale(message, "not a completion for this stage");
      return;
    }
    const contribution = this.contributions.get(message.taskId);
    if (!contribution || contribution.state !== "pending" || contribution.attempt !== message.attempt) {
      this.stale(message, "superseded or already settled");
      return;
    }

    ctx.monitor.record(ctx.run.runId, ctx.logger, "completion_received", this.stage, {
      role: message.role,
      subject: message.subject,
      attempt: message.attempt,
      status: message.status,
    });

    if (message.status === "failure") {
      if (contribution.attempt < this.config.maxAttempts) {
        ctx.monitor.record(ctx.run.runId, ctx.logger, "task_retried", this.stage, {
          role: contribution.role,
          subject: contribution.subject,
          failedAttempt: contribution.attempt,
          error: message.error,
        });
        await this.dispatch(contribution);
      } else {
        this.markMissing(
          contribution,
          `failed ${contribution.attempt} attempt(s): ${message.error ?? "unknown error"}`
        );
      }
    } else {
      ctx.ledger.addCandidate(ctx.run.runId, this.stage, contribution.subject, {
        taskId: message.taskId,
        role: message.role,
        attempt: message.attempt,
        status: message.status,
        ...(message.resultRef !== undefined ? { resultRef: message.resultRef } : {}),
        timestamp: message.timestamp,
      });
      contribution.state = "delivered";
    }

    await this.resolveReadySubjects();
  }

  private stale(message: QueueMessage, reason: string): void {
    this.ctx.monitor.record(this.ctx.run.runId, this.ctx.logger, "completion_stale", this.stage, {
      kind: message.kind,
      runId: message.runId,
      reason,
    });
  }

  private markMissing(contribution: Contribution, reason: string): void {
    contribution.state = "missing";
    this.degraded = true;
    this.ctx.ledger.markMissing(this.ctx.run.runId, this.stage, contribution.subject, contribution.role);
    this.ctx.monitor.record(this.ctx.run.runId, this.ctx.logger, "contributor_missing", this.stage, {
      role: contribution.role,
      subject: contribution.subject,
      attempts: contribution.attempt,
      reason,
    });
  }

  // ── resolution ─────────────────────────────────────────────────────────

  private async resolveReadySubjects(): Promise<void> {
    for (const [subject, contributions] of this.subjects) {
      if (this.settled.has(subject)) {
        continue;
      }
      if (this.ctx.signal.aborted) {
        return;
      }
      if (contributions.every((c) => c.state !== "pending")) {
        await this.resolveSubject(subject);
      }
    }
  }

  private async resolveSubject(subject: string): Promise<void> {
    const { ctx } = this;
    const record = ctx.ledger.open(ctx.run.runId, this.stage, subject);
    try {
      const outcome = await ctx.resolver.resolve(record);
      this.settled.set(subject, outcome);
      ctx.monitor.record(ctx.run.runId, ctx.logger, "subject_resolved", this.stage, {
        subject,
        kind: outcome.kind,
        winner: outcome.winner?.role,
      });
    } catch (err) {
      if (!isOrchestratorError(err, "RESOLUTION_UNRESOLVABLE")) {
        throw err;
      }
      this.settled.set(subject, null);
      this.degraded = true;
      ctx.monitor.record(ctx.run.runId, ctx.logger, "subject_unresolved", this.stage, {
        subject,
        reason: err.message,
      });
    }
  }

  // ── completion ─────────────────────────────────────────────────────────

  private async finish(record: StageRecord): Promise<StageResult> {
    const { ctx } = this;

    // A stage only completes on authoritative values actually present in memory
    for (const [subject, outcome] of this.settled) {
      if (!outcome) {
        continue;
      }
      const entry = await retryWithBackoff(
        () => ctx.store.tryGet(ctx.run.runId, outcome.authoritativeRef),
        { ...this.config.storeRetry, context: `verify ${outcome.authoritativeRef}`, logger: ctx.logger }
      );
      if (!entry) {
        this.settled.set(subject, null);
        this.degraded = true;
        ctx.monitor.record(ctx.run.runId, ctx.logger, "subject_unresolved", this.stage, {
          subject,
          reason: "authoritative result missing from memory",
        });
      }
    }

    record.subjects = [...this.subjects.keys()].map((subject) => this.report(subject));
    record.degraded = this.degraded;

    const unresolved = record.subjects.filter((s) => !s.resolved).length;
    const fraction = record.subjects.length === 0 ? 0 : unresolved / record.subjects.length;
    if (fraction > this.config.degradedFailureThreshold) {
      record.status = StageStatus.Failed;
      ctx.logger.error("Stage failed: too many unresolved subjects", {
        stage: this.stage,
        unresolved,
        total: record.subjects.length,
        threshold: this.config.degradedFailureThreshold,
      });
      return "failed";
    }

    record.status = StageStatus.Completed;
    return "completed";
  }

  private report(subject: string): SubjectReport {
    const outcome = this.settled.get(subject) ?? null;
    const conflict = this.ctx.ledger.get(this.ctx.run.runId, this.stage, subject);
    return {
      subject,
      resolved: outcome !== null,
      ...(outcome ? { authoritativeRef: outcome.authoritativeRef } : {}),
      ...(outcome?.winner ? { winningRole: outcome.winner.role } : {}),
      candidateCount: conflict?.candidates.length ?? 0,
      missingRoles: [...(conflict?.missingRoles ?? [])].sort(),
    };
  }
}
