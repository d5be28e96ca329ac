/**
 * Pipeline scheduler.
 *
 * Drives each run through the stage sequence. Work stages without a roster
 * are skipped. Every run gets:
 *   - a frozen snapshot of the orchestrator config
 *   - its own control destination (orchestrator/<runId>) for completions
 *   - an AbortController fired by abort()
 *
 * Terminal handling:
 *   completed / failed -> archived, short-term memory evicted
 *   aborted            -> archived, memory kept for diagnostics, queued
 *                         tasks for the run purged
 *
 * Abort is observed between dispatches and while waiting for completions.
 * A resolution already in progress finishes before the run stops.
 */

import { errorMessage } from "../errors/index.js";
import { loadOrchestratorConfig } from "../config/orchestrator/loader.js";
import type { OrchestratorConfig } from "../config/orchestrator/schema.js";
import { createNullLogger, generatePipelineRunId, type Logger } from "../logging/index.js";
import type { MemoryStore } from "../memory/memory-store.js";
import type { MessageQueue } from "../queue/message-queue.js";
import { ConflictLedger } from "../resolver/conflict-ledger.js";
import { ConflictResolver } from "../resolver/conflict-resolver.js";
import { systemClock, type Clock } from "../types/clock.js";
import {
  PipelineStage,
  RunStatus,
  StageStatus,
  WORK_STAGES,
  type PipelineRun,
  type StageRecord,
  type WorkStage,
} from "../types/pipeline.js";
import { InMemoryRunArchive, type RunArchive } from "./run-archive.js";
import { RunMonitor, type RunEvent, type RunMetrics } from "./run-monitor.js";
import { StageRunner } from "./stage-runner.js";
import { StageMachine, type StageTransition } from "./state-machine.js";

const CONTROL_PREFIX = "orchestrator/";
const MAX_FINISHED_RUNS = 100;

export interface PipelineSchedulerOptions {
  /** Validated and frozen on construction */
  config: unknown;
  queue: MessageQueue;
  store: MemoryStore;
  archive?: RunArchive;
  /** Built from config when omitted */
  resolver?: ConflictResolver;
  logger?: Logger;
  clock?: Clock;
}

export interface StartOptions {
  /** Explicit run id; generated from the topic when omitted */
  runId?: string;
}

export interface RunHandle {
  readonly runId: string;
  /** Settles with the terminal run; never rejects */
  readonly done: Promise<PipelineRun>;
}

export interface RunStatusReport {
  readonly run: PipelineRun;
  readonly active: boolean;
  readonly transitions: readonly StageTransition[];
  readonly metrics: RunMetrics;
  readonly stageDurations: Partial<Record<WorkStage, number>>;
  readonly events: readonly RunEvent[];
}

interface ActiveRun {
  readonly run: PipelineRun;
  readonly machine: StageMachine;
  readonly controller: AbortController;
  readonly controlDestination: string;
  readonly logger: Logger;
}

interface FinishedRun {
  readonly run: PipelineRun;
  readonly transitions: readonly StageTransition[];
}

export function controlDestinationFor(runId: string): string {
  return `${CONTROL_PREFIX}${runId}`;
}

export class PipelineScheduler {
  readonly config: Readonly<OrchestratorConfig>;
  private readonly queue: MessageQueue;
  private readonly store: MemoryStore;
  private readonly archive: RunArchive;
  private readonly resolver: ConflictResolver;
  private readonly ledger = new ConflictLedger();
  private readonly monitor: RunMonitor;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly active = new Map<string, ActiveRun>();
  private readonly finished = new Map<string, FinishedRun>();
  private readonly completions = new Map<string, Promise<PipelineRun>>();

  constructor(options: PipelineSchedulerOptions) {
    this.config = loadOrchestratorConfig(options.config);
    this.queue = options.queue;
    this.store = options.store;
    this.archive = options.archive ?? new InMemoryRunArchive();
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? createNullLogger()).child({ component: "scheduler" });
    this.monitor = new RunMonitor(this.clock);
    this.resolver =
      options.resolver ??
      new ConflictResolver({
        store: this.store,
        queue: this.queue,
        priority: this.config.priority,
        mergeStrategy: this.config.mergeStrategy,
        storeRetry: this.config.storeRetry,
        logger: options.logger,
        clock: this.clock,
      });
  }

  /**
   * Start a run in the background.
   */
  start(topic: string, options: StartOptions = {}): RunHandle {
    const runId = options.runId ?? generatePipelineRunId(topic, new Date(this.clock.now()));
    if (this.active.has(runId) || this.finished.has(runId)) {
      throw new Error(`Run ${runId} already exists`);
    }

    const run: PipelineRun = {
      runId,
      topic,
      config: this.config,
      startedAt: this.clock.now(),
      currentStage: PipelineStage.Idle,
      status: RunStatus.Running,
      degraded: false,
      stages: {},
      taskLog: [],
    };
    const active: ActiveRun = {
      run,
      machine: new StageMachine(this.clock),
      controller: new AbortController(),
      controlDestination: controlDestinationFor(runId),
      logger: this.logger.child({ runId }),
    };
    this.active.set(runId, active);

    return { runId, done: this.execute(active) };
  }

  /**
   * Start a run and wait for it to reach a terminal status.
   */
  async run(topic: string, options: StartOptions = {}): Promise<PipelineRun> {
    return this.start(topic, options).done;
  }

  /**
   * Request cancellation of an active run.
   *
   * @returns false when the run is unknown, finished or already aborting
   */
  abort(runId: string, reason = "operator cancellation"): boolean {
    const active = this.active.get(runId);
    if (!active || active.controller.signal.aborted) {
      return false;
    }
    active.run.abortReason = reason;
    active.logger.warn("Abort requested", { reason });
    active.controller.abort(new Error(`Run ${runId} aborted: ${reason}`));
    return true;
  }

  getStatus(runId: string): RunStatusReport | undefined {
    const active = this.active.get(runId);
    const finished = this.finished.get(runId);
    const run = active?.run ?? finished?.run;
    if (!run) {
      return undefined;
    }
    return {
      run: structuredClone(run),
      active: active !== undefined,
      transitions: [...(active?.machine.history ?? finished?.transitions ?? [])],
      metrics: this.monitor.metrics(runId),
      stageDurations: this.monitor.stageDurations(runId),
      events: [...this.monitor.eventsFor(runId)],
    };
  }

  activeRuns(): string[] {
    return [...this.active.keys()];
  }

  /**
   * Abort every active run and wait for them to finish.
   */
  async shutdown(reason = "scheduler shutdown"): Promise<void> {
    const pending = [...this.active.keys()].map((runId) => {
      this.abort(runId, reason);
      return this.waitFor(runId);
    });
    await Promise.all(pending);
  }

  // ── run loop ───────────────────────────────────────────────────────────

  private waitFor(runId: string): Promise<PipelineRun | undefined> {
    return this.completions.get(runId) ?? Promise.resolve(undefined);
  }

  private execute(active: ActiveRun): Promise<PipelineRun> {
    const done = this.drive(active)
      .catch((err: unknown) => {
        if (active.controller.signal.aborted) {
          this.markAborted(active);
        } else {
          this.fail(active, errorMessage(err));
        }
      })
      .then(() => this.finalize(active));
    this.completions.set(active.run.runId, done);
    return done;
  }

  private async drive(active: ActiveRun): Promise<void> {
    const { run, logger } = active;
    const signal = active.controller.signal;
    this.monitor.record(run.runId, logger, "run_started", undefined, { topic: run.topic });

    for (const stage of WORK_STAGES) {
      if (signal.aborted) {
        this.markAborted(active);
        return;
      }

      const roster = run.config.stages[stage];
      if (!roster) {
        run.stages[stage] = { stage, status: StageStatus.Skipped, degraded: false, subjects: [] };
        this.monitor.record(run.runId, logger, "stage_skipped", stage);
        continue;
      }

      active.machine.transition(stage);
      run.currentStage = stage;
      const record: StageRecord = {
        stage,
        status: StageStatus.Running,
        degraded: false,
        startedAt: this.clock.now(),
        subjects: [],
      };
      run.stages[stage] = record;
      this.monitor.record(run.runId, logger, "stage_started", stage, {
        roles: roster.roles.map((r) => r.role),
      });

      const runner = new StageRunner(
        {
          run,
          queue: this.queue,
          store: this.store,
          resolver: this.resolver,
          ledger: this.ledger,
          monitor: this.monitor,
          logger: logger.child({ component: `stage:${stage}` }),
          clock: this.clock,
          controlDestination: active.controlDestination,
          signal,
        },
        stage,
        roster,
        this.resolvedInputs(run)
      );
      const result = await runner.run(record);
      record.endedAt = this.clock.now();
      run.degraded = run.degraded || record.degraded;

      if (result === "aborted") {
        record.status = StageStatus.Aborted;
        this.markAborted(active);
        return;
      }
      if (result === "failed") {
        const unresolved = record.subjects.filter((s) => !s.resolved).map((s) => s.subject);
        this.fail(active, `Stage ${stage} left ${unresolved.length} of ${record.subjects.length} subjects unresolved: ${unresolved.join(", ")}`);
        return;
      }
      this.monitor.record(run.runId, logger, "stage_completed", stage, { degraded: record.degraded });
    }

    if (signal.aborted) {
      this.markAborted(active);
      return;
    }
    active.machine.transition(PipelineStage.Completed);
    run.currentStage = PipelineStage.Completed;
    run.status = RunStatus.Completed;
    this.monitor.record(run.runId, logger, "run_completed", undefined, { degraded: run.degraded });
  }

  /**
   * Authoritative keys of every subject resolved so far, for the next
   * stage's payload.
   */
  private resolvedInputs(run: PipelineRun): Record<string, string> {
    const inputs: Record<string, string> = {};
    for (const stage of WORK_STAGES) {
      for (const report of run.stages[stage]?.subjects ?? []) {
        if (report.authoritativeRef !== undefined) {
          inputs[`${stage}/${report.subject}`] = report.authoritativeRef;
        }
      }
    }
    return inputs;
  }

  private markAborted(active: ActiveRun): void {
    const { run } = active;
    if (active.machine.terminal) {
      return;
    }
    active.machine.transition(PipelineStage.Aborted);
    run.currentStage = PipelineStage.Aborted;
    run.status = RunStatus.Aborted;
    const purged = this.queue.purgeRun(run.runId);
    this.monitor.record(run.runId, active.logger, "run_aborted", undefined, {
      reason: run.abortReason,
      purged,
    });
  }

  private fail(active: ActiveRun, reason: string): void {
    const { run } = active;
    if (active.machine.terminal) {
      return;
    }
    active.machine.transition(PipelineStage.Failed);
    run.currentStage = PipelineStage.Failed;
    run.status = RunStatus.Failed;
    run.error = reason;
    this.monitor.record(run.runId, active.logger, "run_failed", undefined, { error: reason });
  }

  private async finalize(active: ActiveRun): Promise<PipelineRun> {
    const { run, logger } = active;
    run.endedAt = this.clock.now();

    this.queue.retireDestination(active.controlDestination);
    this.ledger.closeRun(run.runId);
    this.resolver.forgetRun(run.runId);

    try {
      await this.archive.save(run);
    } catch (err) {
      logger.error("Run not archived", { error: errorMessage(err) });
    }

    if (run.status !== RunStatus.Aborted) {
      try {
        const evicted = await this.store.endRun(run.runId);
        logger.debug("Run memory evicted", { evicted });
      } catch (err) {
        logger.warn("Run memory not evicted", { error: errorMessage(err) });
      }
    }

    this.active.delete(run.runId);
    this.completions.delete(run.runId);
    this.finished.set(run.runId, { run, transitions: [...active.machine.history] });
    this.pruneFinished();

    logger.info("Run finished", {
      status: run.status,
      degraded: run.degraded,
      durationMs: run.endedAt - run.startedAt,
      tasks: run.taskLog.length,
    });
    return structuredClone(run);
  }

  private pruneFinished(): void {
    while (this.finished.size > MAX_FINISHED_RUNS) {
      const oldest = this.finished.keys().next();
      if (oldest.done) {
        return;
      }
      this.finished.delete(oldest.value);
      this.monitor.forget(oldest.value);
    }
  }
}
