/**
 * Run monitor.
 *
 * Keeps an ordered event log per run and derives the counters and stage
 * durations reported by PipelineScheduler.getStatus(). Every event is also
 * written to the run's logger.
 */

import type { Logger } from "../logging/index.js";
import { systemClock, type Clock } from "../types/clock.js";
import type { WorkStage } from "../types/pipeline.js";

export type RunEventType =
  | "run_started"
  | "stage_started"
  | "stage_skipped"
  | "task_dispatched"
  | "task_retried"
  | "completion_received"
  | "completion_stale"
  | "contributor_missing"
  | "subject_resolved"
  | "subject_unresolved"
  | "stage_completed"
  | "run_completed"
  | "run_failed"
  | "run_aborted";

export interface RunEvent {
  readonly type: RunEventType;
  readonly at: number;
  readonly stage?: WorkStage;
  readonly details?: Record<string, unknown>;
}

export interface RunMetrics {
  tasksDispatched: number;
  retries: number;
  completions: number;
  staleCompletions: number;
  missingContributors: number;
  subjectsResolved: number;
  subjectsUnresolved: number;
}

const WARN_EVENTS: ReadonlySet<RunEventType> = new Set([
  "contributor_missing",
  "subject_unresolved",
  "run_failed",
  "run_aborted",
]);

const DEBUG_EVENTS: ReadonlySet<RunEventType> = new Set([
  "task_dispatched",
  "completion_received",
  "completion_stale",
]);

export class RunMonitor {
  private readonly events = new Map<string, RunEvent[]>();

  constructor(private readonly clock: Clock = systemClock) {}

  record(
    runId: string,
    logger: Logger,
    type: RunEventType,
    stage?: WorkStage,
    details?: Record<string, unknown>
  ): RunEvent {
    const event: RunEvent = {
      type,
      at: this.clock.now(),
      ...(stage !== undefined ? { stage } : {}),
      ...(details !== undefined ? { details } : {}),
    };
    let runEvents = this.events.get(runId);
    if (!runEvents) {
      runEvents = [];
      this.events.set(runId, runEvents);
    }
    runEvents.push(event);

    const context = { stage, ...details };
    if (WARN_EVENTS.has(type)) {
      logger.warn(type, context);
    } else if (DEBUG_EVENTS.has(type)) {
      logger.debug(type, context);
    } else {
      logger.info(type, context);
    }
    return event;
  }

  eventsFor(runId: string): readonly RunEvent[] {
    return this.events.get(runId) ?? [];
  }

  metrics(runId: string): RunMetrics {
    const metrics: RunMetrics = {
      tasksDispatched: 0,
      retries: 0,
      completions: 0,
      staleCompletions: 0,
      missingContributors: 0,
      subjectsResolved: 0,
      subjectsUnresolved: 0,
    };
    for (const event of this.eventsFor(runId)) {
      switch (event.type) {
        case "task_dispatched":
          metrics.tasksDispatched++;
          break;
        case "task_retried":
          metrics.retries++;
          break;
        case "completion_received":
          metrics.completions++;
          break;
        case "completion_stale":
          metrics.staleCompletions++;
          break;
        case "contributor_missing":
          metrics.missingContributors++;
          break;
        case "subject_resolved":
          metrics.subjectsResolved++;
          break;
        case "subject_unresolved":
          metrics.subjectsUnresolved++;
          break;
        default:
          break;
      }
    }
    return metrics;
  }

  /**
   * Milliseconds from each stage's start to its completion. Stages that
   * never completed are left out.
   */
  stageDurations(runId: string): Partial<Record<WorkStage, number>> {
    const started = new Map<WorkStage, number>();
    const durations: Partial<Record<WorkStage, number>> = {};
    for (const event of this.eventsFor(runId)) {
      if (event.stage === undefined) {
        continue;
      }
      if (event.type === "stage_started") {
        started.set(event.stage, event.at);
      } else if (event.type === "stage_completed") {
        const start = started.get(event.stage);
        if (start !== undefined) {
          durations[event.stage] = event.at - start;
        }
      }
    }
    return durations;
  }

  forget(runId: string): void {
    this.events.delete(runId);
  }
}
