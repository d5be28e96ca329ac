/**
 * Pipeline stage and run definitions.
 * A run walks the stage sequence once; failed and aborted are reachable
 * from any non-terminal stage.
 */

import type { OrchestratorConfig } from "../config/orchestrator/schema.js";

export enum PipelineStage {
  Idle = "idle",
  Researching = "researching",
  Writing = "writing",
  Editing = "editing",
  Optimizing = "optimizing",
  Illustrating = "illustrating",
  Publishing = "publishing",
  Completed = "completed",
  Failed = "failed",
  Aborted = "aborted",
}

/** Stages that dispatch work to agents, in execution order */
export const WORK_STAGES = [
  PipelineStage.Researching,
  PipelineStage.Writing,
  PipelineStage.Editing,
  PipelineStage.Optimizing,
  PipelineStage.Illustrating,
  PipelineStage.Publishing,
] as const;

export type WorkStage = (typeof WORK_STAGES)[number];

export const TERMINAL_STAGES: ReadonlySet<PipelineStage> = new Set([
  PipelineStage.Completed,
  PipelineStage.Failed,
  PipelineStage.Aborted,
]);

export function isWorkStage(value: string): value is WorkStage {
  const stages: readonly string[] = WORK_STAGES;
  return stages.includes(value);
}

export enum RunStatus {
  Running = "running",
  Completed = "completed",
  Failed = "failed",
  Aborted = "aborted",
}

export enum StageStatus {
  Pending = "pending",
  Running = "running",
  Completed = "completed",
  Skipped = "skipped",
  Failed = "failed",
  Aborted = "aborted",
}

export interface SubjectReport {
  readonly subject: string;
  readonly resolved: boolean;
  /** Key of the authoritative value, when resolved */
  readonly authoritativeRef?: string;
  readonly winningRole?: string;
  readonly candidateCount: number;
  /** Roles that never produced a usable candidate */
  readonly missingRoles: readonly string[];
}

export interface StageRecord {
  readonly stage: WorkStage;
  status: StageStatus;
  degraded: boolean;
  startedAt?: number;
  endedAt?: number;
  subjects: SubjectReport[];
}

export interface TaskLogEntry {
  readonly messageId: string;
  readonly taskId: string;
  readonly stage: WorkStage;
  readonly subject: string;
  readonly role: string;
  readonly attempt: number;
  readonly dispatchedAt: number;
}

/**
 * Input the scheduler seeds for every task of a stage.
 */
export interface StagePayload {
  readonly topic: string;
  readonly stage: WorkStage;
  /** Authoritative keys from earlier stages, keyed by "<stage>/<subject>" */
  readonly inputs: Record<string, string>;
}

export interface PipelineRun {
  readonly runId: string;
  readonly topic: string;
  /** Frozen configuration the run was started with */
  readonly config: Readonly<OrchestratorConfig>;
  readonly startedAt: number;
  currentStage: PipelineStage;
  status: RunStatus;
  /** True when any stage finished with missing contributors or unresolved subjects */
  degraded: boolean;
  stages: Partial<Record<WorkStage, StageRecord>>;
  taskLog: TaskLogEntry[];
  endedAt?: number;
  error?: string;
  abortReason?: string;
}
