/**
 * Archive for runs that reached a terminal status.
 *
 * Archived runs and the long-term memory tier are the only state expected
 * to survive a restart. The JSON archive writes one file per run.
 */

import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { StoreUnavailableError } from "../errors/index.js";
import { OrchestratorConfigSchema } from "../config/orchestrator/schema.js";
import {
  PipelineStage,
  RunStatus,
  StageStatus,
  isWorkStage,
  type PipelineRun,
  type WorkStage,
} from "../types/pipeline.js";

export interface RunArchive {
  save(run: PipelineRun): Promise<void>;
  load(runId: string): Promise<PipelineRun | undefined>;
  list(): Promise<string[]>;
}

export class InMemoryRunArchive implements RunArchive {
  private readonly runs = new Map<string, PipelineRun>();

  async save(run: PipelineRun): Promise<void> {
    this.runs.set(run.runId, structuredClone(run));
  }

  async load(runId: string): Promise<PipelineRun | undefined> {
    const run = this.runs.get(runId);
    return run ? structuredClone(run) : undefined;
  }

  async list(): Promise<string[]> {
    return [...this.runs.keys()].sort();
  }
}

const WorkStageSchema = z.custom<WorkStage>(
  (value) => typeof value === "string" && isWorkStage(value)
);

const SubjectReportSchema = z.object({
  subject: z.string(),
  resolved: z.boolean(),
  authoritativeRef: z.string().optional(),
  winningRole: z.string().optional(),
  candidateCount: z.number(),
  missingRoles: z.array(z.string()),
});

const StageRecordSchema = z.object({
  stage: WorkStageSchema,
  status: z.nativeEnum(StageStatus),
  degraded: z.boolean(),
  startedAt: z.number().optional(),
  endedAt: z.number().optional(),
  subjects: z.array(SubjectReportSchema),
});

const PipelineRunSchema = z.object({
  runId: z.string(),
  topic: z.string(),
  config: OrchestratorConfigSchema,
  startedAt: z.number(),
  currentStage: z.nativeEnum(PipelineStage),
  status: z.nativeEnum(RunStatus),
  degraded: z.boolean(),
  stages: z.object({
    researching: StageRecordSchema.optional(),
    writing: StageRecordSchema.optional(),
    editing: StageRecordSchema.optional(),
    optimizing: StageRecordSchema.optional(),
    illustrating: StageRecordSchema.optional(),
    publishing: StageRecordSchema.optional(),
  }),
  taskLog: z.array(
    z.object({
      messageId: z.string(),
      taskId: z.string(),
      stage: WorkStageSchema,
      subject: z.string(),
      role: z.string(),
      attempt: z.number(),
      dispatchedAt: z.number(),
    })
  ),
  endedAt: z.number().optional(),
  error: z.string().optional(),
  abortReason: z.string().optional(),
});

function archiveFileName(runId: string): string {
  return `${encodeURIComponent(runId)}.json`;
}

export class JsonFileRunArchive implements RunArchive {
  constructor(private readonly dir: string) {}

  async save(run: PipelineRun): Promise<void> {
    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(join(this.dir, archiveFileName(run.runId)), JSON.stringify(run, null, 2), "utf-8");
    } catch (err) {
      throw new StoreUnavailableError(`Cannot archive run ${run.runId}`, { cause: err });
    }
  }

  async load(runId: string): Promise<PipelineRun | undefined> {
    let raw: string;
    try {
      raw = await readFile(join(this.dir, archiveFileName(runId)), "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        return undefined;
      }
      throw new StoreUnavailableError(`Cannot read archived run ${runId}`, { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new StoreUnavailableError(`Archived run ${runId} is not JSON`, { cause: err });
    }

    const parsed = PipelineRunSchema.safeParse(json);
    if (!parsed.success) {
      throw new StoreUnavailableError(`Archived run ${runId} has an unexpected shape`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  async list(): Promise<string[]> {
    try {
      const files = await readdir(this.dir);
      return files
        .filter((file) => file.endsWith(".json"))
        .map((file) => decodeURIComponent(file.slice(0, -".json".length)))
        .sort();
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        return [];
      }
      throw new StoreUnavailableError(`Cannot list run archive ${this.dir}`, { cause: err });
    }
  }
}
