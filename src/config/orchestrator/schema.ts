/**
 * Orchestrator configuration schema.
 *
 * The config is validated once when a scheduler is built and snapshotted
 * into every run it starts. A run never observes a config change; a new
 * config requires a new run.
 *
 * Roles and subjects are plain configuration data: adding an agent role
 * means adding it to a stage roster and, optionally, to a priority list.
 */

import { z } from "zod";

const IDENTIFIER_PATTERN = /^[a-z][a-z0-9_-]*$/;

/** Agent role name, also used as the role's queue destination */
export const RoleNameSchema = z
  .string()
  .regex(IDENTIFIER_PATTERN, "must be lowercase letters, digits, '_' or '-'")
  .describe("Agent role name");

/** Logical subject key agents compete to resolve */
export const SubjectKeySchema = z
  .string()
  .regex(IDENTIFIER_PATTERN, "must be lowercase letters, digits, '_' or '-'")
  .describe("Subject key");

/**
 * Exponential backoff settings shared by queue dispatch and store retries.
 */
export const BackoffSchema = z
  .object({
    /** Total attempts including the first one */
    maxAttempts: z.number().int().min(1).describe("Total attempts including the first"),
    initialDelayMs: z.number().int().min(0).describe("Delay before the first retry"),
    maxDelayMs: z.number().int().min(0).describe("Upper bound on any single delay"),
  })
  .strict();

export type BackoffSettings = z.infer<typeof BackoffSchema>;

/**
 * One role's contribution to a stage.
 */
export const RoleAssignmentSchema = z
  .object({
    role: RoleNameSchema,
    /** Subjects this role produces a candidate for */
    subjects: z.array(SubjectKeySchema).min(1).describe("Subjects this role contributes to"),
  })
  .strict();

export type RoleAssignment = z.infer<typeof RoleAssignmentSchema>;

export const StageRosterSchema = z
  .object({
    roles: z.array(RoleAssignmentSchema).min(1).describe("Roles dispatched in this stage"),
    /** Overrides stageDeadlineMs for this stage */
    deadlineMs: z.number().int().positive().optional(),
  })
  .strict();

export type StageRoster = z.infer<typeof StageRosterSchema>;

/**
 * Rosters keyed by work stage. Stages without a roster are skipped.
 */
export const StageRostersSchema = z
  .object({
    researching: StageRosterSchema.optional(),
    writing: StageRosterSchema.optional(),
    editing: StageRosterSchema.optional(),
    optimizing: StageRosterSchema.optional(),
    illustrating: StageRosterSchema.optional(),
    publishing: StageRosterSchema.optional(),
  })
  .strict();

export type StageRosters = z.infer<typeof StageRostersSchema>;

/**
 * Role ranking used by the conflict resolver; earlier roles outrank later ones.
 */
export const PriorityPolicySchema = z
  .object({
    default: z.array(RoleNameSchema).describe("Ranking applied to every subject"),
    subjects: z
      .record(SubjectKeySchema, z.array(RoleNameSchema))
      .describe("Per-subject rankings that replace the default"),
  })
  .strict();

export type PriorityPolicy = z.infer<typeof PriorityPolicySchema>;

export const MergeStrategyName = z.enum(["none", "shallow-merge"]);
export type MergeStrategyName = z.infer<typeof MergeStrategyName>;

export const MemorySettingsSchema = z
  .object({
    shortTermCapacity: z
      .number()
      .int()
      .min(1)
      .describe("Maximum short-term entries held per run"),
    /** 0 disables age-based expiry */
    shortTermTtlMs: z.number().int().min(0).describe("Short-term entry lifetime; 0 = no expiry"),
  })
  .strict();

export const QueueSettingsSchema = z
  .object({
    capacity: z
      .number()
      .int()
      .min(1)
      .describe("Maximum unacknowledged deliveries per destination"),
    leaseMs: z
      .number()
      .int()
      .positive()
      .describe("How long a dequeued message stays in flight before redelivery"),
    dispatchBackoff: BackoffSchema.describe("Backoff applied when a destination is full"),
  })
  .strict();

export const OrchestratorConfigSchema = z
  .object({
    stages: StageRostersSchema,
    priority: PriorityPolicySchema,
    mergeStrategy: MergeStrategyName.describe("How competing candidates are combined"),
    stageDeadlineMs: z
      .number()
      .int()
      .positive()
      .describe("Default bound on waiting for a stage's completions"),
    maxAttempts: z
      .number()
      .int()
      .min(1)
      .describe("Dispatch attempts per task before the contributor is marked missing"),
    degradedFailureThreshold: z
      .number()
      .min(0)
      .max(1)
      .describe("Run fails when a stage's unresolved subject fraction exceeds this"),
    memory: MemorySettingsSchema,
    queue: QueueSettingsSchema,
    storeRetry: BackoffSchema.describe("Retry budget for memory store faults"),
  })
  .strict();

export type OrchestratorConfig = z.infer<typeof OrchestratorConfigSchema>;
