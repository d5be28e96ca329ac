/**
 * Orchestrator configuration loader and validator.
 *
 * Responsible for:
 * - Validating raw input against the schema with fail-fast behavior
 * - Cross-field checks Zod cannot express (duplicate roles, unknown subjects)
 * - Producing structured error messages
 * - Freezing configuration so a run's snapshot cannot change
 */

import { readFileSync } from "node:fs";
import type { ZodIssue } from "zod";
import { OrchestratorConfigSchema, type OrchestratorConfig } from "./schema.js";
import { WORK_STAGES } from "../../types/pipeline.js";

/**
 * Structured validation error for orchestrator configuration.
 */
export class OrchestratorConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "OrchestratorConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Orchestrator configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or one of our cross-field codes */
  code: string;
}

export type OrchestratorConfigValidation =
  | { success: true; config: OrchestratorConfig }
  | { success: false; errors: ConfigValidationIssue[] };

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

function findDuplicates(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) {
      duplicates.add(value);
    }
    seen.add(value);
  }
  return [...duplicates];
}

/**
 * Validate constraints that span several fields.
 */
function validateCrossFieldConstraints(config: OrchestratorConfig): ConfigValidationIssue[] {
  const issues: ConfigValidationIssue[] = [];
  const knownSubjects = new Set<string>();
  let rosterCount = 0;

  for (const stage of WORK_STAGES) {
    const roster = config.stages[stage];
    if (!roster) {
      continue;
    }
    rosterCount++;

    for (const role of findDuplicates(roster.roles.map((r) => r.role))) {
      issues.push({
        path: ["stages", stage, "roles"],
        message: `role "${role}" is assigned more than once`,
        code: "duplicate_role",
      });
    }

    roster.roles.forEach((assignment, index) => {
      for (const subject of findDuplicates(assignment.subjects)) {
        issues.push({
          path: ["stages", stage, "roles", index, "subjects"],
          message: `subject "${subject}" is listed more than once`,
          code: "duplicate_subject",
        });
      }
      assignment.subjects.forEach((subject) => knownSubjects.add(subject));
    });
  }

  if (rosterCount === 0) {
    issues.push({
      path: ["stages"],
      message: "at least one stage needs a roster",
      code: "empty_pipeline",
    });
  }

  for (const role of findDuplicates(config.priority.default)) {
    issues.push({
      path: ["priority", "default"],
      message: `role "${role}" is ranked more than once`,
      code: "duplicate_priority",
    });
  }

  for (const [subject, ranking] of Object.entries(config.priority.subjects)) {
    if (!knownSubjects.has(subject)) {
      issues.push({
        path: ["priority", "subjects", subject],
        message: `subject "${subject}" is not produced by any stage`,
        code: "unknown_subject",
      });
    }
    for (const role of findDuplicates(ranking)) {
      issues.push({
        path: ["priority", "subjects", subject],
        message: `role "${role}" is ranked more than once`,
        code: "duplicate_priority",
      });
    }
  }

  const backoffs = [
    { path: ["queue", "dispatchBackoff"], settings: config.queue.dispatchBackoff },
    { path: ["storeRetry"], settings: config.storeRetry },
  ];
  for (const { path, settings } of backoffs) {
    if (settings.initialDelayMs > settings.maxDelayMs) {
      issues.push({
        path,
        message: "initialDelayMs must be <= maxDelayMs",
        code: "invalid_range",
      });
    }
  }

  return issues;
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }

  return Object.freeze(obj);
}

/**
 * Validate orchestrator configuration without throwing.
 */
export function validateOrchestratorConfig(input: unknown): OrchestratorConfigValidation {
  const result = OrchestratorConfigSchema.safeParse(input);

  if (!result.success) {
    return { success: false, errors: formatZodIssues(result.error.issues) };
  }

  const issues = validateCrossFieldConstraints(result.data);
  if (issues.length > 0) {
    return { success: false, errors: issues };
  }

  return { success: true, config: result.data };
}

/**
 * Validate and load orchestrator configuration.
 *
 * @throws OrchestratorConfigError if validation fails
 */
export function loadOrchestratorConfig(input: unknown): Readonly<OrchestratorConfig> {
  const result = validateOrchestratorConfig(input);

  if (!result.success) {
    throw new OrchestratorConfigError(
      `Invalid orchestrator configuration: ${result.errors.length} validation error(s)`,
      result.errors
    );
  }

  return deepFreeze(result.config);
}

/**
 * Load orchestrator configuration from a JSON file.
 *
 * @throws OrchestratorConfigError if the file is unreadable, not JSON, or invalid
 */
export function loadOrchestratorConfigFile(path: string): Readonly<OrchestratorConfig> {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    throw new OrchestratorConfigError(`Cannot read orchestrator config: ${path}`, [
      { path: [], message: err instanceof Error ? err.message : String(err), code: "io_error" },
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new OrchestratorConfigError(`Orchestrator config is not valid JSON: ${path}`, [
      { path: [], message: err instanceof Error ? err.message : String(err), code: "invalid_json" },
    ]);
  }

  return loadOrchestratorConfig(parsed);
}
