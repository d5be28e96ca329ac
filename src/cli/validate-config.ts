#!/usr/bin/env node
/**
 * CLI command to validate an orchestrator configuration.
 *
 * Validates:
 * - Process environment (NODE_ENV, LOG_LEVEL)
 * - Orchestrator config file (schema + cross-field checks)
 * - Priority coverage: contributing roles absent from a subject's ranking
 *
 * Reports:
 * - Stage roster: roles, subjects and deadline per stage
 * - Subjects with more than one contributing role (conflict candidates)
 *
 * Usage:
 *   npx tsx src/cli/validate-config.ts [options]
 *   npm run validate-config
 *
 * Options:
 *   --config <path>  Path to orchestrator config JSON (default: built-in defaults)
 *   --json           Output entire report as JSON (for CI parsing)
 *   -h, --help       Show help
 *
 * Exit codes:
 *   0 - All validations passed
 *   1 - One or more validations failed
 */

import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";

import {
  config as appConfig,
  validateConfig,
  ConfigError,
  DEFAULT_ORCHESTRATOR_CONFIG,
  loadOrchestratorConfig,
  loadOrchestratorConfigFile,
  OrchestratorConfigError,
  type AppConfig,
  type OrchestratorConfig,
} from "../config/index.js";
import { generateRunId } from "../logging/index.js";
import { rankingFor } from "../resolver/policy.js";
import { WORK_STAGES, type WorkStage } from "../types/pipeline.js";

// ============================================================
// Types
// ============================================================

export interface StepResult {
  success: boolean;
  component: string;
  message: string;
  details?: string[];
}

export interface StageSummary {
  stage: WorkStage;
  deadlineMs: number;
  roles: Array<{ role: string; subjects: string[] }>;
  /** Subjects more than one role contributes to */
  contested: string[];
}

export interface ValidationReport {
  timestamp: string;
  runId: string;
  configSource: string;
  steps: StepResult[];
  roster: StageSummary[];
  summary: {
    stepsPassed: number;
    stepsFailed: number;
    stepsTotal: number;
    stages: number;
    tasksPerRun: number;
    contestedSubjects: number;
  };
}

export interface ValidateOptions {
  /** Config file; built-in defaults when omitted */
  configPath?: string;
  env?: AppConfig;
}

// ============================================================
// Validation steps
// ============================================================

function runEnvironmentStep(env: AppConfig): StepResult {
  try {
    const level = validateConfig(env);
    return {
      success: true,
      component: "Environment",
      message: `NODE_ENV=${env.env}, LOG_LEVEL=${level}`,
    };
  } catch (err) {
    if (err instanceof ConfigError) {
      return { success: false, component: "Environment", message: err.message };
    }
    throw err;
  }
}

function runConfigStep(configPath: string | undefined): {
  step: StepResult;
  config?: Readonly<OrchestratorConfig>;
} {
  try {
    const config = configPath
      ? loadOrchestratorConfigFile(configPath)
      : loadOrchestratorConfig(DEFAULT_ORCHESTRATOR_CONFIG);
    return {
      step: {
        success: true,
        component: "Orchestrator config",
        message: configPath ? `Loaded ${configPath}` : "Built-in defaults are valid",
      },
      config,
    };
  } catch (err) {
    if (err instanceof OrchestratorConfigError) {
      return {
        step: {
          success: false,
          component: "Orchestrator config",
          message: err.message,
          details: err.issues.map(
            (issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`
          ),
        },
      };
    }
    throw err;
  }
}

/**
 * Every role contributing to a subject should appear in that subject's
 * ranking; an unranked role only wins when it is the sole candidate.
 */
function runPriorityStep(config: Readonly<OrchestratorConfig>): StepResult {
  const gaps: string[] = [];
  for (const stage of WORK_STAGES) {
    for (const assignment of config.stages[stage]?.roles ?? []) {
      for (const subject of assignment.subjects) {
        if (!rankingFor(config.priority, subject).includes(assignment.role)) {
          gaps.push(`${stage}/${subject}: ${assignment.role} is unranked`);
        }
      }
    }
  }
  return gaps.length === 0
    ? { success: true, component: "Priority policy", message: "Every contributing role is ranked" }
    : {
        success: false,
        component: "Priority policy",
        message: `${gaps.length} contribution(s) have no rank`,
        details: gaps,
      };
}

export function summarizeRoster(config: Readonly<OrchestratorConfig>): StageSummary[] {
  const summaries: StageSummary[] = [];
  for (const stage of WORK_STAGES) {
    const roster = config.stages[stage];
    if (!roster) {
      continue;
    }
    const contributors = new Map<string, number>();
    for (const assignment of roster.roles) {
      for (const subject of assignment.subjects) {
        contributors.set(subject, (contributors.get(subject) ?? 0) + 1);
      }
    }
    summaries.push({
      stage,
      deadlineMs: roster.deadlineMs ?? config.stageDeadlineMs,
      roles: roster.roles.map((a) => ({ role: a.role, subjects: [...a.subjects] })),
      contested: [...contributors.entries()]
        .filter(([, count]) => count > 1)
        .map(([subject]) => subject)
        .sort(),
    });
  }
  return summaries;
}

/**
 * Run every validation step and build the report.
 */
export function validateOrchestratorSetup(options: ValidateOptions = {}): ValidationReport {
  const steps: StepResult[] = [runEnvironmentStep(options.env ?? appConfig)];

  const { step, config } = runConfigStep(options.configPath);
  steps.push(step);

  const roster = config ? summarizeRoster(config) : [];
  if (config) {
    steps.push(runPriorityStep(config));
  }

  const stepsPassed = steps.filter((s) => s.success).length;
  return {
    timestamp: new Date().toISOString(),
    runId: generateRunId(),
    configSource: options.configPath ?? "(defaults)",
    steps,
    roster,
    summary: {
      stepsPassed,
      stepsFailed: steps.length - stepsPassed,
      stepsTotal: steps.length,
      stages: roster.length,
      tasksPerRun: roster.reduce(
        (sum, s) => sum + s.roles.reduce((n, r) => n + r.subjects.length, 0),
        0
      ),
      contestedSubjects: roster.reduce((sum, s) => sum + s.contested.length, 0),
    },
  };
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

/**
 * Render the human-readable report as lines.
 */
export function renderReport(report: ValidationReport, useColors = false): string[] {
  const c = (color: keyof typeof COLORS, text: string): string =>
    useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
  const lines: string[] = [];

  lines.push("═".repeat(60));
  lines.push(c("bold", " Orchestrator Configuration Validation"));
  lines.push("═".repeat(60));

  for (const step of report.steps) {
    const mark = step.success ? c("green", "✓") : c("red", "✗");
    lines.push(`${mark} ${c("bold", step.component)}: ${step.message}`);
    for (const detail of step.details ?? []) {
      lines.push(`    ${c(step.success ? "dim" : "red", "•")} ${detail}`);
    }
  }

  if (report.roster.length > 0) {
    lines.push("");
    lines.push(c("bold", "Stage roster:"));
    for (const stage of report.roster) {
      lines.push(`  ${stage.stage} (deadline ${stage.deadlineMs}ms)`);
      for (const { role, subjects } of stage.roles) {
        lines.push(`    ${role}: ${subjects.join(", ")}`);
      }
      if (stage.contested.length > 0) {
        lines.push(`    ${c("yellow", "contested")}: ${stage.contested.join(", ")}`);
      }
    }
  }

  lines.push("─".repeat(60));
  const { stepsPassed, stepsFailed, stepsTotal } = report.summary;
  lines.push(
    stepsFailed === 0
      ? c("green", `✓ All validations passed (${stepsPassed}/${stepsTotal})`)
      : c("red", `✗ Validation failed: ${stepsFailed} error(s)`)
  );
  lines.push("─".repeat(60));
  return lines;
}

// ============================================================
// Main
// ============================================================

const HELP = `
Usage: validate-config [options]

Options:
  --config <path>  Path to orchestrator config JSON (default: built-in defaults)
  --json           Output entire report as JSON (for CI parsing)
  -h, --help       Show this help message
`;

/**
 * Run the command against argv (without node and script) and return the exit code.
 */
export function main(argv: string[]): number {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: "string" },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(HELP);
    return 0;
  }

  const report = validateOrchestratorSetup({
    ...(values.config !== undefined ? { configPath: resolve(values.config) } : {}),
  });

  if (values.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    const useColors = Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;
    for (const line of renderReport(report, useColors)) {
      console.log(line);
    }
  }
  return report.summary.stepsFailed > 0 ? 1 : 0;
}

const invokedDirectly =
  process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (invokedDirectly) {
  try {
    process.exitCode = main(process.argv.slice(2));
  } catch (err) {
    console.error("Unexpected error:", err);
    process.exitCode = 1;
  }
}
