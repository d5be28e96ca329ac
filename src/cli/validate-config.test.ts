/**
 * Tests for the validate-config command.
 *
 * Run: node --import tsx src/cli/validate-config.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { loadOrchestratorConfigFile, type AppConfig } from "../config/index.js";
import { DEFAULT_ORCHESTRATOR_CONFIG } from "../config/orchestrator/defaults.js";
import { PipelineStage } from "../types/pipeline.js";
import {
  main,
  renderReport,
  summarizeRoster,
  validateOrchestratorSetup,
  type ValidationReport,
} from "./validate-config.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

async function test(name: string, fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

const TEST_ENV: AppConfig = {
  env: "test",
  debug: false,
  logLevel: "warn",
  appName: "content-orchestrator",
  logDir: "output/logs",
  orchestratorConfigPath: "",
  memoryStoragePath: "",
  runArchiveDir: "",
  stageDeadlineOverrideMs: 0,
};

function withConfigFile(content: unknown, fn: (path: string) => void): void {
  const dir = mkdtempSync(join(tmpdir(), "validate-config-"));
  try {
    const path = join(dir, "orchestrator.json");
    writeFileSync(path, JSON.stringify(content));
    fn(path);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

/** Run fn with console.log captured */
function captureLog(fn: () => number): { code: number; output: string } {
  const lines: string[] = [];
  const original = console.log;
  console.log = (...args: unknown[]) => {
    lines.push(args.map(String).join(" "));
  };
  try {
    const code = fn();
    return { code, output: lines.join("\n") };
  } finally {
    console.log = original;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

section("Validation steps");

await test("built-in defaults pass every step", () => {
  const report = validateOrchestratorSetup({ env: TEST_ENV });
  assert.equal(report.configSource, "(defaults)");
  assert.deepEqual(report.steps, [
    { success: true, component: "Environment", message: "NODE_ENV=test, LOG_LEVEL=warn" },
    { success: true, component: "Orchestrator config", message: "Built-in defaults are valid" },
    { success: true, component: "Priority policy", message: "Every contributing role is ranked" },
  ]);
  assert.deepEqual(report.summary, {
    stepsPassed: 3,
    stepsFailed: 0,
    stepsTotal: 3,
    stages: 6,
    tasksPerRun: 7,
    contestedSubjects: 0,
  });
  assert.match(report.runId, /^\d{8}-[0-9a-f]{6}$/);
});

await test("an invalid environment fails its step only", () => {
  const report = validateOrchestratorSetup({ env: { ...TEST_ENV, logLevel: "loud" } });
  assert.equal(report.steps[0]?.success, false);
  assert.equal(report.steps[0]?.message, "Invalid LOG_LEVEL: loud. Must be debug, info, warn, error.");
  assert.equal(report.summary.stepsFailed, 1);
  assert.equal(report.summary.stepsTotal, 3);
});

await test("a bad config file reports each issue and skips the priority step", () => {
  withConfigFile({ ...DEFAULT_ORCHESTRATOR_CONFIG, maxAttempts: 0, stages: {} }, (path) => {
    const report = validateOrchestratorSetup({ env: TEST_ENV, configPath: path });
    assert.equal(report.configSource, path);
    assert.equal(report.steps.length, 2);
    const step = report.steps[1];
    assert.equal(step?.success, false);
    assert.equal(step?.message, "Invalid orchestrator configuration: 1 validation error(s)");
    assert.equal(step?.details?.length, 1);
    assert.match(step?.details?.[0] ?? "", /^maxAttempts: /);
    assert.deepEqual(report.roster, []);
  });
});

await test("an unranked contributing role fails the priority step", () => {
  withConfigFile(
    {
      ...DEFAULT_ORCHESTRATOR_CONFIG,
      stages: { writing: { roles: [{ role: "ghostwriter", subjects: ["draft"] }] } },
      priority: { default: ["writer"], subjects: {} },
    },
    (path) => {
      const report = validateOrchestratorSetup({ env: TEST_ENV, configPath: path });
      assert.deepEqual(report.steps[2], {
        success: false,
        component: "Priority policy",
        message: "1 contribution(s) have no rank",
        details: ["writing/draft: ghostwriter is unranked"],
      });
    }
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// ROSTER
// ═══════════════════════════════════════════════════════════════════════════

section("Roster summary");

await test("contested subjects are listed per stage", () => {
  const roster = summarizeRoster(loadOrchestratorConfigFile("config/orchestrator.json"));
  assert.deepEqual(
    roster.map((s) => [s.stage, s.contested]),
    [
      ["researching", ["background"]],
      ["writing", []],
      ["editing", ["tone"]],
      ["optimizing", []],
      ["illustrating", []],
      ["publishing", []],
    ]
  );
  assert.equal(roster[0]?.deadlineMs, 600_000);
  assert.equal(roster[1]?.deadlineMs, 300_000);
});

// ═══════════════════════════════════════════════════════════════════════════
// OUTPUT
// ═══════════════════════════════════════════════════════════════════════════

section("Output");

function sampleReport(stepsFailed: number): ValidationReport {
  return {
    timestamp: "2024-01-15T10:00:00.000Z",
    runId: "20240115-abc123",
    configSource: "(defaults)",
    steps: [
      { success: true, component: "Environment", message: "NODE_ENV=test, LOG_LEVEL=info" },
      stepsFailed === 0
        ? { success: true, component: "Priority policy", message: "Every contributing role is ranked" }
        : {
            success: false,
            component: "Priority policy",
            message: "1 contribution(s) have no rank",
            details: ["editing/tone: writer is unranked"],
          },
    ],
    roster: [
      {
        stage: PipelineStage.Editing,
        deadlineMs: 1000,
        roles: [
          { role: "editor", subjects: ["draft", "tone"] },
          { role: "writer", subjects: ["tone"] },
        ],
        contested: ["tone"],
      },
    ],
    summary: {
      stepsPassed: 2 - stepsFailed,
      stepsFailed,
      stepsTotal: 2,
      stages: 1,
      tasksPerRun: 3,
      contestedSubjects: 1,
    },
  };
}

await test("a passing report renders the roster and a success footer", () => {
  assert.deepEqual(renderReport(sampleReport(0)), [
    "═".repeat(60),
    " Orchestrator Configuration Validation",
    "═".repeat(60),
    "✓ Environment: NODE_ENV=test, LOG_LEVEL=info",
    "✓ Priority policy: Every contributing role is ranked",
    "",
    "Stage roster:",
    "  editing (deadline 1000ms)",
    "    editor: draft, tone",
    "    writer: tone",
    "    contested: tone",
    "─".repeat(60),
    "✓ All validations passed (2/2)",
    "─".repeat(60),
  ]);
});

await test("a failing report lists details and the error count", () => {
  const lines = renderReport(sampleReport(1));
  assert.equal(lines[4], "✗ Priority policy: 1 contribution(s) have no rank");
  assert.equal(lines[5], "    • editing/tone: writer is unranked");
  assert.equal(lines[lines.length - 2], "✗ Validation failed: 1 error(s)");
});

await test("colors wrap marks only when enabled", () => {
  const lines = renderReport(sampleReport(0), true);
  assert.equal(lines[3], "\x1b[32m✓\x1b[0m \x1b[1mEnvironment\x1b[0m: NODE_ENV=test, LOG_LEVEL=info");
});

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND
// ═══════════════════════════════════════════════════════════════════════════

section("Command");

await test("--json prints the report and returns the exit code", () => {
  withConfigFile({ ...DEFAULT_ORCHESTRATOR_CONFIG, stageDeadlineMs: 1234 }, (path) => {
    const { code, output } = captureLog(() => main(["--config", path, "--json"]));
    const parsed: unknown = JSON.parse(output);
    assert.ok(parsed && typeof parsed === "object" && "roster" in parsed);
    assert.equal(output.includes('"deadlineMs": 1234'), true);
    assert.equal(code, validateOrchestratorSetup({ configPath: path }).summary.stepsFailed > 0 ? 1 : 0);
  });
});

await test("an invalid config file exits with 1", () => {
  withConfigFile({ stages: {} }, (path) => {
    const { code } = captureLog(() => main(["--config", path, "--json"]));
    assert.equal(code, 1);
  });
});

await test("--help prints usage and exits 0", () => {
  const { code, output } = captureLog(() => main(["--help"]));
  assert.equal(code, 0);
  assert.match(output, /Usage: validate-config \[options\]/);
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
