/**
 * Tests for the stage state machine, run monitor and run archive.
 *
 * Run: node --import tsx src/scheduler/state-machine.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { InvalidTransitionError, StoreUnavailableError } from "../errors/index.js";
import { DEFAULT_ORCHESTRATOR_CONFIG } from "../config/orchestrator/defaults.js";
import { createNullLogger, type Logger } from "../logging/index.js";
import type { Clock } from "../types/clock.js";
import { PipelineStage, RunStatus, StageStatus, type PipelineRun } from "../types/pipeline.js";
import { InMemoryRunArchive, JsonFileRunArchive } from "./run-archive.js";
import { RunMonitor } from "./run-monitor.js";
import { StageMachine, canTransition, isTerminal } from "./state-machine.js";

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

class ManualClock implements Clock {
  constructor(private time = 1_000) {}
  now(): number {
    return this.time;
  }
  advance(ms: number): void {
    this.time += ms;
  }
}

function sampleRun(runId: string): PipelineRun {
  return {
    runId,
    topic: "Remote work",
    config: DEFAULT_ORCHESTRATOR_CONFIG,
    startedAt: 1,
    currentStage: PipelineStage.Completed,
    status: RunStatus.Completed,
    degraded: true,
    stages: {
      researching: {
        stage: PipelineStage.Researching,
        status: StageStatus.Completed,
        degraded: true,
        startedAt: 1,
        endedAt: 5,
        subjects: [
          {
            subject: "background",
            resolved: true,
            authoritativeRef: "resolved/researching/background",
            winningRole: "researcher",
            candidateCount: 1,
            missingRoles: ["fact_checker"],
          },
        ],
      },
    },
    taskLog: [
      {
        messageId: `${runId}/researching/background/researcher#1`,
        taskId: `${runId}/researching/background/researcher`,
        stage: PipelineStage.Researching,
        subject: "background",
        role: "researcher",
        attempt: 1,
        dispatchedAt: 2,
      },
    ],
    endedAt: 9,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// STATE MACHINE
// ═══════════════════════════════════════════════════════════════════════════

section("Transitions");

await test("full forward walk is allowed", () => {
  const machine = new StageMachine();
  for (const stage of [
    PipelineStage.Researching,
    PipelineStage.Writing,
    PipelineStage.Editing,
    PipelineStage.Optimizing,
    PipelineStage.Illustrating,
    PipelineStage.Publishing,
    PipelineStage.Completed,
  ]) {
    machine.transition(stage);
  }
  assert.equal(machine.current, PipelineStage.Completed);
  assert.equal(machine.terminal, true);
  assert.equal(machine.history.length, 7);
});

await test("forward moves may skip stages", () => {
  assert.equal(canTransition(PipelineStage.Idle, PipelineStage.Writing), true);
  assert.equal(canTransition(PipelineStage.Writing, PipelineStage.Publishing), true);
  assert.equal(canTransition(PipelineStage.Publishing, PipelineStage.Completed), true);
});

await test("backward moves and repeats are rejected", () => {
  assert.equal(canTransition(PipelineStage.Editing, PipelineStage.Writing), false);
  assert.equal(canTransition(PipelineStage.Editing, PipelineStage.Editing), false);
  assert.equal(canTransition(PipelineStage.Idle, PipelineStage.Completed), false);
});

await test("failed and aborted are reachable from any non-terminal stage", () => {
  for (const from of [PipelineStage.Idle, PipelineStage.Researching, PipelineStage.Publishing]) {
    assert.equal(canTransition(from, PipelineStage.Failed), true);
    assert.equal(canTransition(from, PipelineStage.Aborted), true);
  }
});

await test("terminal stages are final", () => {
  for (const terminal of [PipelineStage.Completed, PipelineStage.Failed, PipelineStage.Aborted]) {
    assert.equal(isTerminal(terminal), true);
    assert.equal(canTransition(terminal, PipelineStage.Failed), false);
    assert.equal(canTransition(terminal, PipelineStage.Researching), false);
  }
  assert.equal(isTerminal(PipelineStage.Editing), false);
});

await test("an invalid transition throws and leaves the state unchanged", () => {
  const clock = new ManualClock(42);
  const machine = new StageMachine(clock);
  machine.transition(PipelineStage.Editing);
  assert.throws(
    () => machine.transition(PipelineStage.Writing),
    (err: unknown) =>
      err instanceof InvalidTransitionError && err.message === "Invalid stage transition: editing -> writing"
  );
  assert.equal(machine.current, PipelineStage.Editing);
  assert.deepEqual(machine.history, [{ from: PipelineStage.Idle, to: PipelineStage.Editing, at: 42 }]);
});

// ═══════════════════════════════════════════════════════════════════════════
// MONITOR
// ═══════════════════════════════════════════════════════════════════════════

section("Run monitor");

await test("metrics count events per run", () => {
  const monitor = new RunMonitor(new ManualClock());
  const logger = createNullLogger();
  monitor.record("run-1", logger, "task_dispatched", PipelineStage.Writing);
  monitor.record("run-1", logger, "task_dispatched", PipelineStage.Writing);
  monitor.record("run-1", logger, "task_retried", PipelineStage.Writing);
  monitor.record("run-1", logger, "completion_stale", PipelineStage.Writing);
  monitor.record("run-1", logger, "contributor_missing", PipelineStage.Writing);
  monitor.record("run-1", logger, "subject_resolved", PipelineStage.Writing);
  monitor.record("run-2", logger, "subject_unresolved", PipelineStage.Writing);
  assert.deepEqual(monitor.metrics("run-1"), {
    tasksDispatched: 2,
    retries: 1,
    completions: 0,
    staleCompletions: 1,
    missingContributors: 1,
    subjectsResolved: 1,
    subjectsUnresolved: 0,
  });
  assert.equal(monitor.metrics("run-2").subjectsUnresolved, 1);
});

await test("stage durations span start to completion", () => {
  const clock = new ManualClock(100);
  const monitor = new RunMonitor(clock);
  const logger = createNullLogger();
  monitor.record("run-1", logger, "stage_started", PipelineStage.Writing);
  clock.advance(250);
  monitor.record("run-1", logger, "stage_completed", PipelineStage.Writing);
  monitor.record("run-1", logger, "stage_started", PipelineStage.Editing);
  assert.deepEqual(monitor.stageDurations("run-1"), { writing: 250 });
});

await test("events are logged at a level matching their severity", () => {
  const levels: string[] = [];
  const logger: Logger = {
    debug: () => levels.push("debug"),
    info: () => levels.push("info"),
    warn: () => levels.push("warn"),
    error: () => levels.push("error"),
    child: () => logger,
  };
  const monitor = new RunMonitor();
  monitor.record("run-1", logger, "task_dispatched");
  monitor.record("run-1", logger, "stage_started");
  monitor.record("run-1", logger, "contributor_missing");
  assert.deepEqual(levels, ["debug", "info", "warn"]);
});

await test("forget drops a run's events", () => {
  const monitor = new RunMonitor();
  monitor.record("run-1", createNullLogger(), "run_started");
  monitor.forget("run-1");
  assert.equal(monitor.eventsFor("run-1").length, 0);
});

// ═══════════════════════════════════════════════════════════════════════════
// ARCHIVE
// ═══════════════════════════════════════════════════════════════════════════

section("Run archive");

await test("in-memory archive stores copies", async () => {
  const archive = new InMemoryRunArchive();
  const run = sampleRun("run-b");
  await archive.save(run);
  await archive.save(sampleRun("run-a"));
  run.status = RunStatus.Failed;
  assert.equal((await archive.load("run-b"))?.status, RunStatus.Completed);
  assert.deepEqual(await archive.list(), ["run-a", "run-b"]);
  assert.equal(await archive.load("missing"), undefined);
});

await test("JSON archive round-trips a run through one file per run", async () => {
  const dir = mkdtempSync(join(tmpdir(), "orchestrator-archive-"));
  try {
    const archive = new JsonFileRunArchive(join(dir, "runs"));
    assert.deepEqual(await archive.list(), []);
    const run = sampleRun("remote-work/20240115");
    await archive.save(run);
    assert.deepEqual(await archive.list(), ["remote-work/20240115"]);
    assert.deepEqual(await archive.load("remote-work/20240115"), run);
    assert.equal(await archive.load("other"), undefined);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

await test("a malformed archive file is a store fault", async () => {
  const dir = mkdtempSync(join(tmpdir(), "orchestrator-archive-"));
  try {
    writeFileSync(join(dir, "broken.json"), JSON.stringify({ runId: "broken" }));
    await assert.rejects(new JsonFileRunArchive(dir).load("broken"), StoreUnavailableError);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
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
