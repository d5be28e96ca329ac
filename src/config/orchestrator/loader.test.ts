/**
 * Tests for orchestrator config validation and the env helpers.
 *
 * Run: node --import tsx src/config/orchestrator/loader.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  DEFAULT_ORCHESTRATOR_CONFIG,
  OrchestratorConfigError,
  loadOrchestratorConfig,
  loadOrchestratorConfigFile,
  validateOrchestratorConfig,
  type OrchestratorConfig,
} from "./index.js";
import { ConfigError, optionalEnv, optionalEnvBool, optionalEnvInt } from "../env.js";
import { applyEnvOverrides, loadAppConfig, validateConfig, type AppConfig } from "../index.js";

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

function withConfig(patch: Partial<OrchestratorConfig>): unknown {
  return { ...structuredClone(DEFAULT_ORCHESTRATOR_CONFIG), ...patch };
}

function issueCodes(input: unknown): string[] {
  const result = validateOrchestratorConfig(input);
  return result.success ? [] : result.errors.map((e) => e.code);
}

// ═══════════════════════════════════════════════════════════════════════════
// SCHEMA
// ═══════════════════════════════════════════════════════════════════════════

section("Defaults");

await test("default config is valid", () => {
  const result = validateOrchestratorConfig(DEFAULT_ORCHESTRATOR_CONFIG);
  assert.equal(result.success, true);
});

await test("loaded config is deeply frozen", () => {
  const config = loadOrchestratorConfig(structuredClone(DEFAULT_ORCHESTRATOR_CONFIG));
  assert.ok(Object.isFrozen(config));
  assert.ok(Object.isFrozen(config.priority.default));
  assert.ok(Object.isFrozen(config.queue.dispatchBackoff));
});

section("Schema errors");

await test("unknown top-level keys are rejected", () => {
  assert.deepEqual(issueCodes({ ...structuredClone(DEFAULT_ORCHESTRATOR_CONFIG), extra: true }), [
    "unrecognized_keys",
  ]);
});

await test("threshold outside 0..1 is rejected", () => {
  const result = validateOrchestratorConfig(withConfig({ degradedFailureThreshold: 1.5 }));
  assert.equal(result.success, false);
  if (!result.success) {
    assert.deepEqual(result.errors[0]?.path, ["degradedFailureThreshold"]);
  }
});

await test("role names must be identifiers", () => {
  const codes = issueCodes(
    withConfig({ stages: { writing: { roles: [{ role: "Writer One", subjects: ["draft"] }] } } })
  );
  assert.ok(codes.includes("invalid_string"));
});

section("Cross-field checks");

await test("empty pipeline is rejected", () => {
  assert.deepEqual(issueCodes(withConfig({ stages: {}, priority: { default: [], subjects: {} } })), [
    "empty_pipeline",
  ]);
});

await test("duplicate role in a stage is rejected", () => {
  const codes = issueCodes(
    withConfig({
      stages: {
        writing: {
          roles: [
            { role: "writer", subjects: ["draft"] },
            { role: "writer", subjects: ["tone"] },
          ],
        },
      },
      priority: { default: ["writer"], subjects: {} },
    })
  );
  assert.deepEqual(codes, ["duplicate_role"]);
});

await test("duplicate subject for a role is rejected", () => {
  const codes = issueCodes(
    withConfig({
      stages: { writing: { roles: [{ role: "writer", subjects: ["draft", "draft"] }] } },
      priority: { default: ["writer"], subjects: {} },
    })
  );
  assert.deepEqual(codes, ["duplicate_subject"]);
});

await test("priority for an unknown subject is rejected", () => {
  const codes = issueCodes(
    withConfig({
      stages: { writing: { roles: [{ role: "writer", subjects: ["draft"] }] } },
      priority: { default: ["writer"], subjects: { summary: ["writer"] } },
    })
  );
  assert.deepEqual(codes, ["unknown_subject"]);
});

await test("duplicate ranking entries are rejected", () => {
  const codes = issueCodes(
    withConfig({
      stages: { writing: { roles: [{ role: "writer", subjects: ["draft"] }] } },
      priority: { default: ["writer", "writer"], subjects: {} },
    })
  );
  assert.deepEqual(codes, ["duplicate_priority"]);
});

await test("backoff initial delay above max is rejected", () => {
  const codes = issueCodes(
    withConfig({ storeRetry: { maxAttempts: 2, initialDelayMs: 500, maxDelayMs: 100 } })
  );
  assert.deepEqual(codes, ["invalid_range"]);
});

await test("loadOrchestratorConfig throws with formatted issues", () => {
  assert.throws(
    () => loadOrchestratorConfig(withConfig({ maxAttempts: 0 })),
    (err: unknown) =>
      err instanceof OrchestratorConfigError &&
      err.issues.length === 1 &&
      err.format().startsWith("Orchestrator configuration validation failed:\n  - maxAttempts:")
  );
});

section("Config files");

await test("file loader reads valid JSON", () => {
  const dir = mkdtempSync(join(tmpdir(), "orchestrator-config-"));
  try {
    const path = join(dir, "config.json");
    writeFileSync(path, JSON.stringify(withConfig({ maxAttempts: 5 })));
    assert.equal(loadOrchestratorConfigFile(path).maxAttempts, 5);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

await test("file loader reports missing files and bad JSON", () => {
  const dir = mkdtempSync(join(tmpdir(), "orchestrator-config-"));
  try {
    const badJson = join(dir, "bad.json");
    writeFileSync(badJson, "{ not json");
    assert.throws(
      () => loadOrchestratorConfigFile(join(dir, "missing.json")),
      (err: unknown) => err instanceof OrchestratorConfigError && err.issues[0]?.code === "io_error"
    );
    assert.throws(
      () => loadOrchestratorConfigFile(badJson),
      (err: unknown) => err instanceof OrchestratorConfigError && err.issues[0]?.code === "invalid_json"
    );
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

await test("shipped sample config is valid", () => {
  const config = loadOrchestratorConfigFile("config/orchestrator.json");
  assert.equal(config.mergeStrategy, "shallow-merge");
  assert.deepEqual(config.priority.subjects["background"], ["fact_checker", "researcher"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// ENVIRONMENT
// ═══════════════════════════════════════════════════════════════════════════

section("Environment helpers");

await test("optionalEnv treats empty values as unset", () => {
  assert.equal(optionalEnv("NAME", "fallback", { NAME: "" }), "fallback");
  assert.equal(optionalEnv("NAME", "fallback", { NAME: "set" }), "set");
  assert.equal(optionalEnv("NAME", "fallback", {}), "fallback");
});

await test("optionalEnvInt parses non-negative integers and rejects others", () => {
  assert.equal(optionalEnvInt("LIMIT", 1, { LIMIT: "42" }), 42);
  assert.equal(optionalEnvInt("LIMIT", 1, { LIMIT: "0" }), 0);
  assert.equal(optionalEnvInt("LIMIT", 1, {}), 1);
  assert.throws(() => optionalEnvInt("LIMIT", 1, { LIMIT: "4.2" }), ConfigError);
  assert.throws(
    () => optionalEnvInt("LIMIT", 1, { LIMIT: "-5" }),
    /LIMIT must be a non-negative integer, got: -5/
  );
});

await test("optionalEnvBool recognises yes/no forms", () => {
  assert.equal(optionalEnvBool("FLAG", false, { FLAG: "YES" }), true);
  assert.equal(optionalEnvBool("FLAG", true, { FLAG: "0" }), false);
  assert.throws(() => optionalEnvBool("FLAG", true, { FLAG: "maybe" }), ConfigError);
});

await test("process.env is the default source", () => {
  process.env["ORCH_TEST_BOOL"] = "true";
  assert.equal(optionalEnvBool("ORCH_TEST_BOOL", false), true);
  delete process.env["ORCH_TEST_BOOL"];
  assert.equal(optionalEnvBool("ORCH_TEST_BOOL", false), false);
});

await test("loadAppConfig reads the stage deadline override", () => {
  assert.equal(loadAppConfig({}).stageDeadlineOverrideMs, 0);
  const app = loadAppConfig({ NODE_ENV: "test", STAGE_DEADLINE_MS: "45000" });
  assert.equal(app.env, "test");
  assert.equal(app.stageDeadlineOverrideMs, 45_000);
  assert.throws(() => loadAppConfig({ STAGE_DEADLINE_MS: "soon" }), ConfigError);
});

await test("validateConfig checks NODE_ENV and LOG_LEVEL", () => {
  const base: AppConfig = {
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
  assert.equal(validateConfig(base), "warn");
  assert.throws(() => validateConfig({ ...base, env: "staging" }), ConfigError);
  assert.throws(() => validateConfig({ ...base, logLevel: "loud" }), ConfigError);
});

await test("a positive stage deadline override replaces the configured default", () => {
  const loaded = loadOrchestratorConfig(DEFAULT_ORCHESTRATOR_CONFIG);
  const app = loadAppConfig({});
  assert.equal(applyEnvOverrides(loaded, app), loaded);

  const overridden = applyEnvOverrides(loaded, { ...app, stageDeadlineOverrideMs: 1_500 });
  assert.equal(overridden.stageDeadlineMs, 1_500);
  assert.equal(overridden.maxAttempts, loaded.maxAttempts);
  assert.deepEqual(overridden.stages, loaded.stages);
  assert.equal(Object.isFrozen(overridden), true);
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
