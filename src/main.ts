/**
 * Entry point for the content pipeline orchestrator.
 *
 * Validates the environment and orchestrator config, wires the queue,
 * memory store and scheduler, and reports what it found. Agents attach
 * through AgentWorker from the embedding application.
 */

import {
  config,
  applyEnvOverrides,
  validateConfig,
  ConfigError,
  DEFAULT_ORCHESTRATOR_CONFIG,
  loadOrchestratorConfig,
  loadOrchestratorConfigFile,
  OrchestratorConfigError,
} from "./config/index.js";
import { initRunId, createLogger, type LogLevel } from "./logging/index.js";
import { InMemoryStore, JsonFileLongTermBackend } from "./memory/index.js";
import { MessageQueue } from "./queue/index.js";
import { JsonFileRunArchive, InMemoryRunArchive, PipelineScheduler } from "./scheduler/index.js";

async function main(): Promise<void> {
  // Initialize run ID first
  const runId = initRunId();
  const bootLogger = createLogger({ logDir: config.logDir, console: true, file: false });

  let logLevel: LogLevel;
  try {
    logLevel = validateConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      bootLogger.error("Configuration error", { message: err.message });
      process.exit(1);
    }
    throw err;
  }

  const logger = createLogger({ level: logLevel, logDir: config.logDir });

  try {
    const orchestratorConfig = applyEnvOverrides(
      config.orchestratorConfigPath
        ? loadOrchestratorConfigFile(config.orchestratorConfigPath)
        : loadOrchestratorConfig(DEFAULT_ORCHESTRATOR_CONFIG)
    );

    logger.info("Application starting", { runId });
    logger.info("Configuration loaded", {
      env: config.env,
      debug: config.debug,
      logLevel,
      appName: config.appName,
      orchestratorConfig: config.orchestratorConfigPath || "(defaults)",
      stageDeadlineMs: orchestratorConfig.stageDeadlineMs,
    });

    const queue = new MessageQueue({
      capacity: orchestratorConfig.queue.capacity,
      leaseMs: orchestratorConfig.queue.leaseMs,
      logger,
    });
    const store = new InMemoryStore({
      shortTermCapacity: orchestratorConfig.memory.shortTermCapacity,
      shortTermTtlMs: orchestratorConfig.memory.shortTermTtlMs,
      ...(config.memoryStoragePath
        ? { longTerm: new JsonFileLongTermBackend(config.memoryStoragePath) }
        : {}),
    });
    const archive = config.runArchiveDir
      ? new JsonFileRunArchive(config.runArchiveDir)
      : new InMemoryRunArchive();
    const scheduler = new PipelineScheduler({
      config: orchestratorConfig,
      queue,
      store,
      archive,
      logger,
    });

    const stages = Object.keys(scheduler.config.stages);
    const archived = await archive.list();
    const summary = await store.summarize();
    logger.info("Orchestrator initialized", {
      stages,
      archivedRuns: archived.length,
      longTermEntries: summary.longTerm,
    });

    queue.close();
    store.close();
  } catch (err) {
    if (err instanceof OrchestratorConfigError) {
      logger.error("Orchestrator configuration error", { message: err.format() });
      process.exit(1);
    }
    throw err;
  }
}

main().catch((err: unknown) => {
  console.error("Unexpected error:", err);
  process.exit(1);
});
