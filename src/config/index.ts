/**
 * Application configuration.
 * Validates and exposes typed process-level settings read from the
 * environment. Pipeline behaviour lives in the orchestrator config.
 */

import {
  ConfigError,
  optionalEnv,
  optionalEnvBool,
  optionalEnvInt,
  type EnvSource,
} from "./env.js";
import { loadOrchestratorConfig, type OrchestratorConfig } from "./orchestrator/index.js";
import { LOG_LEVELS, isLogLevel, type LogLevel } from "../logging/index.js";

export { ConfigError, type EnvSource } from "./env.js";

// Re-export orchestrator configuration module
export * from "./orchestrator/index.js";

const ENVIRONMENTS = ["development", "production", "test"] as const;

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Enable debug mode */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: string;
  /** Application name */
  readonly appName: string;
  /** Directory the file logger appends to */
  readonly logDir: string;
  /** Orchestrator config JSON; empty means built-in defaults */
  readonly orchestratorConfigPath: string;
  /** JSON file backing the long-term memory tier; empty keeps it in memory */
  readonly memoryStoragePath: string;
  /** Directory archived pipeline runs are written to; empty keeps them in memory */
  readonly runArchiveDir: string;
  /** Replaces the config file's stageDeadlineMs when positive; 0 keeps it */
  readonly stageDeadlineOverrideMs: number;
}

/**
 * Load application configuration from the environment.
 */
export function loadAppConfig(source: EnvSource = process.env): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development", source),
    debug: optionalEnvBool("DEBUG", false, source),
    logLevel: optionalEnv("LOG_LEVEL", "info", source),
    appName: optionalEnv("APP_NAME", "content-orchestrator", source),
    logDir: optionalEnv("LOG_DIR", "output/logs", source),
    orchestratorConfigPath: optionalEnv("ORCHESTRATOR_CONFIG", "", source),
    memoryStoragePath: optionalEnv("MEMORY_STORAGE_PATH", "", source),
    runArchiveDir: optionalEnv("RUN_ARCHIVE_DIR", "", source),
    stageDeadlineOverrideMs: optionalEnvInt("STAGE_DEADLINE_MS", 0, source),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadAppConfig();

/**
 * Validate application configuration. Call at startup to fail fast.
 */
export function validateConfig(target: AppConfig = config): LogLevel {
  const environments: readonly string[] = ENVIRONMENTS;
  if (!environments.includes(target.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${target.env}. Must be ${ENVIRONMENTS.join(", ")}.`
    );
  }

  if (!isLogLevel(target.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${target.logLevel}. Must be ${LOG_LEVELS.join(", ")}.`
    );
  }

  return target.logLevel;
}

/**
 * Apply environment overrides to a loaded orchestrator config. The result
 * goes back through validation, so it is frozen like any loaded config.
 */
export function applyEnvOverrides(
  orchestrator: Readonly<OrchestratorConfig>,
  target: AppConfig = config
): Readonly<OrchestratorConfig> {
  if (target.stageDeadlineOverrideMs === 0) {
    return orchestrator;
  }
  return loadOrchestratorConfig({
    ...orchestrator,
    stageDeadlineMs: target.stageDeadlineOverrideMs,
  });
}
