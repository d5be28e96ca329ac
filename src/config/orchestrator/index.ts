/**
 * Orchestrator configuration module.
 *
 * Usage:
 *   import { loadOrchestratorConfig, DEFAULT_ORCHESTRATOR_CONFIG } from "./config/index.js";
 *
 *   const config = loadOrchestratorConfig({
 *     ...DEFAULT_ORCHESTRATOR_CONFIG,
 *     maxAttempts: 5,
 *   });
 */

export type {
  OrchestratorConfig,
  BackoffSettings,
  RoleAssignment,
  StageRoster,
  StageRosters,
  PriorityPolicy,
} from "./schema.js";

export {
  OrchestratorConfigSchema,
  StageRosterSchema,
  PriorityPolicySchema,
  BackoffSchema,
  MergeStrategyName,
} from "./schema.js";

export {
  loadOrchestratorConfig,
  loadOrchestratorConfigFile,
  validateOrchestratorConfig,
  OrchestratorConfigError,
  type ConfigValidationIssue,
  type OrchestratorConfigValidation,
} from "./loader.js";

export { DEFAULT_ORCHESTRATOR_CONFIG } from "./defaults.js";
