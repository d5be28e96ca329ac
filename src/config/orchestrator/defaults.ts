/**
 * Default orchestrator configuration.
 *
 * One role per stage, matching the six content agents: research, writing,
 * editing, SEO optimisation, illustration and publishing. Deployments
 * override rosters and rankings through config/orchestrator.json.
 */

import type { OrchestratorConfig } from "./schema.js";

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  stages: {
    researching: { roles: [{ role: "researcher", subjects: ["background"] }] },
    writing: { roles: [{ role: "writer", subjects: ["draft"] }] },
    editing: { roles: [{ role: "editor", subjects: ["draft", "tone"] }] },
    optimizing: { roles: [{ role: "seo", subjects: ["seo_metadata"] }] },
    illustrating: { roles: [{ role: "image", subjects: ["images"] }] },
    publishing: { roles: [{ role: "publisher", subjects: ["publication"] }] },
  },

  // Editors outrank writers on shared subjects; the researcher is the
  // domain expert for factual subjects.
  priority: {
    default: ["editor", "researcher", "writer", "seo", "image", "publisher"],
    subjects: {
      background: ["researcher", "editor", "writer"],
    },
  },

  mergeStrategy: "none",

  stageDeadlineMs: 5 * 60 * 1000,
  maxAttempts: 3,
  degradedFailureThreshold: 0.5,

  memory: {
    shortTermCapacity: 100,
    shortTermTtlMs: 60 * 60 * 1000,
  },

  queue: {
    capacity: 1000,
    leaseMs: 60 * 1000,
    dispatchBackoff: { maxAttempts: 5, initialDelayMs: 100, maxDelayMs: 2000 },
  },

  storeRetry: { maxAttempts: 3, initialDelayMs: 50, maxDelayMs: 1000 },
};
