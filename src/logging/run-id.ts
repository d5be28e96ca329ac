/**
 * Run ID generation.
 *
 * Two kinds of IDs exist: the process run ID, set once at startup and used
 * by loggers that are not bound to a pipeline run, and pipeline run IDs,
 * one per topic run and used as the isolation key in the queue and store.
 */

import { randomBytes } from "node:crypto";

const MAX_SLUG_LENGTH = 32;

function datePart(now: Date): string {
  return now.toISOString().slice(0, 10).replace(/-/g, "");
}

/**
 * Generate a short, unique run ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  return `${datePart(now)}-${randomBytes(3).toString("hex")}`;
}

/**
 * Reduce a topic to a lowercase, dash-separated slug.
 */
export function slugifyTopic(topic: string): string {
  const slug = topic
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/-+$/, "");
  return slug === "" ? "run" : slug;
}

/**
 * Generate a pipeline run ID that stays readable in logs.
 * Format: topic slug + date + random suffix (e.g., "ai-in-healthcare-20240115-a1b2c3")
 */
export function generatePipelineRunId(topic: string, now: Date = new Date()): string {
  return `${slugifyTopic(topic)}-${generateRunId(now)}`;
}

/** Process run ID */
let currentRunId: string | null = null;

/**
 * Initialize the process run ID. Called once at startup.
 */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/**
 * Get the process run ID, or null before initRunId().
 */
export function getRunId(): string | null {
  return currentRunId;
}
