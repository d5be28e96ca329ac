/**
 * Memory key layout shared by the scheduler, resolver and agent workers.
 *
 *   payload/<stage>                               stage input seeded by the scheduler
 *   candidate/<stage>/<subject>/<role>/<attempt>  one agent attempt's result
 *   resolved/<stage>/<subject>                    authoritative value
 */

import type { WorkStage } from "../types/pipeline.js";

export const PAYLOAD_PREFIX = "payload/";
export const CANDIDATE_PREFIX = "candidate/";
export const RESOLVED_PREFIX = "resolved/";

export function payloadKey(stage: WorkStage): string {
  return `${PAYLOAD_PREFIX}${stage}`;
}

export function candidateKey(
  stage: WorkStage,
  subject: string,
  role: string,
  attempt: number
): string {
  return `${CANDIDATE_PREFIX}${stage}/${subject}/${role}/${attempt}`;
}

export function resolvedKey(stage: WorkStage, subject: string): string {
  return `${RESOLVED_PREFIX}${stage}/${subject}`;
}

export function resolvedPrefix(stage: WorkStage): string {
  return `${RESOLVED_PREFIX}${stage}/`;
}
