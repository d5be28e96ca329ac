/**
 * Candidate ordering.
 *
 * Total order, best first:
 *   1. role rank (per-subject ranking replaces the default; unranked roles last)
 *   2. most recent timestamp
 *   3. task id, lexicographically greatest first
 *   4. attempt, descending
 * The order never depends on arrival order, so re-resolving the same
 * candidate set always picks the same winner.
 */

import type { PriorityPolicy } from "../config/orchestrator/schema.js";
import type { Candidate } from "../types/conflict.js";

export function rankingFor(policy: PriorityPolicy, subject: string): readonly string[] {
  return policy.subjects[subject] ?? policy.default;
}

export function roleRank(ranking: readonly string[], role: string): number {
  const index = ranking.indexOf(role);
  return index < 0 ? Number.POSITIVE_INFINITY : index;
}

export function compareCandidates(
  ranking: readonly string[],
  a: Candidate,
  b: Candidate
): number {
  const rankA = roleRank(ranking, a.role);
  const rankB = roleRank(ranking, b.role);
  if (rankA !== rankB) {
    return rankA < rankB ? -1 : 1;
  }
  if (a.timestamp !== b.timestamp) {
    return b.timestamp - a.timestamp;
  }
  if (a.taskId !== b.taskId) {
    return a.taskId > b.taskId ? -1 : 1;
  }
  return b.attempt - a.attempt;
}

/**
 * Sort candidates best-first without mutating the input.
 */
export function orderCandidates<C extends Candidate>(
  policy: PriorityPolicy,
  subject: string,
  candidates: readonly C[]
): C[] {
  const ranking = rankingFor(policy, subject);
  return [...candidates].sort((a, b) => compareCandidates(ranking, a, b));
}

/**
 * Order-independent identity of a candidate set.
 */
export function fingerprint(candidates: readonly Candidate[]): string {
  return candidates
    .map((c) => `${c.taskId}#${c.attempt}:${c.status}:${c.resultRef ?? "-"}`)
    .sort()
    .join("|");
}
