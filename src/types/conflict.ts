/**
 * Conflict records track competing results for one subject in one stage.
 */

import type { CompletionStatus, ResolutionOutcomeKind } from "./messages.js";
import type { WorkStage } from "./pipeline.js";

export interface Candidate {
  readonly taskId: string;
  readonly role: string;
  readonly attempt: number;
  readonly status: CompletionStatus;
  /** Memory key holding the candidate's value */
  readonly resultRef?: string;
  readonly timestamp: number;
}

export interface ResolutionOutcome {
  readonly subject: string;
  readonly kind: ResolutionOutcomeKind;
  /** Winning candidate; absent for merged outcomes */
  readonly winner?: Candidate;
  /** Candidates whose values contributed to the authoritative value */
  readonly contributors: readonly Candidate[];
  readonly value: unknown;
  readonly authoritativeRef: string;
  readonly resolvedAt: number;
}

export type ConflictStatus = "open" | "resolved";

export interface ConflictRecord {
  readonly runId: string;
  readonly stage: WorkStage;
  readonly subject: string;
  readonly candidates: Candidate[];
  status: ConflictStatus;
  missingRoles: string[];
  outcome?: ResolutionOutcome;
  resolvedAt?: number;
}
