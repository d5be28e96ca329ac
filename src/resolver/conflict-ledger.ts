/**
 * Conflict records, one per (run, stage, subject).
 *
 * A record opens with the first candidate for its subject, closes when the
 * resolver settles it, and reopens only if another candidate for the same
 * subject arrives afterwards in the same run.
 */

import type { Candidate, ConflictRecord } from "../types/conflict.js";
import type { WorkStage } from "../types/pipeline.js";

function recordKey(runId: string, stage: WorkStage, subject: string): string {
  return `${runId}/${stage}/${subject}`;
}

export class ConflictLedger {
  private readonly records = new Map<string, ConflictRecord>();

  /**
   * Get the record for a subject, creating an empty open one if needed.
   */
  open(runId: string, stage: WorkStage, subject: string): ConflictRecord {
    const key = recordKey(runId, stage, subject);
    let record = this.records.get(key);
    if (!record) {
      record = { runId, stage, subject, candidates: [], status: "open", missingRoles: [] };
      this.records.set(key, record);
    }
    return record;
  }

  get(runId: string, stage: WorkStage, subject: string): ConflictRecord | undefined {
    return this.records.get(recordKey(runId, stage, subject));
  }

  /**
   * Record a candidate. Duplicate deliveries of the same attempt are ignored.
   *
   * @returns true when the candidate was new
   */
  addCandidate(
    runId: string,
    stage: WorkStage,
    subject: string,
    candidate: Candidate
  ): boolean {
    const record = this.open(runId, stage, subject);
    const duplicate = record.candidates.some(
      (c) => c.taskId === candidate.taskId && c.attempt === candidate.attempt
    );
    if (duplicate) {
      return false;
    }
    record.candidates.push(candidate);
    record.missingRoles = record.missingRoles.filter((role) => role !== candidate.role);
    if (record.status === "resolved") {
      record.status = "open";
    }
    return true;
  }

  markMissing(runId: string, stage: WorkStage, subject: string, role: string): void {
    const record = this.open(runId, stage, subject);
    if (!record.missingRoles.includes(role)) {
      record.missingRoles.push(role);
    }
  }

  forRun(runId: string): ConflictRecord[] {
    return [...this.records.values()].filter((record) => record.runId === runId);
  }

  openRecords(runId: string): ConflictRecord[] {
    return this.forRun(runId).filter((record) => record.status === "open");
  }

  /**
   * Forget a run's records once the run is archived.
   */
  closeRun(runId: string): number {
    let removed = 0;
    for (const [key, record] of this.records) {
      if (record.runId === runId) {
        this.records.delete(key);
        removed++;
      }
    }
    return removed;
  }
}
