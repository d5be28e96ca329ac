/**
 * Shared memory entries.
 */

export type MemoryTier = "short-term" | "long-term";

export interface MemoryEntry<T = unknown> {
  readonly runId: string;
  readonly key: string;
  readonly value: T;
  readonly tier: MemoryTier;
  readonly writtenBy: string;
  readonly writtenAt: number;
  /** Short-term only */
  readonly expiresAt?: number;
}

export interface RecallCriteria {
  readonly runId?: string;
  readonly keyPrefix?: string;
  readonly writtenBy?: string;
  /** Only entries written at or after this timestamp */
  readonly since?: number;
  readonly limit?: number;
}

export interface MemorySummary {
  readonly shortTerm: number;
  readonly longTerm: number;
  readonly byWriter: Record<string, number>;
}
