/**
 * Conflict resolver.
 *
 * Turns a Conflict Record into exactly one authoritative value:
 *
 *   1. one eligible candidate    -> it wins unchanged ("single")
 *   2. several, merge configured -> merged value ("merged"), or on a merge
 *                                   conflict fall through to 3
 *   3. several                   -> best candidate by policy order ("ranked")
 *
 * Failed candidates, and candidates whose result cannot be read back from
 * the store, are ineligible. No eligible candidate is unresolvable.
 *
 * The authoritative value is written to the long-term tier under
 * resolved/<stage>/<subject> and the record closes. Resolution of one
 * subject is serialised; repeating it with the same candidate set returns
 * the same outcome without writing again.
 *
 * A resolution message is then published on the "resolutions" topic. It
 * is a notification for observers only: the scheduler acts on the outcome
 * resolve() returns, and with no subscribers the message is dropped.
 */

import {
  MergeConflictError,
  ResolutionConflictUnresolvableError,
  errorMessage,
  isOrchestratorError,
} from "../errors/index.js";
import type { BackoffSettings, MergeStrategyName, PriorityPolicy } from "../config/orchestrator/schema.js";
import { createNullLogger, type Logger } from "../logging/index.js";
import type { MemoryStore } from "../memory/memory-store.js";
import { resolvedKey } from "../memory/keys.js";
import type { MessageQueue } from "../queue/message-queue.js";
import { systemClock, type Clock } from "../types/clock.js";
import type { Candidate, ConflictRecord, ResolutionOutcome } from "../types/conflict.js";
import { toTopic, type ResolutionMessage } from "../types/messages.js";
import { retryWithBackoff } from "../utils/retry.js";
import { KeyedMutex } from "./keyed-mutex.js";
import { getMergeStrategy, type MergeStrategy } from "./merge.js";
import { fingerprint, orderCandidates } from "./policy.js";

export const RESOLUTIONS_TOPIC = "resolutions";

/** Role name recorded as the writer of authoritative values */
export const RESOLVER_WRITER = "resolver";

export interface ConflictResolverOptions {
  store: MemoryStore;
  queue: MessageQueue;
  priority: PriorityPolicy;
  mergeStrategy: MergeStrategyName;
  storeRetry: BackoffSettings;
  logger?: Logger;
  clock?: Clock;
}

interface LoadedCandidate {
  candidate: Candidate;
  value: unknown;
}

export class ConflictResolver {
  private readonly mutex = new KeyedMutex();
  /** `${runId}/${stage}/${subject}` -> fingerprint of the set last resolved */
  private readonly resolvedSets = new Map<string, string>();
  private readonly merge: MergeStrategy | null;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(private readonly options: ConflictResolverOptions) {
    this.merge = getMergeStrategy(options.mergeStrategy);
    this.logger = (options.logger ?? createNullLogger()).child({ component: "resolver" });
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Resolve a record.
   *
   * @throws ResolutionConflictUnresolvableError when no candidate is eligible
   * @throws StoreUnavailableError when the store stays down past the retry budget
   */
  async resolve(record: ConflictRecord): Promise<ResolutionOutcome> {
    return this.mutex.runExclusive(`${record.runId}/${record.subject}`, () =>
      this.resolveExclusive(record)
    );
  }

  /** True while a resolution for the subject is in flight */
  isResolving(runId: string, subject: string): boolean {
    return this.mutex.isLocked(`${runId}/${subject}`);
  }

  /**
   * Forget idempotency state for a finished run.
   */
  forgetRun(runId: string): void {
    for (const key of this.resolvedSets.keys()) {
      if (key.startsWith(`${runId}/`)) {
        this.resolvedSets.delete(key);
      }
    }
  }

  private async resolveExclusive(record: ConflictRecord): Promise<ResolutionOutcome> {
    const recordId = `${record.runId}/${record.stage}/${record.subject}`;
    const setId = fingerprint(record.candidates);

    if (record.status === "resolved" && record.outcome && this.resolvedSets.get(recordId) === setId) {
      return record.outcome;
    }

    const { eligible, rejected } = await this.loadEligible(record);
    if (eligible.length === 0) {
      this.logger.warn("Subject unresolvable", {
        runId: record.runId,
        stage: record.stage,
        subject: record.subject,
        rejected,
        missingRoles: record.missingRoles,
      });
      this.publish(record, "unresolvable");
      throw new ResolutionConflictUnresolvableError(record.subject, rejected);
    }

    const ordered = orderCandidates(this.options.priority, record.subject, eligible.map((e) => e.candidate));
    const valueOf = new Map(eligible.map((e) => [e.candidate, e.value]));
    const winner = ordered[0];
    if (!winner) {
      throw new ResolutionConflictUnresolvableError(record.subject, rejected);
    }

    let outcome: Omit<ResolutionOutcome, "authoritativeRef" | "resolvedAt">;
    if (ordered.length === 1) {
      outcome = {
        subject: record.subject,
        kind: "single",
        winner,
        contributors: [winner],
        value: valueOf.get(winner),
      };
    } else {
      outcome = this.mergeOrRank(record, ordered, valueOf);
    }

    const authoritativeRef = resolvedKey(record.stage, record.subject);
    await retryWithBackoff(
      () =>
        this.options.store.put(record.runId, authoritativeRef, outcome.value, "long-term", RESOLVER_WRITER),
      {
        ...this.options.storeRetry,
        context: `write ${authoritativeRef}`,
        logger: this.logger,
      }
    );

    const resolvedAt = this.clock.now();
    const resolution: ResolutionOutcome = { ...outcome, authoritativeRef, resolvedAt };
    record.status = "resolved";
    record.outcome = resolution;
    record.resolvedAt = resolvedAt;
    this.resolvedSets.set(recordId, setId);

    this.logger.info("Subject resolved", {
      runId: record.runId,
      stage: record.stage,
      subject: record.subject,
      kind: resolution.kind,
      winner: resolution.winner?.role,
      candidates: record.candidates.length,
    });
    this.publish(record, resolution.kind, authoritativeRef);
    return resolution;
  }

  private mergeOrRank(
    record: ConflictRecord,
    ordered: Candidate[],
    valueOf: Map<Candidate, unknown>
  ): Omit<ResolutionOutcome, "authoritativeRef" | "resolvedAt"> {
    const [winner] = ordered;
    if (this.merge) {
      try {
        const value = this.merge(
          record.subject,
          ordered.map((c) => valueOf.get(c))
        );
        return { subject: record.subject, kind: "merged", contributors: ordered, value };
      } catch (err) {
        if (!(err instanceof MergeConflictError)) {
          throw err;
        }
        this.logger.info("Merge rejected, falling back to ranking", {
          runId: record.runId,
          subject: record.subject,
          fields: err.fields,
        });
      }
    }
    return {
      subject: record.subject,
      kind: "ranked",
      winner,
      contributors: winner ? [winner] : [],
      value: winner ? valueOf.get(winner) : undefined,
    };
  }

  private async loadEligible(
    record: ConflictRecord
  ): Promise<{ eligible: LoadedCandidate[]; rejected: string[] }> {
    const eligible: LoadedCandidate[] = [];
    const rejected: string[] = [];

    for (const candidate of record.candidates) {
      const label = `${candidate.role}#${candidate.attempt}`;
      if (candidate.status === "failure" || candidate.resultRef === undefined) {
        rejected.push(`${label} (${candidate.status})`);
        continue;
      }
      const resultRef = candidate.resultRef;
      const entry = await retryWithBackoff(
        () => this.options.store.tryGet(record.runId, resultRef),
        { ...this.options.storeRetry, context: `read ${resultRef}`, logger: this.logger }
      );
      if (!entry) {
        rejected.push(`${label} (missing result)`);
        continue;
      }
      eligible.push({ candidate, value: entry.value });
    }

    return { eligible, rejected };
  }

  private publish(
    record: ConflictRecord,
    outcome: ResolutionMessage["outcome"],
    authoritativeRef?: string
  ): void {
    const message: ResolutionMessage = {
      kind: "resolution",
      runId: record.runId,
      stage: record.stage,
      subject: record.subject,
      outcome,
      ...(authoritativeRef !== undefined ? { authoritativeRef } : {}),
      timestamp: this.clock.now(),
    };
    try {
      this.options.queue.enqueue(message, toTopic(RESOLUTIONS_TOPIC));
    } catch (err) {
      if (!isOrchestratorError(err, "QUEUE_FULL")) {
        throw err;
      }
      // Observers miss this notification; the outcome itself is already stored
      this.logger.warn("Resolution notification dropped", {
        runId: record.runId,
        subject: record.subject,
        error: errorMessage(err),
      });
    }
  }
}
