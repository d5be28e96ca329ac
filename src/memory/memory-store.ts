/**
 * Shared memory store.
 *
 * Keyed by (run id, key, tier). Two tiers:
 *
 *   short-term  bounded per run, optional TTL, evicted least-recently-written
 *               first when over capacity and dropped entirely by endRun()
 *   long-term   survives runs; written through to a LongTermBackend and
 *               never evicted by the store
 *
 * Writes are last-writer-wins. There is no read-modify-write primitive:
 * callers that need "check then write" coordinate outside the store.
 */

import { NotFoundError, StoreUnavailableError } from "../errors/index.js";
import { systemClock, type Clock } from "../types/clock.js";
import type { MemoryEntry, MemorySummary, MemoryTier, RecallCriteria } from "../types/memory.js";
import { InMemoryLongTermBackend, type LongTermBackend } from "./long-term.js";

export interface MemoryStore {
  put<T>(
    runId: string,
    key: string,
    value: T,
    tier: MemoryTier,
    writtenBy: string
  ): Promise<MemoryEntry<T>>;
  /** @throws NotFoundError when neither tier holds the key */
  get(runId: string, key: string): Promise<MemoryEntry>;
  tryGet(runId: string, key: string): Promise<MemoryEntry | undefined>;
  /** Entries whose key starts with `prefix`, ordered by key; iterate again to restart */
  list(runId: string, prefix: string): AsyncIterable<MemoryEntry>;
  delete(runId: string, key: string, tier?: MemoryTier): Promise<boolean>;
  /** Drop a run's short-term tier; returns the number of entries evicted */
  endRun(runId: string): Promise<number>;
  /** Search long-term entries across runs, newest first */
  recall(criteria?: RecallCriteria): Promise<MemoryEntry[]>;
  summarize(runId?: string): Promise<MemorySummary>;
}

export interface InMemoryStoreOptions {
  /** Maximum short-term entries per run */
  shortTermCapacity: number;
  /** Short-term lifetime in ms; 0 disables expiry */
  shortTermTtlMs?: number;
  longTerm?: LongTermBackend;
  clock?: Clock;
}

function compositeKey(runId: string, key: string): string {
  return `${runId}\u0000${key}`;
}

export class InMemoryStore implements MemoryStore {
  /** runId -> key -> entry; Map order is write order */
  private readonly shortTerm = new Map<string, Map<string, MemoryEntry>>();
  private readonly longTerm = new Map<string, MemoryEntry>();
  private readonly backend: LongTermBackend;
  private readonly clock: Clock;
  private readonly capacity: number;
  private readonly ttlMs: number;
  private loading: Promise<void> | null = null;
  private closed = false;
  private evictionCount = 0;

  constructor(options: InMemoryStoreOptions) {
    this.capacity = options.shortTermCapacity;
    this.ttlMs = options.shortTermTtlMs ?? 0;
    this.backend = options.longTerm ?? new InMemoryLongTermBackend();
    this.clock = options.clock ?? systemClock;
  }

  async put<T>(
    runId: string,
    key: string,
    value: T,
    tier: MemoryTier,
    writtenBy: string
  ): Promise<MemoryEntry<T>> {
    await this.ensureOpen();
    const now = this.clock.now();

    if (tier === "long-term") {
      const entry: MemoryEntry<T> = { runId, key, value, tier, writtenBy, writtenAt: now };
      const id = compositeKey(runId, key);
      const previous = this.longTerm.get(id);
      this.longTerm.set(id, entry);
      try {
        await this.persistLongTerm();
      } catch (err) {
        if (previous) {
          this.longTerm.set(id, previous);
        } else {
          this.longTerm.delete(id);
        }
        throw err;
      }
      return entry;
    }

    const entry: MemoryEntry<T> = {
      runId,
      key,
      value,
      tier,
      writtenBy,
      writtenAt: now,
      ...(this.ttlMs > 0 ? { expiresAt: now + this.ttlMs } : {}),
    };
    const runEntries = this.runTier(runId);
    // Re-insert so Map order tracks the most recent write
    runEntries.delete(key);
    runEntries.set(key, entry);
    this.enforceBounds(runEntries, now);
    return entry;
  }

  async get(runId: string, key: string): Promise<MemoryEntry> {
    const entry = await this.tryGet(runId, key);
    if (!entry) {
      throw new NotFoundError(runId, key);
    }
    return entry;
  }

  async tryGet(runId: string, key: string): Promise<MemoryEntry | undefined> {
    await this.ensureOpen();
    return this.lookup(runId, key, this.clock.now());
  }

  list(runId: string, prefix: string): AsyncIterable<MemoryEntry> {
    return {
      [Symbol.asyncIterator]: () => this.iterate(runId, prefix),
    };
  }

  async delete(runId: string, key: string, tier?: MemoryTier): Promise<boolean> {
    await this.ensureOpen();
    let removed = false;

    if (tier !== "long-term") {
      removed = this.shortTerm.get(runId)?.delete(key) ?? false;
    }
    if (tier !== "short-term") {
      const id = compositeKey(runId, key);
      const previous = this.longTerm.get(id);
      if (previous) {
        this.longTerm.delete(id);
        try {
          await this.persistLongTerm();
        } catch (err) {
          this.longTerm.set(id, previous);
          throw err;
        }
        removed = true;
      }
    }
    return removed;
  }

  async endRun(runId: string): Promise<number> {
    await this.ensureOpen();
    const evicted = this.shortTerm.get(runId)?.size ?? 0;
    this.shortTerm.delete(runId);
    return evicted;
  }

  async recall(criteria: RecallCriteria = {}): Promise<MemoryEntry[]> {
    await this.ensureOpen();
    const matches = [...this.longTerm.values()].filter(
      (entry) =>
        (criteria.runId === undefined || entry.runId === criteria.runId) &&
        (criteria.keyPrefix === undefined || entry.key.startsWith(criteria.keyPrefix)) &&
        (criteria.writtenBy === undefined || entry.writtenBy === criteria.writtenBy) &&
        (criteria.since === undefined || entry.writtenAt >= criteria.since)
    );
    matches.sort((a, b) => b.writtenAt - a.writtenAt || a.key.localeCompare(b.key));
    return criteria.limit === undefined ? matches : matches.slice(0, criteria.limit);
  }

  async summarize(runId?: string): Promise<MemorySummary> {
    await this.ensureOpen();
    const now = this.clock.now();
    const byWriter: Record<string, number> = {};
    let shortTerm = 0;
    let longTerm = 0;

    for (const [id, runEntries] of this.shortTerm) {
      if (runId !== undefined && id !== runId) {
        continue;
      }
      this.purgeExpired(runEntries, now);
      for (const entry of runEntries.values()) {
        shortTerm++;
        byWriter[entry.writtenBy] = (byWriter[entry.writtenBy] ?? 0) + 1;
      }
    }
    for (const entry of this.longTerm.values()) {
      if (runId !== undefined && entry.runId !== runId) {
        continue;
      }
      longTerm++;
      byWriter[entry.writtenBy] = (byWriter[entry.writtenBy] ?? 0) + 1;
    }

    return { shortTerm, longTerm, byWriter };
  }

  /** Short-term entries evicted for capacity since the store was created */
  get evictions(): number {
    return this.evictionCount;
  }

  /**
   * Make the store unavailable. Every later call throws StoreUnavailableError.
   */
  close(): void {
    this.closed = true;
    this.shortTerm.clear();
  }

  // ── internals ──────────────────────────────────────────────────────────

  private async ensureOpen(): Promise<void> {
    if (this.closed) {
      throw new StoreUnavailableError("Memory store is closed");
    }
    if (!this.loading) {
      this.loading = this.loadLongTerm();
    }
    try {
      await this.loading;
    } catch (err) {
      // A failed load is retried on the next call
      this.loading = null;
      throw err;
    }
  }

  private async loadLongTerm(): Promise<void> {
    for (const entry of await this.backend.load()) {
      this.longTerm.set(compositeKey(entry.runId, entry.key), entry);
    }
  }

  private async persistLongTerm(): Promise<void> {
    await this.backend.save([...this.longTerm.values()]);
  }

  private runTier(runId: string): Map<string, MemoryEntry> {
    let runEntries = this.shortTerm.get(runId);
    if (!runEntries) {
      runEntries = new Map();
      this.shortTerm.set(runId, runEntries);
    }
    return runEntries;
  }

  private lookup(runId: string, key: string, now: number): MemoryEntry | undefined {
    const runEntries = this.shortTerm.get(runId);
    const shortEntry = runEntries?.get(key);
    if (shortEntry) {
      if (shortEntry.expiresAt === undefined || shortEntry.expiresAt > now) {
        return shortEntry;
      }
      runEntries?.delete(key);
    }
    return this.longTerm.get(compositeKey(runId, key));
  }

  private purgeExpired(runEntries: Map<string, MemoryEntry>, now: number): void {
    for (const [key, entry] of runEntries) {
      if (entry.expiresAt !== undefined && entry.expiresAt <= now) {
        runEntries.delete(key);
      }
    }
  }

  private enforceBounds(runEntries: Map<string, MemoryEntry>, now: number): void {
    this.purgeExpired(runEntries, now);
    while (runEntries.size > this.capacity) {
      const oldest = runEntries.keys().next();
      if (oldest.done) {
        break;
      }
      runEntries.delete(oldest.value);
      this.evictionCount++;
    }
  }

  private async *iterate(runId: string, prefix: string): AsyncGenerator<MemoryEntry> {
    await this.ensureOpen();
    const keys = new Set<string>();
    for (const key of this.shortTerm.get(runId)?.keys() ?? []) {
      if (key.startsWith(prefix)) {
        keys.add(key);
      }
    }
    for (const entry of this.longTerm.values()) {
      if (entry.runId === runId && entry.key.startsWith(prefix)) {
        keys.add(entry.key);
      }
    }

    for (const key of [...keys].sort()) {
      if (this.closed) {
        throw new StoreUnavailableError("Memory store closed during iteration");
      }
      const entry = this.lookup(runId, key, this.clock.now());
      if (entry) {
        yield entry;
      }
    }
  }
}
