/**
 * Long-term memory backends.
 *
 * The long-term tier is the only memory that outlives a process. The store
 * keeps it in memory and writes the whole tier through to a backend after
 * every long-term change; the tier is small (resolved artifacts and recall
 * notes), so whole-file rewrites are acceptable.
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { StoreUnavailableError } from "../errors/index.js";
import type { MemoryEntry } from "../types/memory.js";

export interface LongTermBackend {
  load(): Promise<MemoryEntry[]>;
  save(entries: readonly MemoryEntry[]): Promise<void>;
}

/**
 * Backend that lives and dies with the process.
 */
export class InMemoryLongTermBackend implements LongTermBackend {
  private entries: MemoryEntry[] = [];

  async load(): Promise<MemoryEntry[]> {
    return [...this.entries];
  }

  async save(entries: readonly MemoryEntry[]): Promise<void> {
    this.entries = [...entries];
  }
}

const PersistedEntrySchema = z.object({
  runId: z.string(),
  key: z.string(),
  value: z.unknown(),
  tier: z.literal("long-term"),
  writtenBy: z.string(),
  writtenAt: z.number(),
});

const PersistedFileSchema = z.object({
  version: z.literal(1),
  entries: z.array(PersistedEntrySchema),
});

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Persists the long-term tier to a single JSON file.
 * A missing file loads as an empty tier; a corrupt one is a store fault.
 */
export class JsonFileLongTermBackend implements LongTermBackend {
  /** Tail of the save chain */
  private pending: Promise<void> = Promise.resolve();
  private writes = 0;

  constructor(private readonly filePath: string) {}

  async load(): Promise<MemoryEntry[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) {
        return [];
      }
      throw new StoreUnavailableError(`Cannot read long-term memory file ${this.filePath}`, {
        cause: err,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new StoreUnavailableError(`Long-term memory file is not JSON: ${this.filePath}`, {
        cause: err,
      });
    }

    const parsed = PersistedFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new StoreUnavailableError(
        `Long-term memory file has an unexpected shape: ${this.filePath}`,
        { cause: parsed.error }
      );
    }
    return parsed.data.entries.map((entry) => ({
      runId: entry.runId,
      key: entry.key,
      value: entry.value,
      tier: entry.tier,
      writtenBy: entry.writtenBy,
      writtenAt: entry.writtenAt,
    }));
  }

  /**
   * Snapshot the entries now and write them after every earlier save has
   * settled. Writes reach the file in call order, so the last save wins.
   */
  save(entries: readonly MemoryEntry[]): Promise<void> {
    const body = JSON.stringify({ version: 1, entries }, null, 2);
    const write = this.pending.then(() => this.write(body));
    // A failed write is reported to its own caller; later saves still run
    this.pending = write.catch(() => undefined);
    return write;
  }

  private async write(body: string): Promise<void> {
    const tempPath = `${this.filePath}.${++this.writes}.tmp`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, body, "utf-8");
      await rename(tempPath, this.filePath);
    } catch (err) {
      throw new StoreUnavailableError(`Cannot write long-term memory file ${this.filePath}`, {
        cause: err,
      });
    }
  }
}
