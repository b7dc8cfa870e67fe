import {
  HistoryDisabledError,
  KeyedSerialQueue,
  type AppendHistoryInput,
  type HistoryEntry,
  type HistoryFilter,
} from "@clia/shared";
import type { HistoryStore } from "@clia/db";

export interface HistoryServiceOptions {
  enabled: boolean;
}

/**
 * Writes for one user go through that user's queue, so appends and clears
 * from concurrent calls are applied one at a time in arrival order.
 */
export class HistoryService {
  private writes = new KeyedSerialQueue();

  constructor(
    private store: HistoryStore,
    private options: HistoryServiceOptions,
  ) {}

  get enabled(): boolean {
    return this.options.enabled;
  }

  /** Returns undefined without writing when history is disabled. */
  async record(input: AppendHistoryInput): Promise<HistoryEntry | undefined> {
    if (!this.enabled) return undefined;
    return this.writes.run(input.userId, () => this.store.append(input));
  }

  async list(userId: string, filter: HistoryFilter): Promise<HistoryEntry[]> {
    this.requireEnabled();
    return this.store.list(userId, filter);
  }

  async clear(userId: string): Promise<number> {
    this.requireEnabled();
    return this.writes.run(userId, () => this.store.clear(userId));
  }

  private requireEnabled(): void {
    if (!this.enabled) throw new HistoryDisabledError();
  }
}
