// ---------------------------------------------------------------------------
// Orchestrator – In-memory execution history
// ---------------------------------------------------------------------------

import type { ExecutionResult } from "./types.js";

export const DEFAULT_HISTORY_LIMIT = 100;

/** Newest-first list of execution records, capped at `limit` entries. */
export class ExecutionHistory {
  readonly limit: number;
  private entries: ExecutionResult[] = [];

  constructor(limit = DEFAULT_HISTORY_LIMIT) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`History limit must be a positive integer, got ${limit}`);
    }
    this.limit = limit;
  }

  /** Record an execution; a record with a known id replaces the old one. */
  add(result: ExecutionResult): void {
    this.entries = [result, ...this.entries.filter((e) => e.id !== result.id)].slice(0, this.limit);
  }

  /** Merge records loaded from disk, keeping newest-first order by start time. */
  restore(results: readonly ExecutionResult[]): void {
    const byId = new Map(this.entries.map((e) => [e.id, e]));
    for (const r of results) {
      if (!byId.has(r.id)) {
        byId.set(r.id, r);
      }
    }
    this.entries = [...byId.values()]
      .sort((a, b) => b.startedAtMs - a.startedAtMs)
      .slice(0, this.limit);
  }

  get(id: string): ExecutionResult | undefined {
    return this.entries.find((e) => e.id === id);
  }

  list(limit?: number): ExecutionResult[] {
    return limit !== undefined && limit > 0 ? this.entries.slice(0, limit) : [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }
}
