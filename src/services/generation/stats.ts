/**
 * Run statistics and the shared failure budget.
 *
 * Both are mutated from concurrent request workers. Every update is a
 * synchronous read-modify-write with no await in between, so on the Node
 * event loop no update can interleave with another.
 */

import type { RunStats } from '../../types/models.js';
import { BudgetExhaustedError } from '../../types/errors.js';

export type RunCounter = {
  [K in keyof RunStats]: RunStats[K] extends number ? K : never;
}[keyof RunStats];

export function emptyRunStats(startedAt: Date = new Date()): RunStats {
  return {
    status: 'complete',
    stop_reason: null,
    started_at: startedAt.toISOString(),
    finished_at: null,
    attempted: 0,
    succeeded: 0,
    corrected: 0,
    validation_failed: 0,
    unexpected_errors: 0,
    retried: 0,
    exhausted: 0,
    cancelled: 0,
    questions_requested: 0,
    records_emitted: 0,
    questions_unmapped: 0,
    input_tokens: 0,
    output_tokens: 0,
    model_time_ms: 0,
    wall_time_ms: 0,
  };
}

/**
 * Run-wide counters plus one breakdown per source database.
 */
export class RunStatsCollector {
  private readonly totals: RunStats;
  private readonly perSource = new Map<string, RunStats>();
  private readonly startedAt: number;

  constructor(private readonly clock: () => Date = () => new Date()) {
    const now = clock();
    this.startedAt = now.getTime();
    this.totals = emptyRunStats(now);
  }

  private source(sourceDbId: string): RunStats {
    let stats = this.perSource.get(sourceDbId);
    if (!stats) {
      stats = emptyRunStats(this.clock());
      this.perSource.set(sourceDbId, stats);
    }
    return stats;
  }

  increment(sourceDbId: string, counter: RunCounter, by: number = 1): void {
    this.totals[counter] += by;
    this.source(sourceDbId)[counter] += by;
  }

  /**
   * Close the run. `stopReason` marks it incomplete.
   */
  finish(stopReason: string | null = null): RunStats {
    const now = this.clock();
    this.totals.finished_at = now.toISOString();
    this.totals.wall_time_ms = now.getTime() - this.startedAt;
    if (stopReason !== null) {
      this.totals.status = 'incomplete';
      this.totals.stop_reason = stopReason;
    }
    for (const stats of this.perSource.values()) {
      stats.finished_at = this.totals.finished_at;
      stats.status = this.totals.status;
      stats.stop_reason = this.totals.stop_reason;
    }
    return this.snapshot();
  }

  snapshot(): RunStats {
    return { ...this.totals };
  }

  sourceSnapshot(sourceDbId: string): RunStats {
    return { ...this.source(sourceDbId) };
  }

  sourceDbIds(): string[] {
    return [...this.perSource.keys()].sort();
  }
}

/**
 * Global count of failed attempts shared by every request in a run.
 */
export class FailureBudget {
  private used = 0;
  private lastError: string | null = null;

  constructor(readonly limit: number) {}

  get exhausted(): boolean {
    return this.used >= this.limit;
  }

  get failures(): number {
    return this.used;
  }

  /**
   * Charge one failure. Returns false when this charge spent the last unit
   * or the budget was already gone.
   */
  consume(reason: string): boolean {
    if (this.exhausted) return false;
    this.used += 1;
    this.lastError = reason;
    return !this.exhausted;
  }

  toError(): BudgetExhaustedError {
    return new BudgetExhaustedError(this.limit, this.lastError ?? undefined);
  }
}
