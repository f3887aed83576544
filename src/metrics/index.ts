/**
 * Memory pipeline metrics.
 * Counters and per-refresh timings are logged as structured events; the last values are kept
 * on the owning coordinator for health/debug inspection.
 */

import { logger } from "../logging";

export type RefreshOutcome = "applied" | "unchanged" | "failed";

export interface RefreshMetrics {
  taskId?: string;
  outcome: RefreshOutcome;
  /** Status polls it took. */
  attempts?: number;
  /** From submission to the tracker reporting (ms). */
  submitToResultMs?: number;
  /** Categories returned by the service. */
  categories?: number;
  /** Categories that made it into the prompt. */
  integratedCategories?: number;
  promptChars?: number;
  /** service_failure | timeout when outcome is failed. */
  failureReason?: string;
}

export interface MemoryCounters {
  submitted: number;
  submitFailed: number;
  turnsSubmitted: number;
  turnsDiscarded: number;
  refreshesApplied: number;
  refreshesUnchanged: number;
  refreshesFailed: number;
}

function emptyCounters(): MemoryCounters {
  return {
    submitted: 0,
    submitFailed: 0,
    turnsSubmitted: 0,
    turnsDiscarded: 0,
    refreshesApplied: 0,
    refreshesUnchanged: 0,
    refreshesFailed: 0,
  };
}

/** One per coordinator, so sessions never share counts. */
export class MemoryMetrics {
  private counters: MemoryCounters = emptyCounters();
  private lastRefresh: RefreshMetrics | undefined;

  constructor(private readonly userId?: string) {}

  recordSubmission(ok: boolean, turns: number, latencyMs?: number): void {
    if (ok) {
      this.counters.submitted++;
      this.counters.turnsSubmitted += turns;
    } else {
      this.counters.submitFailed++;
      this.counters.turnsDiscarded += turns;
    }
    logger.debug(
      { event: "MEMORY_SUBMIT_METRICS", user_id: this.userId, ok, turns, submit_latency_ms: latencyMs },
      "Memory submission"
    );
  }

  recordRefreshMetrics(metrics: RefreshMetrics): void {
    this.lastRefresh = { ...metrics };
    if (metrics.outcome === "applied") this.counters.refreshesApplied++;
    else if (metrics.outcome === "unchanged") this.counters.refreshesUnchanged++;
    else this.counters.refreshesFailed++;
    logger.info(
      {
        event: "MEMORY_REFRESH_METRICS",
        user_id: this.userId,
        task_id: metrics.taskId,
        outcome: metrics.outcome,
        attempts: metrics.attempts,
        submit_to_result_ms: metrics.submitToResultMs,
        categories: metrics.categories,
        integrated_categories: metrics.integratedCategories,
        prompt_chars: metrics.promptChars,
        failure_reason: metrics.failureReason,
      },
      "Memory refresh"
    );
  }

  getCounters(): MemoryCounters {
    return { ...this.counters };
  }

  getLastRefreshMetrics(): RefreshMetrics | undefined {
    return this.lastRefresh ? { ...this.lastRefresh } : undefined;
  }

  reset(): void {
    this.counters = emptyCounters();
    this.lastRefresh = undefined;
  }
}
