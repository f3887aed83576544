/**
 * TaskTracker: drives one submitted summarization job to a terminal state.
 *
 *   pending -> completed | failed | abandoned
 *
 * Polls status on a timer (interval x backoff^n, capped, plus jitter) until the job
 * completes, fails, or the attempt / wall-clock budget runs out. On completion it makes
 * exactly one retrieval call before reporting. Terminal states are final.
 */

import type {
  CategorySummary,
  IMemoryClient,
  MemoryTask,
  MemoryTaskState,
  RemoteTaskState,
  TrackerFailureReason,
} from "./types";
import { MemoryPipelineError, ServiceError, TimeoutError, TransportError, toMemoryError } from "./errors";
import { logger } from "../logging";

export interface TaskTrackerConfig {
  /** Delay before the first poll and base for backoff (ms). */
  pollIntervalMs: number;
  /** Multiplier applied per attempt; 1 = fixed interval. */
  backoffFactor?: number;
  /** Upper bound on the backoff delay, before jitter (ms). */
  maxPollIntervalMs?: number;
  /** Uniform random jitter added to each delay, in [0, jitterMs). */
  jitterMs?: number;
  /** Give up (abandoned/timeout) after this many status polls. */
  maxPollAttempts: number;
  /** Give up after this much wall-clock time since run() (ms). Unset = no limit. */
  maxPollDurationMs?: number;
}

export type TrackerOutcome =
  | { kind: "completed"; task: MemoryTask; categories: CategorySummary[] }
  | { kind: "failed"; task: MemoryTask; reason: TrackerFailureReason; error: MemoryPipelineError };

export interface TaskTrackerDeps {
  /** Source of jitter in [0, 1). */
  random?: () => number;
  now?: () => number;
}

const TERMINAL_STATES: ReadonlySet<MemoryTaskState> = new Set<MemoryTaskState>(["completed", "failed", "abandoned"]);

export function isTerminalState(state: MemoryTaskState): boolean {
  return TERMINAL_STATES.has(state);
}

export class TaskTracker {
  private readonly task: MemoryTask;
  private readonly backoffFactor: number;
  private readonly maxPollIntervalMs: number;
  private readonly jitterMs: number;
  private readonly random: () => number;
  private readonly now: () => number;
  private runPromise: Promise<TrackerOutcome> | null = null;
  private sleepTimer: ReturnType<typeof setTimeout> | null = null;
  private wake: (() => void) | null = null;

  constructor(
    private readonly client: IMemoryClient,
    task: MemoryTask,
    private readonly config: TaskTrackerConfig,
    deps: TaskTrackerDeps = {}
  ) {
    if (!(config.pollIntervalMs >= 0)) throw new RangeError("pollIntervalMs must be >= 0");
    if (!Number.isInteger(config.maxPollAttempts) || config.maxPollAttempts < 1) {
      throw new RangeError("maxPollAttempts must be a positive integer");
    }
    this.task = { ...task };
    this.backoffFactor = config.backoffFactor ?? 1;
    this.maxPollIntervalMs = config.maxPollIntervalMs ?? Number.POSITIVE_INFINITY;
    this.jitterMs = Math.max(0, config.jitterMs ?? 0);
    this.random = deps.random ?? Math.random;
    this.now = deps.now ?? Date.now;
  }

  get taskId(): string {
    return this.task.taskId;
  }

  get state(): MemoryTaskState {
    return this.task.state;
  }

  get attempts(): number {
    return this.task.attempts;
  }

  snapshot(): MemoryTask {
    return { ...this.task };
  }

  /** Start polling. Idempotent: later calls return the same promise. Never rejects. */
  run(): Promise<TrackerOutcome> {
    if (!this.runPromise) this.runPromise = this.loop();
    return this.runPromise;
  }

  /**
   * Stop tracking a job that is still pending. A poll already in flight has its result ignored.
   * Returns false when the tracker was already terminal.
   */
  abandon(): boolean {
    if (!this.transition("abandoned")) return false;
    this.cancelSleep();
    return true;
  }

  /** Delay before the given (1-based) attempt. */
  nextDelayMs(attempt: number): number {
    const backoff = this.config.pollIntervalMs * Math.pow(this.backoffFactor, Math.max(0, attempt - 1));
    const base = Math.min(backoff, this.maxPollIntervalMs);
    return base + Math.floor(this.random() * this.jitterMs);
  }

  private async loop(): Promise<TrackerOutcome> {
    const startedAt = this.now();
    const maxDuration = this.config.maxPollDurationMs;

    const deadline = maxDuration !== undefined ? startedAt + maxDuration : Number.POSITIVE_INFINITY;
    const pastDeadline = (): TrackerOutcome => {
      this.transition("abandoned");
      return this.failure("timeout", new TimeoutError(`No result within ${maxDuration}ms`, this.context()));
    };

    while (this.isPending()) {
      if (this.task.attempts >= this.config.maxPollAttempts) {
        this.transition("abandoned");
        return this.failure("timeout", new TimeoutError(`No result after ${this.task.attempts} polls`, this.context()));
      }
      if (this.now() >= deadline) return pastDeadline();

      // The wait never runs past the deadline.
      await this.sleep(Math.min(this.nextDelayMs(this.task.attempts + 1), Math.max(0, deadline - this.now())));
      if (!this.isPending()) break;
      if (this.now() >= deadline) return pastDeadline();

      this.task.attempts++;
      let remote: RemoteTaskState;
      try {
        remote = await this.client.status(this.task.taskId);
      } catch (err) {
        if (!this.isPending()) break;
        const error = toMemoryError(err);
        if (error instanceof TransportError) {
          logger.warn({ event: "MEMORY_POLL_ERROR", ...this.context(), err: error.message }, "Status poll failed; will retry");
          continue;
        }
        this.transition("failed");
        return this.failure("service_failure", error);
      }
      if (!this.isPending()) break;

      logger.debug({ event: "MEMORY_POLL", ...this.context(), remote }, "Memory task status");
      if (remote === "completed") {
        this.transition("completed");
        return this.retrieveOnce();
      }
      if (remote === "failed") {
        this.transition("failed");
        return this.failure("service_failure", new ServiceError("Summarization job failed", undefined, this.context()));
      }
    }

    return this.failure("timeout", new TimeoutError("Tracking abandoned before the job finished", this.context()));
  }

  private async retrieveOnce(): Promise<TrackerOutcome> {
    try {
      const categories = await this.client.retrieveDefaultCategories(this.task.userId, this.task.agentId);
      return { kind: "completed", task: this.snapshot(), categories };
    } catch (err) {
      return this.failure("service_failure", toMemoryError(err));
    }
  }

  private failure(reason: TrackerFailureReason, error: MemoryPipelineError): TrackerOutcome {
    return { kind: "failed", task: this.snapshot(), reason, error };
  }

  /** Only pending tasks move; anything terminal stays put. */
  private transition(next: MemoryTaskState): boolean {
    if (isTerminalState(this.task.state)) return false;
    this.task.state = next;
    return true;
  }

  private isPending(): boolean {
    return this.task.state === "pending";
  }

  private context(): Record<string, unknown> {
    return { taskId: this.task.taskId, userId: this.task.userId, attempts: this.task.attempts };
  }

  private sleep(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const wake = (): void => {
        this.sleepTimer = null;
        this.wake = null;
        resolve();
      };
      this.wake = wake;
      this.sleepTimer = setTimeout(wake, ms);
    });
  }

  private cancelSleep(): void {
    if (this.sleepTimer) clearTimeout(this.sleepTimer);
    this.wake?.();
  }
}
