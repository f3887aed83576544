/**
 * MemoryCoordinator: per-session owner of the memory pipeline.
 *
 * Buffers turns, submits full batches, runs one TaskTracker per submission, and swaps the
 * composed prompt into the live session when a tracker completes. Nothing here blocks the
 * conversation: onTurn is synchronous and every failure is contained and logged.
 *
 * Overlapping refreshes are applied in completion order (last completion wins).
 * On close the buffer is flushed, outstanding trackers get closeGraceMs to finish, and
 * whatever is still pending after that is abandoned.
 */

import type { CategorySummary, ConversationTurn, IMemoryClient, MemoryTask, SystemPrompt, TrackerFailureReason } from "./types";
import type { ILiveSession } from "../session/live-session";
import { TurnBuffer } from "./turn-buffer";
import { TaskTracker, type TaskTrackerConfig, type TrackerOutcome } from "./task-tracker";
import { type MemoryPipelineError, describeError, toMemoryError } from "./errors";
import { composeSystemPrompt } from "../prompts/composer";
import { MemoryMetrics } from "../metrics";
import { logger } from "../logging";

export interface MemoryCoordinatorConfig {
  userId: string;
  agentId: string;
  /** Display names passed through on submission. */
  userName?: string;
  agentName?: string;
  /** Instructions every composed prompt starts from. */
  baseInstructions: string;
  /** Turns per submission batch. */
  flushThreshold: number;
  tracker: TaskTrackerConfig;
  /** How long onClose waits for outstanding trackers before abandoning them (ms). */
  closeGraceMs: number;
}

export type PromptSource = "initial" | "refresh";

export type RefreshFailureReason = TrackerFailureReason | "submit_failure";

export interface MemoryCoordinatorCallbacks {
  /** A composed prompt was produced; changed is false for a no-op refresh. */
  onPromptApplied?(prompt: SystemPrompt, meta: { source: PromptSource; taskId?: string; changed: boolean }): void;
  /** A submission or tracked job did not produce a prompt. */
  onRefreshFailed?(meta: { task?: MemoryTask; reason: RefreshFailureReason; error: MemoryPipelineError }): void;
}

export class MemoryCoordinator {
  /** Counters for this session only. */
  readonly metrics: MemoryMetrics;
  private readonly buffer: TurnBuffer;
  private readonly inFlight = new Set<TaskTracker>();
  private readonly work = new Set<Promise<void>>();
  private closing: Promise<void> | null = null;
  private abandonNewTrackers = false;

  constructor(
    private readonly client: IMemoryClient,
    private readonly session: ILiveSession,
    private readonly config: MemoryCoordinatorConfig,
    private readonly callbacks: MemoryCoordinatorCallbacks = {}
  ) {
    this.buffer = new TurnBuffer({ flushThreshold: config.flushThreshold });
    this.metrics = new MemoryMetrics(config.userId);
  }

  /** Ingest a turn. Starts a submission in the background once the batch is full. */
  onTurn(turn: ConversationTurn): void {
    if (this.closing) {
      logger.warn({ event: "MEMORY_TURN_AFTER_CLOSE", userId: this.config.userId, role: turn.role }, "Turn arrived after close; ignored");
      return;
    }
    if (this.buffer.append(turn)) {
      this.track(this.submitAndTrack());
    }
  }

  /**
   * Drain the buffer and submit it. The drain happens before the first await, so turns
   * appended while the request is in flight go to the next batch.
   * Resolves with the new task, or null when there was nothing to send or the submit failed
   * (the batch is then dropped, not retried).
   */
  async submitAndTrack(): Promise<MemoryTask | null> {
    const batch = this.buffer.drain();
    if (batch.length === 0) return null;

    const { userId, agentId, userName, agentName } = this.config;
    const started = Date.now();
    let taskId: string;
    try {
      taskId = await this.client.submit(userId, agentId, batch, { userName, agentName });
    } catch (err) {
      const error = toMemoryError(err);
      this.metrics.recordSubmission(false, batch.length, Date.now() - started);
      logger.warn(
        { event: "MEMORY_SUBMIT_FAILED", userId, agentId, turns: batch.length, code: error.code, err: error.message },
        "Memory submission failed; batch discarded"
      );
      this.callbacks.onRefreshFailed?.({ reason: "submit_failure", error });
      return null;
    }

    this.metrics.recordSubmission(true, batch.length, Date.now() - started);
    const task: MemoryTask = { taskId, userId, agentId, submittedAt: Date.now(), state: "pending", attempts: 0 };
    logger.info({ event: "MEMORY_SUBMITTED", taskId, userId, agentId, turns: batch.length }, "Conversation submitted for summarization");

    const tracker = new TaskTracker(this.client, task, this.config.tracker);
    this.inFlight.add(tracker);
    this.track(tracker.run().then((outcome) => this.settle(tracker, outcome)));
    if (this.abandonNewTrackers) tracker.abandon();
    return tracker.snapshot();
  }

  onTrackerCompleted(task: MemoryTask, categories: CategorySummary[]): void {
    const prompt = composeSystemPrompt(this.config.baseInstructions, categories);
    const changed = this.applyPrompt(prompt.text);
    logger.info(
      {
        event: "MEMORY_TASK_COMPLETED",
        taskId: task.taskId,
        userId: task.userId,
        attempts: task.attempts,
        categories: categories.length,
        integrated: prompt.integratedSummaries.length,
        changed,
      },
      "Memory refresh completed"
    );
    this.metrics.recordRefreshMetrics({
      taskId: task.taskId,
      outcome: changed ? "applied" : "unchanged",
      attempts: task.attempts,
      submitToResultMs: Date.now() - task.submittedAt,
      categories: categories.length,
      integratedCategories: prompt.integratedSummaries.length,
      promptChars: prompt.text.length,
    });
    this.callbacks.onPromptApplied?.(prompt, { source: "refresh", taskId: task.taskId, changed });
  }

  onTrackerFailed(task: MemoryTask, reason: TrackerFailureReason, error: MemoryPipelineError): void {
    logger.warn(
      {
        event: "MEMORY_TASK_FAILED",
        taskId: task.taskId,
        userId: task.userId,
        agentId: task.agentId,
        attempts: task.attempts,
        state: task.state,
        reason,
        code: error.code,
        err: error.message,
      },
      "Memory refresh failed; keeping current prompt"
    );
    this.metrics.recordRefreshMetrics({
      taskId: task.taskId,
      outcome: "failed",
      attempts: task.attempts,
      submitToResultMs: Date.now() - task.submittedAt,
      failureReason: reason,
    });
    this.callbacks.onRefreshFailed?.({ task, reason, error });
  }

  /** Replace the session's instructions in one step. Returns false when nothing changed. */
  applyPrompt(prompt: string): boolean {
    const change = this.session.replaceInstructions(prompt);
    if (!change) return false;
    logger.info(
      { event: "MEMORY_PROMPT_APPLIED", userId: this.config.userId, version: change.version, promptChars: prompt.length },
      "System prompt updated"
    );
    return true;
  }

  /**
   * Retrieve whatever the service already knows about this user and apply it.
   * On failure the session keeps its current instructions.
   */
  async loadInitialMemories(): Promise<SystemPrompt> {
    const { userId, agentId, baseInstructions } = this.config;
    let categories: CategorySummary[];
    try {
      categories = await this.client.retrieveDefaultCategories(userId, agentId);
    } catch (err) {
      const error = toMemoryError(err);
      logger.warn(
        { event: "MEMORY_INITIAL_LOAD_FAILED", userId, agentId, code: error.code, err: error.message },
        "Could not load memories; using base instructions"
      );
      return composeSystemPrompt(baseInstructions, []);
    }
    const prompt = composeSystemPrompt(baseInstructions, categories);
    const changed = this.applyPrompt(prompt.text);
    logger.info(
      { event: "MEMORY_INITIAL_LOAD", userId, agentId, categories: categories.length, integrated: prompt.integratedSummaries.length },
      prompt.integratedSummaries.length > 0 ? "Memories loaded into system prompt" : "No memories yet; using base instructions"
    );
    this.callbacks.onPromptApplied?.(prompt, { source: "initial", changed });
    return prompt;
  }

  /** Flush what is left and wind down trackers. Idempotent. */
  onClose(): Promise<void> {
    if (!this.closing) this.closing = this.shutdown();
    return this.closing;
  }

  getInFlightTasks(): MemoryTask[] {
    return [...this.inFlight].map((t) => t.snapshot());
  }

  get bufferedTurns(): number {
    return this.buffer.size;
  }

  /** Resolves once no submission or tracker is outstanding. */
  async whenIdle(): Promise<void> {
    while (this.work.size > 0) {
      await Promise.all([...this.work]);
    }
  }

  private async shutdown(): Promise<void> {
    const flushed = this.buffer.size;
    if (flushed > 0) this.track(this.submitAndTrack());

    let timer: ReturnType<typeof setTimeout> | undefined;
    const graceExpired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), this.config.closeGraceMs);
    });
    const settled = await Promise.race([this.whenIdle().then(() => true), graceExpired]);
    clearTimeout(timer);

    let abandoned = 0;
    if (!settled) {
      this.abandonNewTrackers = true;
      for (const tracker of this.inFlight) {
        if (tracker.abandon()) abandoned++;
      }
      await this.whenIdle();
    }
    logger.info(
      { event: "MEMORY_CLOSED", userId: this.config.userId, flushedTurns: flushed, abandoned },
      "Memory pipeline closed"
    );
  }

  private settle(tracker: TaskTracker, outcome: TrackerOutcome): void {
    this.inFlight.delete(tracker);
    if (outcome.kind === "completed") {
      this.onTrackerCompleted(outcome.task, outcome.categories);
    } else {
      this.onTrackerFailed(outcome.task, outcome.reason, outcome.error);
    }
  }

  /** Keep background work observable and make sure nothing escapes into the conversation. */
  private track(work: Promise<unknown>): void {
    const entry: Promise<void> = work
      .then(
        () => undefined,
        (err: unknown) => {
          logger.error({ event: "MEMORY_PIPELINE_ERROR", userId: this.config.userId, err: describeError(err) }, "Unexpected memory pipeline error");
        }
      )
      .finally(() => {
        this.work.delete(entry);
      });
    this.work.add(entry);
  }
}
