/**
 * Memory pipeline: turn buffering, summarization jobs, prompt refresh.
 */

import type { AppConfig } from "../config";
import type { ILiveSession } from "../session/live-session";
import type { IMemoryClient } from "./types";
import { MemoryClient } from "./client";
import { MemoryCoordinator, type MemoryCoordinatorCallbacks } from "./coordinator";

export * from "./types";
export * from "./errors";
export { MemoryClient, normalizeCategory, normalizeState } from "./client";
export type { MemoryClientConfig } from "./client";
export { TaskTracker, isTerminalState } from "./task-tracker";
export type { TaskTrackerConfig, TaskTrackerDeps, TrackerOutcome } from "./task-tracker";
export { TurnBuffer } from "./turn-buffer";
export { MemoryCoordinator } from "./coordinator";
export type { MemoryCoordinatorCallbacks, MemoryCoordinatorConfig, PromptSource, RefreshFailureReason } from "./coordinator";

/** Memory client for the configured service, or null when memory is disabled. */
export function createMemoryClient(config: AppConfig): IMemoryClient | null {
  const { baseUrl, apiKey, requestTimeoutMs } = config.memory;
  if (!baseUrl) return null;
  return new MemoryClient({ baseUrl, apiKey, requestTimeoutMs });
}

/** Coordinator wired from config for one session. */
export function createMemoryCoordinator(
  config: AppConfig,
  client: IMemoryClient,
  session: ILiveSession,
  callbacks: MemoryCoordinatorCallbacks = {}
): MemoryCoordinator {
  const m = config.memory;
  return new MemoryCoordinator(
    client,
    session,
    {
      userId: m.userId,
      agentId: m.agentId,
      userName: m.userName,
      agentName: m.agentName,
      baseInstructions: config.agent.baseInstructions,
      flushThreshold: m.flushThreshold,
      tracker: {
        pollIntervalMs: m.pollIntervalMs,
        backoffFactor: m.backoffFactor,
        maxPollIntervalMs: m.maxPollIntervalMs,
        jitterMs: m.jitterMs,
        maxPollAttempts: m.maxPollAttempts,
        maxPollDurationMs: m.maxPollDurationMs,
      },
      closeGraceMs: m.closeGraceMs,
    },
    callbacks
  );
}
