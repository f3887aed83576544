/**
 * Memory pipeline types.
 * Turns flow into the buffer, get submitted for summarization, and come back
 * as category summaries that are folded into the live system prompt.
 */

export type TurnRole = "user" | "assistant";

export interface ConversationTurn {
  readonly role: TurnRole;
  readonly text: string;
  /** Epoch ms when the turn was recognized or produced. */
  readonly timestamp: number;
}

/** State reported by the remote service for a submitted job. */
export type RemoteTaskState = "pending" | "completed" | "failed";

/** Local tracker state; "abandoned" is never reported by the service. */
export type MemoryTaskState = RemoteTaskState | "abandoned";

export interface MemoryTask {
  taskId: string;
  userId: string;
  agentId: string;
  submittedAt: number;
  state: MemoryTaskState;
  /** Status polls issued so far. */
  attempts: number;
}

export interface CategorySummary {
  readonly categoryName: string;
  /** Absent when the service has nothing for this category yet. */
  readonly summaryText?: string;
}

export interface SystemPrompt {
  base: string;
  /** Summaries actually folded in (empty ones dropped), in retrieval order. */
  integratedSummaries: CategorySummary[];
  text: string;
}

export type TrackerFailureReason = "service_failure" | "timeout";

/** Optional extras sent along with a submission. */
export interface SubmitOptions {
  userName?: string;
  agentName?: string;
}

/**
 * Adapter over the remote summarization service.
 * Implementations reject with TransportError or ServiceError.
 */
export interface IMemoryClient {
  submit(userId: string, agentId: string, turns: readonly ConversationTurn[], options?: SubmitOptions): Promise<string>;
  status(taskId: string): Promise<RemoteTaskState>;
  retrieveDefaultCategories(userId: string, agentId: string): Promise<CategorySummary[]>;
}

/** Build an immutable turn. Returns null for blank text. */
export function createTurn(role: TurnRole, text: string, timestamp: number = Date.now()): ConversationTurn | null {
  const trimmed = (text || "").trim();
  if (!trimmed) return null;
  return Object.freeze({ role, text: trimmed, timestamp });
}
