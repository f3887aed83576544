import type { Message } from "../adapters/llm";
import type { TranscriptSnapshot } from "../session/transcript";

export type PromptMode = "greeting" | "reply";

export interface BuildPromptArgs {
  mode: PromptMode;
  /** Live instructions, read from the session at call time. */
  instructions: string;
  snapshot: TranscriptSnapshot;
  /** Task for greeting mode (e.g. "Greet the user and offer your assistance."). */
  greetingInstruction?: string;
}

export interface PromptManagerConfig {
  /** Cap on history turns sent to the LLM. Unset = everything in the snapshot. */
  maxHistoryTurns?: number;
}

/**
 * PromptManager
 *
 * Centralizes how LLM message lists are built so the conversation driver only deals with turns.
 * The system message is always the session's current instructions, whatever memory refresh last put there.
 */
export class PromptManager {
  private readonly maxHistoryTurns: number | undefined;

  constructor(cfg: PromptManagerConfig = {}) {
    this.maxHistoryTurns = cfg.maxHistoryTurns;
  }

  buildMessages(args: BuildPromptArgs): Message[] {
    const history = this.historyMessages(args.snapshot);
    const system: Message = { role: "system", content: args.instructions };

    if (args.mode === "greeting") {
      const task = (args.greetingInstruction || "").trim();
      return task ? [system, ...history, { role: "user", content: task }] : [system, ...history];
    }

    return [system, ...history];
  }

  private historyMessages(snapshot: TranscriptSnapshot): Message[] {
    const turns = this.maxHistoryTurns !== undefined ? snapshot.turns.slice(-this.maxHistoryTurns) : snapshot.turns;
    return turns.map((t) => ({ role: t.role, content: t.text }));
  }
}
