/**
 * In-session transcript: rolling list of recent turns used as LLM history.
 * Separate from the memory pipeline's batch buffer; this one is bounded by count and never drained.
 */

import { createTurn, type ConversationTurn, type TurnRole } from "../memory/types";

export interface TranscriptSnapshot {
  turns: ConversationTurn[];
}

export interface ISessionTranscript {
  /** Append a turn. Returns the stored turn, or null when the text was blank. */
  append(role: TurnRole, text: string): ConversationTurn | null;
  getSnapshot(): TranscriptSnapshot;
  clear(): void;
}

export interface SessionTranscriptConfig {
  /** Max number of recent turns to keep. */
  maxTurns: number;
}

export class SessionTranscript implements ISessionTranscript {
  private turns: ConversationTurn[] = [];
  private readonly maxTurns: number;

  constructor(config: SessionTranscriptConfig) {
    this.maxTurns = Math.max(1, config.maxTurns);
  }

  append(role: TurnRole, text: string): ConversationTurn | null {
    const turn = createTurn(role, text);
    if (!turn) return null;
    this.turns.push(turn);
    while (this.turns.length > this.maxTurns) {
      this.turns.shift();
    }
    return turn;
  }

  getSnapshot(): TranscriptSnapshot {
    return { turns: [...this.turns] };
  }

  clear(): void {
    this.turns = [];
  }
}
