/**
 * Turn buffer: holds conversation turns until there are enough to submit.
 * append and drain are synchronous, so a turn lands wholly before or after a drain.
 */

import type { ConversationTurn } from "./types";

export interface TurnBufferConfig {
  /** Number of turns that triggers a flush. */
  flushThreshold: number;
}

export class TurnBuffer {
  private turns: ConversationTurn[] = [];
  private readonly flushThreshold: number;

  constructor(config: TurnBufferConfig) {
    if (!Number.isInteger(config.flushThreshold) || config.flushThreshold < 1) {
      throw new RangeError(`flushThreshold must be a positive integer (got ${config.flushThreshold})`);
    }
    this.flushThreshold = config.flushThreshold;
  }

  /** Append a turn; returns true when the buffer has reached the flush threshold. */
  append(turn: ConversationTurn): boolean {
    this.turns.push(turn);
    return this.turns.length >= this.flushThreshold;
  }

  /** Take everything buffered, in append order, and start over empty. */
  drain(): ConversationTurn[] {
    const drained = this.turns;
    this.turns = [];
    return drained;
  }

  get size(): number {
    return this.turns.length;
  }

  isEmpty(): boolean {
    return this.turns.length === 0;
  }
}
