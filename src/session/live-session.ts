/**
 * Live session: the one instruction string the response path reads on every turn.
 *
 * Replacement swaps a single string reference, so a reader sees the old value or the new
 * one in full. The memory coordinator is the only writer.
 */

export interface InstructionsChange {
  previous: string;
  current: string;
  version: number;
}

export interface ILiveSession {
  /** Current instructions, read by the response path. */
  readonly instructions: string;
  /** Incremented on every effective replacement. */
  readonly version: number;
  /** Replace the instructions whole. Returns null when the text is unchanged. */
  replaceInstructions(next: string): InstructionsChange | null;
}

export interface LiveSessionConfig {
  sessionId: string;
  initialInstructions: string;
  onInstructionsChanged?: (change: InstructionsChange) => void;
}

export class LiveSession implements ILiveSession {
  readonly sessionId: string;
  private current: string;
  private currentVersion = 0;
  private readonly onInstructionsChanged?: (change: InstructionsChange) => void;

  constructor(config: LiveSessionConfig) {
    this.sessionId = config.sessionId;
    this.current = config.initialInstructions;
    this.onInstructionsChanged = config.onInstructionsChanged;
  }

  get instructions(): string {
    return this.current;
  }

  get version(): number {
    return this.currentVersion;
  }

  replaceInstructions(next: string): InstructionsChange | null {
    const previous = this.current;
    if (next === previous) return null;
    this.current = next;
    this.currentVersion++;
    const change: InstructionsChange = { previous, current: next, version: this.currentVersion };
    this.onInstructionsChanged?.(change);
    return change;
  }
}
