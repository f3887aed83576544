/**
 * Stub LLM adapter for tests or when no provider is configured.
 * Replies with a fixed text (empty by default).
 */

import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export class StubLLM implements ILLM {
  /** Messages of every call, most recent last. */
  readonly calls: Message[][] = [];

  constructor(private readonly reply = "") {}

  async chat(messages: Message[], _options?: ChatOptions): Promise<ChatResponse> {
    this.calls.push(messages.map((m) => ({ ...m })));
    return { text: this.reply };
  }
}
