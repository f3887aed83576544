/**
 * Anthropic Claude LLM adapter.
 * The system message travels in the top-level system field; the rest become user/assistant turns.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export interface AnthropicLlmConfig {
  apiKey: string;
  model: string;
}

type ConversationMessage = { role: "user" | "assistant"; content: string };

function toConversation(messages: Message[]): { system?: string; msgs: ConversationMessage[] } {
  const system = messages
    .filter((m) => m.role === "system")
    .map((m) => m.content)
    .join("\n\n");
  const msgs: ConversationMessage[] = [];
  for (const m of messages) {
    if (m.role === "user" || m.role === "assistant") msgs.push({ role: m.role, content: m.content });
  }
  return { system: system || undefined, msgs };
}

export class AnthropicLLM implements ILLM {
  private client: Anthropic;

  constructor(private readonly cfg: AnthropicLlmConfig) {
    this.client = new Anthropic({ apiKey: cfg.apiKey });
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const maxTokens = options?.maxTokens ?? 256;
    const { system, msgs } = toConversation(messages);
    const request = { model: this.cfg.model, max_tokens: maxTokens, system, messages: msgs };
    if (options?.stream) {
      const streamResult = this.client.messages.stream(request);
      const asyncIter = (async function* (): AsyncIterable<string> {
        for await (const event of streamResult) {
          if (event.type === "content_block_delta" && event.delta.type === "text_delta") {
            yield event.delta.text;
          }
        }
      })();
      return { text: "", stream: asyncIter };
    }
    const response = await this.client.messages.create(request);
    const textBlock = response.content.find((b) => b.type === "text");
    const text = textBlock && textBlock.type === "text" ? textBlock.text : "";
    return { text };
  }
}
