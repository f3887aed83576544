/**
 * LLM adapter types.
 * Implementations can be swapped via config (OpenAI, Anthropic, stub).
 */

export interface Message {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatOptions {
  /** If true, the reply is streamed (tokens as they arrive). */
  stream?: boolean;
  maxTokens?: number;
}

export interface ChatResponse {
  /** Full reply for non-streaming calls; may be empty when streaming. */
  text: string;
  /** Reply chunks when streaming was requested. */
  stream?: AsyncIterable<string>;
}

/** Messages in, assistant reply out. */
export interface ILLM {
  chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse>;
}

/** Drain a response into its full text, whether or not it was streamed. */
export async function collectText(response: ChatResponse): Promise<string> {
  if (!response.stream) return response.text;
  const parts: string[] = [];
  for await (const token of response.stream) parts.push(token);
  return parts.join("");
}
