/**
 * Conversation driver: text in, reply out.
 *
 * Stands in for the speech loop. Each turn reads the live session's instructions at
 * message-building time, calls the LLM, and reports both turns through onTurn so the memory
 * pipeline can pick them up. Nothing here waits on memory.
 */

import type { ILLM, Message } from "../adapters/llm";
import { collectText } from "../adapters/llm";
import type { ILiveSession } from "./live-session";
import type { ISessionTranscript } from "./transcript";
import type { ConversationTurn } from "../memory/types";
import { PromptManager } from "../prompts/prompt-manager";
import { logger, logLlmCall, logTurn } from "../logging";
import { describeError } from "../memory/errors";

const DEFAULT_LLM_TIMEOUT_MS = 25_000;

export const LLM_FALLBACK_REPLY = "Sorry, I'm having trouble responding right now. Please try again in a moment.";

function withTimeout<T>(p: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
    p.then(
      (v) => {
        clearTimeout(timer);
        resolve(v);
      },
      (e: unknown) => {
        clearTimeout(timer);
        reject(e);
      }
    );
  });
}

export interface ConversationCallbacks {
  /** Every recorded turn, user and assistant, in order. */
  onTurn?(turn: ConversationTurn): void;
  onReply?(text: string): void;
}

export interface ConversationDriverConfig {
  /** Instruction used for greet(); empty = greet() does nothing. */
  greetingInstruction?: string;
  timeouts?: { llmMs?: number };
  maxTokens?: number;
  promptManager?: PromptManager;
}

export class ConversationDriver {
  private readonly promptManager: PromptManager;
  private readonly llmTimeoutMs: number;
  private readonly maxTokens: number;
  /** Serializes turns so history stays in order. */
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly llm: ILLM,
    private readonly session: ILiveSession,
    private readonly transcript: ISessionTranscript,
    private readonly config: ConversationDriverConfig = {},
    private readonly callbacks: ConversationCallbacks = {}
  ) {
    this.promptManager = config.promptManager ?? new PromptManager();
    this.llmTimeoutMs = config.timeouts?.llmMs ?? DEFAULT_LLM_TIMEOUT_MS;
    this.maxTokens = config.maxTokens ?? 150;
  }

  /** Handle one user utterance. Resolves with the reply, or null for blank input. */
  handleUserText(text: string): Promise<string | null> {
    return this.enqueue(() => this.reply(text));
  }

  /** Opening reply, if a greeting instruction is configured. The instruction itself is not recorded. */
  greet(): Promise<string | null> {
    return this.enqueue(() => this.greeting());
  }

  /** Resolves once every queued turn, including ones queued while waiting, has finished. */
  async idle(): Promise<void> {
    let current = this.queue;
    await current;
    while (current !== this.queue) {
      current = this.queue;
      await current;
    }
  }

  private enqueue<T>(job: () => Promise<T>): Promise<T> {
    const next = this.queue.then(job, job);
    this.queue = next.catch(() => undefined);
    return next;
  }

  private async reply(text: string): Promise<string | null> {
    const userTurn = this.transcript.append("user", text);
    if (!userTurn) return null;
    this.emitTurn(userTurn);

    const messages = this.promptManager.buildMessages({
      mode: "reply",
      instructions: this.session.instructions,
      snapshot: this.transcript.getSnapshot(),
    });
    return this.respond(messages, "LLM");
  }

  private async greeting(): Promise<string | null> {
    const task = (this.config.greetingInstruction || "").trim();
    if (!task) return null;
    const messages = this.promptManager.buildMessages({
      mode: "greeting",
      instructions: this.session.instructions,
      snapshot: this.transcript.getSnapshot(),
      greetingInstruction: task,
    });
    return this.respond(messages, "LLM(greeting)");
  }

  private async respond(messages: Message[], label: string): Promise<string> {
    const started = Date.now();
    let fullText: string;
    try {
      const reply = this.llm.chat(messages, { stream: true, maxTokens: this.maxTokens }).then(collectText);
      fullText = (await withTimeout(reply, this.llmTimeoutMs, label)).trim();
    } catch (err) {
      logger.warn({ event: "LLM_FAILED", label, err: describeError(err) }, "LLM failed");
      this.callbacks.onReply?.(LLM_FALLBACK_REPLY);
      return LLM_FALLBACK_REPLY;
    }
    logLlmCall(logger, messages.length, fullText.length, Date.now() - started);

    const assistantTurn = this.transcript.append("assistant", fullText);
    if (assistantTurn) this.emitTurn(assistantTurn);
    this.callbacks.onReply?.(fullText);
    return fullText;
  }

  private emitTurn(turn: ConversationTurn): void {
    logTurn(logger, turn.role, turn.text.length);
    try {
      this.callbacks.onTurn?.(turn);
    } catch (err) {
      logger.error({ event: "TURN_CALLBACK_FAILED", role: turn.role, err: describeError(err) }, "onTurn callback threw");
    }
  }
}

/**
 * End a session: let the driver finish the turns it has queued, so their user and assistant
 * turns reach the memory pipeline, then close the pipeline.
 */
export async function closeConversation(driver: ConversationDriver, memory: { onClose(): Promise<void> } | null): Promise<void> {
  await driver.idle();
  await memory?.onClose();
}
