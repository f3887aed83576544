/**
 * In-process stand-in for the memory service, scripted per task.
 */

import type { CategorySummary, ConversationTurn, IMemoryClient, RemoteTaskState, SubmitOptions } from "../../src/memory/types";

export type StatusStep = RemoteTaskState | Error | (() => Promise<RemoteTaskState>);

export interface SubmitCall {
  userId: string;
  agentId: string;
  turns: ConversationTurn[];
  options?: SubmitOptions;
}

export class FakeMemoryClient implements IMemoryClient {
  readonly submits: SubmitCall[] = [];
  readonly statusCalls: string[] = [];
  retrieveCalls = 0;

  /** Errors to throw from upcoming submits, in order (undefined = succeed). */
  submitErrors: Array<Error | undefined> = [];
  /** Scripted status replies per task; the last step repeats once the script runs out. */
  statusScripts = new Map<string, StatusStep[]>();
  /** What retrieveDefaultCategories returns, or throws when an Error. */
  categories: CategorySummary[] | Error | (() => CategorySummary[]) = [];

  private nextTask = 1;

  async submit(userId: string, agentId: string, turns: readonly ConversationTurn[], options?: SubmitOptions): Promise<string> {
    this.submits.push({ userId, agentId, turns: [...turns], options });
    const error = this.submitErrors.shift();
    if (error) throw error;
    return `task-${this.nextTask++}`;
  }

  async status(taskId: string): Promise<RemoteTaskState> {
    this.statusCalls.push(taskId);
    const script = this.statusScripts.get(taskId) ?? [];
    const step = script.length > 1 ? script.shift() : script[0];
    if (step === undefined) return "pending";
    if (step instanceof Error) throw step;
    if (typeof step === "function") return step();
    return step;
  }

  async retrieveDefaultCategories(_userId: string, _agentId: string): Promise<CategorySummary[]> {
    this.retrieveCalls++;
    if (this.categories instanceof Error) throw this.categories;
    if (typeof this.categories === "function") return this.categories();
    return this.categories;
  }

  /** All turn texts submitted so far, in submission order. */
  submittedTexts(): string[] {
    return this.submits.flatMap((s) => s.turns.map((t) => t.text));
  }
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function turn(role: "user" | "assistant", text: string, timestamp = 0): ConversationTurn {
  return Object.freeze({ role, text, timestamp });
}

/** Let pending promise callbacks and short timers run. */
export function flushAsync(ms = 0): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Poll until the condition holds; fails the test after timeoutMs. */
export async function waitFor(condition: () => boolean, timeoutMs = 1000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error("waitFor: condition not met in time");
    await flushAsync(1);
  }
}
