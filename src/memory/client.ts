/**
 * HTTP client for the memory summarization service.
 * Submits conversation batches, polls job status, and retrieves default category summaries.
 *
 * Endpoints (relative to baseUrl):
 *   POST /memorize                               { userId, agentId, conversation: [{ role, text }] } -> { taskId }
 *   GET  /status/{taskId}                        -> { state: "pending" | "completed" | "failed" }
 *   GET  /default-categories?userId=&agentId=    -> { categories: [...] } | [...]
 */

import { z } from "zod";
import type { CategorySummary, ConversationTurn, IMemoryClient, RemoteTaskState, SubmitOptions } from "./types";
import { CompositionError, ServiceError, TransportError, describeError } from "./errors";
import { logger } from "../logging";

export interface MemoryClientConfig {
  baseUrl: string;
  /** Sent as a bearer token when set. */
  apiKey?: string;
  /** Per-request timeout (ms). */
  requestTimeoutMs?: number;
}

const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

/** Service state names, including the job-queue spellings some deployments report. */
const STATE_ALIASES = new Map<string, RemoteTaskState>([
  ["pending", "pending"],
  ["started", "pending"],
  ["processing", "pending"],
  ["retry", "pending"],
  ["completed", "completed"],
  ["success", "completed"],
  ["failed", "failed"],
  ["failure", "failed"],
  ["revoked", "failed"],
]);

const SubmitResponseSchema = z
  .object({
    taskId: z.string().min(1).optional(),
    task_id: z.string().min(1).optional(),
  })
  .transform((r) => r.taskId ?? r.task_id)
  .pipe(z.string({ required_error: "taskId missing from response" }));

const StatusResponseSchema = z
  .object({
    state: z.string().optional(),
    status: z.string().optional(),
  })
  .transform((r) => r.state ?? r.status)
  .pipe(z.string({ required_error: "state missing from response" }));

const CategoriesResponseSchema = z.union([
  z.object({ categories: z.array(z.unknown()) }).transform((r) => r.categories),
  z.array(z.unknown()),
]);

/** Key/value encoding: [["name", "prefs"], ["summary", "..."]] or [{ key: "name", value: "prefs" }, ...]. */
const KeyValueCategorySchema = z.array(
  z.union([z.tuple([z.string(), z.unknown()]), z.object({ key: z.string(), value: z.unknown() })])
);

/** Structured encoding: { name: "prefs", summary: "...", ...extra }. */
const StructuredCategorySchema = z.record(z.string(), z.unknown());

function toFieldMap(raw: unknown): Map<string, unknown> | null {
  const kv = KeyValueCategorySchema.safeParse(raw);
  if (kv.success) {
    return new Map(kv.data.map((entry): [string, unknown] => (Array.isArray(entry) ? [entry[0], entry[1]] : [entry.key, entry.value])));
  }
  const structured = StructuredCategorySchema.safeParse(raw);
  if (structured.success) return new Map(Object.entries(structured.data));
  return null;
}

/**
 * Normalize one category, whichever encoding the service used.
 * Throws CompositionError when no name can be read; a non-string summary becomes "no summary".
 */
export function normalizeCategory(raw: unknown): CategorySummary {
  const fields = toFieldMap(raw);
  if (!fields) throw new CompositionError("Unrecognized category encoding", { type: typeof raw });
  const name = fields.get("name");
  if (typeof name !== "string" || !name.trim()) {
    throw new CompositionError("Category has no name", { keys: [...fields.keys()] });
  }
  const summary = fields.get("summary");
  return Object.freeze({
    categoryName: name.trim(),
    summaryText: typeof summary === "string" ? summary : undefined,
  });
}

/** Map a service state string to the three states the tracker understands. */
export function normalizeState(raw: string): RemoteTaskState {
  const state = STATE_ALIASES.get(raw.trim().toLowerCase());
  if (!state) throw new ServiceError(`Unknown task state "${raw}"`);
  return state;
}

export class MemoryClient implements IMemoryClient {
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly requestTimeoutMs: number;

  constructor(config: MemoryClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.apiKey = config.apiKey;
    this.requestTimeoutMs = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  /** POST /memorize: start a summarization job for this batch; resolves with its task id. */
  async submit(userId: string, agentId: string, turns: readonly ConversationTurn[], options: SubmitOptions = {}): Promise<string> {
    if (turns.length === 0) throw new RangeError("Cannot submit an empty conversation");
    const body: Record<string, unknown> = {
      userId,
      agentId,
      conversation: turns.map((t) => ({ role: t.role, text: t.text })),
    };
    if (options.userName) body.userName = options.userName;
    if (options.agentName) body.agentName = options.agentName;

    const data = await this.request("/memorize", body);
    return this.parse(SubmitResponseSchema, data, "/memorize");
  }

  /** GET /status/{taskId}. Safe to call repeatedly. */
  async status(taskId: string): Promise<RemoteTaskState> {
    const path = `/status/${encodeURIComponent(taskId)}`;
    const data = await this.request(path);
    return normalizeState(this.parse(StatusResponseSchema, data, path));
  }

  /** GET /default-categories. Malformed entries are logged and dropped. */
  async retrieveDefaultCategories(userId: string, agentId: string): Promise<CategorySummary[]> {
    const path = `/default-categories?userId=${encodeURIComponent(userId)}&agentId=${encodeURIComponent(agentId)}`;
    const data = await this.request(path);
    const entries = this.parse(CategoriesResponseSchema, data, "/default-categories");
    const categories: CategorySummary[] = [];
    entries.forEach((entry, index) => {
      try {
        categories.push(normalizeCategory(entry));
      } catch (err) {
        if (!(err instanceof CompositionError)) throw err;
        logger.warn(
          { event: "MEMORY_CATEGORY_MALFORMED", userId, agentId, index, err: err.message, details: err.details },
          "Skipping category that cannot be normalized"
        );
      }
    });
    return categories;
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, path: string): T {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new ServiceError(`Unexpected response from ${path}`, undefined, { issues: result.error.issues });
    }
    return result.data;
  }

  /** GET when body is undefined, otherwise POST it as JSON. */
  private async request(path: string, body?: Record<string, unknown>): Promise<unknown> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;
    if (body !== undefined) headers["Content-Type"] = "application/json";

    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}${path}`, {
        method: body !== undefined ? "POST" : "GET",
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (err) {
      throw new TransportError(`Memory service request failed: ${describeError(err)}`, { path });
    }
    if (!res.ok) {
      throw new ServiceError(`Memory service responded ${res.status} ${res.statusText}`.trim(), res.status, { path });
    }
    try {
      return await res.json();
    } catch (err) {
      throw new ServiceError(`Malformed JSON from ${path}: ${describeError(err)}`, res.status, { path });
    }
  }
}
