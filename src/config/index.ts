/**
 * Env-based configuration for the voice agent and its memory pipeline.
 * Load from .env.local (or process.env). Do not commit secrets.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";

// Load .env.local from project root when not set
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export type LlmProvider = "openai" | "anthropic" | "stub";

const LLM_PROVIDERS: readonly LlmProvider[] = ["openai", "anthropic", "stub"];

export const DEFAULT_AGENT_INSTRUCTIONS = [
  "You are a helpful voice AI assistant.",
  "You eagerly assist users with their questions by providing information from your extensive knowledge.",
  "Your responses are concise, to the point, and without any complex formatting or punctuation including emojis, asterisks, or other symbols.",
  "You are curious, friendly, and have a sense of humor.",
].join(" ");

export const DEFAULT_GREETING_INSTRUCTION = "Greet the user and offer your assistance.";

export interface AppConfig {
  /** LLM provider and options */
  llm: {
    provider: LlmProvider;
    openaiApiKey?: string;
    /** OpenAI-compatible endpoint; unset = api.openai.com */
    openaiBaseUrl?: string;
    openaiModel?: string;
    anthropicApiKey?: string;
    anthropicModel?: string;
    /** Per-reply timeout (ms). */
    timeoutMs: number;
  };

  /** Memory service integration. Disabled unless baseUrl is set. */
  memory: {
    baseUrl?: string;
    apiKey?: string;
    userId: string;
    agentId: string;
    userName?: string;
    agentName?: string;
    /** Turns per submission. */
    flushThreshold: number;
    pollIntervalMs: number;
    /** 1 = fixed interval. */
    backoffFactor: number;
    maxPollIntervalMs: number;
    jitterMs: number;
    maxPollAttempts: number;
    maxPollDurationMs: number;
    /** How long shutdown waits for in-flight refreshes. */
    closeGraceMs: number;
    requestTimeoutMs: number;
  };

  /** Conversation behaviour */
  agent: {
    baseInstructions: string;
    /** Instruction for the opening reply. Empty = no greeting. */
    greetingInstruction: string;
    /** Max recent turns kept as LLM history. */
    maxTurnsInTranscript: number;
  };
}

function getEnv(key: string, defaultValue?: string): string | undefined {
  const v = process.env[key];
  if (v === undefined || v === "") return defaultValue;
  return v.trim();
}

function getEnvInt(key: string, defaultValue: number, min = 0): number {
  const v = getEnv(key);
  if (v === undefined) return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) || n < min ? defaultValue : n;
}

function getEnvFloat(key: string, defaultValue: number, min = 0): number {
  const v = getEnv(key);
  if (v === undefined) return defaultValue;
  const n = Number(v);
  return Number.isFinite(n) && n >= min ? n : defaultValue;
}

function isLlmProvider(v: string): v is LlmProvider {
  return LLM_PROVIDERS.some((p) => p === v);
}

function parseProvider(raw: string | undefined): LlmProvider {
  const v = (raw ?? "").toLowerCase();
  return isLlmProvider(v) ? v : "openai";
}

/**
 * Build config from environment variables.
 * LLM_PROVIDER selects the adapter; MEMORY_API_URL turns on the memory pipeline.
 */
export function loadConfig(): AppConfig {
  const llmProvider = parseProvider(getEnv("MODEL_PROVIDER") || getEnv("LLM_PROVIDER"));
  const memoryUrl = getEnv("MEMORY_API_URL");

  return {
    llm: {
      provider: llmProvider,
      openaiApiKey: getEnv("OPENAI_API_KEY"),
      openaiBaseUrl: getEnv("OPENAI_BASE_URL"),
      openaiModel: getEnv("OPENAI_MODEL_NAME") || "gpt-4o-mini",
      anthropicApiKey: getEnv("ANTHROPIC_API_KEY"),
      anthropicModel: getEnv("ANTHROPIC_MODEL_NAME") || "claude-3-5-sonnet-20241022",
      timeoutMs: getEnvInt("LLM_TIMEOUT_MS", 25_000, 1),
    },
    memory: {
      baseUrl: memoryUrl ? memoryUrl.replace(/\/+$/, "") : undefined,
      apiKey: getEnv("MEMORY_API_KEY"),
      userId: getEnv("MEMORY_USER_ID") || "default_user",
      agentId: getEnv("MEMORY_AGENT_ID") || "voice_assistant_001",
      userName: getEnv("MEMORY_USER_NAME"),
      agentName: getEnv("MEMORY_AGENT_NAME"),
      flushThreshold: getEnvInt("MEMORY_FLUSH_THRESHOLD", 4, 1),
      pollIntervalMs: getEnvInt("MEMORY_POLL_INTERVAL_MS", 2000),
      backoffFactor: getEnvFloat("MEMORY_POLL_BACKOFF", 1, 1),
      maxPollIntervalMs: getEnvInt("MEMORY_MAX_POLL_INTERVAL_MS", 30_000),
      jitterMs: getEnvInt("MEMORY_POLL_JITTER_MS", 250),
      maxPollAttempts: getEnvInt("MEMORY_MAX_POLL_ATTEMPTS", 30, 1),
      maxPollDurationMs: getEnvInt("MEMORY_MAX_POLL_DURATION_MS", 120_000, 1),
      closeGraceMs: getEnvInt("MEMORY_CLOSE_GRACE_MS", 5000),
      requestTimeoutMs: getEnvInt("MEMORY_REQUEST_TIMEOUT_MS", 10_000, 1),
    },
    agent: {
      baseInstructions: getEnv("AGENT_INSTRUCTIONS") || DEFAULT_AGENT_INSTRUCTIONS,
      /** GREETING_INSTRUCTION unset = default; set to empty string = no greeting. */
      greetingInstruction: (() => {
        const v = process.env.GREETING_INSTRUCTION;
        return v === undefined ? DEFAULT_GREETING_INSTRUCTION : v.trim();
      })(),
      maxTurnsInTranscript: getEnvInt("MAX_TURNS_IN_MEMORY", 50, 1),
    },
  };
}
