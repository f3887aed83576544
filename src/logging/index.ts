/**
 * Structured logging for the voice agent and its memory pipeline.
 * JSON output for shipping; pretty output in development.
 *
 * Env:
 *   LOG_LEVEL  - debug | info | warn | error | silent (default: info; silent under Jest)
 *   LOG_FILE   - If set, append all logs to this path (creates dirs if needed).
 */

import pino from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

function resolveLevel(raw: string | undefined): LogLevel {
  const v = raw?.trim().toLowerCase();
  const known = LOG_LEVELS.find((l) => l === v);
  if (known) return known;
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

const defaultConfig: LoggerConfig = {
  level: resolveLevel(process.env.LOG_LEVEL),
  pretty: process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test",
};

export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? defaultConfig.level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pretty = config.pretty ?? defaultConfig.pretty;
  const logFile = process.env.LOG_FILE?.trim();

  const streams: pino.StreamEntry[] = [];
  if (pretty) {
    streams.push({
      stream: pino.transport({ target: "pino-pretty", options: { colorize: true } }),
    });
  } else {
    streams.push({ stream: process.stdout });
  }
  if (logFile) {
    streams.push({
      stream: pino.destination({ dest: logFile, append: true, mkdir: true }),
    });
  }

  if (streams.length === 1) {
    return pino(opts, streams[0].stream);
  }
  return pino(opts, pino.multistream(streams));
}

export const logger = createLogger();

/** Log an LLM call (summary only, no content). */
export function logLlmCall(log: pino.Logger, messageCount: number, responseLength: number, durationMs?: number): void {
  log.info({ event: "LLM_CALL", messageCount, responseLength, durationMs }, "LLM completed");
}

/** Log a conversation turn handed to the memory pipeline (length only; transcripts may hold PII). */
export function logTurn(log: pino.Logger, role: "user" | "assistant", textLength: number): void {
  log.debug({ event: "TURN", role, textLength }, role === "user" ? "User turn" : "Assistant turn");
}

/** Log error. */
export function logError(log: pino.Logger, err: Error, context?: Record<string, unknown>): void {
  log.error({ err: err.message, stack: err.stack, ...context }, "Error");
}
