/**
 * Error taxonomy for the memory pipeline.
 * Every error raised between the turn buffer and the prompt swap is one of these,
 * so the coordinator can log it with context and keep the conversation going.
 */

import { ZodError } from "zod";

export type MemoryErrorCode = "TRANSPORT" | "SERVICE" | "TIMEOUT" | "COMPOSITION";

export class MemoryPipelineError extends Error {
  readonly code: MemoryErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: MemoryErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "MemoryPipelineError";
    this.code = code;
    this.details = details;
  }

  toJSON(): { code: MemoryErrorCode; message: string; details?: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details !== undefined && { details: this.details }),
    };
  }
}

/** Network failure or request timeout talking to the memory service. Always recoverable. */
export class TransportError extends MemoryPipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("TRANSPORT", message, details);
    this.name = "TransportError";
  }
}

/** Non-success response, or a body the adapter cannot make sense of. */
export class ServiceError extends MemoryPipelineError {
  readonly status?: number;

  constructor(message: string, status?: number, details?: Record<string, unknown>) {
    super("SERVICE", message, status !== undefined ? { status, ...details } : details);
    this.name = "ServiceError";
    this.status = status;
  }
}

/** A tracker ran out of attempts or wall-clock time (or was abandoned on close). */
export class TimeoutError extends MemoryPipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("TIMEOUT", message, details);
    this.name = "TimeoutError";
  }
}

/** A category entry that cannot be normalized. Treated as "no summary" for that entry. */
export class CompositionError extends MemoryPipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("COMPOSITION", message, details);
    this.name = "CompositionError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toMemoryError(err: unknown): MemoryPipelineError {
  if (err instanceof MemoryPipelineError) return err;
  if (err instanceof ZodError) {
    return new ServiceError("Unexpected response shape", undefined, { issues: err.issues });
  }
  if (err instanceof Error) {
    return new TransportError(err.message, { name: err.name });
  }
  return new TransportError("Unknown error", { err: String(err) });
}
