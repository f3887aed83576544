/**
 * Unit tests for the memory error taxonomy.
 */

import { z } from "zod";
import {
  CompositionError,
  MemoryPipelineError,
  ServiceError,
  TimeoutError,
  TransportError,
  describeError,
  toMemoryError,
} from "../../../src/memory/errors";

describe("memory errors", () => {
  it("carries a code per class", () => {
    expect(new TransportError("x").code).toBe("TRANSPORT");
    expect(new ServiceError("x").code).toBe("SERVICE");
    expect(new TimeoutError("x").code).toBe("TIMEOUT");
    expect(new CompositionError("x").code).toBe("COMPOSITION");
  });

  it("ServiceError folds the status into details", () => {
    const err = new ServiceError("Memory service responded 503", 503, { path: "/memorize" });
    expect(err.status).toBe(503);
    expect(err.toJSON()).toEqual({
      code: "SERVICE",
      message: "Memory service responded 503",
      details: { status: 503, path: "/memorize" },
    });
  });

  it("toJSON omits details when there are none", () => {
    expect(new TimeoutError("late").toJSON()).toEqual({ code: "TIMEOUT", message: "late" });
  });

  it("subclasses are MemoryPipelineError and Error", () => {
    const err = new TransportError("down");
    expect(err).toBeInstanceOf(MemoryPipelineError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("TransportError");
  });

  describe("toMemoryError", () => {
    it("passes pipeline errors through", () => {
      const err = new ServiceError("bad", 500);
      expect(toMemoryError(err)).toBe(err);
    });

    it("maps zod errors to ServiceError", () => {
      const parsed = z.object({ taskId: z.string() }).safeParse({});
      expect(parsed.success).toBe(false);
      if (parsed.success) return;
      const err = toMemoryError(parsed.error);
      expect(err).toBeInstanceOf(ServiceError);
      expect(err.message).toBe("Unexpected response shape");
    });

    it("maps plain errors to TransportError", () => {
      const err = toMemoryError(new TypeError("fetch failed"));
      expect(err).toBeInstanceOf(TransportError);
      expect(err.message).toBe("fetch failed");
      expect(err.details).toEqual({ name: "TypeError" });
    });

    it("maps non-errors to TransportError", () => {
      const err = toMemoryError(42);
      expect(err).toBeInstanceOf(TransportError);
      expect(err.details).toEqual({ err: "42" });
    });
  });

  it("describeError reads messages and stringifies the rest", () => {
    expect(describeError(new Error("boom"))).toBe("boom");
    expect(describeError("plain")).toBe("plain");
  });
});
