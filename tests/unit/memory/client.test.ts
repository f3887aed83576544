/**
 * Unit tests for the memory service client (fetch is stubbed).
 */

import { MemoryClient, normalizeCategory, normalizeState } from "../../../src/memory/client";
import { CompositionError, ServiceError, TransportError } from "../../../src/memory/errors";
import { turn } from "../../helpers/fake-memory-client";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

describe("MemoryClient", () => {
  const client = new MemoryClient({ baseUrl: "http://memory.test/", apiKey: "test-secret", requestTimeoutMs: 1000 });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("submit", () => {
    it("POSTs the conversation and returns the task id", async () => {
      const fetchSpy = jest.spyOn(globalThis, "fetch").mockResolvedValue(jsonResponse({ taskId: "T1" }));
      const taskId = await client.submit("u1", "a1", [turn("user", "hi"), turn("assistant", "hello")], { userName: "Sam" });

      expect(taskId).toBe("T1");
      expect(fetchSpy).toHaveBeenCalledTimes(1);
      const [url, init] = fetchSpy.mock.calls[0];
      expect(url).toBe("http://memory.test/memorize");
      expect(init?.method).toBe("POST");
      expect(init?.headers).toEqual({
        Accept: "application/json",
        Authorization: "Bearer test-secret",
        "Content-Type": "application/json",
      });
      expect(JSON.parse(String(init?.body))).toEqual({
        userId: "u1",
        agentId: "a1",
        conversation: [
          { role: "user", text: "hi" },
          { role: "assistant", text: "hello" },
        ],
        userName: "Sam",
      });
    });

    it("accepts task_id", async () => {
      jest.spyOn(globalThis, "fetch").mockResolvedValue(jsonResponse({ task_id: "T9" }));
      await expect(client.submit("u1", "a1", [turn("user", "hi")])).resolves.toBe("T9");
    });

    it("rejects a response without a task id", async () => {
      jest.spyOn(globalThis, "fetch").mockResolvedValue(jsonResponse({ ok: true }));
      await expect(client.submit("u1", "a1", [turn("user", "hi")])).rejects.toThrow("Unexpected response from /memorize");
    });

    it("maps auth rejection to ServiceError with the status", async () => {
      jest.spyOn(globalThis, "fetch").mockResolvedValue(jsonResponse({ error: "nope" }, 401));
      const err = await client.submit("u1", "a1", [turn("user", "hi")]).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ServiceError);
      expect(err instanceof ServiceError && err.status).toBe(401);
      expect(err instanceof ServiceError && err.message).toBe("Memory service responded 401");
    });

    it("maps network failure to TransportError", async () => {
      jest.spyOn(globalThis, "fetch").mockRejectedValue(new TypeError("fetch failed"));
      const err = await client.submit("u1", "a1", [turn("user", "hi")]).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(TransportError);
      expect(err instanceof Error && err.message).toBe("Memory service request failed: fetch failed");
    });

    it("maps an unparseable body to ServiceError", async () => {
      jest.spyOn(globalThis, "fetch").mockResolvedValue(new Response("not json", { status: 200 }));
      await expect(client.submit("u1", "a1", [turn("user", "hi")])).rejects.toBeInstanceOf(ServiceError);
    });

    it("refuses an empty conversation without calling the service", async () => {
      const fetchSpy = jest.spyOn(globalThis, "fetch");
      await expect(client.submit("u1", "a1", [])).rejects.toThrow(RangeError);
      expect(fetchSpy).not.toHaveBeenCalled();
    });
  });

  describe("status", () => {
    it("GETs the status path with the task id encoded", async () => {
      const fetchSpy = jest.spyOn(globalThis, "fetch").mockResolvedValue(jsonResponse({ state: "pending" }));
      await expect(client.status("a/b")).resolves.toBe("pending");
      const [url, init] = fetchSpy.mock.calls[0];
      expect(url).toBe("http://memory.test/status/a%2Fb");
      expect(init?.method).toBe("GET");
      expect(init?.body).toBeUndefined();
    });

    it("understands job-queue state names under a status key", async () => {
      jest.spyOn(globalThis, "fetch").mockResolvedValue(jsonResponse({ status: "SUCCESS" }));
      await expect(client.status("T1")).resolves.toBe("completed");
    });

    it("rejects unknown states", async () => {
      jest.spyOn(globalThis, "fetch").mockResolvedValue(jsonResponse({ state: "exploded" }));
      await expect(client.status("T1")).rejects.toThrow('Unknown task state "exploded"');
    });
  });

  describe("retrieveDefaultCategories", () => {
    it("normalizes every encoding and drops malformed entries", async () => {
      const fetchSpy = jest.spyOn(globalThis, "fetch").mockResolvedValue(
        jsonResponse({
          categories: [
            { name: "preferences", summary: "Likes green tea." },
            [
              ["name", "work"],
              ["summary", "Works night shifts."],
            ],
            [
              { key: "name", value: "hobbies" },
              { key: "summary", value: "Plays chess." },
            ],
            { summary: "orphan" },
            17,
            { name: "goals" },
          ],
        })
      );
      const categories = await client.retrieveDefaultCategories("u 1", "a1");
      expect(fetchSpy.mock.calls[0][0]).toBe("http://memory.test/default-categories?userId=u%201&agentId=a1");
      expect(categories).toEqual([
        { categoryName: "preferences", summaryText: "Likes green tea." },
        { categoryName: "work", summaryText: "Works night shifts." },
        { categoryName: "hobbies", summaryText: "Plays chess." },
        { categoryName: "goals", summaryText: undefined },
      ]);
    });

    it("accepts a bare array", async () => {
      jest.spyOn(globalThis, "fetch").mockResolvedValue(jsonResponse([{ name: "personal_info", summary: "Name is Sam." }]));
      await expect(client.retrieveDefaultCategories("u1", "a1")).resolves.toEqual([
        { categoryName: "personal_info", summaryText: "Name is Sam." },
      ]);
    });

    it("sends no Authorization header without an api key", async () => {
      const anonymous = new MemoryClient({ baseUrl: "http://memory.test" });
      const fetchSpy = jest.spyOn(globalThis, "fetch").mockResolvedValue(jsonResponse([]));
      await anonymous.retrieveDefaultCategories("u1", "a1");
      expect(fetchSpy.mock.calls[0][1]?.headers).toEqual({ Accept: "application/json" });
    });
  });
});

describe("normalizeCategory", () => {
  it("trims the name and keeps the summary as given", () => {
    expect(normalizeCategory({ name: "  prefs ", summary: "Likes tea" })).toEqual({ categoryName: "prefs", summaryText: "Likes tea" });
  });

  it("treats a non-string summary as absent", () => {
    expect(normalizeCategory({ name: "prefs", summary: 5 })).toEqual({ categoryName: "prefs", summaryText: undefined });
  });

  it("throws CompositionError without a name", () => {
    expect(() => normalizeCategory({ summary: "x" })).toThrow(CompositionError);
    expect(() => normalizeCategory([["summary", "x"]])).toThrow("Category has no name");
  });

  it("throws CompositionError for scalars", () => {
    expect(() => normalizeCategory("prefs")).toThrow("Unrecognized category encoding");
    expect(() => normalizeCategory(null)).toThrow(CompositionError);
  });
});

describe("normalizeState", () => {
  it.each([
    ["pending", "pending"],
    ["STARTED", "pending"],
    ["retry", "pending"],
    ["completed", "completed"],
    ["Success", "completed"],
    ["FAILURE", "failed"],
    ["revoked", "failed"],
  ])("maps %s to %s", (raw, expected) => {
    expect(normalizeState(raw)).toBe(expected);
  });

  it("does not treat object prototype keys as states", () => {
    expect(() => normalizeState("constructor")).toThrow(ServiceError);
  });
});
