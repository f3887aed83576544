/**
 * End-to-end test of the memory pipeline over HTTP.
 * A local server on a random port plays the memory service; the conversation runs through the
 * text driver with a stub LLM.
 */

import * as http from "http";
import { MemoryClient } from "../../src/memory/client";
import { MemoryCoordinator } from "../../src/memory/coordinator";
import { LiveSession } from "../../src/session/live-session";
import { SessionTranscript } from "../../src/session/transcript";
import { ConversationDriver } from "../../src/session/conversation";
import { StubLLM } from "../../src/adapters/llm";

const BASE = "You are a helpful voice AI assistant.";

interface Received {
  method: string;
  url: string;
  authorization?: string;
  body?: unknown;
}

let server: http.Server;
let baseUrl: string;
const received: Received[] = [];
let statusReplies: string[] = [];

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (c: Buffer) => chunks.push(c));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });
}

function send(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

beforeAll((done) => {
  server = http.createServer((req, res) => {
    readBody(req).then(
      (raw) => {
        const url = req.url ?? "";
        received.push({
          method: req.method ?? "",
          url,
          authorization: req.headers.authorization,
          body: raw ? JSON.parse(raw) : undefined,
        });
        if (req.method === "POST" && url === "/memorize") return send(res, 200, { taskId: "T1" });
        if (req.method === "GET" && url === "/status/T1") return send(res, 200, { state: statusReplies.shift() ?? "completed" });
        if (req.method === "GET" && url.startsWith("/default-categories")) {
          return send(res, 200, {
            categories: [
              { name: "preferences", summary: "Prefers short answers." },
              { name: "goals", summary: null },
            ],
          });
        }
        send(res, 404, { error: "not found" });
      },
      () => send(res, 400, { error: "bad request" })
    );
  });
  server.listen(0, "127.0.0.1", () => {
    const addr = server.address();
    const port = typeof addr === "object" && addr ? addr.port : 0;
    baseUrl = `http://127.0.0.1:${port}`;
    done();
  });
});

afterAll((done) => {
  server.closeAllConnections();
  server.close(done);
});

beforeEach(() => {
  received.length = 0;
  statusReplies = [];
});

describe("memory pipeline over HTTP", () => {
  it("refreshes the live prompt from a four-turn conversation", async () => {
    statusReplies = ["pending", "pending", "completed"];
    const llm = new StubLLM("Got it.");
    const session = new LiveSession({ sessionId: "s1", initialInstructions: BASE });
    const coordinator = new MemoryCoordinator(new MemoryClient({ baseUrl, apiKey: "test-secret" }), session, {
      userId: "user-1",
      agentId: "agent-1",
      baseInstructions: BASE,
      flushThreshold: 4,
      tracker: { pollIntervalMs: 5, jitterMs: 0, maxPollAttempts: 10 },
      closeGraceMs: 1000,
    });
    const driver = new ConversationDriver(llm, session, new SessionTranscript({ maxTurns: 20 }), {}, {
      onTurn: (t) => coordinator.onTurn(t),
    });

    await driver.handleUserText("Hi, I'm planning a trip.");
    await driver.handleUserText("Keep it short please.");
    await coordinator.whenIdle();

    const expected = `${BASE}\n\nHere's what you know about the user:\n\n**preferences:** Prefers short answers.`;
    expect(session.instructions).toBe(expected);
    expect(session.version).toBe(1);

    expect(received.map((r) => `${r.method} ${r.url}`)).toEqual([
      "POST /memorize",
      "GET /status/T1",
      "GET /status/T1",
      "GET /status/T1",
      "GET /default-categories?userId=user-1&agentId=agent-1",
    ]);
    expect(received[0].authorization).toBe("Bearer test-secret");
    expect(received[0].body).toEqual({
      userId: "user-1",
      agentId: "agent-1",
      conversation: [
        { role: "user", text: "Hi, I'm planning a trip." },
        { role: "assistant", text: "Got it." },
        { role: "user", text: "Keep it short please." },
        { role: "assistant", text: "Got it." },
      ],
    });

    await driver.handleUserText("Where should I go?");
    expect(llm.calls[2][0]).toEqual({ role: "system", content: expected });

    await coordinator.onClose();
  });

  it("keeps the base prompt when the service rejects the submission", async () => {
    const session = new LiveSession({ sessionId: "s2", initialInstructions: BASE });
    const coordinator = new MemoryCoordinator(new MemoryClient({ baseUrl: `${baseUrl}/missing` }), session, {
      userId: "user-1",
      agentId: "agent-1",
      baseInstructions: BASE,
      flushThreshold: 2,
      tracker: { pollIntervalMs: 5, jitterMs: 0, maxPollAttempts: 10 },
      closeGraceMs: 1000,
    });

    coordinator.onTurn({ role: "user", text: "hello", timestamp: 1 });
    coordinator.onTurn({ role: "assistant", text: "hi", timestamp: 2 });
    await coordinator.whenIdle();

    expect(received.map((r) => `${r.method} ${r.url}`)).toEqual(["POST /missing/memorize"]);
    expect(session.instructions).toBe(BASE);
    expect(coordinator.getInFlightTasks()).toEqual([]);
  });
});
