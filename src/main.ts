/**
 * Entry point: load config, open a live session, wire the memory pipeline, and run a text
 * conversation over stdin/stdout. Memory stays off unless MEMORY_API_URL is set.
 */

import * as readline from "readline";
import { randomUUID } from "crypto";
import { loadConfig } from "./config";
import { createLLM } from "./adapters/llm";
import { LiveSession } from "./session/live-session";
import { SessionTranscript } from "./session/transcript";
import { ConversationDriver, closeConversation } from "./session/conversation";
import { createMemoryClient, createMemoryCoordinator, type MemoryCoordinator } from "./memory";
import { logger, logError } from "./logging";
import { describeError } from "./memory/errors";

async function main(): Promise<void> {
  const config = loadConfig();
  const llm = createLLM(config);
  const session = new LiveSession({
    sessionId: randomUUID(),
    initialInstructions: config.agent.baseInstructions,
    onInstructionsChanged: (change) =>
      logger.debug({ event: "INSTRUCTIONS_CHANGED", version: change.version, chars: change.current.length }, "Instructions replaced"),
  });
  const transcript = new SessionTranscript({ maxTurns: config.agent.maxTurnsInTranscript });

  const memoryClient = createMemoryClient(config);
  let coordinator: MemoryCoordinator | null = null;
  if (memoryClient) {
    coordinator = createMemoryCoordinator(config, memoryClient, session);
    await coordinator.loadInitialMemories();
  } else {
    logger.info({ event: "MEMORY_DISABLED" }, "MEMORY_API_URL not set; running without memory");
  }
  const memory = coordinator;

  const driver = new ConversationDriver(
    llm,
    session,
    transcript,
    { greetingInstruction: config.agent.greetingInstruction, timeouts: { llmMs: config.llm.timeoutMs } },
    {
      onTurn: (turn) => memory?.onTurn(turn),
      onReply: (text) => {
        if (text) process.stdout.write(`assistant> ${text}\n`);
      },
    }
  );

  logger.info({ event: "SESSION_STARTED", sessionId: session.sessionId, provider: config.llm.provider, memory: memory !== null }, "Session started");
  await driver.greet();

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: "you> " });
  let shuttingDown: Promise<void> | null = null;
  const shutdown = (reason: string): Promise<void> => {
    if (!shuttingDown) {
      shuttingDown = (async () => {
        logger.info({ event: "SESSION_CLOSING", reason }, "Closing session");
        await closeConversation(driver, memory);
      })();
    }
    return shuttingDown;
  };

  rl.on("line", (line) => {
    driver
      .handleUserText(line)
      .then(() => rl.prompt())
      .catch((err: unknown) => logger.error({ event: "TURN_FAILED", err: describeError(err) }, "Turn failed"));
  });
  rl.on("close", () => {
    shutdown("stdin_closed").then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ event: "SHUTDOWN_FAILED", err: describeError(err) }, "Shutdown failed");
        process.exit(1);
      }
    );
  });
  // readline swallows SIGINT on a TTY; outside one the process signal arrives instead.
  rl.on("SIGINT", () => rl.close());
  process.on("SIGINT", () => rl.close());
  rl.prompt();
}

main().catch((err: unknown) => {
  logError(logger, err instanceof Error ? err : new Error(String(err)));
  process.exit(1);
});
