#!/usr/bin/env node
/**
 * tasker — a terminal agent that answers requests by calling MCP tools.
 *
 * Starts the built-in tool servers and any configured stdio servers, then
 * reads requests line by line and prints each turn's events as plain text.
 */

import { createInterface } from "node:readline";
import { Logger } from "./logger.js";
import { Agent } from "./agent.js";
import { McpManager } from "./mcp/index.js";
import { attachNativeServers } from "./servers/index.js";
import { createCompletionClient } from "./drivers/index.js";
import { buildSystemPrompt } from "./prompts.js";
import { loadConfig, usage } from "./cli/config.js";
import { InterruptTracker, renderEvent } from "./cli/repl.js";
import { asError, errorLogFields, isAbortError, isTaskerError, taskerError } from "./errors.js";
import { getVersion } from "./version.js";
import type { TaskerConfig } from "./types.js";

async function bootstrap(cfg: TaskerConfig): Promise<{ agent: Agent; mcp: McpManager }> {
  const mcp = new McpManager();
  await attachNativeServers(mcp, { workingDirectory: cfg.workingDirectory, enabled: cfg.nativeServers });
  await mcp.connectAll(cfg.mcpServers);

  const systemPrompt = buildSystemPrompt({
    workingDirectory: cfg.workingDirectory,
    mcpInstructions: mcp.instructions(),
  });

  const { llm } = cfg.agent;
  const { client, model } = createCompletionClient(llm);
  const agent = new Agent({
    completion: client,
    tools: mcp,
    model,
    systemPrompt,
    maxSteps: cfg.agent.maxSteps,
    toolTimeoutMs: cfg.agent.toolTimeoutMs,
    strictTools: cfg.agent.strictTools,
    generation: {
      temperature: llm.temperature,
      maxTokens: llm.maxTokens,
      contextWindow: llm.numCtx ?? undefined,
    },
  });
  return { agent, mcp };
}

async function interactive(cfg: TaskerConfig, agent: Agent, mcp: McpManager): Promise<void> {
  // terminal mode must follow stdin; a terminal stderr with piped stdin would echo twice
  const isTerminal = !!(process.stdin.isTTY && typeof process.stdin.setRawMode === "function");
  const rl = createInterface({
    input: process.stdin,
    output: process.stderr,
    terminal: isTerminal,
    prompt: "you > ",
  });

  if (Logger.isVerbose()) {
    const tools = await mcp.listTools();
    Logger.info(`tasker ${getVersion()} — ${cfg.agent.llm.modelId}, ${tools.length} tool(s)`);
  }
  Logger.info("type 'exit' or Ctrl+D to quit\n");

  const interrupts = new InterruptTracker();
  let turnAbort: AbortController | null = null;
  let queue: Promise<void> = Promise.resolve();
  let closing = false;

  const write = (line: string) => process.stdout.write(line + "\n");

  async function runTurn(input: string): Promise<void> {
    const controller = new AbortController();
    turnAbort = controller;
    try {
      for await (const event of agent.turn(input, { signal: controller.signal })) {
        for (const line of renderEvent(event)) write(line);
      }
      if (controller.signal.aborted) write("(turn cancelled)");
    } catch (e: unknown) {
      if (controller.signal.aborted && isAbortError(e)) {
        write("(turn cancelled)");
      } else {
        const te = isTaskerError(e) ? e : taskerError("completion_error", asError(e).message, { cause: e });
        Logger.error(`error: ${te.message}`, errorLogFields(te));
      }
    } finally {
      turnAbort = null;
    }
  }

  async function handleLine(line: string): Promise<void> {
    if (closing) return;
    const input = line.trim();
    if (input === "exit" || input === "quit") {
      rl.close();
      return;
    }
    if (input) {
      interrupts.reset();
      await runTurn(input);
      write("");
    }
    if (!closing) rl.prompt();
  }

  const onInterrupt = () => {
    const action = interrupts.press(turnAbort !== null);
    switch (action) {
      case "quit":
        turnAbort?.abort();
        rl.close();
        return;
      case "cancel_turn":
        process.stderr.write("\n[Ctrl+C] cancelling turn (press again to quit)\n");
        turnAbort?.abort();
        return;
      case "arm":
        process.stderr.write("\n(press Ctrl+C again to quit)\n");
        rl.prompt();
        return;
    }
  };

  rl.on("SIGINT", onInterrupt);
  process.on("SIGINT", onInterrupt);

  rl.on("line", (line: string) => {
    queue = queue.then(() => handleLine(line));
  });

  rl.on("error", (e: Error) => {
    Logger.error(`readline error: ${e.message}`);
  });

  await new Promise<void>((resolveClosed) => {
    rl.on("close", () => {
      closing = true;
      resolveClosed();
    });
    rl.prompt();
  });

  await queue;
  await mcp.disconnectAll();
  Logger.info("\ngoodbye.");
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const cmd = loadConfig(argv);
  switch (cmd.kind) {
    case "help":
      Logger.info(usage());
      return;
    case "version":
      Logger.info(`tasker ${getVersion()}`);
      return;
    case "run":
      break;
  }

  const cfg = cmd.config;
  Logger.setVerbose(cfg.verbose);

  const { agent, mcp } = await bootstrap(cfg);
  await interactive(cfg, agent, mcp);
}

process.on("unhandledRejection", (reason: unknown) => {
  const err = asError(reason);
  Logger.error(`unhandled rejection: ${err.message}`);
  if (err.stack) Logger.error(err.stack);
});

main()
  .then(() => process.exit(0))
  .catch((e: unknown) => {
    if (isTaskerError(e)) {
      Logger.error("tasker:", e.message, errorLogFields(e));
    } else {
      const err = asError(e);
      Logger.error("tasker:", err.message);
      if (err.stack) Logger.error(err.stack);
    }
    process.exit(1);
  });
