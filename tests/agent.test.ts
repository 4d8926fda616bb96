/**
 * Tests for the agent turn loop.
 *
 * Covers: the four reference conversations (text only, one tool call,
 * failing tool, exhausted step budget), history invariants, cancellation,
 * reentrancy, and completion failures.
 */

import { test, describe, before } from "node:test";
import assert from "node:assert";
import { Agent, CANCELLED_TOOL_TEXT, DEFAULT_MAX_STEPS } from "../src/agent.js";
import { isTaskerError, taskerError } from "../src/errors.js";
import { Logger } from "../src/logger.js";
import type { TurnEvent } from "../src/events.js";
import type { AgentOptions } from "../src/agent.js";
import type { AssistantReply } from "../src/drivers/types.js";
import { FakeTransport, ScriptedCompletion, call, reply, textBlocks, tool } from "./helpers/fakes.js";
import type { FakeTool, ScriptStep } from "./helpers/fakes.js";

before(() => Logger.setLevel("SILENT"));

async function collect(gen: AsyncGenerator<TurnEvent, void, undefined>): Promise<TurnEvent[]> {
  const out: TurnEvent[] = [];
  for await (const ev of gen) out.push(ev);
  return out;
}

function makeAgent(script: ScriptStep[], tools: FakeTool[] = [], opts: Partial<AgentOptions> = {}) {
  const completion = new ScriptedCompletion(script);
  const transport = new FakeTransport(tools);
  const agent = new Agent({ completion, tools: transport, model: "test-model", systemPrompt: "sys", ...opts });
  return { agent, completion, transport };
}

function abortError(): Error {
  return Object.assign(new Error("This operation was aborted"), { name: "AbortError" });
}

function roles(agent: Agent): string[] {
  return agent.history.messages.map((m) => m.role);
}

const viewTool = tool("view", () => textBlocks("a.txt\nb.txt"));

// ---------------------------------------------------------------------------
// Reference conversations
// ---------------------------------------------------------------------------

describe("Agent.turn — reference conversations", () => {
  test("text-only reply yields one assistant event and ends", async () => {
    const { agent, completion } = makeAgent([reply("Done.")]);
    const events = await collect(agent.turn("list files"));

    assert.deepStrictEqual(events, [{ type: "assistant", text: "Done.", toolCalls: [] }]);
    assert.strictEqual(completion.requests.length, 1);
    assert.deepStrictEqual(roles(agent), ["system", "user", "assistant"]);
  });

  test("one tool call yields assistant then tool event, then a second completion", async () => {
    const { agent, completion } = makeAgent(
      [reply(null, [call("c1", "view", { path: "." })]), reply("There are two files.")],
      [viewTool],
    );
    const events = await collect(agent.turn("list files"));

    assert.deepStrictEqual(events, [
      {
        type: "assistant",
        text: null,
        toolCalls: [{ name: "view", id: "c1", args: { path: "." }, rawArguments: '{"path":"."}' }],
      },
      { type: "tool", name: "view", id: "c1", content: "a.txt\nb.txt" },
      { type: "assistant", text: "There are two files.", toolCalls: [] },
    ]);

    assert.strictEqual(completion.requests.length, 2);
    const second = completion.requests[1].messages;
    assert.deepStrictEqual(second[second.length - 1], {
      role: "tool",
      tool_call_id: "c1",
      name: "view",
      content: "a.txt\nb.txt",
    });
  });

  test("a failing tool still produces a tool event with error text", async () => {
    const fetchTool = tool("fetch", () => {
      throw new Error("connection refused");
    });
    const { agent } = makeAgent([reply(null, [call("f1", "fetch", { url: "http://localhost:1" })]), reply("Sorry.")], [fetchTool]);
    const events = await collect(agent.turn("get the page"));

    const toolEvent = events[1];
    assert.strictEqual(toolEvent.type, "tool");
    if (toolEvent.type !== "tool") return;
    assert.strictEqual(toolEvent.name, "fetch");
    assert.strictEqual(toolEvent.id, "f1");
    assert.strictEqual(
      toolEvent.content,
      "Error executing tool call 'fetch': connection refused. Try again with different arguments.",
    );
  });

  test("step budget of 25 stops the loop without raising", async () => {
    const script: ScriptStep[] = Array.from({ length: 30 }, (_, i) => reply(null, [call(`c${i}`, "view", { path: "." })]));
    const { agent, completion } = makeAgent(script, [viewTool]);
    const events = await collect(agent.turn("loop forever"));

    assert.strictEqual(completion.requests.length, DEFAULT_MAX_STEPS);
    assert.strictEqual(events.filter((e) => e.type === "assistant").length, 25);
    assert.strictEqual(events.filter((e) => e.type === "tool").length, 25);
    assert.strictEqual(agent.phase, "done");
  });
});

// ---------------------------------------------------------------------------
// History invariants
// ---------------------------------------------------------------------------

describe("Agent.turn — history invariants", () => {
  test("history is append-only across turns", async () => {
    const { agent } = makeAgent(
      [reply(null, [call("c1", "view", {})]), reply("first"), reply("second")],
      [viewTool],
    );
    await collect(agent.turn("one"));
    const before = agent.history.messages.map((m) => m.id);
    await collect(agent.turn("two"));
    const after = agent.history.messages.map((m) => m.id);

    assert.ok(after.length > before.length);
    assert.deepStrictEqual(after.slice(0, before.length), before);
  });

  test("k tool calls get k results, in order, before the next completion", async () => {
    const order: string[] = [];
    const echo = tool("echo", (args) => {
      order.push(String(args.n));
      return textBlocks(`got ${String(args.n)}`);
    });
    const { agent, completion } = makeAgent(
      [reply("working", [call("a", "echo", { n: 1 }), call("b", "echo", { n: 2 }), call("c", "echo", { n: 3 })]), reply("ok")],
      [echo],
    );
    await collect(agent.turn("go"));

    assert.deepStrictEqual(order, ["1", "2", "3"]);
    const msgs = completion.requests[1].messages;
    assert.deepStrictEqual(
      msgs.slice(3).map((m) => (m.role === "tool" ? [m.tool_call_id, m.content] : m.role)),
      [["a", "got 1"], ["b", "got 2"], ["c", "got 3"]],
    );
  });

  test("a turn never makes more than maxSteps completion calls", async () => {
    const script: ScriptStep[] = Array.from({ length: 10 }, (_, i) => reply(null, [call(`c${i}`, "view", {})]));
    const { agent, completion } = makeAgent(script, [viewTool], { maxSteps: 3 });
    const events = await collect(agent.turn("go"));

    assert.strictEqual(completion.requests.length, 3);
    assert.strictEqual(events.length, 6);
  });

  test("reasoning markup is stripped from events and history", async () => {
    const { agent } = makeAgent([reply("<think>the user wants a greeting</think>\nHello!")]);
    const events = await collect(agent.turn("hi"));

    assert.deepStrictEqual(events, [{ type: "assistant", text: "Hello!", toolCalls: [] }]);
    const last = agent.history.last();
    assert.strictEqual(last?.content, "Hello!");
  });

  test("a reply that is only reasoning is stored with null text", async () => {
    const { agent } = makeAgent([reply("<think>hmm</think>", [call("c1", "view", {})]), reply("done")], [viewTool]);
    const events = await collect(agent.turn("hi"));

    const first = events[0];
    assert.strictEqual(first.type === "assistant" ? first.text : "not assistant", null);
    assert.strictEqual(agent.history.messages[2].content, null);
  });

  test("undecodable arguments become an argument error result", async () => {
    const { agent, transport } = makeAgent([reply(null, [call("c1", "view", "{path:")]), reply("retrying")], [viewTool]);
    const events = await collect(agent.turn("look"));

    assert.strictEqual(transport.calls.length, 0);
    const assistant = events[0];
    assert.ok(assistant.type === "assistant" && assistant.toolCalls[0].argumentsError);
    const toolEvent = events[1];
    assert.ok(
      toolEvent.type === "tool" &&
        toolEvent.content.startsWith("Error executing tool call 'view': Arguments are not valid JSON: "),
    );
  });
});

// ---------------------------------------------------------------------------
// Completion requests
// ---------------------------------------------------------------------------

describe("Agent.turn — completion requests", () => {
  test("model, generation options and tool definitions are sent", async () => {
    const { agent, completion } = makeAgent([reply("ok")], [viewTool], {
      generation: { temperature: 0.2, maxTokens: 100, contextWindow: 8192 },
      strictTools: false,
    });
    await collect(agent.turn("hi"));

    const req = completion.requests[0];
    assert.strictEqual(req.model, "test-model");
    assert.deepStrictEqual(req.options, { temperature: 0.2, maxTokens: 100, contextWindow: 8192 });
    assert.deepStrictEqual(req.tools.map((t) => [t.function.name, t.function.strict]), [["view", false]]);
  });

  test("tool timeout is forwarded to the transport", async () => {
    const { agent, transport } = makeAgent([reply(null, [call("c1", "view", {})]), reply("ok")], [viewTool], {
      toolTimeoutMs: 750,
    });
    await collect(agent.turn("hi"));
    assert.strictEqual(transport.calls[0].opts.timeoutMs, 750);
  });

  test("completion failures propagate and leave the agent usable", async () => {
    const failing: ScriptStep = () => {
      throw taskerError("completion_error", "openai chat failed (401): bad key", { status: 401 });
    };
    const { agent } = makeAgent([failing, reply("recovered")]);

    await assert.rejects(collect(agent.turn("hi")), (e: unknown) => isTaskerError(e) && e.kind === "completion_error");
    assert.deepStrictEqual(roles(agent), ["system", "user"]);
    assert.strictEqual(agent.phase, "done");

    const events = await collect(agent.turn("again"));
    assert.deepStrictEqual(events, [{ type: "assistant", text: "recovered", toolCalls: [] }]);
  });

  test("a second concurrent turn raises busy_error", async () => {
    let release: (r: AssistantReply) => void = () => {};
    const gate = new Promise<AssistantReply>((resolve) => {
      release = resolve;
    });
    const { agent } = makeAgent([() => gate]);

    const first = agent.turn("one");
    const firstNext = first.next();
    await assert.rejects(agent.turn("two").next(), (e: unknown) => isTaskerError(e) && e.kind === "busy_error");

    release(reply("done"));
    const result = await firstNext;
    assert.deepStrictEqual(result.value, { type: "assistant", text: "done", toolCalls: [] });
    assert.strictEqual((await first.next()).done, true);
    assert.deepStrictEqual(roles(agent), ["system", "user", "assistant"]);
  });
});

// ---------------------------------------------------------------------------
// Cancellation
// ---------------------------------------------------------------------------

describe("Agent.turn — cancellation", () => {
  test("an already-aborted signal records the utterance and yields nothing", async () => {
    const controller = new AbortController();
    controller.abort();
    const { agent, completion } = makeAgent([reply("never")]);
    const events = await collect(agent.turn("hi", { signal: controller.signal }));

    assert.deepStrictEqual(events, []);
    assert.strictEqual(completion.requests.length, 0);
    assert.deepStrictEqual(roles(agent), ["system", "user"]);
  });

  test("abort during a completion ends the stream without an assistant message", async () => {
    const controller = new AbortController();
    const { agent } = makeAgent([
      () => {
        controller.abort();
        throw abortError();
      },
    ]);
    const events = await collect(agent.turn("hi", { signal: controller.signal }));

    assert.deepStrictEqual(events, []);
    assert.deepStrictEqual(roles(agent), ["system", "user"]);
  });

  test("a tool that finishes after the abort keeps its result; later calls are cancelled", async () => {
    const controller = new AbortController();
    const create = tool("create", () => {
      controller.abort();
      return textBlocks("File successfully created at /w/a.txt");
    });
    const { agent, completion, transport } = makeAgent(
      [reply(null, [call("c1", "create", {}), call("c2", "create", {})]), reply("never")],
      [create],
    );
    const events = await collect(agent.turn("go", { signal: controller.signal }));

    assert.strictEqual(events.length, 1);
    assert.strictEqual(completion.requests.length, 1);
    assert.strictEqual(transport.calls.length, 1);
    const tail = agent.history.messages.slice(3);
    assert.deepStrictEqual(
      tail.map((m) => (m.role === "tool" ? [m.toolCallId, m.content] : m.role)),
      [["c1", "File successfully created at /w/a.txt"], ["c2", CANCELLED_TOOL_TEXT]],
    );
  });

  test("a call the abort interrupts is answered with the cancellation text", async () => {
    const controller = new AbortController();
    const slow = tool("slow", () => {
      controller.abort();
      throw abortError();
    });
    const { agent } = makeAgent([reply(null, [call("c1", "slow", {})]), reply("never")], [slow]);
    const events = await collect(agent.turn("go", { signal: controller.signal }));

    assert.strictEqual(events.length, 1);
    const last = agent.history.last();
    assert.strictEqual(last?.role === "tool" ? last.content : undefined, CANCELLED_TOOL_TEXT);
  });

  test("a consumer that stops iterating still leaves every call answered", async () => {
    const { agent, transport } = makeAgent(
      [reply(null, [call("c1", "view", {}), call("c2", "view", {})]), reply("never")],
      [viewTool],
    );
    for await (const ev of agent.turn("go")) {
      assert.strictEqual(ev.type, "assistant");
      break;
    }

    assert.strictEqual(transport.calls.length, 0);
    assert.deepStrictEqual(roles(agent), ["system", "user", "assistant", "tool", "tool"]);
    assert.strictEqual(agent.phase, "done");

    const snapshot = agent.history.snapshotForCompletion();
    assert.deepStrictEqual(
      snapshot.slice(3).map((m) => (m.role === "tool" ? m.tool_call_id : m.role)),
      ["c1", "c2"],
    );
  });
});

// ---------------------------------------------------------------------------
// Phase
// ---------------------------------------------------------------------------

describe("Agent.history", () => {
  test("callers outside the turn loop cannot write to it", async () => {
    const { agent } = makeAgent([reply("Done.")]);
    await collect(agent.turn("hi"));

    assert.strictEqual("append" in agent.history, false);
    assert.strictEqual(Reflect.set(agent.history.messages, "length", 0), false);
    assert.deepStrictEqual(roles(agent), ["system", "user", "assistant"]);
  });
});

describe("Agent.phase", () => {
  test("starts idle", () => {
    const { agent } = makeAgent([]);
    assert.strictEqual(agent.phase, "idle");
  });
});
