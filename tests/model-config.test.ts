import { test, describe } from "node:test";
import assert from "node:assert";
import { parseModelId, defaultBaseUrl, DEFAULT_MODEL_ID } from "../src/model-config.js";
import { createCompletionClient } from "../src/drivers/index.js";
import type { LlmConfig } from "../src/types.js";

describe("parseModelId", () => {
  test("ollama_chat and ollama prefixes select Ollama", () => {
    assert.deepStrictEqual(parseModelId("ollama_chat/qwen3:30b-a3b-q4_K_M"), { provider: "ollama", model: "qwen3:30b-a3b-q4_K_M" });
    assert.deepStrictEqual(parseModelId("ollama/llama3.1"), { provider: "ollama", model: "llama3.1" });
  });

  test("openai prefix is stripped", () => {
    assert.deepStrictEqual(parseModelId("openai/gpt-4o"), { provider: "openai", model: "gpt-4o" });
  });

  test("unprefixed and unknown-prefixed ids go to the OpenAI-compatible client unchanged", () => {
    assert.deepStrictEqual(parseModelId("gpt-4o-mini"), { provider: "openai", model: "gpt-4o-mini" });
    assert.deepStrictEqual(parseModelId("meta-llama/Llama-3-8B"), { provider: "openai", model: "meta-llama/Llama-3-8B" });
  });

  test("the default model runs on Ollama", () => {
    assert.strictEqual(parseModelId(DEFAULT_MODEL_ID).provider, "ollama");
  });
});

describe("defaultBaseUrl", () => {
  test("per provider", () => {
    assert.strictEqual(defaultBaseUrl("ollama"), "http://localhost:11434");
    assert.strictEqual(defaultBaseUrl("openai"), "https://api.openai.com");
  });
});

describe("createCompletionClient", () => {
  const llm: LlmConfig = {
    modelId: DEFAULT_MODEL_ID,
    baseUrl: null,
    apiKey: null,
    temperature: 0.7,
    maxTokens: 4000,
    numCtx: 32000,
    requestTimeoutMs: 1000,
  };

  test("picks the backend from the model id and strips the prefix", () => {
    const ollama = createCompletionClient(llm);
    assert.strictEqual(ollama.client.provider, "ollama");
    assert.strictEqual(ollama.model, "qwen3:30b-a3b-q4_K_M");

    const openai = createCompletionClient({ ...llm, modelId: "gpt-4o", apiKey: "test-secret" });
    assert.strictEqual(openai.client.provider, "openai");
    assert.strictEqual(openai.model, "gpt-4o");
  });
});
