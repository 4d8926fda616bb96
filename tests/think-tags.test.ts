import { test, describe } from "node:test";
import assert from "node:assert";
import { stripThinking } from "../src/think-tags.js";

describe("stripThinking", () => {
  test("removes a leading think block and trims", () => {
    assert.strictEqual(stripThinking("<think>plan the answer</think>\n\nThe answer is 4."), "The answer is 4.");
  });

  test("removes multiple blocks, including multi-line ones", () => {
    const input = "<think>a\nb</think>Hello <think>c</think>world";
    assert.strictEqual(stripThinking(input), "Hello world");
  });

  test("text without think tags is only trimmed", () => {
    assert.strictEqual(stripThinking("  plain reply \n"), "plain reply");
  });

  test("null and empty string come back untouched", () => {
    assert.strictEqual(stripThinking(null), null);
    assert.strictEqual(stripThinking(""), "");
  });

  test("content that is only thinking becomes empty", () => {
    assert.strictEqual(stripThinking("<think>nothing to say</think>"), "");
  });

  test("is idempotent, even when removal splices a new block together", () => {
    const nested = "<thi<think>x</think>nk>hidden</think>visible";
    const once = stripThinking(nested);
    assert.strictEqual(once, "visible");
    assert.strictEqual(stripThinking(once), once);
  });

  test("an unterminated block is left alone", () => {
    assert.strictEqual(stripThinking("<think>still going"), "<think>still going");
  });
});
