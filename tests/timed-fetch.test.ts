/**
 * Tests for timedFetch.
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import { timedFetch } from "../src/utils/timed-fetch.js";
import { asError } from "../src/errors.js";
import { startServer, sendJson } from "./helpers/http-server.js";

describe("timedFetch", () => {
  test("successful GET", async () => {
    const srv = await startServer((_req, res) => sendJson(res, 200, { ok: true }));

    try {
      const res = await timedFetch(`${srv.url}/`, { where: "test" });
      assert.strictEqual(res.status, 200);
      assert.deepStrictEqual(await res.json(), { ok: true });
    } finally {
      await srv.close();
    }
  });

  test("successful POST with body", async () => {
    const srv = await startServer((req, res) => sendJson(res, 200, { echo: req.body }));

    try {
      const res = await timedFetch(`${srv.url}/`, {
        method: "POST",
        body: "hello",
        where: "test-post",
      });
      assert.strictEqual(res.status, 200);
      assert.deepStrictEqual(await res.json(), { echo: "hello" });
    } finally {
      await srv.close();
    }
  });

  test("timeout triggers abort", async () => {
    const srv = await startServer(() => {
      // Never respond — simulate hang
    });

    try {
      await assert.rejects(
        () => timedFetch(`${srv.url}/`, { timeoutMs: 100, where: "test-timeout" }),
        (err: unknown) => {
          const msg = asError(err).message;
          assert.ok(msg.startsWith("[fetch timeout] test-timeout"), `Expected timeout error, got: ${msg}`);
          return true;
        },
      );
    } finally {
      await srv.close();
    }
  });

  test("caller abort surfaces as AbortError, not a timeout", async () => {
    const srv = await startServer(() => {
      // hang
    });
    const controller = new AbortController();

    try {
      const pending = timedFetch(`${srv.url}/`, { timeoutMs: 5_000, signal: controller.signal });
      setTimeout(() => controller.abort(), 20);
      await assert.rejects(pending, (err: unknown) => {
        assert.strictEqual(asError(err).name, "AbortError");
        return true;
      });
    } finally {
      await srv.close();
    }
  });

  test("no timeout when timeoutMs is 0", async () => {
    const srv = await startServer((_req, res) => {
      res.writeHead(200);
      res.end("ok");
    });

    try {
      const res = await timedFetch(`${srv.url}/`, { timeoutMs: 0, where: "test-no-timeout" });
      assert.strictEqual(res.status, 200);
      assert.strictEqual(await res.text(), "ok");
    } finally {
      await srv.close();
    }
  });

  test("connection failure is tagged as a fetch error", async () => {
    const srv = await startServer((_req, res) => sendJson(res, 200, {}));
    const url = `${srv.url}/`;
    await srv.close();

    await assert.rejects(
      () => timedFetch(url, { where: "gone" }),
      (err: unknown) => {
        assert.ok(asError(err).message.startsWith("[fetch error] gone"));
        return true;
      },
    );
  });
});
