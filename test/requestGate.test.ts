import test from "node:test";
import assert from "node:assert/strict";
import { RequestGate, USER_AGENTS } from "../src/services/requestGate.js";
import { recordingFetch, silentLogger } from "./helpers.js";

function recordingSleep() {
  const waits: number[] = [];
  const sleep = async (ms: number): Promise<void> => {
    waits.push(ms);
  };
  return { waits, sleep };
}

test("execute returns the body on the first successful attempt", async () => {
  const { fetchImpl, calls } = recordingFetch(() => new Response("ok", { status: 200 }));
  const gate = new RequestGate({ fetchImpl, minRequestIntervalMs: 0, logger: silentLogger });

  const result = await gate.execute("https://example.test/search");

  assert.deepEqual(result, { ok: true, status: 200, body: "ok", attempts: 1 });
  assert.equal(calls.length, 1);
  assert.equal(gate.requestCount, 1);
});

test("execute rotates a browser user agent and lets caller headers win", async () => {
  const { fetchImpl, calls } = recordingFetch(() => new Response("ok"));
  const gate = new RequestGate({ fetchImpl, minRequestIntervalMs: 0, random: () => 0, logger: silentLogger });

  await gate.execute("https://example.test/a");
  await gate.execute("https://example.test/b", { "Accept-Language": "de-DE" });

  assert.equal(calls[0]?.headers["user-agent"], USER_AGENTS[0]);
  assert.equal(calls[0]?.headers["accept-language"], "en-US,en;q=0.9");
  assert.equal(calls[1]?.headers["accept-language"], "de-DE");
});

test("HTTP 429 backs off with the rate-limit delay scaled by attempt", async () => {
  const statuses = [429, 429, 200];
  const { fetchImpl, calls } = recordingFetch(() => new Response("body", { status: statuses[calls.length - 1] ?? 200 }));
  const { waits, sleep } = recordingSleep();
  const gate = new RequestGate({
    fetchImpl,
    sleep,
    minRequestIntervalMs: 0,
    rateLimitBackoffMs: 100,
    retryBackoffMs: 10,
    logger: silentLogger
  });

  const result = await gate.execute("https://example.test/busy");

  assert.deepEqual(result, { ok: true, status: 200, body: "body", attempts: 3 });
  assert.deepEqual(waits, [100, 200]);
});

test("server errors are retried up to maxRetries and then reported", async () => {
  const { fetchImpl, calls } = recordingFetch(() => new Response("down", { status: 500 }));
  const { waits, sleep } = recordingSleep();
  const gate = new RequestGate({
    fetchImpl,
    sleep,
    minRequestIntervalMs: 0,
    maxRetries: 2,
    rateLimitBackoffMs: 100,
    retryBackoffMs: 10,
    logger: silentLogger
  });

  const result = await gate.execute("https://example.test/down");

  assert.deepEqual(result, { ok: false, reason: "http_error", status: 500, attempts: 3 });
  assert.equal(calls.length, 3);
  assert.deepEqual(waits, [10, 20]);
});

test("transport errors become a network_error failure instead of throwing", async () => {
  const gate = new RequestGate({
    fetchImpl: async () => {
      throw new TypeError("fetch failed");
    },
    minRequestIntervalMs: 0,
    maxRetries: 0,
    logger: silentLogger
  });

  const result = await gate.execute("https://example.test/reset");

  assert.deepEqual(result, { ok: false, reason: "network_error", attempts: 1 });
});

test("a request that outlives the timeout is aborted", async () => {
  const gate = new RequestGate({
    fetchImpl: (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(Object.assign(new Error("aborted"), { name: "AbortError" })));
      }),
    minRequestIntervalMs: 0,
    maxRetries: 0,
    requestTimeoutMs: 20,
    logger: silentLogger
  });

  const result = await gate.execute("https://example.test/slow");

  assert.deepEqual(result, { ok: false, reason: "timeout", attempts: 1 });
});

test("the session budget forces a rest before the next request", async () => {
  const { fetchImpl } = recordingFetch(() => new Response("ok"));
  const { waits, sleep } = recordingSleep();
  const gate = new RequestGate({
    fetchImpl,
    sleep,
    minRequestIntervalMs: 0,
    maxRequestsPerSession: 2,
    sessionRestMs: 500,
    logger: silentLogger
  });

  for (let index = 0; index < 5; index += 1) {
    await gate.execute(`https://example.test/${index}`);
  }

  assert.deepEqual(waits, [500, 500]);
  assert.equal(gate.requestCount, 5);
});

test("concurrent callers are paced one at a time through a single gate", async () => {
  let inFlight = 0;
  let maxInFlight = 0;
  const gate = new RequestGate({
    fetchImpl: async () => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setImmediate(resolve));
      inFlight -= 1;
      return new Response("ok");
    },
    minRequestIntervalMs: 20,
    logger: silentLogger
  });

  const startedAt = Date.now();
  const results = await Promise.all(
    Array.from({ length: 30 }, (_, index) => gate.execute(`https://example.test/${index}`))
  );
  const elapsed = Date.now() - startedAt;

  assert.equal(results.every((result) => result.ok), true);
  assert.equal(maxInFlight, 1);
  assert.ok(elapsed >= 29 * 20, `expected at least 580ms, took ${elapsed}ms`);
  await gate.stop();
});
