import test from "node:test";
import assert from "node:assert/strict";
import { MockAgent } from "undici";
import { FetchError } from "../errors.js";
import { HttpPageFetcher } from "./http-fetcher.js";

const ORIGIN = "https://tracking.example.test";
const TEMPLATE = `${ORIGIN}/track/{track}`;

function createFetcher(agent: MockAgent, maxAttempts = 1): HttpPageFetcher {
  return new HttpPageFetcher({
    urlTemplate: TEMPLATE,
    timeoutMs: 2000,
    maxAttempts,
    retryBaseDelayMs: 0,
    createDispatcher: () => agent
  });
}

function createAgent(): MockAgent {
  const agent = new MockAgent();
  agent.disableNetConnect();
  return agent;
}

test("fetch returns the page body on 2xx", async () => {
  const agent = createAgent();
  agent
    .get(ORIGIN)
    .intercept({ path: "/track/94044975-0220-1", method: "GET" })
    .reply(200, "<html><body>В пути</body></html>");

  const content = await createFetcher(agent).fetch("94044975-0220-1");
  assert.equal(content, "<html><body>В пути</body></html>");
});

test("fetch rejects non-success responses with a FetchError carrying the body", async () => {
  const agent = createAgent();
  agent.get(ORIGIN).intercept({ path: "/track/12345678", method: "GET" }).reply(404, "not here");

  await assert.rejects(createFetcher(agent, 3).fetch("12345678"), (error: unknown) => {
    assert.ok(error instanceof FetchError);
    assert.equal(error.statusCode, 404);
    assert.equal(error.body, "not here");
    assert.equal(error.trackingNumber, "12345678");
    return true;
  });
});

test("fetch retries server errors before giving up", async () => {
  const agent = createAgent();
  const pool = agent.get(ORIGIN);
  pool.intercept({ path: "/track/12345678", method: "GET" }).reply(503, "busy");
  pool.intercept({ path: "/track/12345678", method: "GET" }).reply(200, "Доставлен");

  const content = await createFetcher(agent, 2).fetch("12345678");
  assert.equal(content, "Доставлен");
});

test("fetch wraps network failures in FetchError", async () => {
  const agent = createAgent();
  agent
    .get(ORIGIN)
    .intercept({ path: "/track/12345678", method: "GET" })
    .replyWithError(new Error("socket hang up"));

  await assert.rejects(createFetcher(agent).fetch("12345678"), (error: unknown) => {
    assert.ok(error instanceof FetchError);
    assert.equal(error.statusCode, undefined);
    return true;
  });
});

test("fetchMany isolates per-number failures and fetches duplicates once", async () => {
  const agent = createAgent();
  const pool = agent.get(ORIGIN);
  pool.intercept({ path: "/track/11111111", method: "GET" }).reply(200, "Создан");
  pool.intercept({ path: "/track/22222222", method: "GET" }).reply(500, "oops");

  const results = await createFetcher(agent).fetchMany(["11111111", "22222222", "11111111"]);

  assert.equal(results.size, 2);
  assert.deepEqual(results.get("11111111"), { ok: true, content: "Создан" });
  const failed = results.get("22222222");
  assert.equal(failed?.ok, false);
  if (failed && !failed.ok) {
    assert.equal(failed.error.statusCode, 500);
  }
});
