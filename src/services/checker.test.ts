import test from "node:test";
import assert from "node:assert/strict";
import { FetchError } from "../errors.js";
import { setLogLevel } from "../logger.js";
import { StatusChecker, fromFetchError } from "./checker.js";
import { PageFetcher, PageResult } from "./page-fetcher.js";

setLogLevel("silent");

function stubFetcher(pages: Record<string, string | Error>): PageFetcher {
  return {
    fetch: async (trackingNumber) => {
      const page = pages[trackingNumber];
      if (page === undefined || page instanceof Error) {
        throw page ?? new Error("no page");
      }
      return page;
    },
    fetchMany: async (trackingNumbers) => {
      const results = new Map<string, PageResult>();
      for (const trackingNumber of trackingNumbers) {
        const page = pages[trackingNumber];
        results.set(
          trackingNumber,
          typeof page === "string"
            ? { ok: true, content: page }
            : { ok: false, error: new FetchError(trackingNumber, page?.message ?? "no page") }
        );
      }
      return results;
    }
  };
}

test("check extracts the status from the fetched page", async () => {
  const checker = new StatusChecker(stubFetcher({ "12345678": "<p>Готов к выдаче</p>" }));
  assert.deepEqual(await checker.check("12345678"), {
    status: "ready for pickup",
    reason: "matched",
    detail: "готов к выдаче"
  });
});

test("check turns a thrown fetch failure into unknown/fetch-error", async () => {
  const checker = new StatusChecker(stubFetcher({ "12345678": new Error("connect ETIMEDOUT") }));
  assert.deepEqual(await checker.check("12345678"), {
    status: "unknown",
    reason: "fetch-error",
    detail: "connect ETIMEDOUT"
  });
});

test("checkMany maps each page result", async () => {
  const checker = new StatusChecker(
    stubFetcher({ "11111111": "Заказ в пути", "22222222": new Error("socket hang up") })
  );

  const results = await checker.checkMany(["11111111", "22222222"]);

  assert.equal(results.get("11111111")?.status, "in transit");
  assert.deepEqual(results.get("22222222"), {
    status: "unknown",
    reason: "fetch-error",
    detail: "socket hang up"
  });
});

test("fromFetchError treats a rejected anti-bot page as blocked", () => {
  const error = new FetchError("12345678", "tracking page request failed (403)", {
    statusCode: 403,
    body: "<html><body>Please solve the CAPTCHA</body></html>"
  });
  assert.deepEqual(fromFetchError(error), { status: "blocked", reason: "blocked", detail: "solve the captcha" });
});

test("fromFetchError keeps other rejected pages as fetch errors", () => {
  const error = new FetchError("12345678", "tracking page request failed (502)", {
    statusCode: 502,
    body: "Bad gateway"
  });
  assert.deepEqual(fromFetchError(error), {
    status: "unknown",
    reason: "fetch-error",
    detail: "tracking page request failed (502)"
  });
});
