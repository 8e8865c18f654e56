import test from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { setLogLevel } from "../logger.js";
import { JsonTrackingStore } from "../store/tracking-store.js";
import { ExtractionResult } from "../types.js";
import { formatAddReply } from "./format.js";
import { TrackingCommands } from "./tracking-commands.js";

setLogLevel("silent");

const TRACK = "94044975-0220-1";

function tempStore(): JsonTrackingStore {
  return new JsonTrackingStore(join(mkdtempSync(join(tmpdir(), "parcel-watch-")), "tracks.json"), {
    legacyOwnerId: "42"
  });
}

function clock(...isoTimes: string[]): () => Date {
  let i = 0;
  return () => new Date(isoTimes[Math.min(i++, isoTimes.length - 1)] ?? "2026-03-01T00:00:00.000Z");
}

test("addTracking persists a pending record, checks once and stores the baseline", async () => {
  const store = tempStore();
  const seenDuringCheck: unknown[] = [];

  const checker = {
    check: async (trackingNumber: string): Promise<ExtractionResult> => {
      seenDuringCheck.push(store.loadAll().tracking["42"]?.[trackingNumber]?.status);
      return { status: "in transit", reason: "matched", detail: "в пути" };
    }
  };

  const commands = new TrackingCommands(store, checker, clock("2026-03-01T10:00:00.000Z", "2026-03-01T10:00:05.000Z"));
  const outcome = await commands.addTracking("42", TRACK);

  assert.deepEqual(seenDuringCheck, [null]);
  assert.equal(outcome.kind, "added");
  if (outcome.kind !== "added") {
    return;
  }
  assert.deepEqual(outcome.record, {
    trackingNumber: TRACK,
    status: "in transit",
    lastCheckedAt: "2026-03-01T10:00:05.000Z",
    lastCheckReason: "matched",
    addedAt: "2026-03-01T10:00:00.000Z"
  });
  assert.equal(formatAddReply(TRACK, outcome.result), "Added 94044975-0220-1.\nStatus: in transit");
  assert.deepEqual(store.loadAll().tracking["42"]?.[TRACK], outcome.record);
});

test("addTracking keeps the record when the first check is blocked", async () => {
  const store = tempStore();
  const commands = new TrackingCommands(store, {
    check: async () => ({ status: "blocked", reason: "blocked", detail: "captcha" })
  });

  const outcome = await commands.addTracking("42", TRACK);

  assert.equal(outcome.kind, "added");
  assert.equal(store.loadAll().tracking["42"]?.[TRACK]?.status, "blocked");
  assert.equal(store.loadAll().tracking["42"]?.[TRACK]?.lastCheckReason, "blocked");
});

test("addTracking does not re-check a number the owner already tracks", async () => {
  const store = tempStore();
  let checks = 0;
  const commands = new TrackingCommands(store, {
    check: async () => {
      checks += 1;
      return { status: "created", reason: "matched" };
    }
  });

  await commands.addTracking("42", TRACK);
  const second = await commands.addTracking("42", TRACK);

  assert.equal(second.kind, "exists");
  assert.equal(second.record.status, "created");
  assert.equal(checks, 1);
});

test("the same number is tracked independently per owner", async () => {
  const store = tempStore();
  const commands = new TrackingCommands(store, {
    check: async () => ({ status: "created", reason: "matched" })
  });

  await commands.addTracking("42", TRACK);
  const other = await commands.addTracking("-100", TRACK);

  assert.equal(other.kind, "added");
  assert.deepEqual(Object.keys(store.loadAll().tracking).sort(), ["-100", "42"]);
});

test("removeTracking of an unknown number leaves the file untouched", async () => {
  const store = tempStore();
  const commands = new TrackingCommands(store, {
    check: async () => ({ status: "created", reason: "matched" })
  });
  await commands.addTracking("42", TRACK);
  const before = readFileSync(store.filePath, "utf8");

  assert.deepEqual(commands.removeTracking("42", "11111111"), { kind: "not-found" });
  assert.deepEqual(commands.removeTracking("-100", TRACK), { kind: "not-found" });
  assert.equal(readFileSync(store.filePath, "utf8"), before);
});

test("removeTracking deletes the record and drops an emptied owner", async () => {
  const store = tempStore();
  const commands = new TrackingCommands(store, {
    check: async () => ({ status: "created", reason: "matched" })
  });
  await commands.addTracking("42", TRACK);

  assert.deepEqual(commands.removeTracking("42", TRACK), { kind: "removed" });
  assert.deepEqual(store.loadAll().tracking, {});
});

test("listTracking returns only the owner's records, oldest first", async () => {
  const store = tempStore();
  const commands = new TrackingCommands(
    store,
    { check: async () => ({ status: "unknown", reason: "no-match" }) },
    clock(
      "2026-03-02T00:00:00.000Z",
      "2026-03-02T00:00:01.000Z",
      "2026-03-01T00:00:00.000Z",
      "2026-03-01T00:00:01.000Z",
      "2026-03-03T00:00:00.000Z"
    )
  );

  await commands.addTracking("42", "22222222");
  await commands.addTracking("42", "11111111");
  await commands.addTracking("-100", "33333333");

  assert.deepEqual(
    commands.listTracking("42").map((r) => r.trackingNumber),
    ["11111111", "22222222"]
  );
  assert.deepEqual(commands.listTracking("7"), []);
});
