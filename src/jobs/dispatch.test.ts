import test from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { setLogLevel } from "../logger.js";
import { JsonTrackingStore } from "../store/tracking-store.js";
import { Notifier, TrackingRecord } from "../types.js";
import { STARTUP_MESSAGE, dispatchTransitions, maybeNotifyStartup, startupRecipients } from "./dispatch.js";

setLogLevel("silent");

type Sent = { ownerId: string; text: string };

function recordingNotifier(failFor: string[] = []): Notifier & { sent: Sent[] } {
  const sent: Sent[] = [];
  return {
    sent,
    send: async (ownerId, text) => {
      if (failFor.includes(ownerId)) {
        throw new Error("chat not found");
      }
      sent.push({ ownerId, text });
    }
  };
}

function tempStore(): JsonTrackingStore {
  return new JsonTrackingStore(join(mkdtempSync(join(tmpdir(), "parcel-watch-")), "tracks.json"), {
    legacyOwnerId: "42"
  });
}

const pending: TrackingRecord = {
  trackingNumber: "12345678",
  status: null,
  lastCheckedAt: null,
  lastCheckReason: "pending",
  addedAt: "2026-03-01T00:00:00.000Z"
};

test("dispatchTransitions sends one message per event and survives send failures", async () => {
  const notifier = recordingNotifier(["-100"]);

  const sent = await dispatchTransitions(
    [
      { ownerId: "-100", trackingNumber: "11111111", from: "created", to: "in transit" },
      { ownerId: "42", trackingNumber: "94044975-0220-1", from: "in transit", to: "delivered" }
    ],
    notifier
  );

  assert.equal(sent, 1);
  assert.deepEqual(notifier.sent, [{ ownerId: "42", text: "94044975-0220-1: in transit → delivered" }]);
});

test("maybeNotifyStartup sends once per cooldown window", async () => {
  const store = tempStore();
  const notifier = recordingNotifier();
  let now = new Date("2026-03-01T10:00:00.000Z");
  const deps = { store, notifier, allowedChatIds: new Set(["42"]), cooldownSeconds: 1800, now: () => now };

  assert.equal(await maybeNotifyStartup(deps), 1);
  assert.equal(store.loadAll().meta.lastStartupNotificationAt, "2026-03-01T10:00:00.000Z");

  now = new Date("2026-03-01T10:29:59.000Z");
  assert.equal(await maybeNotifyStartup(deps), 0);

  now = new Date("2026-03-01T10:30:00.000Z");
  assert.equal(await maybeNotifyStartup(deps), 1);

  assert.deepEqual(notifier.sent, [
    { ownerId: "42", text: STARTUP_MESSAGE },
    { ownerId: "42", text: STARTUP_MESSAGE }
  ]);
});

test("startupRecipients falls back to the owners present in the store", () => {
  const document = {
    version: 2 as const,
    meta: { lastStartupNotificationAt: null },
    tracking: { "42": { "12345678": pending }, "-100": { "12345678": pending } }
  };

  assert.deepEqual(startupRecipients(document, new Set()), ["42", "-100"]);
  assert.deepEqual(startupRecipients(document, new Set(["7"])), ["7"]);
});
