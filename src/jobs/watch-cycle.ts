import { logger } from "../logger.js";
import { StatusChecker } from "../services/checker.js";
import { isLifecycleStatus } from "../services/status-extractor.js";
import { listAllRecords, TrackingStore } from "../store/tracking-store.js";
import { ExtractionResult, TrackingRecord, TransitionEvent } from "../types.js";

export type CheckDecision = {
  record: TrackingRecord;
  event?: TransitionEvent;
};

export type WatchCycleDeps = {
  store: TrackingStore;
  checker: Pick<StatusChecker, "checkMany">;
  stopWhenDelivered: boolean;
  now?: () => Date;
};

export type WatchCycleResult = {
  checked: number;
  events: TransitionEvent[];
};

// First observations and unknown/blocked results are stored without an event.
export function decideCheck(
  ownerId: string,
  record: TrackingRecord,
  result: ExtractionResult,
  now: Date
): CheckDecision {
  const next: TrackingRecord = {
    ...record,
    lastCheckedAt: now.toISOString(),
    lastCheckReason: result.reason
  };
  const previous = record.status;

  if (previous === null || !isLifecycleStatus(result.status)) {
    next.status = result.status;
    return { record: next };
  }

  if (previous === result.status) {
    return { record: next };
  }

  next.status = result.status;
  return {
    record: next,
    event: { ownerId, trackingNumber: record.trackingNumber, from: previous, to: result.status }
  };
}

export async function runWatchCycle(deps: WatchCycleDeps): Promise<WatchCycleResult> {
  const now = deps.now ?? (() => new Date());
  const targets = listAllRecords(deps.store.loadAll()).filter(
    ({ record }) => !(deps.stopWhenDelivered && record.status === "delivered")
  );

  if (targets.length === 0) {
    return { checked: 0, events: [] };
  }

  logger.info({ count: targets.length }, "running poll cycle");
  const results = await deps.checker.checkMany(targets.map(({ record }) => record.trackingNumber));
  const checkedAt = now();

  // Records removed while pages were loading stay removed.
  const events = deps.store.update((document) => {
    const emitted: TransitionEvent[] = [];

    for (const { ownerId, record } of targets) {
      const owned = document.tracking[ownerId];
      const current = owned?.[record.trackingNumber];
      if (!owned || !current) {
        logger.info({ ownerId, trackingNumber: record.trackingNumber }, "record removed during poll cycle");
        continue;
      }

      const result: ExtractionResult = results.get(record.trackingNumber) ?? {
        status: "unknown",
        reason: "fetch-error",
        detail: "no page returned"
      };
      const decision = decideCheck(ownerId, current, result, checkedAt);
      owned[record.trackingNumber] = decision.record;
      if (decision.event) {
        emitted.push(decision.event);
      }
    }

    return emitted;
  });

  logger.info({ checked: targets.length, transitions: events.length }, "poll cycle complete");
  return { checked: targets.length, events };
}
