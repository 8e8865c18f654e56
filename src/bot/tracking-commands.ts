import { decideCheck } from "../jobs/watch-cycle.js";
import { StatusChecker } from "../services/checker.js";
import { findRecord, listOwnerRecords, TrackingStore } from "../store/tracking-store.js";
import { ExtractionResult, TrackingRecord } from "../types.js";

export type AddOutcome =
  | { kind: "exists"; record: TrackingRecord }
  | { kind: "added"; record: TrackingRecord; result: ExtractionResult };

export type RemoveOutcome = { kind: "removed" } | { kind: "not-found" };

export class TrackingCommands {
  constructor(
    private readonly store: TrackingStore,
    private readonly checker: Pick<StatusChecker, "check">,
    private readonly now: () => Date = () => new Date()
  ) {}

  async addTracking(ownerId: string, trackingNumber: string): Promise<AddOutcome> {
    const existing = findRecord(this.store.loadAll(), ownerId, trackingNumber);
    if (existing) {
      return { kind: "exists", record: existing };
    }

    const created: TrackingRecord = {
      trackingNumber,
      status: null,
      lastCheckedAt: null,
      lastCheckReason: "pending",
      addedAt: this.now().toISOString()
    };
    this.store.update((document) => {
      const owned = document.tracking[ownerId] ?? {};
      owned[trackingNumber] = created;
      document.tracking[ownerId] = owned;
    });

    const result = await this.checker.check(trackingNumber);

    const record = this.store.update((document) => {
      const owned = document.tracking[ownerId];
      const current = owned?.[trackingNumber];
      if (!owned || !current) {
        return undefined;
      }
      const decision = decideCheck(ownerId, current, result, this.now());
      owned[trackingNumber] = decision.record;
      return decision.record;
    });

    return { kind: "added", record: record ?? created, result };
  }

  removeTracking(ownerId: string, trackingNumber: string): RemoveOutcome {
    if (!findRecord(this.store.loadAll(), ownerId, trackingNumber)) {
      return { kind: "not-found" };
    }

    this.store.update((document) => {
      const owned = document.tracking[ownerId];
      if (!owned) {
        return;
      }
      delete owned[trackingNumber];
      if (Object.keys(owned).length === 0) {
        delete document.tracking[ownerId];
      }
    });
    return { kind: "removed" };
  }

  listTracking(ownerId: string): TrackingRecord[] {
    return listOwnerRecords(this.store.loadAll(), ownerId).sort((a, b) => a.addedAt.localeCompare(b.addedAt));
  }

  async debugCheck(trackingNumber: string): Promise<ExtractionResult> {
    return this.checker.check(trackingNumber);
  }
}
