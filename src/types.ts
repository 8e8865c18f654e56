export const LIFECYCLE_STATUSES = [
  "created",
  "handed to carrier",
  "in transit",
  "outbound customs",
  "inbound customs",
  "at sortation",
  "out for delivery",
  "ready for pickup",
  "delivered"
] as const;

export type LifecycleStatus = (typeof LIFECYCLE_STATUSES)[number];

export const ALL_STATUSES = [...LIFECYCLE_STATUSES, "unknown", "blocked"] as const;

export type SentinelStatus = "unknown" | "blocked";

export type Status = (typeof ALL_STATUSES)[number];

export type CheckReason = "matched" | "blocked" | "no-match" | "fetch-error";

export type ExtractionResult = {
  status: Status;
  reason: CheckReason;
  detail?: string;
};

export type TrackingRecord = {
  trackingNumber: string;
  status: Status | null;
  lastCheckedAt: string | null;
  lastCheckReason: string;
  addedAt: string;
};

export type OwnerTracking = Record<string, TrackingRecord>;

export type TrackStore = Record<string, OwnerTracking>;

export type StoreMeta = {
  lastStartupNotificationAt: string | null;
};

export type StoreDocument = {
  version: 2;
  meta: StoreMeta;
  tracking: TrackStore;
};

export type TransitionEvent = {
  ownerId: string;
  trackingNumber: string;
  from: Status;
  to: LifecycleStatus;
};

export interface Notifier {
  send(ownerId: string, text: string): Promise<void>;
}
