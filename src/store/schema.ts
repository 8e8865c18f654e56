import { z } from "zod";
import { matchStatus } from "../services/status-extractor.js";
import { ALL_STATUSES, Status, StoreDocument, TrackingRecord } from "../types.js";

export const CURRENT_VERSION = 2;

const recordSchema = z.object({
  trackingNumber: z.string().min(1),
  status: z.enum(ALL_STATUSES).nullable(),
  lastCheckedAt: z.string().nullable(),
  lastCheckReason: z.string(),
  addedAt: z.string()
});

// Owner-keyed layout. Documents written before versioning carry no `version`.
const currentSchema = z.object({
  version: z.literal(CURRENT_VERSION).optional(),
  meta: z
    .object({ lastStartupNotificationAt: z.string().nullable().default(null) })
    .default({ lastStartupNotificationAt: null }),
  tracking: z.record(z.record(recordSchema))
});

const legacyRecordSchema = z.object({
  status: z.string().nullable().optional(),
  addedAt: z.string().optional(),
  lastCheckedAt: z.string().nullable().optional()
});

export type LegacyFlatDocument = Record<string, z.infer<typeof legacyRecordSchema>>;

export type DocumentShape = "current" | "legacy-flat" | "invalid";

export type ParsedDocument =
  | { shape: "current"; document: StoreDocument }
  | { shape: "legacy-flat"; document: StoreDocument; skipped: string[] }
  | { shape: "invalid"; issue: string };

export type UpgradeOptions = {
  ownerId: string;
  now: Date;
};

// Older builds accepted any run of digits and hyphens, including a leading hyphen.
const LEGACY_KEY = /^[\d-]*\d[\d-]*$/;

export function emptyDocument(): StoreDocument {
  return {
    version: CURRENT_VERSION,
    meta: { lastStartupNotificationAt: null },
    tracking: {}
  };
}

export function detectShape(raw: unknown): DocumentShape {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return "invalid";
  }

  if ("tracking" in raw) {
    return "current";
  }

  const looksFlat = Object.values(raw).every(
    (value) => typeof value === "object" && value !== null && !Array.isArray(value)
  );
  return looksFlat ? "legacy-flat" : "invalid";
}

export function parseDocument(raw: unknown, options: UpgradeOptions): ParsedDocument {
  const shape = detectShape(raw);

  if (shape === "current") {
    const parsed = currentSchema.safeParse(raw);
    if (!parsed.success) {
      return { shape: "invalid", issue: parsed.error.message };
    }
    return {
      shape,
      document: { version: CURRENT_VERSION, meta: parsed.data.meta, tracking: parsed.data.tracking }
    };
  }

  if (shape === "legacy-flat") {
    const { flat, skipped } = readLegacyEntries(raw);
    if (skipped.length > 0 && Object.keys(flat).length === 0) {
      return { shape: "invalid", issue: "no readable legacy entries" };
    }
    return { shape, document: upgradeLegacy(flat, options), skipped };
  }

  return { shape: "invalid", issue: "unrecognised store layout" };
}

// Keeps the entries that look like tracking records; the rest are reported back by key.
function readLegacyEntries(raw: unknown): { flat: LegacyFlatDocument; skipped: string[] } {
  const flat: LegacyFlatDocument = {};
  const skipped: string[] = [];

  const entries = z.record(z.unknown()).safeParse(raw);
  for (const [key, value] of Object.entries(entries.success ? entries.data : {})) {
    const record = legacyRecordSchema.safeParse(value);
    if (LEGACY_KEY.test(key) && record.success) {
      flat[key] = record.data;
    } else {
      skipped.push(key);
    }
  }
  return { flat, skipped };
}

export function upgradeLegacy(flat: LegacyFlatDocument, options: UpgradeOptions): StoreDocument {
  const addedAt = options.now.toISOString();
  const records: Record<string, TrackingRecord> = {};

  for (const [trackingNumber, legacy] of Object.entries(flat)) {
    records[trackingNumber] = {
      trackingNumber,
      status: legacyStatus(legacy.status),
      lastCheckedAt: legacy.lastCheckedAt ?? null,
      lastCheckReason: "migrated",
      addedAt: legacy.addedAt ?? addedAt
    };
  }

  const document = emptyDocument();
  if (Object.keys(records).length > 0) {
    document.tracking[options.ownerId] = records;
  }
  return document;
}

// Older builds stored the matched page phrase itself rather than a canonical label.
function legacyStatus(label: string | null | undefined): Status | null {
  if (label === null || label === undefined) {
    return null;
  }
  const known = ALL_STATUSES.find((s) => s === label);
  if (known) {
    return known;
  }
  return matchStatus(label)?.status ?? "unknown";
}
