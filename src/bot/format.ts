import { ExtractionResult, Status, TrackingRecord, TransitionEvent } from "../types.js";

export function formatTransition(event: TransitionEvent): string {
  return `${event.trackingNumber}: ${event.from} → ${event.to}`;
}

export function formatStatus(status: Status | null): string {
  return status ?? "not checked yet";
}

export function formatRecordList(records: readonly TrackingRecord[]): string {
  if (records.length === 0) {
    return "No tracked parcels yet.";
  }

  const lines = records.map((r) => `- ${r.trackingNumber}: ${formatStatus(r.status)}`);
  return ["Tracked parcels:", ...lines].join("\n");
}

export function formatAddReply(trackingNumber: string, result: ExtractionResult): string {
  const header = `Added ${trackingNumber}.`;

  if (result.status === "blocked") {
    return `${header}\nWarning: the tracking site is blocking automated requests right now, so the status is unavailable. I'll keep trying in the background.`;
  }
  if (result.status === "unknown") {
    return `${header}\nCouldn't determine the status yet. I'll keep checking and message you when it changes.`;
  }
  return `${header}\nStatus: ${result.status}`;
}

export function formatDebug(trackingNumber: string, result: ExtractionResult): string {
  const lines = [`Debug ${trackingNumber}`, `status: ${result.status}`, `reason: ${result.reason}`];
  if (result.detail) {
    lines.push(`detail: ${result.detail}`);
  }
  return lines.join("\n");
}

export function formatHelp(pollIntervalSeconds: number, trackingUrlTemplate: string): string {
  const example = trackingUrlTemplate.replace("{track}", "94044975-0220-1");
  const minutes = Math.max(1, Math.round(pollIntervalSeconds / 60));
  return [
    "Send a tracking link like:",
    example,
    "or just the number: 94044975-0220-1",
    "",
    "Commands:",
    "/add <tracking_number>",
    "/list",
    "/remove <tracking_number>",
    "/debug <tracking_number>",
    "",
    `Statuses are re-checked every ${minutes} min; you get a message only when one changes.`
  ].join("\n");
}
