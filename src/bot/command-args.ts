// Accepts a bare number or a pasted tracking link (`...?track=94044975-0220-1`).
const TRACKING_NUMBER_RE = /(?:[?&]track=)?(\d[\d-]{4,}\d)/i;

export function parseTrackingNumber(text: string): string | undefined {
  const match = TRACKING_NUMBER_RE.exec(text);
  return match?.[1];
}

export function commandArgument(text: string): string {
  return text.trim().split(/\s+/).slice(1).join(" ").trim();
}
