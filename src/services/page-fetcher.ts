import { FetchError } from "../errors.js";

export type PageResult = { ok: true; content: string } | { ok: false; error: FetchError };

export interface PageFetcher {
  fetch(trackingNumber: string): Promise<string>;
  // Failures are reported per number, never thrown.
  fetchMany(trackingNumbers: readonly string[]): Promise<Map<string, PageResult>>;
}

export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export const BROWSER_ACCEPT_LANGUAGE = "ru-RU,ru;q=0.9,en-US;q=0.8,en;q=0.7";

export function trackingUrl(template: string, trackingNumber: string): string {
  return template.replace("{track}", encodeURIComponent(trackingNumber));
}

export function uniqueNumbers(trackingNumbers: readonly string[]): string[] {
  return [...new Set(trackingNumbers)];
}
