import { FetchError, toFetchError } from "../errors.js";
import { logger } from "../logger.js";
import { ExtractionResult } from "../types.js";
import { PageFetcher, PageResult } from "./page-fetcher.js";
import { extractStatus } from "./status-extractor.js";

export class StatusChecker {
  constructor(private readonly fetcher: PageFetcher) {}

  async check(trackingNumber: string): Promise<ExtractionResult> {
    try {
      const content = await this.fetcher.fetch(trackingNumber);
      return extractStatus(content);
    } catch (error) {
      return fromFetchError(toFetchError(trackingNumber, error));
    }
  }

  async checkMany(trackingNumbers: readonly string[]): Promise<Map<string, ExtractionResult>> {
    const pages = await this.fetcher.fetchMany(trackingNumbers);
    const results = new Map<string, ExtractionResult>();
    for (const [trackingNumber, page] of pages) {
      results.set(trackingNumber, fromPage(page));
    }
    return results;
  }
}

export function fromPage(page: PageResult): ExtractionResult {
  return page.ok ? extractStatus(page.content) : fromFetchError(page.error);
}

// A rejected response can still be an anti-bot page; those count as blocked.
export function fromFetchError(error: FetchError): ExtractionResult {
  if (error.body) {
    const fromBody = extractStatus(error.body);
    if (fromBody.status === "blocked") {
      return fromBody;
    }
  }

  logger.warn(
    { trackingNumber: error.trackingNumber, statusCode: error.statusCode, err: error },
    "tracking page fetch failed"
  );
  return { status: "unknown", reason: "fetch-error", detail: error.message };
}
