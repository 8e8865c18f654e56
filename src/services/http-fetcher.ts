import { setTimeout as sleep } from "node:timers/promises";
import { Agent, Dispatcher, request } from "undici";
import { FetchError, toFetchError } from "../errors.js";
import {
  BROWSER_ACCEPT_LANGUAGE,
  BROWSER_USER_AGENT,
  PageFetcher,
  PageResult,
  trackingUrl,
  uniqueNumbers
} from "./page-fetcher.js";

export type HttpPageFetcherOptions = {
  urlTemplate: string;
  timeoutMs: number;
  maxAttempts?: number;
  retryBaseDelayMs?: number;
  createDispatcher?: () => Dispatcher;
};

type RawResponse = {
  statusCode: number;
  body: string;
  retryAfterSeconds?: string;
};

export class HttpPageFetcher implements PageFetcher {
  private readonly maxAttempts: number;
  private readonly retryBaseDelayMs: number;
  private readonly createDispatcher: () => Dispatcher;

  constructor(private readonly options: HttpPageFetcherOptions) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
    this.createDispatcher =
      options.createDispatcher ?? (() => new Agent({ keepAliveTimeout: 10_000, connections: 2 }));
  }

  async fetch(trackingNumber: string): Promise<string> {
    return this.withDispatcher((dispatcher) => this.load(dispatcher, trackingNumber));
  }

  async fetchMany(trackingNumbers: readonly string[]): Promise<Map<string, PageResult>> {
    return this.withDispatcher(async (dispatcher) => {
      const results = new Map<string, PageResult>();
      for (const trackingNumber of uniqueNumbers(trackingNumbers)) {
        try {
          results.set(trackingNumber, { ok: true, content: await this.load(dispatcher, trackingNumber) });
        } catch (error) {
          results.set(trackingNumber, { ok: false, error: toFetchError(trackingNumber, error) });
        }
      }
      return results;
    });
  }

  private async withDispatcher<T>(run: (dispatcher: Dispatcher) => Promise<T>): Promise<T> {
    const dispatcher = this.createDispatcher();
    try {
      return await run(dispatcher);
    } finally {
      await dispatcher.close();
    }
  }

  private async load(dispatcher: Dispatcher, trackingNumber: string): Promise<string> {
    const url = trackingUrl(this.options.urlTemplate, trackingNumber);

    for (let attempt = 1; ; attempt += 1) {
      const result = await this.get(dispatcher, url, trackingNumber);
      if (result.statusCode >= 200 && result.statusCode < 300) {
        return result.body;
      }

      const retryable = result.statusCode === 429 || result.statusCode >= 500;
      if (!retryable || attempt >= this.maxAttempts) {
        throw new FetchError(trackingNumber, `tracking page request failed (${result.statusCode})`, {
          statusCode: result.statusCode,
          body: result.body
        });
      }

      const retryAfter = Number(result.retryAfterSeconds);
      const backoffMs = Number.isFinite(retryAfter) && result.retryAfterSeconds
        ? retryAfter * 1000
        : this.retryBaseDelayMs * 2 ** (attempt - 1);
      await sleep(Math.min(backoffMs, this.options.timeoutMs));
    }
  }

  private async get(dispatcher: Dispatcher, url: string, trackingNumber: string): Promise<RawResponse> {
    try {
      const response = await request(url, {
        method: "GET",
        dispatcher,
        headers: {
          accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
          "accept-language": BROWSER_ACCEPT_LANGUAGE,
          "user-agent": BROWSER_USER_AGENT
        },
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs,
        signal: AbortSignal.timeout(this.options.timeoutMs)
      });

      const body = await response.body.text();
      const retryAfterHeader = response.headers["retry-after"];
      const retryAfterSeconds = Array.isArray(retryAfterHeader) ? retryAfterHeader[0] : retryAfterHeader;

      return { statusCode: response.statusCode, body, retryAfterSeconds };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new FetchError(trackingNumber, `tracking page request failed: ${message}`, { cause: error });
    }
  }
}
