import { chromium } from "playwright-core";
import { FetchError, toFetchError } from "../errors.js";
import { logger } from "../logger.js";
import {
  BROWSER_ACCEPT_LANGUAGE,
  BROWSER_USER_AGENT,
  PageFetcher,
  PageResult,
  trackingUrl,
  uniqueNumbers
} from "./page-fetcher.js";

// Playwright's Browser/BrowserContext/Page satisfy these structurally.
export interface RenderedPage {
  goto(url: string, options: { waitUntil: "networkidle"; timeout: number }): Promise<{ status(): number } | null>;
  waitForTimeout(timeout: number): Promise<void>;
  innerText(selector: string, options: { timeout: number }): Promise<string>;
  close(): Promise<void>;
}

export interface BrowserSession {
  newPage(): Promise<RenderedPage>;
  close(): Promise<void>;
}

export interface BrowserHandle {
  newContext(options: {
    userAgent: string;
    locale: string;
    viewport: { width: number; height: number };
    extraHTTPHeaders: Record<string, string>;
  }): Promise<BrowserSession>;
  close(): Promise<void>;
}

export type BrowserLauncher = () => Promise<BrowserHandle>;

export type BrowserPageFetcherOptions = {
  urlTemplate: string;
  timeoutMs: number;
  settleMs: number;
  executablePath?: string;
  launch?: BrowserLauncher;
};

export class BrowserPageFetcher implements PageFetcher {
  private readonly launch: BrowserLauncher;

  constructor(private readonly options: BrowserPageFetcherOptions) {
    this.launch =
      options.launch ??
      (() =>
        chromium.launch({
          headless: true,
          executablePath: options.executablePath,
          args: ["--disable-blink-features=AutomationControlled"]
        }));
  }

  async fetch(trackingNumber: string): Promise<string> {
    try {
      return await this.withSession((session) => this.render(session, trackingNumber));
    } catch (error) {
      throw toFetchError(trackingNumber, error);
    }
  }

  async fetchMany(trackingNumbers: readonly string[]): Promise<Map<string, PageResult>> {
    const numbers = uniqueNumbers(trackingNumbers);
    const results = new Map<string, PageResult>();
    if (numbers.length === 0) {
      return results;
    }

    try {
      await this.withSession(async (session) => {
        for (const trackingNumber of numbers) {
          try {
            results.set(trackingNumber, { ok: true, content: await this.render(session, trackingNumber) });
          } catch (error) {
            results.set(trackingNumber, { ok: false, error: toFetchError(trackingNumber, error) });
          }
        }
      });
    } catch (error) {
      logger.warn({ err: error, count: numbers.length }, "browser session failed");
      for (const trackingNumber of numbers) {
        if (!results.has(trackingNumber)) {
          results.set(trackingNumber, { ok: false, error: toFetchError(trackingNumber, error) });
        }
      }
    }

    return results;
  }

  async withSession<T>(run: (session: BrowserSession) => Promise<T>): Promise<T> {
    const browser = await this.launch();
    try {
      const session = await browser.newContext({
        userAgent: BROWSER_USER_AGENT,
        locale: "ru-RU",
        viewport: { width: 1280, height: 800 },
        extraHTTPHeaders: { "accept-language": BROWSER_ACCEPT_LANGUAGE }
      });
      try {
        return await run(session);
      } finally {
        await session.close();
      }
    } finally {
      await browser.close();
    }
  }

  private async render(session: BrowserSession, trackingNumber: string): Promise<string> {
    const page = await session.newPage();
    try {
      const url = trackingUrl(this.options.urlTemplate, trackingNumber);
      const response = await page.goto(url, { waitUntil: "networkidle", timeout: this.options.timeoutMs });
      await page.waitForTimeout(this.options.settleMs);
      const text = await page.innerText("body", { timeout: this.options.timeoutMs });

      const statusCode = response?.status();
      if (statusCode !== undefined && (statusCode < 200 || statusCode >= 300)) {
        throw new FetchError(trackingNumber, `tracking page responded with ${statusCode}`, {
          statusCode,
          body: text
        });
      }
      return text;
    } finally {
      await page.close();
    }
  }
}
