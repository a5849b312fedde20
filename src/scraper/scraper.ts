import {
  chromium,
  firefox,
  webkit,
  type Browser,
  type BrowserType,
} from "playwright-core";
import type { ScraperSettings } from "../config/schema.js";
import { log } from "../utils/logger.js";
import { extractPageData } from "./extract.js";
import type { PageScraper, ScrapeOptions, ScrapeResult } from "./types.js";

const BROWSERS: Record<string, BrowserType> = {
  chrome: chromium,
  chromium,
  edge: chromium,
  firefox,
  webkit,
};

export function browserTypeFor(name: string): BrowserType {
  const browserType = BROWSERS[name.toLowerCase()];
  if (!browserType) {
    throw new Error(`Unsupported browser: ${name}`);
  }
  return browserType;
}

/**
 * Loads pages in a real browser and extracts their structure. The browser
 * is launched on the first scrape and kept until `close()`.
 */
export class WebScraper implements PageScraper {
  private browser: Browser | undefined;

  constructor(private readonly settings: ScraperSettings) {}

  private async ensureBrowser(headless: boolean): Promise<Browser> {
    if (!this.browser || !this.browser.isConnected()) {
      this.browser = await browserTypeFor(this.settings.browser).launch({ headless });
      log.debug(`Browser launched: ${this.settings.browser} (headless=${headless})`);
    }
    return this.browser;
  }

  async scrape(url: string, options: ScrapeOptions): Promise<ScrapeResult> {
    const browser = await this.ensureBrowser(options.headless);
    const context = await browser.newContext({
      userAgent: this.settings.user_agent,
      viewport: { width: 1920, height: 1080 },
    });
    const timeout = this.settings.timeout * 1000;
    const start = Date.now();

    try {
      const page = await context.newPage();
      log.debug(`Navigating to ${url}`);

      const response = await page.goto(url, { waitUntil: "domcontentloaded", timeout });
      await page.waitForSelector("body", { state: "attached", timeout });
      // Give client-side frameworks time to render
      await page.waitForTimeout(this.settings.wait_time * 1000);

      const html = await page.content();
      const extracted = await page.evaluate(extractPageData, url);

      return {
        url,
        html,
        ...extracted,
        loadTime: Date.now() - start,
        statusCode: response?.status() ?? 200,
      };
    } finally {
      await context.close().catch((error: unknown) => {
        log.debug(`Browser context close failed: ${String(error)}`);
      });
    }
  }

  async close(): Promise<void> {
    if (this.browser) {
      const browser = this.browser;
      this.browser = undefined;
      await browser.close();
      log.debug("Browser closed");
    }
  }
}
