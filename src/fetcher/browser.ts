/**
 * Headless browser fetcher for boards that render their list client-side.
 * playwright-core ships no browser; point BROWSER_EXECUTABLE_PATH at a
 * Chromium build or rely on an installed Chrome channel.
 */

import * as cheerio from 'cheerio';
import { chromium } from 'playwright-core';
import { FetchError, toErrorMessage } from '../utils/errors';
import { logger as rootLogger, type Logger } from '../utils/logger';
import { DEFAULT_FETCH_HEADERS, type FetchOptions, type FetchedPage, type PageFetcher } from './types';

// The slice of the playwright API this fetcher drives
export interface BrowserPage {
  goto(url: string, options: { timeout: number; waitUntil: 'domcontentloaded' }): Promise<unknown>;
  waitForSelector(selector: string, options: { timeout: number }): Promise<unknown>;
  waitForTimeout(timeout: number): Promise<void>;
  content(): Promise<string>;
  url(): string;
}

export interface BrowserHandle {
  newContext(options: { userAgent: string; ignoreHTTPSErrors: boolean; locale: string }): Promise<{
    newPage(): Promise<BrowserPage>;
  }>;
  close(): Promise<void>;
}

export interface BrowserPageFetcherOptions {
  navigationTimeoutMs?: number;
  waitTimeoutMs?: number;
  settleMs?: number;
  executablePath?: string;
  /** Replaces chromium.launch, used by tests */
  launch?: () => Promise<BrowserHandle>;
  logger?: Logger;
}

export class BrowserPageFetcher implements PageFetcher {
  private readonly navigationTimeoutMs: number;
  private readonly waitTimeoutMs: number;
  private readonly settleMs: number;
  private readonly launch: () => Promise<BrowserHandle>;
  private readonly logger: Logger;

  constructor(options: BrowserPageFetcherOptions = {}) {
    this.navigationTimeoutMs = options.navigationTimeoutMs ?? 30_000;
    this.waitTimeoutMs = options.waitTimeoutMs ?? 10_000;
    this.settleMs = options.settleMs ?? 2_000;
    this.logger = options.logger ?? rootLogger.child('[browser]');
    const executablePath = options.executablePath;
    this.launch =
      options.launch ??
      (() =>
        chromium.launch({
          headless: true,
          ...(executablePath ? { executablePath } : { channel: 'chrome' }),
          args: ['--no-sandbox', '--disable-dev-shm-usage'],
        }));
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchedPage> {
    let browser: BrowserHandle | undefined;
    try {
      browser = await this.launch();
      const context = await browser.newContext({
        userAgent: DEFAULT_FETCH_HEADERS['User-Agent'],
        ignoreHTTPSErrors: true,
        locale: 'ko-KR',
      });
      const page = await context.newPage();
      await page.goto(url, { timeout: this.navigationTimeoutMs, waitUntil: 'domcontentloaded' });

      if (options.waitSelector) {
        try {
          await page.waitForSelector(options.waitSelector, { timeout: this.waitTimeoutMs });
        } catch (error) {
          // Capture whatever rendered; the adapter decides if it is usable
          this.logger.warn(`Selector "${options.waitSelector}" not found on ${url}`, toErrorMessage(error));
        }
      }
      if (this.settleMs > 0) {
        await page.waitForTimeout(this.settleMs);
      }

      const body = await page.content();
      return { url: page.url() || url, body, $: cheerio.load(body) };
    } catch (error) {
      throw new FetchError(`Browser fetch failed for ${url}: ${toErrorMessage(error)}`, {
        url,
        reason: 'browser',
        cause: error,
      });
    } finally {
      if (browser) {
        await browser.close().catch(error => this.logger.warn('Failed to close browser', toErrorMessage(error)));
      }
    }
  }
}
