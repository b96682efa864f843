import pLimit, { type LimitFunction } from 'p-limit';
import { chromium, type Browser } from 'playwright-core';
import { USER_AGENTS } from '../discovery/http.js';
import { logger } from '../observability/logger.js';

const log = logger.child({ module: 'renderer' });

export interface RenderedFetcher {
  fetchRendered(url: string): Promise<string>;
  close(): Promise<void>;
}

export interface BrowserRendererOptions {
  endpoint: string;
  maxContexts?: number;
  timeoutMs?: number;
  /** Extra settle time after DOMContentLoaded for client-side rendering. */
  settleMs?: number;
}

/**
 * Renders pages in a remote Chromium over CDP. Each fetch gets its own browser
 * context; at most `maxContexts` exist at once and further requests queue.
 */
export class BrowserRenderer implements RenderedFetcher {
  private browser: Promise<Browser> | null = null;
  private readonly limit: LimitFunction;
  private readonly timeoutMs: number;
  private readonly settleMs: number;

  constructor(private readonly options: BrowserRendererOptions) {
    this.limit = pLimit(options.maxContexts ?? 5);
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.settleMs = options.settleMs ?? 2_000;
  }

  fetchRendered(url: string): Promise<string> {
    return this.limit(async () => {
      const browser = await this.connect();
      const context = await browser.newContext({
        userAgent: USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)],
        viewport: { width: 1920, height: 1080 },
      });
      try {
        const page = await context.newPage();
        await page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.timeoutMs });
        if (this.settleMs > 0) await page.waitForTimeout(this.settleMs);
        return await page.content();
      } finally {
        await context.close();
      }
    });
  }

  async close(): Promise<void> {
    if (!this.browser) return;
    const pending = this.browser;
    this.browser = null;
    try {
      await (await pending).close();
      log.info('Browser connection closed');
    } catch (err) {
      log.warn({ err }, 'Failed to close browser connection');
    }
  }

  private connect(): Promise<Browser> {
    if (!this.browser) {
      const endpoint = this.options.endpoint.replace(/^ws:/, 'http:').replace(/^wss:/, 'https:');
      log.info({ endpoint }, 'Connecting to browser over CDP');
      const connecting = chromium.connectOverCDP(endpoint, { timeout: 30_000 });
      this.browser = connecting;
      // A failed connect or a dropped connection is retried by the next fetch.
      const forget = () => {
        if (this.browser === connecting) this.browser = null;
      };
      void connecting.then(
        browser =>
          browser.on('disconnected', () => {
            if (this.browser === connecting) log.warn({ endpoint }, 'Browser disconnected');
            forget();
          }),
        forget,
      );
    }
    return this.browser;
  }
}
