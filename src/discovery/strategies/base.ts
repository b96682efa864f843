import pLimit from 'p-limit';
import type { Source } from '../../config/crawler.js';
import { logger } from '../../observability/logger.js';
import { sleep as defaultSleep, type Sleep } from '../../resilience/clock.js';
import type { SourceThrottle } from '../../resilience/throttler.js';
import {
  HttpError,
  RateLimitedError,
  ThrottledError,
  discardBody,
  randomUserAgent,
  type HttpClient,
} from '../http.js';

export interface CategoryRef {
  layer3Id: string;
  layer3Name: string;
}

export interface DiscoveryStrategy {
  readonly source: Source;
  discover(client: HttpClient, categoryId: string, limit?: number): Promise<string[]>;
  /** Strips volatile parts so repeated discovery converges on the same URL set. */
  normalizeUrl(url: string): string;
  /** The value the listing endpoint expects for a category. */
  categoryParam(category: CategoryRef): string;
}

export interface StrategyOptions {
  throttle?: SourceThrottle;
  retryCount?: number;
  backoffBase?: number;
  pageConcurrency?: number;
  maxPages?: number;
  requestTimeoutMs?: number;
  sleep?: Sleep;
}

const RATE_LIMIT_STATUSES = new Set([429, 449]);

export abstract class BaseDiscoveryStrategy implements DiscoveryStrategy {
  abstract readonly source: Source;

  protected readonly throttle?: SourceThrottle;
  protected readonly retryCount: number;
  protected readonly backoffBase: number;
  protected readonly pageConcurrency: number;
  protected readonly maxPages: number;
  protected readonly requestTimeoutMs: number;
  protected readonly sleep: Sleep;

  constructor(options: StrategyOptions = {}) {
    this.throttle = options.throttle;
    this.retryCount = options.retryCount ?? 3;
    this.backoffBase = options.backoffBase ?? 2;
    this.pageConcurrency = options.pageConcurrency ?? 5;
    this.maxPages = options.maxPages ?? 10;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
    this.sleep = options.sleep ?? defaultSleep;
  }

  abstract discover(client: HttpClient, categoryId: string, limit?: number): Promise<string[]>;

  protected get log() {
    return logger.child({ module: `discovery:${this.source}` });
  }

  normalizeUrl(url: string): string {
    try {
      const parsed = new URL(url);
      parsed.search = '';
      parsed.hash = '';
      return parsed.toString();
    } catch {
      return url.split(/[?#]/)[0];
    }
  }

  categoryParam(category: CategoryRef): string {
    return category.layer3Id;
  }

  /**
   * GET with throttling and retries. Rate-limit responses back off for
   * `backoffBase^(attempt+1)` seconds, transport errors and 5xx for
   * `backoffBase^attempt` seconds. Other 4xx responses fail immediately.
   */
  protected async getWithRetry(
    client: HttpClient,
    url: string,
    headers: Record<string, string> = {},
  ): Promise<Response> {
    for (let attempt = 0; attempt < this.retryCount; attempt++) {
      const isLast = attempt === this.retryCount - 1;

      if (this.throttle && !(await this.throttle.acquire())) {
        throw new ThrottledError(this.throttle.key);
      }

      let response: Response;
      try {
        response = await client.get(url, {
          headers: { 'User-Agent': randomUserAgent(), ...headers },
          timeoutMs: this.requestTimeoutMs,
        });
      } catch (err) {
        this.log.warn({ err, url, attempt: attempt + 1 }, 'Listing request failed');
        if (isLast) throw err;
        await this.sleep(this.backoffBase ** attempt * 1000);
        continue;
      }

      if (RATE_LIMIT_STATUSES.has(response.status)) {
        this.log.debug({ url, status: response.status, attempt: attempt + 1 }, 'Listing rate limited');
        await discardBody(response);
        if (!isLast) await this.sleep(this.backoffBase ** (attempt + 1) * 1000);
        continue;
      }

      if (response.status >= 500 && !isLast) {
        this.log.warn({ url, status: response.status, attempt: attempt + 1 }, 'Listing server error');
        await discardBody(response);
        await this.sleep(this.backoffBase ** attempt * 1000);
        continue;
      }

      if (!response.ok) {
        await discardBody(response);
        throw new HttpError(response.status, url);
      }

      await this.throttle?.reportSuccess();
      return response;
    }

    await this.throttle?.report429();
    throw new RateLimitedError(url, this.retryCount);
  }

  /**
   * Fetches the given pages with at most `pageConcurrency` in flight. A failed
   * page is logged and skipped; results keep page order.
   */
  protected async fetchPages(
    pages: number[],
    fetchPage: (page: number) => Promise<string[]>,
  ): Promise<string[]> {
    const limit = pLimit(this.pageConcurrency);
    const settled = await Promise.allSettled(pages.map(page => limit(() => fetchPage(page))));

    const urls: string[] = [];
    settled.forEach((result, i) => {
      if (result.status === 'fulfilled') {
        urls.push(...result.value);
      } else {
        this.log.error({ err: result.reason, page: pages[i] }, 'Listing page failed');
      }
    });
    return urls;
  }

  /**
   * Normalizes and dedupes in first-seen order, then caps at `limit`. Limit
   * checks run on this result so repeated postings never take a slot.
   */
  protected collect(urls: string[], limit?: number): string[] {
    const seen = new Set<string>();
    for (const url of urls) {
      if (url) seen.add(this.normalizeUrl(url));
    }
    const unique = [...seen];
    return limit !== undefined ? unique.slice(0, limit) : unique;
  }

  protected reached(urls: string[], limit?: number): boolean {
    return limit !== undefined && urls.length >= limit;
  }

  /** Pages `from..to` needed to reach `limit`, given the first page's size. */
  protected remainingPages(lastPage: number, collected: number, pageSize: number, limit?: number): number[] {
    let to = Math.min(lastPage, this.maxPages);
    if (limit !== undefined && pageSize > 0) {
      to = Math.min(to, 1 + Math.ceil(Math.max(0, limit - collected) / pageSize));
    }
    const pages: number[] = [];
    for (let page = 2; page <= to; page++) pages.push(page);
    return pages;
  }
}

