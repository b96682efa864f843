import { createHash } from 'node:crypto';
import type { Redis } from 'ioredis';
import type { Source } from '../config/crawler.js';
import { discardBody, documentHeaders, type HttpClient } from '../discovery/http.js';
import { logger } from '../observability/logger.js';
import { CircuitOpenError, type CircuitBreaker } from '../resilience/circuit-breaker.js';
import { systemClock, type Clock } from '../resilience/clock.js';
import type { SourceThrottle } from '../resilience/throttler.js';
import type { RenderedFetcher } from './renderer.js';
import { errorMessage } from './types.js';

const log = logger.child({ module: 'fetcher' });

export interface DocumentCache {
  get(url: string): Promise<string | null>;
  set(url: string, html: string, ttlSeconds: number): Promise<void>;
}

function cacheKey(url: string): string {
  return `crawl:html:${createHash('md5').update(url).digest('hex')}`;
}

export class RedisDocumentCache implements DocumentCache {
  constructor(private readonly redis: Redis) {}

  get(url: string): Promise<string | null> {
    return this.redis.get(cacheKey(url));
  }

  async set(url: string, html: string, ttlSeconds: number): Promise<void> {
    await this.redis.set(cacheKey(url), html, 'EX', ttlSeconds);
  }
}

export class MemoryDocumentCache implements DocumentCache {
  private readonly entries = new Map<string, { html: string; expiresAt: number }>();

  constructor(private readonly clock: Clock = systemClock) {}

  async get(url: string): Promise<string | null> {
    const entry = this.entries.get(cacheKey(url));
    if (!entry) return null;
    if (entry.expiresAt <= this.clock()) {
      this.entries.delete(cacheKey(url));
      return null;
    }
    return entry.html;
  }

  async set(url: string, html: string, ttlSeconds: number): Promise<void> {
    this.entries.set(cacheKey(url), { html, expiresAt: this.clock() + ttlSeconds * 1000 });
  }
}

export interface FetchedDocument {
  html: string;
  fromCache: boolean;
  rendered: boolean;
  /** Whether the primary HTTP request returned a 2xx. */
  httpOk: boolean;
  error?: string;
}

export interface DocumentFetcherOptions {
  throttles: Map<Source, SourceThrottle>;
  cache?: DocumentCache | null;
  renderer?: RenderedFetcher | null;
  renderBreaker: CircuitBreaker;
  cacheTtlSeconds?: number;
  timeoutMs?: number;
}

/**
 * Cache, then a throttled plain GET, then a breaker-guarded browser render when
 * the GET produced nothing.
 */
export class DocumentFetcher {
  private readonly cacheTtlSeconds: number;
  private readonly timeoutMs: number;

  constructor(private readonly options: DocumentFetcherOptions) {
    this.cacheTtlSeconds = options.cacheTtlSeconds ?? 3600;
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  async fetch(source: Source, url: string, client: HttpClient): Promise<FetchedDocument> {
    const cached = await this.readCache(url);
    if (cached) return { html: cached, fromCache: true, rendered: false, httpOk: true };

    const throttle = this.options.throttles.get(source);
    if (throttle && !(await throttle.acquire())) {
      return { html: '', fromCache: false, rendered: false, httpOk: false, error: 'throttled' };
    }

    let html = '';
    let httpOk = false;
    let error: string | undefined;
    try {
      const response = await client.get(url, { headers: documentHeaders(source), timeoutMs: this.timeoutMs });
      if (response.status === 429) {
        await discardBody(response);
        await throttle?.report429();
        error = 'HTTP 429';
      } else if (response.ok) {
        httpOk = true;
        html = await response.text();
        await throttle?.reportSuccess();
      } else {
        await discardBody(response);
        error = `HTTP ${response.status}`;
      }
    } catch (err) {
      error = errorMessage(err);
      log.debug({ err, url }, 'Primary fetch failed');
    }

    let rendered = false;
    if (!html) {
      const fallback = await this.render(url);
      html = fallback.html;
      rendered = html.length > 0;
      if (fallback.error) error = fallback.error;
    }

    if (html) {
      await this.writeCache(url, html);
      error = undefined;
    }
    return { html, fromCache: false, rendered, httpOk, error };
  }

  private async render(url: string): Promise<{ html: string; error?: string }> {
    const { renderer, renderBreaker } = this.options;
    if (!renderer) return { html: '' };
    try {
      return { html: await renderBreaker.call(() => renderer.fetchRendered(url)) };
    } catch (err) {
      if (err instanceof CircuitOpenError) {
        log.debug({ url }, 'Rendering skipped, breaker open');
      } else {
        log.warn({ err, url }, 'Rendering fallback failed');
      }
      return { html: '', error: errorMessage(err) };
    }
  }

  private async readCache(url: string): Promise<string | null> {
    if (!this.options.cache) return null;
    try {
      return await this.options.cache.get(url);
    } catch (err) {
      log.warn({ err, url }, 'Document cache read failed');
      return null;
    }
  }

  private async writeCache(url: string, html: string): Promise<void> {
    if (!this.options.cache) return;
    try {
      await this.options.cache.set(url, html, this.cacheTtlSeconds);
    } catch (err) {
      log.warn({ err, url }, 'Document cache write failed');
    }
  }
}
