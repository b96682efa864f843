import { describe, it, expect } from 'vitest';
import type { Source } from '../../config/crawler.js';
import { CircuitBreaker } from '../../resilience/circuit-breaker.js';
import { MemoryThrottleStore } from '../../resilience/throttle-store.js';
import { Throttler, type SourceThrottle } from '../../resilience/throttler.js';
import { DocumentFetcher, MemoryDocumentCache, type DocumentCache } from '../fetcher.js';
import type { RenderedFetcher } from '../renderer.js';
import { FakeClock, FakeHttpClient, htmlResponse } from '../../__tests__/fakes.js';

const URL_A = 'https://www.104.com.tw/job/a1';
const URL_B = 'https://www.104.com.tw/job/b2';

class StubRenderer implements RenderedFetcher {
  calls: string[] = [];
  constructor(private readonly result: string | Error) {}

  async fetchRendered(url: string): Promise<string> {
    this.calls.push(url);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }

  async close(): Promise<void> {}
}

function setup(options: { capacity?: number; renderer?: RenderedFetcher; cache?: DocumentCache; breakerThreshold?: number } = {}) {
  const clock = new FakeClock();
  const throttler = new Throttler(new MemoryThrottleStore(clock.now), { clock: clock.now, sleep: clock.sleep });
  const throttle = throttler.forKey('platform_104', {
    rate: 5,
    capacity: options.capacity ?? 20,
    timeoutMs: 0,
    cooldownSeconds: 300,
  });
  const cache = options.cache ?? new MemoryDocumentCache(clock.now);
  const renderBreaker = new CircuitBreaker('rendering', {
    failureThreshold: options.breakerThreshold ?? 10,
    recoveryTimeoutMs: 30_000,
    clock: clock.now,
  });
  const fetcher = new DocumentFetcher({
    throttles: new Map<Source, SourceThrottle>([['platform_104', throttle]]),
    cache,
    renderer: options.renderer,
    renderBreaker,
  });
  return { clock, throttler, throttle, cache, renderBreaker, fetcher };
}

describe('DocumentFetcher', () => {
  it('serves a cached document without a request', async () => {
    const { fetcher, cache } = setup();
    await cache.set(URL_A, '<html>cached</html>', 60);
    const client = new FakeHttpClient(() => htmlResponse('<html>fresh</html>'));

    const doc = await fetcher.fetch('platform_104', URL_A, client);

    expect(doc).toEqual({ html: '<html>cached</html>', fromCache: true, rendered: false, httpOk: true });
    expect(client.calls).toHaveLength(0);
  });

  it('fetches with the source headers and caches the body', async () => {
    const { fetcher, cache } = setup();
    const client = new FakeHttpClient(() => htmlResponse('<html>fresh</html>'));

    const doc = await fetcher.fetch('platform_104', URL_A, client);

    expect(doc).toEqual({ html: '<html>fresh</html>', fromCache: false, rendered: false, httpOk: true, error: undefined });
    expect(client.calls[0].options?.headers?.['User-Agent']).toContain('facebookexternalhit');
    expect(await cache.get(URL_A)).toBe('<html>fresh</html>');
  });

  it('starts a cooldown on 429', async () => {
    const { fetcher, throttler } = setup();
    const client = new FakeHttpClient(() => htmlResponse('slow down', 429));

    const doc = await fetcher.fetch('platform_104', URL_A, client);

    expect(doc.html).toBe('');
    expect(doc.error).toBe('HTTP 429');
    expect(await throttler.isCooling('platform_104')).toBe(true);
  });

  it('releases the body of a rejected response before falling back', async () => {
    const limited = htmlResponse('<html>slow down</html>', 429);
    const missing = htmlResponse('<html>not found</html>', 404);

    const first = await setup().fetcher.fetch('platform_104', URL_A, new FakeHttpClient(() => limited));
    const second = await setup().fetcher.fetch('platform_104', URL_B, new FakeHttpClient(() => missing));

    expect(first).toMatchObject({ html: '', httpOk: false, error: 'HTTP 429' });
    expect(second).toMatchObject({ html: '', httpOk: false, error: 'HTTP 404' });
    expect(limited.bodyUsed).toBe(true);
    expect(missing.bodyUsed).toBe(true);
  });

  it('returns a throttled result without requesting when no token arrives in time', async () => {
    const { fetcher, throttle } = setup({ capacity: 1 });
    await throttle.acquire();
    const client = new FakeHttpClient(() => htmlResponse('<html></html>'));

    const doc = await fetcher.fetch('platform_104', URL_A, client);

    expect(doc).toEqual({ html: '', fromCache: false, rendered: false, httpOk: false, error: 'throttled' });
    expect(client.calls).toHaveLength(0);
  });

  it('falls back to rendering when the plain request fails', async () => {
    const renderer = new StubRenderer('<html>rendered</html>');
    const { fetcher, cache } = setup({ renderer });
    const client = new FakeHttpClient(() => htmlResponse('unavailable', 503));

    const doc = await fetcher.fetch('platform_104', URL_A, client);

    expect(doc).toEqual({ html: '<html>rendered</html>', fromCache: false, rendered: true, httpOk: false, error: undefined });
    expect(renderer.calls).toEqual([URL_A]);
    expect(await cache.get(URL_A)).toBe('<html>rendered</html>');
  });

  it('reports the render failure when both paths fail', async () => {
    const { fetcher } = setup({ renderer: new StubRenderer(new Error('browser crashed')) });
    const client = new FakeHttpClient(() => new Error('ECONNRESET'));

    const doc = await fetcher.fetch('platform_104', URL_A, client);

    expect(doc.html).toBe('');
    expect(doc.rendered).toBe(false);
    expect(doc.error).toBe('browser crashed');
  });

  it('skips the renderer while its breaker is open', async () => {
    const renderer = new StubRenderer(new Error('browser crashed'));
    const { fetcher, renderBreaker } = setup({ renderer, breakerThreshold: 1 });
    const client = new FakeHttpClient(() => htmlResponse('', 500));

    await fetcher.fetch('platform_104', URL_A, client);
    const doc = await fetcher.fetch('platform_104', URL_B, client);

    expect(renderBreaker.currentState).toBe('OPEN');
    expect(renderer.calls).toEqual([URL_A]);
    expect(doc.error).toBe('Circuit breaker [rendering] is OPEN');
  });

  it('treats a failing cache as a miss', async () => {
    const cache: DocumentCache = {
      get: () => Promise.reject(new Error('redis down')),
      set: () => Promise.reject(new Error('redis down')),
    };
    const { fetcher } = setup({ cache });
    const client = new FakeHttpClient(() => htmlResponse('<html>fresh</html>'));

    const doc = await fetcher.fetch('platform_104', URL_A, client);

    expect(doc.html).toBe('<html>fresh</html>');
    expect(client.calls).toHaveLength(1);
  });
});

describe('MemoryDocumentCache', () => {
  it('expires entries after their TTL', async () => {
    const clock = new FakeClock();
    const cache = new MemoryDocumentCache(clock.now);
    await cache.set(URL_A, 'html', 10);

    clock.advance(9_999);
    expect(await cache.get(URL_A)).toBe('html');
    clock.advance(1);
    expect(await cache.get(URL_A)).toBeNull();
  });
});
