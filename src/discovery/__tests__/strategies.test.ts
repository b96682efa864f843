import { describe, it, expect } from 'vitest';
import { HttpError, RateLimitedError, ThrottledError, USER_AGENTS } from '../http.js';
import { CakeresumeStrategy, extractPostingLinks } from '../strategies/cakeresume.js';
import { Platform104Strategy } from '../strategies/platform104.js';
import { Platform1111Strategy } from '../strategies/platform1111.js';
import { Yes123Strategy } from '../strategies/yes123.js';
import { YouratorStrategy } from '../strategies/yourator.js';
import { MemoryThrottleStore } from '../../resilience/throttle-store.js';
import { Throttler } from '../../resilience/throttler.js';
import { FakeClock, FakeHttpClient, htmlResponse, jsonResponse } from '../../__tests__/fakes.js';

function pageOf(url: string, param = 'page'): number {
  return Number(new URL(url).searchParams.get(param));
}

function listing104(page: number, count: number, lastPage: number) {
  return {
    data: Array.from({ length: count }, (_, i) => ({ link: { job: `//www.104.com.tw/job/p${page}j${i}` } })),
    metadata: { pagination: { lastPage } },
  };
}

describe('Platform104Strategy', () => {
  it('fetches the first page, then fans out the remaining pages in order', async () => {
    const clock = new FakeClock();
    const client = new FakeHttpClient(url => jsonResponse(listing104(pageOf(url), 2, 3)));
    const strategy = new Platform104Strategy({ sleep: clock.sleep, maxPages: 50 });

    const urls = await strategy.discover(client, '2007001004');

    expect(urls).toEqual([
      'https://www.104.com.tw/job/p1j0',
      'https://www.104.com.tw/job/p1j1',
      'https://www.104.com.tw/job/p2j0',
      'https://www.104.com.tw/job/p2j1',
      'https://www.104.com.tw/job/p3j0',
      'https://www.104.com.tw/job/p3j1',
    ]);
    expect(client.calls[0].url).toBe(
      'https://www.104.com.tw/jobs/search/api/jobs?jobcat=2007001004&page=1&pagesize=20',
    );
    expect(client.calls[0].options?.headers?.Referer).toBe('https://www.104.com.tw/');
    expect(USER_AGENTS).toContain(client.calls[0].options?.headers?.['User-Agent']);
  });

  it('stops after the first page when it already satisfies the limit', async () => {
    const client = new FakeHttpClient(url => jsonResponse(listing104(pageOf(url), 20, 10)));
    const strategy = new Platform104Strategy({ sleep: new FakeClock().sleep });

    const urls = await strategy.discover(client, 'c', 5);

    expect(urls).toHaveLength(5);
    expect(client.calls).toHaveLength(1);
  });

  it('only fetches the pages the limit needs', async () => {
    const client = new FakeHttpClient(url => jsonResponse(listing104(pageOf(url), 20, 10)));
    const strategy = new Platform104Strategy({ sleep: new FakeClock().sleep, maxPages: 50 });

    const urls = await strategy.discover(client, 'c', 25);

    expect(urls).toHaveLength(25);
    expect(client.calls.map(c => pageOf(c.url))).toEqual([1, 2]);
  });

  it('counts the limit on distinct postings after normalization', async () => {
    const client = new FakeHttpClient(() =>
      jsonResponse({
        data: [
          { link: { job: '//www.104.com.tw/job/a?jobsource=hot' } },
          { link: { job: '//www.104.com.tw/job/a?jobsource=list' } },
          { link: { job: '//www.104.com.tw/job/b' } },
          { link: { job: '//www.104.com.tw/job/c' } },
        ],
        metadata: { pagination: { lastPage: 1 } },
      }),
    );
    const strategy = new Platform104Strategy({ sleep: new FakeClock().sleep });

    expect(await strategy.discover(client, 'c', 3)).toEqual([
      'https://www.104.com.tw/job/a',
      'https://www.104.com.tw/job/b',
      'https://www.104.com.tw/job/c',
    ]);
  });

  it('keeps paging when duplicates leave the first page short of the limit', async () => {
    const client = new FakeHttpClient(url =>
      pageOf(url) === 1
        ? jsonResponse({
            data: [{ link: { job: '//www.104.com.tw/job/a?x=1' } }, { link: { job: '//www.104.com.tw/job/a?x=2' } }],
            metadata: { pagination: { lastPage: 3 } },
          })
        : jsonResponse(listing104(pageOf(url), 1, 3)),
    );
    const strategy = new Platform104Strategy({ sleep: new FakeClock().sleep });

    expect(await strategy.discover(client, 'c', 2)).toEqual([
      'https://www.104.com.tw/job/a',
      'https://www.104.com.tw/job/p2j0',
    ]);
    expect(client.calls.map(c => pageOf(c.url))).toEqual([1, 2]);
  });

  it('returns nothing for a zero limit', async () => {
    const client = new FakeHttpClient(url => jsonResponse(listing104(pageOf(url), 20, 10)));
    const strategy = new Platform104Strategy({ sleep: new FakeClock().sleep });

    expect(await strategy.discover(client, 'c', 0)).toEqual([]);
    expect(client.calls).toHaveLength(1);
  });

  it('never goes past maxPages', async () => {
    const client = new FakeHttpClient(url => jsonResponse(listing104(pageOf(url), 1, 100)));
    const strategy = new Platform104Strategy({ sleep: new FakeClock().sleep, maxPages: 4 });

    expect(await strategy.discover(client, 'c')).toHaveLength(4);
  });

  it('throws when the first page fails', async () => {
    const client = new FakeHttpClient(() => jsonResponse({}, 404));
    const strategy = new Platform104Strategy({ sleep: new FakeClock().sleep });

    await expect(strategy.discover(client, 'c')).rejects.toBeInstanceOf(HttpError);
  });

  it('skips a later page that keeps failing', async () => {
    const clock = new FakeClock();
    const client = new FakeHttpClient(url =>
      pageOf(url) === 2 ? jsonResponse({}, 503) : jsonResponse(listing104(pageOf(url), 1, 3)),
    );
    const strategy = new Platform104Strategy({ sleep: clock.sleep });

    const urls = await strategy.discover(client, 'c');

    expect(urls).toEqual(['https://www.104.com.tw/job/p1j0', 'https://www.104.com.tw/job/p3j0']);
    expect(clock.sleeps).toEqual([1_000, 2_000]);
  });

  it('retries transport errors with exponential backoff', async () => {
    const clock = new FakeClock();
    let attempts = 0;
    const client = new FakeHttpClient(url => {
      attempts++;
      return attempts < 3 ? new Error('socket hang up') : jsonResponse(listing104(pageOf(url), 1, 1));
    });
    const strategy = new Platform104Strategy({ sleep: clock.sleep });

    expect(await strategy.discover(client, 'c')).toEqual(['https://www.104.com.tw/job/p1j0']);
    expect(clock.sleeps).toEqual([1_000, 2_000]);
  });
});

describe('rate limiting during discovery', () => {
  function throttled(clock: FakeClock, capacity = 20) {
    const throttler = new Throttler(new MemoryThrottleStore(clock.now), { clock: clock.now, sleep: clock.sleep });
    return { throttler, throttle: throttler.forKey('platform_104', { rate: 0.001, capacity, timeoutMs: 0, cooldownSeconds: 300 }) };
  }

  it('backs off on 429 and succeeds on retry', async () => {
    const clock = new FakeClock();
    let attempts = 0;
    const client = new FakeHttpClient(url => {
      attempts++;
      return attempts === 1 ? jsonResponse({}, 429) : jsonResponse(listing104(pageOf(url), 1, 1));
    });
    const strategy = new Platform104Strategy({ sleep: clock.sleep });

    expect(await strategy.discover(client, 'c')).toHaveLength(1);
    expect(clock.sleeps).toEqual([2_000]);
  });

  it('releases the bodies of responses it retries past or rejects', async () => {
    const clock = new FakeClock();
    const served: Response[] = [];
    const client = new FakeHttpClient(url => {
      const response =
        served.length === 0
          ? jsonResponse({}, 429)
          : served.length === 1
            ? jsonResponse({}, 503)
            : jsonResponse(listing104(pageOf(url), 1, 1));
      served.push(response);
      return response;
    });
    const strategy = new Platform104Strategy({ sleep: clock.sleep });

    expect(await strategy.discover(client, 'c')).toHaveLength(1);
    expect(served.map(r => r.bodyUsed)).toEqual([true, true, true]);

    const rejected = jsonResponse({ error: 'gone' }, 404);
    await expect(
      strategy.discover(new FakeHttpClient(() => rejected), 'c'),
    ).rejects.toBeInstanceOf(HttpError);
    expect(rejected.bodyUsed).toBe(true);
  });

  it('throws RateLimitedError and starts a cooldown once retries are exhausted', async () => {
    const clock = new FakeClock();
    const { throttler, throttle } = throttled(clock);
    const client = new FakeHttpClient(() => jsonResponse({}, 449));
    const strategy = new Platform104Strategy({ sleep: clock.sleep, throttle });

    await expect(strategy.discover(client, 'c')).rejects.toBeInstanceOf(RateLimitedError);
    expect(client.calls).toHaveLength(3);
    expect(clock.sleeps).toEqual([2_000, 4_000]);
    expect(await throttler.isCooling('platform_104')).toBe(true);
  });

  it('throws ThrottledError without a request when no token is granted', async () => {
    const clock = new FakeClock();
    const { throttle } = throttled(clock, 1);
    await throttle.acquire();
    const client = new FakeHttpClient(() => jsonResponse(listing104(1, 1, 1)));
    const strategy = new Platform104Strategy({ sleep: clock.sleep, throttle });

    await expect(strategy.discover(client, 'c')).rejects.toBeInstanceOf(ThrottledError);
    expect(client.calls).toHaveLength(0);
  });
});

describe('Platform1111Strategy', () => {
  it('maps job ids to posting URLs across pages', async () => {
    const client = new FakeHttpClient(url =>
      jsonResponse({
        result: {
          hits: [{ jobId: 100 + pageOf(url) }, { jobId: '' }, {}],
          pagination: { totalPage: 2 },
        },
      }),
    );
    const strategy = new Platform1111Strategy({ sleep: new FakeClock().sleep });

    const urls = await strategy.discover(client, '140100');

    expect(urls).toEqual(['https://www.1111.com.tw/job/101', 'https://www.1111.com.tw/job/102']);
    expect(client.calls[0].url).toBe('https://www.1111.com.tw/api/v1/search/jobs/?jobPositions=140100&page=1');
  });
});

describe('CakeresumeStrategy', () => {
  const page = (n: number) => `
    <a href="/companies/acme/jobs/backend-${n}">Backend</a>
    <a href="/companies/acme/jobs/backend-${n}">Backend again</a>
    <a href="/companies/acme">Acme</a>
    <a href="/jobs/for-companies/hiring">Hire</a>
    <a href="https://www.cake.me/companies/beta/j/pm-${n}">PM</a>`;

  it('keeps posting links and drops company and landing pages', () => {
    expect(extractPostingLinks(page(1))).toEqual([
      'https://www.cake.me/companies/acme/jobs/backend-1',
      'https://www.cake.me/companies/beta/j/pm-1',
    ]);
  });

  it('staggers page requests and merges pages without duplicates', async () => {
    const clock = new FakeClock();
    const client = new FakeHttpClient(url => htmlResponse(page(pageOf(url))));
    const strategy = new CakeresumeStrategy({ sleep: clock.sleep, random: () => 0, maxPages: 2 });

    const urls = await strategy.discover(client, 'software-engineer');

    expect(urls).toEqual([
      'https://www.cake.me/companies/acme/jobs/backend-1',
      'https://www.cake.me/companies/beta/j/pm-1',
      'https://www.cake.me/companies/acme/jobs/backend-2',
      'https://www.cake.me/companies/beta/j/pm-2',
    ]);
    expect(clock.sleeps).toEqual([500, 500]);
  });
});

describe('YouratorStrategy', () => {
  it('queries by category name', () => {
    const strategy = new YouratorStrategy();
    expect(strategy.categoryParam({ layer3Id: '7', layer3Name: 'Backend Engineer' })).toBe('Backend Engineer');
    expect(strategy.categoryParam({ layer3Id: '7', layer3Name: '' })).toBe('7');
  });

  it('paginates until nextPage is null', async () => {
    const client = new FakeHttpClient(url => {
      const n = pageOf(url);
      return jsonResponse({ payload: { jobs: [{ path: `/companies/x/jobs/${n}` }], nextPage: n < 3 ? n + 1 : null } });
    });
    const strategy = new YouratorStrategy({ sleep: new FakeClock().sleep });

    const urls = await strategy.discover(client, 'Backend Engineer');

    expect(urls).toEqual([
      'https://www.yourator.co/companies/x/jobs/1',
      'https://www.yourator.co/companies/x/jobs/2',
      'https://www.yourator.co/companies/x/jobs/3',
    ]);
    expect(client.calls[0].url).toBe('https://www.yourator.co/api/v4/jobs?category_id[]=Backend%20Engineer&page=1');
  });

  it('stops on an empty page', async () => {
    const client = new FakeHttpClient(url =>
      jsonResponse({ payload: { jobs: pageOf(url) === 1 ? [{ path: '/companies/x/jobs/1' }] : [], nextPage: 99 } }),
    );
    const strategy = new YouratorStrategy({ sleep: new FakeClock().sleep });

    expect(await strategy.discover(client, 'c')).toEqual(['https://www.yourator.co/companies/x/jobs/1']);
    expect(client.calls).toHaveLength(2);
  });

  it('keeps earlier pages when a later page fails', async () => {
    const client = new FakeHttpClient(url =>
      pageOf(url) === 1
        ? jsonResponse({ payload: { jobs: [{ path: '/companies/x/jobs/1' }], nextPage: 2 } })
        : jsonResponse({}, 400),
    );
    const strategy = new YouratorStrategy({ sleep: new FakeClock().sleep });

    expect(await strategy.discover(client, 'c')).toEqual(['https://www.yourator.co/companies/x/jobs/1']);
  });
});

describe('Yes123Strategy', () => {
  const listing = (ids: string[]) =>
    ids.map(id => `<a href="job.asp?p_id=${id}&amp;job_id=99">job</a>`).join('\n');

  it('collects posting links until a page has none', async () => {
    const client = new FakeHttpClient(url => {
      const n = pageOf(url, 'now_page');
      return htmlResponse(n === 1 ? listing(['A1', 'A2']) : n === 2 ? listing(['A2', 'B1']) : '<p>none</p>');
    });
    const strategy = new Yes123Strategy({ sleep: new FakeClock().sleep });

    const urls = await strategy.discover(client, '2_1011_0001_0000');

    expect(urls).toEqual([
      'https://www.yes123.com.tw/wk_index/job.asp?p_id=A1',
      'https://www.yes123.com.tw/wk_index/job.asp?p_id=A2',
      'https://www.yes123.com.tw/wk_index/job.asp?p_id=B1',
    ]);
    expect(client.calls).toHaveLength(3);
    expect(client.calls[0].options?.headers?.Referer).toBe('https://www.yes123.com.tw/');
  });

  it('normalizes to the identifying p_id parameter only', () => {
    const strategy = new Yes123Strategy();
    expect(strategy.normalizeUrl('https://www.yes123.com.tw/wk_index/job.asp?p_id=A1&job_id=99#top')).toBe(
      'https://www.yes123.com.tw/wk_index/job.asp?p_id=A1',
    );
  });
});

describe('default normalization', () => {
  it('strips query string and fragment', () => {
    const strategy = new Platform104Strategy();
    expect(strategy.normalizeUrl('https://www.104.com.tw/job/abc?jobsource=list#apply')).toBe(
      'https://www.104.com.tw/job/abc',
    );
  });
});
