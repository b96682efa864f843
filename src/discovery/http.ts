import type { Source } from '../config/crawler.js';

export const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
];

// 104 serves the full JSON-LD payload to link-preview crawlers.
const PREVIEW_AGENT = 'facebookexternalhit/1.1 (+http://www.facebook.com/externalhit_uatext.php)';

export function randomUserAgent(): string {
  return USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)];
}

/** Headers for posting-page requests. */
export function documentHeaders(source: Source): Record<string, string> {
  const headers: Record<string, string> = {
    'User-Agent': source === 'platform_104' ? PREVIEW_AGENT : randomUserAgent(),
  };
  if (source === 'platform_yes123') headers.Referer = 'https://www.yes123.com.tw/';
  return headers;
}

/** Releases the connection behind a response whose body will not be read. */
export async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) await response.body.cancel();
}

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export interface HttpClient {
  get(url: string, options?: HttpRequestOptions): Promise<Response>;
}

export class FetchHttpClient implements HttpClient {
  constructor(private readonly defaultTimeoutMs = 20_000) {}

  get(url: string, options: HttpRequestOptions = {}): Promise<Response> {
    return fetch(url, {
      headers: options.headers,
      redirect: 'follow',
      signal: AbortSignal.timeout(options.timeoutMs ?? this.defaultTimeoutMs),
    });
  }
}

export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly url: string,
  ) {
    super(`HTTP ${status} for ${url}`);
    this.name = 'HttpError';
  }
}

export class RateLimitedError extends Error {
  constructor(readonly url: string, attempts: number) {
    super(`Still rate limited after ${attempts} attempts: ${url}`);
    this.name = 'RateLimitedError';
  }
}

export class ThrottledError extends Error {
  constructor(readonly key: string) {
    super(`No throttle token for ${key} before timeout`);
    this.name = 'ThrottledError';
  }
}
