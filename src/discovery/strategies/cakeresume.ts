import * as cheerio from 'cheerio';
import type { HttpClient } from '../http.js';
import { BaseDiscoveryStrategy, type StrategyOptions } from './base.js';

const LISTING_URL = 'https://www.cake.me/jobs';
const ORIGIN = 'https://www.cake.me';

export interface CakeresumeOptions extends StrategyOptions {
  /** Random delay before each page request, in ms. */
  staggerMs?: { min: number; max: number };
  random?: () => number;
}

/** Posting links look like `/companies/{slug}/jobs/{slug}`; `/jobs/for-*` are landing pages. */
export function extractPostingLinks(html: string): string[] {
  const $ = cheerio.load(html);
  const urls: string[] = [];
  $('a[href]').each((_, el) => {
    const href = $(el).attr('href');
    if (!href) return;
    const isPosting = (href.includes('/jobs/') || href.includes('/j/')) && href.includes('/companies/');
    if (!isPosting || href.startsWith('/jobs/for-')) return;
    const url = href.startsWith('http') ? href : `${ORIGIN}${href}`;
    if (!urls.includes(url)) urls.push(url);
  });
  return urls;
}

export class CakeresumeStrategy extends BaseDiscoveryStrategy {
  readonly source = 'platform_cakeresume' as const;

  private readonly staggerMs: { min: number; max: number };
  private readonly random: () => number;

  constructor(options: CakeresumeOptions = {}) {
    super({ pageConcurrency: 2, maxPages: 5, ...options });
    this.staggerMs = options.staggerMs ?? { min: 500, max: 2_000 };
    this.random = options.random ?? Math.random;
  }

  async discover(client: HttpClient, categoryId: string, limit?: number): Promise<string[]> {
    const firstPage = await this.fetchListing(client, categoryId, 1);
    const urls = this.collect(firstPage);
    if (this.reached(urls, limit)) return this.collect(urls, limit);

    const pages = this.remainingPages(this.maxPages, urls.length, firstPage.length, limit);
    const rest = await this.fetchPages(pages, page => this.fetchListing(client, categoryId, page));
    return this.collect([...urls, ...rest], limit);
  }

  private async fetchListing(client: HttpClient, categoryId: string, page: number): Promise<string[]> {
    const { min, max } = this.staggerMs;
    await this.sleep(min + this.random() * (max - min));
    const url = `${LISTING_URL}?refinementList[job_categories][0]=${encodeURIComponent(categoryId)}&page=${page}`;
    const response = await this.getWithRetry(client, url);
    return extractPostingLinks(await response.text());
  }
}
