import type { HttpClient } from '../http.js';
import { BaseDiscoveryStrategy } from './base.js';

const LISTING_URL = 'https://www.yes123.com.tw/wk_index/joblist.asp';
const POSTING_BASE = 'https://www.yes123.com.tw/wk_index/';
const POSTING_LINK = /job\.asp\?p_id=[^"'\s>]+/g;

export class Yes123Strategy extends BaseDiscoveryStrategy {
  readonly source = 'platform_yes123' as const;

  /** Postings are addressed by query string, so keep `p_id` and drop the rest. */
  override normalizeUrl(url: string): string {
    try {
      const parsed = new URL(url);
      const id = parsed.searchParams.get('p_id');
      parsed.search = id ? `?p_id=${encodeURIComponent(id)}` : '';
      parsed.hash = '';
      return parsed.toString();
    } catch {
      return url;
    }
  }

  async discover(client: HttpClient, categoryId: string, limit?: number): Promise<string[]> {
    let urls: string[] = [];

    for (let page = 1; page <= this.maxPages; page++) {
      const url = `${LISTING_URL}?job_check=${encodeURIComponent(categoryId)}&now_page=${page}`;
      let html: string;
      try {
        const response = await this.getWithRetry(client, url, { Referer: 'https://www.yes123.com.tw/' });
        html = await response.text();
      } catch (err) {
        if (page === 1) throw err;
        this.log.error({ err, page }, 'Listing page failed, stopping pagination');
        break;
      }

      const matches = html.match(POSTING_LINK) ?? [];
      if (matches.length === 0) break;
      urls = this.collect([...urls, ...matches.map(match => `${POSTING_BASE}${match.replace(/&amp;/g, '&')}`)]);
      if (this.reached(urls, limit)) break;
    }

    return this.collect(urls, limit);
  }
}
