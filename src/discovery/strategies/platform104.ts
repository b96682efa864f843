import { z } from 'zod';
import type { HttpClient } from '../http.js';
import { BaseDiscoveryStrategy } from './base.js';

const API_URL = 'https://www.104.com.tw/jobs/search/api/jobs';
const PAGE_SIZE = 20;

const listingSchema = z.object({
  data: z
    .array(z.object({ link: z.object({ job: z.string().optional() }).optional() }))
    .default([]),
  metadata: z
    .object({
      pagination: z.object({ lastPage: z.coerce.number().optional() }).optional(),
    })
    .optional(),
});

type Listing = z.infer<typeof listingSchema>;

function absolute(link: string): string {
  return link.startsWith('//') ? `https:${link}` : link;
}

function links(listing: Listing): string[] {
  return listing.data.flatMap(item => (item.link?.job ? [absolute(item.link.job)] : []));
}

export class Platform104Strategy extends BaseDiscoveryStrategy {
  readonly source = 'platform_104' as const;

  async discover(client: HttpClient, categoryId: string, limit?: number): Promise<string[]> {
    const first = await this.fetchListing(client, categoryId, 1);
    const urls = this.collect(links(first));
    const lastPage = first.metadata?.pagination?.lastPage ?? 1;

    if (this.reached(urls, limit) || lastPage <= 1) return this.collect(urls, limit);

    const pages = this.remainingPages(lastPage, urls.length, PAGE_SIZE, limit);
    const rest = await this.fetchPages(pages, async page => links(await this.fetchListing(client, categoryId, page)));
    return this.collect([...urls, ...rest], limit);
  }

  private async fetchListing(client: HttpClient, categoryId: string, page: number): Promise<Listing> {
    const url = `${API_URL}?jobcat=${encodeURIComponent(categoryId)}&page=${page}&pagesize=${PAGE_SIZE}`;
    const response = await this.getWithRetry(client, url, { Referer: 'https://www.104.com.tw/' });
    return listingSchema.parse(await response.json());
  }
}
