import { z } from 'zod';
import type { HttpClient } from '../http.js';
import { BaseDiscoveryStrategy } from './base.js';

const API_URL = 'https://www.1111.com.tw/api/v1/search/jobs/';

const listingSchema = z.object({
  result: z
    .object({
      hits: z.array(z.object({ jobId: z.union([z.string(), z.number()]).optional() })).default([]),
      pagination: z.object({ totalPage: z.coerce.number().optional() }).optional(),
    })
    .default({}),
});

type Listing = z.infer<typeof listingSchema>;

function jobUrls(listing: Listing): string[] {
  return listing.result.hits.flatMap(hit =>
    hit.jobId !== undefined && hit.jobId !== '' ? [`https://www.1111.com.tw/job/${hit.jobId}`] : [],
  );
}

export class Platform1111Strategy extends BaseDiscoveryStrategy {
  readonly source = 'platform_1111' as const;

  async discover(client: HttpClient, categoryId: string, limit?: number): Promise<string[]> {
    const first = await this.fetchListing(client, categoryId, 1);
    const firstPage = jobUrls(first);
    const urls = this.collect(firstPage);
    const totalPages = first.result.pagination?.totalPage ?? 1;

    if (this.reached(urls, limit) || totalPages <= 1) return this.collect(urls, limit);

    const pages = this.remainingPages(totalPages, urls.length, firstPage.length, limit);
    const rest = await this.fetchPages(pages, async page => jobUrls(await this.fetchListing(client, categoryId, page)));
    return this.collect([...urls, ...rest], limit);
  }

  private async fetchListing(client: HttpClient, categoryId: string, page: number): Promise<Listing> {
    const url = `${API_URL}?jobPositions=${encodeURIComponent(categoryId)}&page=${page}`;
    const response = await this.getWithRetry(client, url, { Referer: 'https://www.1111.com.tw/' });
    return listingSchema.parse(await response.json());
  }
}
