import { z } from 'zod';
import type { HttpClient } from '../http.js';
import { BaseDiscoveryStrategy, type CategoryRef } from './base.js';

const API_URL = 'https://www.yourator.co/api/v4/jobs';
const ORIGIN = 'https://www.yourator.co';

const listingSchema = z.object({
  payload: z
    .object({
      jobs: z.array(z.object({ path: z.string().optional() })).default([]),
      nextPage: z.union([z.number(), z.string()]).nullable().optional(),
    })
    .default({}),
});

export class YouratorStrategy extends BaseDiscoveryStrategy {
  readonly source = 'platform_yourator' as const;

  // The listing API filters by category name rather than id.
  override categoryParam(category: CategoryRef): string {
    return category.layer3Name || category.layer3Id;
  }

  async discover(client: HttpClient, categoryId: string, limit?: number): Promise<string[]> {
    let urls: string[] = [];

    for (let page = 1; page <= this.maxPages; page++) {
      const url = `${API_URL}?category_id[]=${encodeURIComponent(categoryId)}&page=${page}`;
      let listing: z.infer<typeof listingSchema>;
      try {
        const response = await this.getWithRetry(client, url);
        listing = listingSchema.parse(await response.json());
      } catch (err) {
        if (page === 1) throw err;
        this.log.error({ err, page }, 'Listing page failed, stopping pagination');
        break;
      }

      const { jobs, nextPage } = listing.payload;
      if (jobs.length === 0) break;
      urls = this.collect([...urls, ...jobs.flatMap(job => (job.path ? [`${ORIGIN}${job.path}`] : []))]);
      if (this.reached(urls, limit) || nextPage == null) break;
    }

    return this.collect(urls, limit);
  }
}
