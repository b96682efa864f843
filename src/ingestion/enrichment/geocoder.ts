import { z } from 'zod';
import type { HttpClient } from '../../discovery/http.js';
import { logger } from '../../observability/logger.js';
import type { SourceThrottle } from '../../resilience/throttler.js';
import type { CrawlStore, Enricher, JobLocation, Posting } from '../types.js';

const log = logger.child({ module: 'enrichment:geocoder' });

const SEARCH_URL = 'https://nominatim.openstreetmap.org/search';

const searchResultSchema = z.array(
  z.object({
    lat: z.coerce.number(),
    lon: z.coerce.number(),
    display_name: z.string().optional(),
  }),
);

const FULL_WIDTH = '１２３４５６７８９０（）［］／、';
const HALF_WIDTH = '1234567890()[]/,';

/** Reduces a Taiwanese street address to something a public geocoder resolves. */
export function cleanAddress(address: string): string {
  let cleaned = [...address].map(ch => {
    const i = FULL_WIDTH.indexOf(ch);
    return i >= 0 ? HALF_WIDTH[i] : ch;
  }).join('');

  cleaned = cleaned.split(/[/,]/)[0].trim();
  cleaned = cleaned.replace(/^(台灣省|臺灣省|中華民國|台灣|臺灣|Taiwan)/, '').trim();
  cleaned = cleaned.replace(/[([].*?[)\]]/g, '').trim();
  for (const floor of [/\d+[樓Ff].*/, /B\d+.*/, /地下\d+樓.*/, /\d+棟.*/, /(?<=號)\s*[A-Z0-9].*/]) {
    cleaned = cleaned.replace(floor, '').trim();
  }
  const city = /^(.{2}[市縣])\1/.exec(cleaned);
  if (city) cleaned = cleaned.slice(city[1].length);
  return cleaned.replace(/[-\s]+$/, '');
}

export interface GeocoderOptions {
  client: HttpClient;
  store: Pick<CrawlStore, 'saveLocation'>;
  /** Nominatim allows one request per second per client. */
  throttle?: SourceThrottle;
  userAgent: string;
  timeoutMs?: number;
}

export class Geocoder implements Enricher {
  readonly name = 'geocoder';

  constructor(private readonly options: GeocoderOptions) {}

  /** Full address first, then street level, then region + district, then region alone. */
  async geocode(address: string, region?: string, district?: string): Promise<JobLocation | null> {
    const cleaned = cleanAddress(address);
    const street = /(.*?[路街巷段]|.*?大道)/.exec(cleaned)?.[1];
    const queries = [cleaned, street, `${region ?? ''}${district ?? ''}`, region].filter(
      (q, i, all): q is string => Boolean(q) && all.indexOf(q) === i,
    );

    for (const query of queries) {
      const location = await this.search(query);
      if (location) return location;
    }
    return null;
  }

  async enrich(posting: Posting): Promise<void> {
    if (!posting.address || (posting.latitude !== undefined && posting.longitude !== undefined)) return;
    const location = await this.geocode(posting.address, posting.region, posting.district);
    if (!location) {
      log.debug({ address: posting.address }, 'No geocoding match');
      return;
    }
    await this.options.store.saveLocation(posting.source, posting.sourceId, location);
  }

  private async search(query: string): Promise<JobLocation | null> {
    const { throttle, client } = this.options;
    if (throttle && !(await throttle.acquire())) {
      log.warn({ query }, 'Geocoder throttled, skipping');
      return null;
    }

    const params = new URLSearchParams({
      q: query.includes('Taiwan') ? query : `${query}, Taiwan`,
      format: 'json',
      limit: '1',
    });
    const response = await client.get(`${SEARCH_URL}?${params.toString()}`, {
      headers: { 'User-Agent': this.options.userAgent },
      timeoutMs: this.options.timeoutMs ?? 10_000,
    });
    if (response.status === 429) {
      await throttle?.report429();
      return null;
    }
    if (!response.ok) return null;
    await throttle?.reportSuccess();

    const [hit] = searchResultSchema.parse(await response.json());
    if (!hit) return null;
    return { latitude: hit.lat, longitude: hit.lon, formattedAddress: hit.display_name ?? query, provider: 'OSM' };
  }
}
