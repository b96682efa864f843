import type { Source } from '../config/crawler.js';
import { errorMessage, type HealthSink } from '../ingestion/types.js';
import { logger } from '../observability/logger.js';
import { systemClock, type Clock } from '../resilience/clock.js';
import type { HttpClient } from './http.js';
import type { CategoryRef, DiscoveryStrategy } from './strategies/base.js';

const log = logger.child({ module: 'discovery' });

export interface DiscoveryResult {
  urls: string[];
  ok: boolean;
  error?: string;
}

export class DiscoveryService {
  constructor(
    private readonly strategies: Map<Source, DiscoveryStrategy>,
    private readonly health: HealthSink,
    private readonly clock: Clock = systemClock,
  ) {}

  /** The value to pass as `categoryId` for this source's listing endpoint. */
  categoryParam(source: Source, category: CategoryRef): string {
    return this.strategies.get(source)?.categoryParam(category) ?? category.layer3Id;
  }

  /**
   * Runs the source's strategy for one category. Never throws: a strategy
   * failure comes back as `ok: false` so callers can tell an empty category
   * from a failed one. Health is reported either way.
   */
  async discover(source: Source, categoryId: string, client: HttpClient, limit?: number): Promise<DiscoveryResult> {
    const strategy = this.strategies.get(source);
    if (!strategy) {
      log.error({ source }, 'No discovery strategy for source');
      return { urls: [], ok: false, error: `no strategy for ${source}` };
    }

    const startedAt = this.clock();
    let result: DiscoveryResult;
    try {
      const found = await strategy.discover(client, categoryId, limit);
      result = { urls: normalize(strategy, found, limit), ok: true };
    } catch (err) {
      log.error({ err, source, categoryId }, 'Category discovery failed');
      result = { urls: [], ok: false, error: errorMessage(err) };
    }

    await this.report(source, result, this.clock() - startedAt);
    log.debug({ source, categoryId, count: result.urls.length, ok: result.ok }, 'Category discovered');
    return result;
  }

  async discoverCategory(source: Source, categoryId: string, client: HttpClient, limit?: number): Promise<string[]> {
    return (await this.discover(source, categoryId, client, limit)).urls;
  }

  private async report(source: Source, result: DiscoveryResult, latencyMs: number): Promise<void> {
    try {
      await this.health.recordHealth({
        source,
        fetchOk: result.ok,
        extractionOk: result.ok && result.urls.length > 0,
        latencyMs,
        error: result.error,
      });
    } catch (err) {
      log.warn({ err, source }, 'Failed to record discovery health');
    }
  }
}

function normalize(strategy: DiscoveryStrategy, urls: string[], limit?: number): string[] {
  const seen = new Set<string>();
  for (const url of urls) {
    if (!url) continue;
    seen.add(strategy.normalizeUrl(url));
  }
  const unique = [...seen];
  return limit !== undefined ? unique.slice(0, limit) : unique;
}
