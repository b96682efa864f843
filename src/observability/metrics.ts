import { Counter, Histogram, Registry } from 'prom-client';
import type { Source } from '../config/crawler.js';

export type HealResult = 'success' | 'failure' | 'rejected' | 'circuit_open';

/** Per-platform crawl counters and latency, exposed in Prometheus format. */
export class CrawlMetrics {
  readonly requests: Counter<'platform' | 'status'>;
  readonly extractions: Counter<'platform' | 'status'>;
  readonly latency: Histogram<'platform'>;
  readonly healRequests: Counter<'platform' | 'result'>;

  constructor(readonly registry: Registry = new Registry()) {
    const registers = [registry];
    this.requests = new Counter({
      name: 'crawler_requests_total',
      help: 'Total number of crawl requests',
      labelNames: ['platform', 'status'] as const,
      registers,
    });
    this.extractions = new Counter({
      name: 'crawler_extraction_total',
      help: 'Total number of job extractions',
      labelNames: ['platform', 'status'] as const,
      registers,
    });
    this.latency = new Histogram({
      name: 'crawler_request_latency_seconds',
      help: 'Crawl request latency in seconds',
      labelNames: ['platform'] as const,
      buckets: [0.1, 0.5, 1, 2, 5, 10],
      registers,
    });
    this.healRequests = new Counter({
      name: 'crawler_ai_heal_requests_total',
      help: 'Total number of AI healing requests',
      labelNames: ['platform', 'result'] as const,
      registers,
    });
  }

  recordRequest(platform: Source, ok: boolean, latencyMs: number): void {
    this.requests.inc({ platform, status: ok ? 'success' : 'failed' });
    this.latency.observe({ platform }, latencyMs / 1000);
  }

  recordExtraction(platform: Source, ok: boolean): void {
    this.extractions.inc({ platform, status: ok ? 'success' : 'failure' });
  }

  recordHeal(platform: Source, result: HealResult): void {
    this.healRequests.inc({ platform, result });
  }
}
