import pLimit, { type LimitFunction } from 'p-limit';
import { logger } from '../../observability/logger.js';
import type { Enricher, Posting } from '../types.js';

const log = logger.child({ module: 'enrichment' });

/**
 * Detached, bounded enrichment. `schedule` returns immediately; each enricher
 * runs in its own error boundary so one failing enricher never affects
 * another or the caller.
 */
export class EnrichmentQueue {
  private readonly limit: LimitFunction;
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly enrichers: Enricher[],
    concurrency = 3,
  ) {
    this.limit = pLimit(concurrency);
  }

  get size(): number {
    return this.pending.size;
  }

  schedule(posting: Posting): void {
    if (this.enrichers.length === 0) return;
    const task = this.limit(() => this.run(posting)).finally(() => {
      this.pending.delete(task);
    });
    this.pending.add(task);
  }

  /** Resolves once every scheduled task, including ones scheduled meanwhile, has settled. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled([...this.pending]);
    }
  }

  private async run(posting: Posting): Promise<void> {
    for (const enricher of this.enrichers) {
      try {
        await enricher.enrich(posting);
      } catch (err) {
        log.error({ err, enricher: enricher.name, source: posting.source, sourceId: posting.sourceId }, 'Enrichment failed');
      }
    }
  }
}
