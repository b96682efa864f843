import pLimit from 'p-limit';
import { enabledSources, type CrawlerConfig, type Source } from '../config/crawler.js';
import type { HttpClient } from '../discovery/http.js';
import type { DiscoveryService } from '../discovery/service.js';
import { logger } from '../observability/logger.js';
import type { CrawlMetrics } from '../observability/metrics.js';
import type { CircuitBreakerRegistry, CircuitSnapshot } from '../resilience/circuit-breaker.js';
import { systemClock, type Clock } from '../resilience/clock.js';
import type { FetchedDocument } from './fetcher.js';
import type { HealedRecord } from './healer.js';
import {
  errorMessage,
  type Category,
  type CrawlOutcome,
  type CrawlStore,
  type JobLocation,
  type Organization,
  type Posting,
  type PostingExtractor,
  type RecordValidator,
} from './types.js';

const log = logger.child({ module: 'orchestrator' });

export interface DocumentSource {
  fetch(source: Source, url: string, client: HttpClient): Promise<FetchedDocument>;
}

export interface PostingHealer {
  heal(source: Source, html: string, url: string, pageTitle: string): Promise<HealedRecord | null>;
}

export interface EnrichmentScheduler {
  schedule(posting: Posting): void;
}

export interface OrchestratorDeps {
  config: CrawlerConfig;
  store: CrawlStore;
  discovery: DiscoveryService;
  fetcher: DocumentSource;
  extractors: Map<Source, PostingExtractor>;
  client: HttpClient;
  breakers: CircuitBreakerRegistry;
  healer?: PostingHealer | null;
  validator?: RecordValidator | null;
  enrichment?: EnrichmentScheduler | null;
  metrics?: CrawlMetrics | null;
  clock?: Clock;
}

export interface SourceRunResult {
  source: Source;
  categoriesTotal: number;
  categoriesSkipped: number;
  categoriesCompleted: number;
  categoriesFailed: number;
  urlsSucceeded: number;
  urlsFailed: number;
  stopped: boolean;
}

export interface RunSummary {
  results: SourceRunResult[];
  failedSources: { source: Source; error: string }[];
  urlsSucceeded: number;
  urlsFailed: number;
  breakers: CircuitSnapshot[];
}

type CategoryStatus = 'completed' | 'failed' | 'interrupted';

function emptyResult(source: Source): SourceRunResult {
  return {
    source,
    categoriesTotal: 0,
    categoriesSkipped: 0,
    categoriesCompleted: 0,
    categoriesFailed: 0,
    urlsSucceeded: 0,
    urlsFailed: 0,
    stopped: false,
  };
}

function nativeLocation(posting: Posting): JobLocation | null {
  if (posting.latitude === undefined || posting.longitude === undefined) return null;
  return {
    latitude: posting.latitude,
    longitude: posting.longitude,
    formattedAddress: posting.address,
    provider: 'NATIVE',
  };
}

/**
 * Drives discovery, fetching, extraction and persistence for each source.
 * Categories run strictly in listing order; URLs inside a category run with
 * bounded concurrency. A category is checkpointed only after its whole batch
 * has finished.
 */
export class PipelineOrchestrator {
  private stopping = false;
  private readonly clock: Clock;

  constructor(private readonly deps: OrchestratorDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  get isStopping(): boolean {
    return this.stopping;
  }

  /** No new category or URL task starts after this; in-flight tasks finish. */
  stop(): void {
    if (this.stopping) return;
    this.stopping = true;
    log.info('Stop requested, finishing in-flight work');
  }

  async runAll(limitPerSource: number, resume = true): Promise<RunSummary> {
    const sources = enabledSources(this.deps.config);
    log.info({ sources, limitPerSource, resume }, 'Starting crawl run');

    const settled = await Promise.allSettled(
      sources.map(source => this.runSource(source, limitPerSource, undefined, resume)),
    );

    const summary: RunSummary = {
      results: [],
      failedSources: [],
      urlsSucceeded: 0,
      urlsFailed: 0,
      breakers: this.deps.breakers.snapshots(),
    };

    settled.forEach((outcome, i) => {
      const source = sources[i];
      if (outcome.status === 'fulfilled') {
        summary.results.push(outcome.value);
        summary.urlsSucceeded += outcome.value.urlsSucceeded;
        summary.urlsFailed += outcome.value.urlsFailed;
        log.info({ ...outcome.value }, 'Source crawl complete');
      } else {
        const error = errorMessage(outcome.reason);
        summary.failedSources.push({ source, error });
        log.error({ err: outcome.reason, source }, 'Source crawl failed');
      }
    });

    log.info(
      {
        urlsSucceeded: summary.urlsSucceeded,
        urlsFailed: summary.urlsFailed,
        failedSources: summary.failedSources.length,
        breakers: summary.breakers.map(b => ({ name: b.name, state: b.state, failures: b.consecutiveFailures })),
      },
      'Crawl run complete',
    );
    return summary;
  }

  async runSource(
    source: Source,
    maxPerCategory: number,
    targetCategory?: string,
    resume = true,
  ): Promise<SourceRunResult> {
    const result = emptyResult(source);
    const categories = await this.deps.store.listCategories(source, targetCategory);
    result.categoriesTotal = categories.length;

    let pending = categories;
    if (resume && !targetCategory) {
      try {
        const done = await this.deps.store.getCrawledCategoryIds(
          source,
          this.deps.config.pipeline.resumeWindowDays,
        );
        pending = categories.filter(c => !done.has(c.layer3Id));
        result.categoriesSkipped = categories.length - pending.length;
      } catch (err) {
        log.warn({ err, source }, 'Checkpoint read failed, crawling all categories');
      }
    }

    log.info(
      { source, total: result.categoriesTotal, skipped: result.categoriesSkipped, pending: pending.length },
      'Source crawl started',
    );

    for (const category of pending) {
      if (this.stopping) {
        result.stopped = true;
        break;
      }
      const status = await this.runCategory(source, category, maxPerCategory, result);
      if (status === 'completed') result.categoriesCompleted++;
      else if (status === 'failed') result.categoriesFailed++;
      else result.stopped = true;
    }

    return result;
  }

  /**
   * Fetch, extract, validate and persist one URL. Never throws; every failure
   * is returned in the outcome.
   */
  async processUrl(source: Source, url: string, client: HttpClient, category?: Category): Promise<CrawlOutcome> {
    const startedAt = this.clock();
    let fetchOk = false;
    let extractionOk = false;
    let success = false;
    let error: string | null = null;

    try {
      const doc = await this.deps.fetcher.fetch(source, url, client);
      fetchOk = doc.html.length > 0;

      if (!fetchOk) {
        error = doc.error ?? 'empty document';
      } else {
        const record = await this.extract(source, url, doc.html);
        extractionOk = record !== null;

        if (!record) {
          error = 'no posting extracted';
        } else {
          const { posting, organization } = record;
          if (category && !posting.categoryName) posting.categoryName = category.layer3Name;

          if (this.deps.validator) await this.deps.validator.validate(posting);

          const saved = await this.deps.store.saveRecord(
            posting,
            organization,
            category?.layer3Id ?? null,
            nativeLocation(posting),
          );
          if (saved) {
            success = true;
            this.deps.enrichment?.schedule(posting);
          } else {
            error = 'persistence failed';
          }
        }
      }
    } catch (err) {
      error = errorMessage(err);
      log.error({ err, source, url }, 'URL processing failed');
    }

    const latencyMs = this.clock() - startedAt;
    const metrics = this.deps.metrics;
    if (metrics) {
      metrics.recordRequest(source, success, latencyMs);
      if (fetchOk) metrics.recordExtraction(source, extractionOk);
    }
    try {
      await this.deps.store.recordHealth({
        source,
        fetchOk,
        extractionOk,
        latencyMs,
        error: error ?? undefined,
      });
    } catch (err) {
      log.warn({ err, source }, 'Failed to record health');
    }

    return { url, success, latencyMs, error };
  }

  private async extract(
    source: Source,
    url: string,
    html: string,
  ): Promise<{ posting: Posting; organization: Organization | null } | null> {
    const extractor = this.deps.extractors.get(source);
    const posting = extractor?.extractPosting(html, url) ?? null;
    if (extractor && posting?.title) {
      return { posting, organization: extractor.extractOrganization(html, url) };
    }

    if (!this.deps.healer) return null;
    return this.deps.healer.heal(source, html, url, extractor?.pageTitle(html) ?? '');
  }

  private async runCategory(
    source: Source,
    category: Category,
    maxPerCategory: number,
    result: SourceRunResult,
  ): Promise<CategoryStatus> {
    const { discovery, client, store, config } = this.deps;
    const categoryId = category.layer3Id;

    const found = await discovery.discover(
      source,
      discovery.categoryParam(source, category),
      client,
      maxPerCategory,
    );
    if (!found.ok) {
      log.warn({ source, categoryId, error: found.error }, 'Discovery failed, category left unmarked');
      return 'failed';
    }

    const urls = found.urls;
    let interrupted = false;

    if (urls.length > 0) {
      const limit = pLimit(config.pipeline.urlConcurrency);
      const outcomes = await Promise.allSettled(
        urls.map(url =>
          limit(async () => {
            if (this.stopping) {
              interrupted = true;
              return null;
            }
            return this.processUrl(source, url, client, category);
          }),
        ),
      );

      for (const outcome of outcomes) {
        if (outcome.status === 'rejected') {
          result.urlsFailed++;
          log.error({ err: outcome.reason, source, categoryId }, 'URL task rejected');
        } else if (outcome.value) {
          if (outcome.value.success) result.urlsSucceeded++;
          else result.urlsFailed++;
        }
      }
    }

    if (interrupted) {
      log.info({ source, categoryId }, 'Category interrupted by stop, left unmarked');
      return 'interrupted';
    }

    try {
      await store.markCategoryCrawled(source, categoryId, new Date(this.clock()));
    } catch (err) {
      log.error({ err, source, categoryId }, 'Failed to write checkpoint');
      return 'failed';
    }

    log.info({ source, categoryId, urls: urls.length }, 'Category complete');
    return 'completed';
  }
}
