import type { Redis } from 'ioredis';
import { SOURCES, type CrawlerConfig, type Source } from './config/crawler.js';
import type { Env } from './config/env.js';
import { createDatabase, type DatabaseHandle } from './db/client.js';
import { PgCrawlStore } from './db/queries.js';
import { createRedis } from './db/redis.js';
import { FetchHttpClient } from './discovery/http.js';
import { buildStrategyRegistry } from './discovery/registry.js';
import { DiscoveryService } from './discovery/service.js';
import { Geocoder } from './ingestion/enrichment/geocoder.js';
import { EnrichmentQueue } from './ingestion/enrichment/queue.js';
import { SkillTagger } from './ingestion/enrichment/skills.js';
import { JsonLdExtractor } from './ingestion/extractor.js';
import { DocumentFetcher, MemoryDocumentCache, RedisDocumentCache } from './ingestion/fetcher.js';
import { AnthropicHealingModel, SelfHealer } from './ingestion/healer.js';
import { PipelineOrchestrator } from './ingestion/orchestrator.js';
import { BrowserRenderer, type RenderedFetcher } from './ingestion/renderer.js';
import type { Enricher } from './ingestion/types.js';
import { SchemaValidator } from './ingestion/validator.js';
import { logger } from './observability/logger.js';
import { CrawlMetrics } from './observability/metrics.js';
import { CircuitBreakerRegistry } from './resilience/circuit-breaker.js';
import { HealingGate } from './resilience/healing-gate.js';
import { MemoryThrottleStore, RedisThrottleStore } from './resilience/throttle-store.js';
import { Throttler, type SourceThrottle } from './resilience/throttler.js';

const log = logger.child({ module: 'app' });

export interface Crawler {
  orchestrator: PipelineOrchestrator;
  database: DatabaseHandle;
  metrics: CrawlMetrics;
  /** Stops new work, drains enrichment, then releases every connection. */
  shutdown(): Promise<void>;
}

export function buildCrawler(env: Env, config: CrawlerConfig): Crawler {
  const database = createDatabase(env.DATABASE_URL);
  const metrics = new CrawlMetrics();
  const store = new PgCrawlStore(database.db);

  const redis: Redis | null = env.REDIS_URL ? createRedis(env.REDIS_URL) : null;
  if (!redis) log.warn('REDIS_URL not set, throttle state and document cache are per-process');

  const throttler = new Throttler(redis ? new RedisThrottleStore(redis) : new MemoryThrottleStore(), {
    adaptive: config.adaptive,
  });
  const throttles = new Map<Source, SourceThrottle>();
  for (const source of SOURCES) {
    const { rate, capacity } = config.sources[source].throttle;
    throttles.set(
      source,
      throttler.forKey(source, {
        rate,
        capacity,
        timeoutMs: config.pipeline.throttleTimeoutSeconds * 1000,
        cooldownSeconds: config.pipeline.cooldownSeconds,
      }),
    );
  }

  const breakers = new CircuitBreakerRegistry();
  const toBreakerOptions = (b: CrawlerConfig['breakers']['rendering']) => ({
    failureThreshold: b.failureThreshold,
    recoveryTimeoutMs: b.recoveryTimeoutSeconds * 1000,
  });
  const renderBreaker = breakers.get('rendering', toBreakerOptions(config.breakers.rendering));
  const healingBreaker = breakers.get('healing', toBreakerOptions(config.breakers.healing));

  const client = new FetchHttpClient(config.pipeline.fetchTimeoutSeconds * 1000);

  let renderer: RenderedFetcher | null = null;
  if (env.BROWSER_WS_ENDPOINT) {
    renderer = new BrowserRenderer({
      endpoint: env.BROWSER_WS_ENDPOINT,
      maxContexts: config.pipeline.maxRenderContexts,
      timeoutMs: config.pipeline.renderTimeoutSeconds * 1000,
    });
  } else {
    log.warn('BROWSER_WS_ENDPOINT not set, rendering fallback disabled');
  }

  const fetcher = new DocumentFetcher({
    throttles,
    cache: redis ? new RedisDocumentCache(redis) : new MemoryDocumentCache(),
    renderer,
    renderBreaker,
    cacheTtlSeconds: config.pipeline.documentCacheTtlSeconds,
    timeoutMs: config.pipeline.fetchTimeoutSeconds * 1000,
  });

  const extractors = new Map(SOURCES.map(source => [source, new JsonLdExtractor(source)] as const));

  let healer: SelfHealer | null = null;
  if (config.healing.enabled && env.ANTHROPIC_API_KEY) {
    healer = new SelfHealer({
      model: new AnthropicHealingModel(env.AI_HEALING_MODEL, env.ANTHROPIC_API_KEY),
      breaker: healingBreaker,
      gate: new HealingGate({
        failureThreshold: config.healing.failureThreshold,
        isolationMs: config.healing.isolationSeconds * 1000,
      }),
      extractors,
      minTitleSimilarity: config.healing.minTitleSimilarity,
      metrics,
    });
  } else {
    log.warn('AI self-healing disabled');
  }

  const enrichers: Enricher[] = [];
  if (config.enrichment.skills) enrichers.push(new SkillTagger(store));
  if (config.enrichment.geocoding) {
    enrichers.push(
      new Geocoder({
        client,
        store,
        throttle: throttler.forKey('geocoder', {
          rate: 1,
          capacity: 1,
          timeoutMs: 30_000,
          cooldownSeconds: config.pipeline.cooldownSeconds,
        }),
        userAgent: env.GEOCODER_USER_AGENT,
      }),
    );
  }
  const enrichment = new EnrichmentQueue(enrichers, config.enrichment.concurrency);

  const orchestrator = new PipelineOrchestrator({
    config,
    store,
    discovery: new DiscoveryService(buildStrategyRegistry(config, throttles), store),
    fetcher,
    extractors,
    client,
    breakers,
    healer,
    validator: new SchemaValidator({
      sampleDir: env.FAILED_SAMPLE_DIR,
      driftThreshold: config.validation.driftThreshold,
      driftMinSamples: config.validation.driftMinSamples,
      maxSamplesPerSource: config.validation.maxSamplesPerSource,
    }),
    enrichment,
    metrics,
  });

  return {
    orchestrator,
    database,
    metrics,
    async shutdown() {
      orchestrator.stop();
      await enrichment.drain();
      if (renderer) await renderer.close();
      if (redis) {
        await redis.quit().catch((err: unknown) => log.warn({ err }, 'Redis quit failed'));
      }
      await database.close();
    },
  };
}
