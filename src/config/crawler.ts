import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import yaml from 'js-yaml';
import { z } from 'zod';
import { logger } from '../observability/logger.js';

export const SOURCES = [
  'platform_104',
  'platform_1111',
  'platform_cakeresume',
  'platform_yourator',
  'platform_yes123',
] as const;

export type Source = (typeof SOURCES)[number];

export function isSource(value: string): value is Source {
  return (SOURCES as readonly string[]).includes(value);
}

const throttleSchema = z.object({
  rate: z.number().positive(),
  capacity: z.number().positive(),
});

const sourceSchema = z.object({
  enabled: z.boolean().default(true),
  throttle: throttleSchema.default({ rate: 2, capacity: 10 }),
  discovery: z
    .object({
      pageConcurrency: z.number().int().positive().default(5),
      maxPages: z.number().int().positive().default(10),
    })
    .default({}),
});

const breakerSchema = z.object({
  failureThreshold: z.number().int().positive(),
  recoveryTimeoutSeconds: z.number().positive(),
});

const crawlerConfigSchema = z.object({
  sources: z
    .object({
      platform_104: sourceSchema.default({ throttle: { rate: 5, capacity: 20 }, discovery: { pageConcurrency: 5, maxPages: 50 } }),
      platform_1111: sourceSchema.default({ throttle: { rate: 5, capacity: 20 }, discovery: { pageConcurrency: 5, maxPages: 20 } }),
      platform_cakeresume: sourceSchema.default({ throttle: { rate: 5, capacity: 20 }, discovery: { pageConcurrency: 2, maxPages: 5 } }),
      platform_yourator: sourceSchema.default({ throttle: { rate: 5, capacity: 20 }, discovery: { pageConcurrency: 1, maxPages: 10 } }),
      platform_yes123: sourceSchema.default({ throttle: { rate: 3, capacity: 15 }, discovery: { pageConcurrency: 1, maxPages: 10 } }),
    })
    .default({}),
  pipeline: z
    .object({
      urlConcurrency: z.number().int().positive().default(5),
      resumeWindowDays: z.number().positive().default(30),
      documentCacheTtlSeconds: z.number().int().positive().default(3600),
      throttleTimeoutSeconds: z.number().positive().default(60),
      fetchTimeoutSeconds: z.number().positive().default(15),
      renderTimeoutSeconds: z.number().positive().default(30),
      maxRenderContexts: z.number().int().positive().default(5),
      cooldownSeconds: z.number().int().positive().default(300),
    })
    .default({}),
  adaptive: z
    .object({
      successStreak: z.number().int().positive().default(50),
      boostFactor: z.number().min(1).default(1.1),
      backoffFactor: z.number().positive().max(1).default(0.7),
      maxMultiplier: z.number().min(1).default(1.5),
      minMultiplier: z.number().positive().max(1).default(0.1),
    })
    .default({}),
  breakers: z
    .object({
      rendering: breakerSchema.default({ failureThreshold: 10, recoveryTimeoutSeconds: 30 }),
      healing: breakerSchema.default({ failureThreshold: 5, recoveryTimeoutSeconds: 60 }),
    })
    .default({}),
  healing: z
    .object({
      enabled: z.boolean().default(true),
      failureThreshold: z.number().int().positive().default(3),
      isolationSeconds: z.number().positive().default(600),
      minTitleSimilarity: z.number().min(0).max(1).default(0.4),
    })
    .default({}),
  retry: z
    .object({
      count: z.number().int().positive().default(3),
      backoffBase: z.number().positive().default(2),
    })
    .default({}),
  validation: z
    .object({
      driftThreshold: z.number().min(0).max(1).default(0.3),
      driftMinSamples: z.number().int().positive().default(10),
      maxSamplesPerSource: z.number().int().nonnegative().default(50),
    })
    .default({}),
  enrichment: z
    .object({
      concurrency: z.number().int().positive().default(3),
      skills: z.boolean().default(true),
      geocoding: z.boolean().default(true),
    })
    .default({}),
});

export type CrawlerConfig = z.infer<typeof crawlerConfigSchema>;
export type SourceConfig = z.infer<typeof sourceSchema>;
export type BreakerConfig = z.infer<typeof breakerSchema>;
export type AdaptiveConfig = CrawlerConfig['adaptive'];

const __dirname = dirname(fileURLToPath(import.meta.url));
const CONFIG_PATH = resolve(__dirname, '../../config/crawler.yml');

export function parseCrawlerConfig(raw: unknown): CrawlerConfig {
  return crawlerConfigSchema.parse(raw ?? {});
}

export function enabledSources(config: CrawlerConfig): Source[] {
  return SOURCES.filter(source => config.sources[source].enabled);
}

let _config: CrawlerConfig | null = null;

export function loadCrawlerConfig(): CrawlerConfig {
  if (_config) return _config;

  const log = logger.child({ module: 'config:crawler' });
  try {
    const raw = readFileSync(CONFIG_PATH, 'utf-8');
    _config = parseCrawlerConfig(yaml.load(raw));
    log.info(
      {
        sources: enabledSources(_config),
        urlConcurrency: _config.pipeline.urlConcurrency,
        resumeWindowDays: _config.pipeline.resumeWindowDays,
      },
      'Crawler config loaded',
    );
    return _config;
  } catch (err) {
    log.fatal({ err }, 'Failed to load crawler config');
    process.exit(1);
  }
}
