import { SOURCES, type CrawlerConfig, type Source } from '../config/crawler.js';
import type { Sleep } from '../resilience/clock.js';
import type { SourceThrottle } from '../resilience/throttler.js';
import type { DiscoveryStrategy, StrategyOptions } from './strategies/base.js';
import { CakeresumeStrategy } from './strategies/cakeresume.js';
import { Platform104Strategy } from './strategies/platform104.js';
import { Platform1111Strategy } from './strategies/platform1111.js';
import { Yes123Strategy } from './strategies/yes123.js';
import { YouratorStrategy } from './strategies/yourator.js';

const FACTORIES: Record<Source, (options: StrategyOptions) => DiscoveryStrategy> = {
  platform_104: options => new Platform104Strategy(options),
  platform_1111: options => new Platform1111Strategy(options),
  platform_cakeresume: options => new CakeresumeStrategy(options),
  platform_yourator: options => new YouratorStrategy(options),
  platform_yes123: options => new Yes123Strategy(options),
};

/** One strategy per source, built once at startup. */
export function buildStrategyRegistry(
  config: CrawlerConfig,
  throttles: Map<Source, SourceThrottle>,
  sleep?: Sleep,
): Map<Source, DiscoveryStrategy> {
  const registry = new Map<Source, DiscoveryStrategy>();
  for (const source of SOURCES) {
    const { discovery } = config.sources[source];
    registry.set(
      source,
      FACTORIES[source]({
        throttle: throttles.get(source),
        retryCount: config.retry.count,
        backoffBase: config.retry.backoffBase,
        pageConcurrency: discovery.pageConcurrency,
        maxPages: discovery.maxPages,
        sleep,
      }),
    );
  }
  return registry;
}
