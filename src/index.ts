import type { Server } from 'node:http';
import { collectDefaultMetrics } from 'prom-client';
import { logger } from './observability/logger.js';
import { env } from './config/env.js';
import { loadCrawlerConfig } from './config/crawler.js';
import { runMigrations } from './db/migrate.js';
import { buildCrawler } from './app.js';
import { CrawlScheduler } from './ingestion/scheduler.js';
import { startMetricsServer } from './observability/server.js';

const log = logger.child({ module: 'main' });

async function main(): Promise<void> {
  log.info('Starting job listing crawler');

  const config = loadCrawlerConfig();
  const crawler = buildCrawler(env, config);

  await runMigrations(crawler.database.db);

  const scheduler = new CrawlScheduler(crawler.orchestrator, {
    cron: env.CRAWL_CRON,
    timezone: env.CRAWL_TIMEZONE,
    limitPerCategory: env.CRAWL_LIMIT_PER_CATEGORY,
  });
  scheduler.start();

  let metricsServer: Server | null = null;
  if (env.METRICS_PORT) {
    collectDefaultMetrics({ register: crawler.metrics.registry });
    metricsServer = startMetricsServer(crawler.metrics.registry, env.METRICS_PORT);
  }

  if (env.RUN_CRAWL_ON_STARTUP) {
    log.info('Running crawl on startup');
    scheduler.trigger('startup').catch(err => {
      log.error({ err }, 'Startup crawl failed');
    });
  }

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'Shutting down...');
    crawler.orchestrator.stop();
    try {
      await scheduler.stop();
      metricsServer?.close();
      await crawler.shutdown();
      process.exit(0);
    } catch (err) {
      log.error({ err }, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((err) => {
  log.fatal({ err }, 'Fatal startup error');
  process.exit(1);
});
