import { Redis } from 'ioredis';
import { logger } from '../observability/logger.js';

const log = logger.child({ module: 'redis' });

/**
 * Coordination-state connection. Commands fail fast while Redis is down so the
 * throttler and document cache fall back instead of queueing.
 */
export function createRedis(url: string): Redis {
  const redis = new Redis(url, {
    lazyConnect: true,
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    commandTimeout: 1_000,
  });
  redis.on('error', (err: Error) => log.warn({ err }, 'Redis connection error'));
  redis.connect().catch((err: unknown) => log.error({ err }, 'Redis unavailable, throttling fails open'));
  return redis;
}
