import { createHash } from 'node:crypto';
import { logger } from '../observability/logger.js';
import { sleep as defaultSleep, systemClock, type Clock, type Sleep } from './clock.js';
import type { AdaptivePolicy, TakeResult, ThrottleStore } from './throttle-store.js';

const log = logger.child({ module: 'throttler' });

const MAX_WAIT_MS = 5_000;

export type AdaptiveSettings = Omit<AdaptivePolicy, 'baseRate'>;

export const DEFAULT_ADAPTIVE: AdaptiveSettings = {
  successStreak: 50,
  boostFactor: 1.1,
  backoffFactor: 0.7,
  maxMultiplier: 1.5,
  minMultiplier: 0.1,
};

export interface ThrottlerOptions {
  adaptive?: AdaptiveSettings;
  cooldownPollMs?: number;
  clock?: Clock;
  sleep?: Sleep;
  random?: () => number;
}

export interface AcquireOptions {
  rate: number;
  capacity: number;
  timeoutMs: number;
  proxy?: string;
}

function proxyHash(proxy: string): string {
  return createHash('md5').update(proxy).digest('hex').slice(0, 8);
}

function cooldownKey(key: string, proxy?: string): string {
  return proxy ? `${key}:proxy:${proxyHash(proxy)}` : key;
}

/**
 * Distributed adaptive token bucket.
 *
 * Every store failure is logged and treated as permission to proceed: pipeline
 * liveness wins over rate-limit fairness. A `null` store means no coordination
 * state is configured at all.
 */
export class Throttler {
  private readonly adaptive: AdaptiveSettings;
  private readonly cooldownPollMs: number;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private readonly random: () => number;

  constructor(
    private readonly store: ThrottleStore | null,
    options: ThrottlerOptions = {},
  ) {
    this.adaptive = options.adaptive ?? DEFAULT_ADAPTIVE;
    this.cooldownPollMs = options.cooldownPollMs ?? 2_000;
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  /** One atomic refill-and-consume attempt. Never blocks. */
  async tryAcquire(key: string, rate: number, capacity: number): Promise<TakeResult> {
    if (!this.store) return { granted: true };
    try {
      return await this.store.take(key, rate, capacity, this.clock() / 1000);
    } catch (err) {
      log.error({ err, key }, 'Token bucket unavailable, failing open');
      return { granted: true };
    }
  }

  /**
   * Waits for a token. Returns false when `timeoutMs` elapses first; that is a
   * backpressure signal for the caller, not an error.
   */
  async acquire(key: string, options: AcquireOptions): Promise<boolean> {
    if (!this.store) return true;

    const startedAt = this.clock();
    for (;;) {
      if (this.clock() - startedAt > options.timeoutMs) {
        log.warn({ key, timeoutMs: options.timeoutMs }, 'Throttle wait timed out');
        return false;
      }

      if (await this.isCooling(key, options.proxy)) {
        await this.sleep(this.cooldownPollMs);
        continue;
      }

      const rate = await this.currentRate(key, options.rate);
      const result = await this.tryAcquire(key, rate, options.capacity);
      if (result.granted) return true;

      const jitter = 0.01 + this.random() * 0.04;
      await this.sleep(Math.min((result.waitSeconds + jitter) * 1000, MAX_WAIT_MS));
    }
  }

  async isCooling(key: string, proxy?: string): Promise<boolean> {
    if (!this.store) return false;
    const keys = proxy ? [key, cooldownKey(key, proxy)] : [key];
    try {
      return await this.store.isCooling(keys);
    } catch (err) {
      log.error({ err, key }, 'Cooldown check failed');
      return false;
    }
  }

  async currentRate(key: string, baseRate: number): Promise<number> {
    if (!this.store) return baseRate;
    try {
      return (await this.store.adaptiveRate(key)) ?? baseRate;
    } catch (err) {
      log.error({ err, key }, 'Adaptive rate unavailable, using base rate');
      return baseRate;
    }
  }

  async reportSuccess(key: string, baseRate: number): Promise<void> {
    if (!this.store) return;
    try {
      const change = await this.store.recordSuccess(key, { ...this.adaptive, baseRate });
      if (change) {
        log.info({ key, previous: change.previous, next: change.next }, 'Adaptive rate raised');
      }
    } catch (err) {
      log.error({ err, key }, 'Failed to record throttle success');
    }
  }

  /** Starts a cooldown (source-wide, or for one proxy) and cuts the adaptive rate. */
  async report429(key: string, baseRate: number, cooldownSeconds: number, proxy?: string): Promise<void> {
    if (!this.store) return;
    try {
      await this.store.setCooldown(cooldownKey(key, proxy), cooldownSeconds);
      log.warn({ key, proxy: proxy ? proxyHash(proxy) : undefined, cooldownSeconds }, 'Cooldown triggered');
    } catch (err) {
      log.error({ err, key }, 'Failed to set cooldown');
    }

    try {
      const change = await this.store.recordRateLimit(key, { ...this.adaptive, baseRate });
      log.warn({ key, previous: change.previous, next: change.next }, 'Adaptive rate lowered');
    } catch (err) {
      log.error({ err, key }, 'Failed to record rate limit');
    }
  }

  forKey(key: string, limits: SourceLimits): SourceThrottle {
    return new SourceThrottle(this, key, limits);
  }
}

export interface SourceLimits {
  rate: number;
  capacity: number;
  timeoutMs: number;
  cooldownSeconds: number;
}

/** One source's view of the shared throttler, shared by all of that source's workers. */
export class SourceThrottle {
  constructor(
    private readonly throttler: Throttler,
    readonly key: string,
    readonly limits: SourceLimits,
  ) {}

  acquire(proxy?: string): Promise<boolean> {
    return this.throttler.acquire(this.key, {
      rate: this.limits.rate,
      capacity: this.limits.capacity,
      timeoutMs: this.limits.timeoutMs,
      proxy,
    });
  }

  reportSuccess(): Promise<void> {
    return this.throttler.reportSuccess(this.key, this.limits.rate);
  }

  report429(proxy?: string): Promise<void> {
    return this.throttler.report429(this.key, this.limits.rate, this.limits.cooldownSeconds, proxy);
  }
}
