import { z } from 'zod';
import { systemClock, type Clock } from './clock.js';

export type TakeResult = { granted: true } | { granted: false; waitSeconds: number };

export interface RateChange {
  previous: number;
  next: number;
}

export interface AdaptivePolicy {
  baseRate: number;
  successStreak: number;
  boostFactor: number;
  backoffFactor: number;
  maxMultiplier: number;
  minMultiplier: number;
}

/**
 * Shared throttle state. Every method is a single atomic operation against the
 * backing store; callers never read-modify-write.
 */
export interface ThrottleStore {
  /** Refill by elapsed time, then consume one token if available. */
  take(key: string, rate: number, capacity: number, nowSeconds: number): Promise<TakeResult>;
  adaptiveRate(key: string): Promise<number | null>;
  /** Returns the rate change when the success streak completed, otherwise null. */
  recordSuccess(key: string, policy: AdaptivePolicy): Promise<RateChange | null>;
  recordRateLimit(key: string, policy: AdaptivePolicy): Promise<RateChange>;
  setCooldown(key: string, seconds: number): Promise<void>;
  isCooling(keys: string[]): Promise<boolean>;
}

const TOKEN_BUCKET_LUA = `
local key = KEYS[1]
local rate = tonumber(ARGV[1])
local capacity = tonumber(ARGV[2])
local now = tonumber(ARGV[3])

local state = redis.call('HMGET', key, 'last_time', 'tokens')
local last_time = tonumber(state[1]) or now
local tokens = tonumber(state[2]) or capacity

tokens = math.min(capacity, tokens + math.max(0, now - last_time) * rate)

if tokens >= 1 then
  redis.call('HSET', key, 'last_time', tostring(now), 'tokens', tostring(tokens - 1))
  return {1, '0'}
end
return {0, tostring((1 - tokens) / rate)}
`;

const SUCCESS_LUA = `
local streak = redis.call('INCR', KEYS[1])
if streak < tonumber(ARGV[1]) then
  return {0, '0', '0'}
end
redis.call('SET', KEYS[1], 0)
local current = tonumber(redis.call('GET', KEYS[2])) or tonumber(ARGV[2])
local next_rate = math.min(current * tonumber(ARGV[3]), tonumber(ARGV[4]))
redis.call('SET', KEYS[2], tostring(next_rate))
return {1, tostring(current), tostring(next_rate)}
`;

const RATE_LIMIT_LUA = `
redis.call('SET', KEYS[1], 0)
local current = tonumber(redis.call('GET', KEYS[2])) or tonumber(ARGV[1])
local next_rate = math.max(current * tonumber(ARGV[2]), tonumber(ARGV[3]))
redis.call('SET', KEYS[2], tostring(next_rate))
return {tostring(current), tostring(next_rate)}
`;

const takeReplySchema = z.tuple([z.coerce.number(), z.coerce.number()]);
const successReplySchema = z.tuple([z.coerce.number(), z.coerce.number(), z.coerce.number()]);
const rateLimitReplySchema = z.tuple([z.coerce.number(), z.coerce.number()]);

function streakKey(key: string): string {
  return `throttle:success_streak:${key}`;
}

function rateKey(key: string): string {
  return `throttle:adaptive_rate:${key}`;
}

/** The Redis commands the throttle needs. An ioredis client satisfies it. */
export interface ThrottleRedis {
  eval(script: string, numKeys: number, ...args: (string | number)[]): Promise<unknown>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
  exists(...keys: string[]): Promise<number>;
}

export class RedisThrottleStore implements ThrottleStore {
  constructor(private readonly redis: ThrottleRedis) {}

  async take(key: string, rate: number, capacity: number, nowSeconds: number): Promise<TakeResult> {
    const reply = await this.redis.eval(TOKEN_BUCKET_LUA, 1, `throttle:${key}`, rate, capacity, nowSeconds);
    const [granted, waitSeconds] = takeReplySchema.parse(reply);
    return granted === 1 ? { granted: true } : { granted: false, waitSeconds };
  }

  async adaptiveRate(key: string): Promise<number | null> {
    const value = await this.redis.get(rateKey(key));
    if (value === null) return null;
    const rate = Number(value);
    return Number.isFinite(rate) ? rate : null;
  }

  async recordSuccess(key: string, policy: AdaptivePolicy): Promise<RateChange | null> {
    const reply = await this.redis.eval(
      SUCCESS_LUA,
      2,
      streakKey(key),
      rateKey(key),
      policy.successStreak,
      policy.baseRate,
      policy.boostFactor,
      policy.baseRate * policy.maxMultiplier,
    );
    const [boosted, previous, next] = successReplySchema.parse(reply);
    return boosted === 1 ? { previous, next } : null;
  }

  async recordRateLimit(key: string, policy: AdaptivePolicy): Promise<RateChange> {
    const reply = await this.redis.eval(
      RATE_LIMIT_LUA,
      2,
      streakKey(key),
      rateKey(key),
      policy.baseRate,
      policy.backoffFactor,
      policy.baseRate * policy.minMultiplier,
    );
    const [previous, next] = rateLimitReplySchema.parse(reply);
    return { previous, next };
  }

  async setCooldown(key: string, seconds: number): Promise<void> {
    await this.redis.set(`cooling:${key}`, '1', 'EX', Math.max(1, Math.ceil(seconds)));
  }

  async isCooling(keys: string[]): Promise<boolean> {
    if (keys.length === 0) return false;
    const count = await this.redis.exists(...keys.map(k => `cooling:${k}`));
    return count > 0;
  }
}

interface Bucket {
  tokens: number;
  lastRefill: number;
}

/** Single-process store. Each method body runs without awaiting, so it is atomic on the event loop. */
export class MemoryThrottleStore implements ThrottleStore {
  private readonly buckets = new Map<string, Bucket>();
  private readonly rates = new Map<string, number>();
  private readonly streaks = new Map<string, number>();
  private readonly cooldowns = new Map<string, number>();

  constructor(private readonly clock: Clock = systemClock) {}

  async take(key: string, rate: number, capacity: number, nowSeconds: number): Promise<TakeResult> {
    const bucket = this.buckets.get(key) ?? { tokens: capacity, lastRefill: nowSeconds };
    const elapsed = Math.max(0, nowSeconds - bucket.lastRefill);
    const tokens = Math.min(capacity, bucket.tokens + elapsed * rate);

    if (tokens >= 1) {
      this.buckets.set(key, { tokens: tokens - 1, lastRefill: nowSeconds });
      return { granted: true };
    }
    return { granted: false, waitSeconds: (1 - tokens) / rate };
  }

  async adaptiveRate(key: string): Promise<number | null> {
    return this.rates.get(key) ?? null;
  }

  async recordSuccess(key: string, policy: AdaptivePolicy): Promise<RateChange | null> {
    const streak = (this.streaks.get(key) ?? 0) + 1;
    if (streak < policy.successStreak) {
      this.streaks.set(key, streak);
      return null;
    }
    this.streaks.set(key, 0);
    const previous = this.rates.get(key) ?? policy.baseRate;
    const next = Math.min(previous * policy.boostFactor, policy.baseRate * policy.maxMultiplier);
    this.rates.set(key, next);
    return { previous, next };
  }

  async recordRateLimit(key: string, policy: AdaptivePolicy): Promise<RateChange> {
    this.streaks.set(key, 0);
    const previous = this.rates.get(key) ?? policy.baseRate;
    const next = Math.max(previous * policy.backoffFactor, policy.baseRate * policy.minMultiplier);
    this.rates.set(key, next);
    return { previous, next };
  }

  async setCooldown(key: string, seconds: number): Promise<void> {
    this.cooldowns.set(key, this.clock() + seconds * 1000);
  }

  async isCooling(keys: string[]): Promise<boolean> {
    const now = this.clock();
    return keys.some(key => (this.cooldowns.get(key) ?? 0) > now);
  }
}
