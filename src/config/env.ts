import 'dotenv/config';
import { z } from 'zod';

const envSchema = z.object({
  DATABASE_URL: z.string().min(1),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  RUN_CRAWL_ON_STARTUP: z.string().transform(v => v === 'true').default('false'),

  // Scheduling
  CRAWL_CRON: z.string().default('0 0 3 * * *'),
  CRAWL_TIMEZONE: z.string().default('Asia/Taipei'),
  CRAWL_LIMIT_PER_CATEGORY: z.coerce.number().int().positive().default(20),

  // Shared throttle state + document cache, optional: falls back to per-process memory
  REDIS_URL: z.string().optional(),

  // AI self-healing, optional: disabled without a key
  ANTHROPIC_API_KEY: z.string().optional(),
  AI_HEALING_MODEL: z.string().default('claude-haiku-4-5-20251001'),

  // Rendering fallback, optional: CDP endpoint of a headless Chromium
  BROWSER_WS_ENDPOINT: z.string().optional(),

  // Prometheus /metrics endpoint, optional: not served without a port
  METRICS_PORT: z.coerce.number().int().positive().optional(),

  FAILED_SAMPLE_DIR: z.string().default('data/failed_samples'),
  GEOCODER_USER_AGENT: z.string().default('job-listing-crawler/0.1'),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    console.error('Invalid environment variables:', result.error.flatten().fieldErrors);
    process.exit(1);
  }
  return result.data;
}

export const env = loadEnv();
