import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { Source } from '../config/crawler.js';
import { logger } from '../observability/logger.js';
import { systemClock, type Clock } from '../resilience/clock.js';
import type { Posting, RecordValidator } from './types.js';

const log = logger.child({ module: 'validator' });

const salary = z.number().int().nonnegative().optional();

export const postingSchema = z
  .object({
    source: z.string().min(1),
    sourceId: z.string().trim().min(1),
    url: z.string().url(),
    title: z.string().trim().min(1),
    salaryMin: salary,
    salaryMax: salary,
    latitude: z.number().min(-90).max(90).optional(),
    longitude: z.number().min(-180).max(180).optional(),
  })
  .refine(p => p.salaryMin === undefined || p.salaryMax === undefined || p.salaryMin <= p.salaryMax, {
    message: 'salaryMin exceeds salaryMax',
    path: ['salaryMin'],
  });

export interface ValidationStats {
  total: number;
  failed: number;
}

export interface SchemaValidatorOptions {
  sampleDir: string;
  driftThreshold?: number;
  driftMinSamples?: number;
  maxSamplesPerSource?: number;
  clock?: Clock;
}

/**
 * Checks extracted postings against the storage contract. A failure is
 * recorded and sampled to disk for regression fixtures; it never blocks the
 * record.
 */
export class SchemaValidator implements RecordValidator {
  private readonly stats = new Map<Source, ValidationStats>();
  private readonly samplesWritten = new Map<Source, number>();
  private readonly driftThreshold: number;
  private readonly driftMinSamples: number;
  private readonly maxSamplesPerSource: number;
  private readonly clock: Clock;

  constructor(private readonly options: SchemaValidatorOptions) {
    this.driftThreshold = options.driftThreshold ?? 0.3;
    this.driftMinSamples = options.driftMinSamples ?? 10;
    this.maxSamplesPerSource = options.maxSamplesPerSource ?? 50;
    this.clock = options.clock ?? systemClock;
  }

  async validate(posting: Posting): Promise<boolean> {
    const result = postingSchema.safeParse(posting);
    this.record(posting.source, !result.success);
    if (result.success) return true;

    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    log.error({ source: posting.source, sourceId: posting.sourceId, issues }, 'Posting failed validation');
    await this.saveSample(posting, issues);
    return false;
  }

  statsFor(source: Source): ValidationStats {
    return { ...(this.stats.get(source) ?? { total: 0, failed: 0 }) };
  }

  private record(source: Source, failed: boolean): void {
    const stats = this.stats.get(source) ?? { total: 0, failed: 0 };
    stats.total++;
    if (failed) stats.failed++;
    this.stats.set(source, stats);

    const ratio = stats.failed / stats.total;
    if (failed && stats.total >= this.driftMinSamples && ratio > this.driftThreshold) {
      log.error({ source, failureRate: Number(ratio.toFixed(3)), total: stats.total }, 'Structural drift alert');
    }
  }

  private async saveSample(posting: Posting, issues: string[]): Promise<void> {
    const written = this.samplesWritten.get(posting.source) ?? 0;
    if (written >= this.maxSamplesPerSource) return;
    this.samplesWritten.set(posting.source, written + 1);

    const safeId = (posting.sourceId || 'null').replace(/[^\w.-]/g, '_');
    const path = join(this.options.sampleDir, `job_${posting.source}_${safeId}_${this.clock()}.json`);
    try {
      await mkdir(this.options.sampleDir, { recursive: true });
      await writeFile(path, JSON.stringify({ issues, posting }, null, 2), 'utf-8');
      log.info({ path }, 'Failed sample saved');
    } catch (err) {
      log.error({ err, path }, 'Failed to save validation sample');
    }
  }
}
