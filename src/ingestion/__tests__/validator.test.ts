import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { SchemaValidator } from '../validator.js';
import { FakeClock, makePosting } from '../../__tests__/fakes.js';

describe('SchemaValidator', () => {
  let dir: string;
  const clock = new FakeClock();

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'crawler-samples-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('accepts a well-formed posting without writing a sample', async () => {
    const validator = new SchemaValidator({ sampleDir: dir, clock: clock.now });

    expect(await validator.validate(makePosting({ salaryMin: 40000, salaryMax: 60000, latitude: 25.04 }))).toBe(true);
    expect(validator.statsFor('platform_104')).toEqual({ total: 1, failed: 0 });
    expect(await readdir(dir)).toEqual([]);
  });

  it('saves a failed sample with its issues', async () => {
    const validator = new SchemaValidator({ sampleDir: dir, clock: clock.now });
    const posting = makePosting({ salaryMin: 70000, salaryMax: 50000 });

    expect(await validator.validate(posting)).toBe(false);

    const name = `job_platform_104_abc123_${clock.now()}.json`;
    expect(await readdir(dir)).toEqual([name]);
    const sample: unknown = JSON.parse(await readFile(join(dir, name), 'utf-8'));
    expect(sample).toMatchObject({
      issues: ['salaryMin: salaryMin exceeds salaryMax'],
      posting: { sourceId: 'abc123', salaryMin: 70000, salaryMax: 50000 },
    });
  });

  it('rejects blank titles and out-of-range coordinates', async () => {
    const validator = new SchemaValidator({ sampleDir: dir, clock: clock.now });

    expect(await validator.validate(makePosting({ title: '   ' }))).toBe(false);
    expect(await validator.validate(makePosting({ latitude: 91 }))).toBe(false);
    expect(validator.statsFor('platform_104')).toEqual({ total: 2, failed: 2 });
  });

  it('makes the sample file name safe', async () => {
    const validator = new SchemaValidator({ sampleDir: dir, clock: clock.now });

    await validator.validate(makePosting({ sourceId: 'a/b?c', url: 'not a url' }));

    expect(await readdir(dir)).toEqual([`job_platform_104_a_b_c_${clock.now()}.json`]);
  });

  it('caps the samples kept per source', async () => {
    const validator = new SchemaValidator({ sampleDir: dir, clock: clock.now, maxSamplesPerSource: 1 });

    await validator.validate(makePosting({ sourceId: 'one', title: '' }));
    await validator.validate(makePosting({ sourceId: 'two', title: '' }));

    expect(await readdir(dir)).toEqual([`job_platform_104_one_${clock.now()}.json`]);
    expect(validator.statsFor('platform_104').failed).toBe(2);
  });

  it('keeps separate counts per source', async () => {
    const validator = new SchemaValidator({ sampleDir: dir, clock: clock.now });

    await validator.validate(makePosting());
    await validator.validate(makePosting({ source: 'platform_1111', title: '' }));

    expect(validator.statsFor('platform_104')).toEqual({ total: 1, failed: 0 });
    expect(validator.statsFor('platform_1111')).toEqual({ total: 1, failed: 1 });
    expect(validator.statsFor('platform_yes123')).toEqual({ total: 0, failed: 0 });
  });
});
