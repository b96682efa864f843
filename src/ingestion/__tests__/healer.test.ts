import { describe, it, expect } from 'vitest';
import type { Source } from '../../config/crawler.js';
import { CrawlMetrics } from '../../observability/metrics.js';
import { CircuitBreaker } from '../../resilience/circuit-breaker.js';
import { HealingGate } from '../../resilience/healing-gate.js';
import { JsonLdExtractor } from '../extractor.js';
import { SelfHealer, titleSimilarity, type HealedFields, type HealingModel } from '../healer.js';
import { FakeClock } from '../../__tests__/fakes.js';

const URL = 'https://www.104.com.tw/job/7x2ab';
const HTML = '<h1>Backend Engineer</h1><p>Acme</p>';

class StubModel implements HealingModel {
  inputs: string[] = [];
  constructor(private readonly result: HealedFields | Error) {}

  async extract(pageText: string): Promise<HealedFields> {
    this.inputs.push(pageText);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

function makeHealer(
  model: HealingModel,
  options: { breakerThreshold?: number; enabled?: boolean; metrics?: CrawlMetrics } = {},
) {
  const clock = new FakeClock();
  const breaker = new CircuitBreaker('healing', {
    failureThreshold: options.breakerThreshold ?? 5,
    recoveryTimeoutMs: 60_000,
    clock: clock.now,
  });
  const gate = new HealingGate({ failureThreshold: 3, isolationMs: 600_000, clock: clock.now });
  const extractors = new Map<Source, JsonLdExtractor>([['platform_104', new JsonLdExtractor('platform_104')]]);
  const healer = new SelfHealer({ model, breaker, gate, extractors, enabled: options.enabled, metrics: options.metrics });
  return { clock, breaker, gate, healer };
}

describe('SelfHealer', () => {
  it('builds a healed posting and organization from the model output', async () => {
    const model = new StubModel({
      title: 'Backend Engineer',
      company_name: ' Acme ',
      address: '台北市信義區市府路1號',
      salary_min: 40000,
      salary_max: 60000,
    });
    const { healer } = makeHealer(model);

    const healed = await healer.heal('platform_104', HTML, URL, 'Backend Engineer | 104');

    expect(model.inputs).toEqual(['Backend EngineerAcme']);
    expect(healed?.posting).toMatchObject({
      source: 'platform_104',
      sourceId: '7x2ab',
      url: URL,
      title: 'Backend Engineer',
      companyName: 'Acme',
      companySourceId: 'healed:Acme',
      address: '台北市信義區市府路1號',
      salaryMin: 40000,
      salaryMax: 60000,
      provenance: 'healed',
    });
    expect(healed?.organization).toEqual({
      source: 'platform_104',
      sourceId: 'healed:Acme',
      name: 'Acme',
      provenance: 'healed',
    });
  });

  it('rejects a title that does not resemble the page title', async () => {
    const { healer, gate } = makeHealer(new StubModel({ title: 'Backend Engineer' }));

    expect(await healer.heal('platform_104', HTML, URL, '會計助理')).toBeNull();
    expect(gate.allows()).toBe(true);
  });

  it('accepts any title when the page has none', async () => {
    const { healer } = makeHealer(new StubModel({ title: 'Backend Engineer' }));

    const healed = await healer.heal('platform_104', HTML, URL, '');

    expect(healed?.posting.title).toBe('Backend Engineer');
    expect(healed?.organization).toBeNull();
  });

  it('returns null for an empty title', async () => {
    const { healer } = makeHealer(new StubModel({ title: '   ' }));
    expect(await healer.heal('platform_104', HTML, URL, 'Backend Engineer')).toBeNull();
  });

  it('isolates the model after three consecutive failures', async () => {
    const model = new StubModel(new Error('overloaded'));
    const { healer, gate } = makeHealer(model);

    for (let i = 0; i < 4; i++) {
      expect(await healer.heal('platform_104', HTML, URL, 'Backend Engineer')).toBeNull();
    }

    expect(model.inputs).toHaveLength(3);
    expect(gate.allows()).toBe(false);
  });

  it('does not count breaker rejections against the gate', async () => {
    const model = new StubModel(new Error('overloaded'));
    const { healer, gate, breaker } = makeHealer(model, { breakerThreshold: 1 });

    for (let i = 0; i < 5; i++) {
      await healer.heal('platform_104', HTML, URL, 'Backend Engineer');
    }

    expect(breaker.currentState).toBe('OPEN');
    expect(model.inputs).toHaveLength(1);
    expect(gate.allows()).toBe(true);
  });

  it('counts heal requests by result', async () => {
    const metrics = new CrawlMetrics();
    const recovered = makeHealer(new StubModel({ title: 'Backend Engineer' }), { metrics }).healer;
    const failing = makeHealer(new StubModel(new Error('overloaded')), { breakerThreshold: 1, metrics }).healer;

    await recovered.heal('platform_104', HTML, URL, 'Backend Engineer');
    await recovered.heal('platform_104', HTML, URL, '會計助理');
    await failing.heal('platform_104', HTML, URL, 'Backend Engineer');
    await failing.heal('platform_104', HTML, URL, 'Backend Engineer');

    const counts = Object.fromEntries(
      (await metrics.healRequests.get()).values.map(v => [`${v.labels.platform}/${v.labels.result}`, v.value]),
    );
    expect(counts).toEqual({
      'platform_104/success': 1,
      'platform_104/rejected': 1,
      'platform_104/failure': 1,
      'platform_104/circuit_open': 1,
    });
  });

  it('does nothing when disabled', async () => {
    const model = new StubModel({ title: 'Backend Engineer' });
    const { healer } = makeHealer(model, { enabled: false });

    expect(await healer.heal('platform_104', HTML, URL, 'Backend Engineer')).toBeNull();
    expect(model.inputs).toEqual([]);
  });
});

describe('titleSimilarity', () => {
  it('ignores case', () => {
    expect(titleSimilarity('Backend', 'backend')).toBe(1);
  });

  it('is 1 for two empty strings', () => {
    expect(titleSimilarity('', '')).toBe(1);
  });

  it('scales edit distance by the longer title', () => {
    expect(titleSimilarity('abcd', 'abcx')).toBe(0.75);
  });
});
