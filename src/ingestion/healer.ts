import Anthropic from '@anthropic-ai/sdk';
import { distance } from 'fastest-levenshtein';
import { z } from 'zod';
import type { Source } from '../config/crawler.js';
import { logger } from '../observability/logger.js';
import type { CrawlMetrics } from '../observability/metrics.js';
import { CircuitOpenError, type CircuitBreaker } from '../resilience/circuit-breaker.js';
import type { HealingGate } from '../resilience/healing-gate.js';
import { stripTags, type JsonLdExtractor } from './extractor.js';
import type { Organization, Posting } from './types.js';

const log = logger.child({ module: 'healer' });

const MAX_INPUT_CHARS = 8000;

const healedSchema = z.object({
  title: z.string().default(''),
  description: z.string().nullish(),
  company_name: z.string().nullish(),
  address: z.string().nullish(),
  salary_min: z.number().int().nonnegative().nullish(),
  salary_max: z.number().int().nonnegative().nullish(),
  salary_text: z.string().nullish(),
});

export type HealedFields = z.infer<typeof healedSchema>;

export interface HealingModel {
  /** Throws when the model call itself fails. */
  extract(pageText: string): Promise<HealedFields>;
}

const extractionTool: Anthropic.Tool = {
  name: 'extract_job_posting',
  description: 'Extract the job posting fields from the text of a job listing page',
  input_schema: {
    type: 'object' as const,
    properties: {
      title: { type: 'string', description: 'The job title exactly as shown on the page' },
      description: { type: 'string', description: 'The job description' },
      company_name: { type: 'string', description: 'The hiring company' },
      address: { type: 'string', description: 'The work location address' },
      salary_min: { type: 'integer', description: 'Lowest salary figure, if stated' },
      salary_max: { type: 'integer', description: 'Highest salary figure, if stated' },
      salary_text: { type: 'string', description: 'The salary as written on the page' },
    },
    required: ['title'],
  },
};

export class AnthropicHealingModel implements HealingModel {
  private readonly client: Anthropic;

  constructor(
    private readonly model: string,
    apiKey?: string,
  ) {
    this.client = new Anthropic({ apiKey, timeout: 60_000, maxRetries: 1 });
  }

  async extract(pageText: string): Promise<HealedFields> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: 2048,
      tools: [extractionTool],
      tool_choice: { type: 'tool', name: 'extract_job_posting' },
      messages: [
        {
          role: 'user',
          content: `Extract the job posting from this page text.\n\n${pageText}`,
        },
      ],
    });

    const toolBlock = response.content.find(
      (block): block is Anthropic.ToolUseBlock => block.type === 'tool_use',
    );
    if (!toolBlock) throw new Error('No tool use in model response');

    return healedSchema.parse(toolBlock.input);
  }
}

/** 1 − Levenshtein distance over the longer length, case-insensitive. */
export function titleSimilarity(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  return 1 - distance(left, right) / Math.max(left.length, right.length, 1);
}

export interface SelfHealerOptions {
  model: HealingModel;
  breaker: CircuitBreaker;
  gate: HealingGate;
  extractors: Map<Source, JsonLdExtractor>;
  minTitleSimilarity?: number;
  enabled?: boolean;
  metrics?: CrawlMetrics | null;
}

export interface HealedRecord {
  posting: Posting;
  organization: Organization | null;
}

export class SelfHealer {
  private readonly minTitleSimilarity: number;

  constructor(private readonly options: SelfHealerOptions) {
    this.minTitleSimilarity = options.minTitleSimilarity ?? 0.4;
  }

  async heal(source: Source, html: string, url: string, pageTitle: string): Promise<HealedRecord | null> {
    const { gate, breaker, model } = this.options;
    if (this.options.enabled === false || !gate.allows()) return null;

    const pageText = stripTags(html).slice(0, MAX_INPUT_CHARS);
    let fields: HealedFields;
    try {
      fields = await breaker.call(() => model.extract(pageText));
    } catch (err) {
      if (err instanceof CircuitOpenError) {
        this.options.metrics?.recordHeal(source, 'circuit_open');
        return null;
      }
      log.warn({ err, source, url }, 'AI extraction failed');
      gate.recordFailure(err);
      this.options.metrics?.recordHeal(source, 'failure');
      return null;
    }
    gate.recordSuccess();

    const title = fields.title.trim();
    if (!title) {
      this.options.metrics?.recordHeal(source, 'rejected');
      return null;
    }

    if (pageTitle) {
      const similarity = titleSimilarity(pageTitle, title);
      if (similarity < this.minTitleSimilarity) {
        log.info({ source, url, pageTitle, title, similarity }, 'Healed title rejected');
        this.options.metrics?.recordHeal(source, 'rejected');
        return null;
      }
    }

    const sourceId = this.options.extractors.get(source)?.sourceId(url) ?? url;
    const companyName = fields.company_name?.trim() || undefined;
    const posting: Posting = {
      source,
      sourceId,
      url,
      title,
      description: fields.description ?? undefined,
      companyName,
      address: fields.address ?? undefined,
      salaryMin: fields.salary_min ?? undefined,
      salaryMax: fields.salary_max ?? undefined,
      salaryText: fields.salary_text ?? undefined,
      provenance: 'healed',
    };

    const organization: Organization | null = companyName
      ? { source, sourceId: `healed:${companyName}`, name: companyName, provenance: 'healed' }
      : null;
    if (organization) posting.companySourceId = organization.sourceId;

    this.options.metrics?.recordHeal(source, 'success');
    log.info({ source, url, title }, 'Posting recovered by AI extraction');
    return { posting, organization };
  }
}
