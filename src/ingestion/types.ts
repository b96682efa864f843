import type { Source } from '../config/crawler.js';

export type Provenance = 'native' | 'healed';

export interface Posting {
  source: Source;
  sourceId: string;
  url: string;
  title: string;
  description?: string;
  companyName?: string;
  companySourceId?: string;
  address?: string;
  region?: string;
  district?: string;
  salaryMin?: number;
  salaryMax?: number;
  salaryText?: string;
  employmentType?: string;
  postedAt?: Date;
  validThrough?: Date;
  latitude?: number;
  longitude?: number;
  categoryName?: string;
  provenance: Provenance;
  raw?: unknown;
}

export interface Organization {
  source: Source;
  sourceId: string;
  name: string;
  url?: string;
  website?: string;
  address?: string;
  description?: string;
  employeeCount?: string;
  provenance: Provenance;
}

/** Coordinates for a posting, either from the page itself or from a geocoder. */
export interface JobLocation {
  latitude: number;
  longitude: number;
  formattedAddress?: string;
  provider: 'NATIVE' | 'OSM';
}

export interface Category {
  source: Source;
  layer1Id?: string | null;
  layer1Name?: string | null;
  layer2Id?: string | null;
  layer2Name?: string | null;
  layer3Id: string;
  layer3Name: string;
  lastCrawledAt: Date | null;
}

export interface CrawlOutcome {
  url: string;
  success: boolean;
  latencyMs: number;
  error: string | null;
}

export interface HealthReport {
  source: Source;
  fetchOk: boolean;
  extractionOk: boolean;
  latencyMs: number;
  error?: string;
}

export interface HealthSink {
  recordHealth(report: HealthReport): Promise<void>;
}

export interface SkillTag {
  name: string;
  type: string;
}

export interface CrawlStore extends HealthSink {
  listCategories(source: Source, layer3Id?: string): Promise<Category[]>;
  /** Category ids checkpointed within the last `windowDays`. */
  getCrawledCategoryIds(source: Source, windowDays: number): Promise<Set<string>>;
  markCategoryCrawled(source: Source, layer3Id: string, at?: Date): Promise<void>;
  /** One transaction; idempotent on `(source, sourceId)`. Returns false when nothing was written. */
  saveRecord(
    posting: Posting,
    organization: Organization | null,
    categoryId: string | null,
    location: JobLocation | null,
  ): Promise<boolean>;
  saveSkills(source: Source, sourceId: string, skills: SkillTag[]): Promise<void>;
  saveLocation(source: Source, sourceId: string, location: JobLocation): Promise<void>;
}

export interface PostingExtractor {
  extractPosting(html: string, url: string): Posting | null;
  extractOrganization(html: string, url: string): Organization | null;
  pageTitle(html: string): string;
}

export interface RecordValidator {
  validate(posting: Posting): Promise<boolean>;
}

export interface Enricher {
  readonly name: string;
  enrich(posting: Posting): Promise<void>;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
