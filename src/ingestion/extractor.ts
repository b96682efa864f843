import { createHash } from 'node:crypto';
import * as cheerio from 'cheerio';
import type { Source } from '../config/crawler.js';
import { logger } from '../observability/logger.js';
import type { Organization, Posting, PostingExtractor } from './types.js';

const log = logger.child({ module: 'extractor' });

type JsonObject = Record<string, unknown>;

interface SourcePatterns {
  job: RegExp | 'lastSegment';
  company: RegExp | 'lastSegment';
}

const PATTERNS: Record<Source, SourcePatterns> = {
  platform_104: { job: /job\/([^/?#]+)/, company: /company\/([^/?#]+)/ },
  platform_1111: { job: /job\/(\d+)/, company: /corp\/(\d+)/ },
  platform_cakeresume: { job: 'lastSegment', company: 'lastSegment' },
  platform_yourator: { job: /jobs\/(\d+)/, company: /companies\/([^/?#]+)/ },
  platform_yes123: { job: /p_id=([^&#]+)/, company: /p_id=([^&#]+)/ },
};

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed || undefined;
  }
  if (typeof value === 'number') return String(value);
  return undefined;
}

function num(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.replace(/,/g, ''));
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function first(value: unknown): unknown {
  return Array.isArray(value) ? value[0] : value;
}

function date(value: unknown): Date | undefined {
  const raw = text(value);
  if (!raw) return undefined;
  const parsed = new Date(raw);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}

export function stripTags(html: string): string {
  return cheerio.load(`<div>${html}</div>`)('div').first().text().replace(/\s+/g, ' ').trim();
}

function hashId(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 16);
}

export function matchId(pattern: RegExp | 'lastSegment', url: string): string | undefined {
  if (pattern === 'lastSegment') {
    const segment = url.split(/[?#]/)[0].replace(/\/+$/, '').split('/').pop();
    return segment || undefined;
  }
  return pattern.exec(url)?.[1];
}

/** Every JSON-LD object on the page, with arrays and `@graph` flattened. */
export function readJsonLd(html: string): JsonObject[] {
  const $ = cheerio.load(html);
  const objects: JsonObject[] = [];

  $('script[type="application/ld+json"]').each((_, el) => {
    const raw = $(el).text().trim().replace(/^<!\[CDATA\[|\]\]>$/gi, '');
    if (!raw) return;
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      log.debug({ err }, 'Skipping invalid JSON-LD block');
      return;
    }
    const nodes = Array.isArray(data) ? data : isObject(data) && Array.isArray(data['@graph']) ? data['@graph'] : [data];
    for (const node of nodes) {
      if (isObject(node)) objects.push(node);
    }
  });

  return objects;
}

function isType(node: JsonObject, type: string): boolean {
  const declared = node['@type'];
  return Array.isArray(declared) ? declared.includes(type) : declared === type;
}

interface Salary {
  min?: number;
  max?: number;
  text?: string;
}

/** Reads `baseSalary` as a MonetaryAmount, a bare value or free text such as `4萬`. */
export function parseSalary(node: unknown): Salary {
  const salary = first(node);
  if (isObject(salary)) {
    const value = isObject(salary.value) ? salary.value : salary;
    const min = num(value.minValue) ?? num(value.value);
    const max = num(value.maxValue);
    const unit = text(value.unitText) ?? 'MONTH';
    if (min !== undefined || max !== undefined) {
      const range = max !== undefined && max !== min ? `${min ?? ''}-${max}` : `${min ?? max}`;
      return { min: min && Math.round(min), max: max && Math.round(max), text: `${range} ${unit}` };
    }
    return {};
  }

  const raw = text(salary);
  if (!raw) return {};
  const cleaned = raw.replace(/[,\s]/g, '');
  const wan = /([\d.]+)(?=萬)/.exec(cleaned);
  if (wan) return { min: Math.round(Number(wan[1]) * 10_000), text: raw };
  const digits = cleaned.match(/\d+/g) ?? [];
  return { min: num(digits[0]), max: num(digits[1]), text: raw };
}

/** Splits a Taiwanese address into county/city and district. */
export function splitAddress(address: string): { region?: string; district?: string } {
  const match = /^(.{2}[市縣])(.{1,3}?[區鄉鎮市])?/.exec(address.replace(/^台灣|^臺灣/, ''));
  return { region: match?.[1], district: match?.[2] };
}

export class JsonLdExtractor implements PostingExtractor {
  private readonly patterns: SourcePatterns;

  constructor(readonly source: Source) {
    this.patterns = PATTERNS[source];
  }

  pageTitle(html: string): string {
    return cheerio.load(html)('title').first().text().trim();
  }

  sourceId(url: string): string {
    return matchId(this.patterns.job, url) ?? hashId(url);
  }

  extractPosting(html: string, url: string): Posting | null {
    const node = readJsonLd(html).find(n => isType(n, 'JobPosting'));
    if (!node) return null;

    const title = text(node.title);
    if (!title) return null;

    const hiring = first(node.hiringOrganization);
    const org = isObject(hiring) ? hiring : undefined;
    const location = first(node.jobLocation);
    const place: JsonObject = isObject(location) ? location : {};
    const address: JsonObject = isObject(place.address) ? place.address : {};
    const geo: JsonObject = isObject(place.geo) ? place.geo : {};
    const street = text(address.streetAddress) ?? text(place.address);
    const split = street ? splitAddress(street) : {};
    const salary = parseSalary(node.baseSalary);
    const description = text(node.description);
    const orgUrl = org ? text(org.sameAs) ?? text(org.url) : undefined;

    return {
      source: this.source,
      sourceId: this.sourceId(text(node.url) ?? url),
      url,
      title,
      description: description && stripTags(description),
      companyName: org ? text(org.name) : undefined,
      companySourceId: orgUrl && matchId(this.patterns.company, orgUrl),
      address: street,
      region: text(address.addressRegion) ?? split.region,
      district: text(address.addressLocality) ?? split.district,
      salaryMin: salary.min,
      salaryMax: salary.max,
      salaryText: salary.text,
      employmentType: text(first(node.employmentType)),
      postedAt: date(node.datePosted),
      validThrough: date(node.validThrough),
      latitude: num(geo.latitude),
      longitude: num(geo.longitude),
      provenance: 'native',
      raw: node,
    };
  }

  extractOrganization(html: string, url: string): Organization | null {
    const nodes = readJsonLd(html);
    const posting = nodes.find(n => isType(n, 'JobPosting'));
    const hiring = posting ? first(posting.hiringOrganization) : undefined;
    const org = isObject(hiring) ? hiring : nodes.find(n => isType(n, 'Organization'));
    if (!org) return null;

    const name = text(org.name);
    if (!name) return null;

    const orgUrl = text(org.url);
    const website = text(org.sameAs);
    const idSource = website ?? orgUrl;
    const address = isObject(org.address)
      ? [text(org.address.addressRegion), text(org.address.addressLocality), text(org.address.streetAddress)]
          .filter(Boolean)
          .join('')
      : text(org.address);
    const employees = isObject(org.numberOfEmployees) ? text(org.numberOfEmployees.value) : text(org.numberOfEmployees);
    const description = text(org.description);

    return {
      source: this.source,
      sourceId: (idSource && matchId(this.patterns.company, idSource)) ?? hashId(`${name}|${url}`),
      name,
      url: orgUrl,
      website,
      address: address || undefined,
      description: description && stripTags(description),
      employeeCount: employees,
      provenance: 'native',
    };
  }
}
