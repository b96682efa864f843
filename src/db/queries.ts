import { and, asc, eq, gt, sql } from 'drizzle-orm';
import { isSource, type Source } from '../config/crawler.js';
import type {
  Category,
  CrawlStore,
  HealthReport,
  JobLocation,
  Organization,
  Posting,
  SkillTag,
} from '../ingestion/types.js';
import { logger } from '../observability/logger.js';
import type { Database } from './client.js';
import { categories, categoryJobs, companies, jobLocations, jobSkills, jobs, sourceHealth } from './schema.js';

const log = logger.child({ module: 'db:queries' });

const DAY_MS = 24 * 60 * 60 * 1000;

export class PgCrawlStore implements CrawlStore {
  constructor(private readonly db: Database) {}

  async listCategories(source: Source, layer3Id?: string): Promise<Category[]> {
    const conditions = [eq(categories.source, source)];
    if (layer3Id) conditions.push(eq(categories.layer3Id, layer3Id));

    const rows = await this.db
      .select()
      .from(categories)
      .where(and(...conditions))
      .orderBy(asc(categories.id));

    return rows.flatMap(row =>
      isSource(row.source)
        ? [{
            source: row.source,
            layer1Id: row.layer1Id,
            layer1Name: row.layer1Name,
            layer2Id: row.layer2Id,
            layer2Name: row.layer2Name,
            layer3Id: row.layer3Id,
            layer3Name: row.layer3Name,
            lastCrawledAt: row.lastCrawledAt,
          }]
        : [],
    );
  }

  async getCrawledCategoryIds(source: Source, windowDays: number): Promise<Set<string>> {
    const since = new Date(Date.now() - windowDays * DAY_MS);
    const rows = await this.db
      .select({ layer3Id: categories.layer3Id })
      .from(categories)
      .where(and(eq(categories.source, source), gt(categories.lastCrawledAt, since)));
    return new Set(rows.map(r => r.layer3Id));
  }

  async markCategoryCrawled(source: Source, layer3Id: string, at = new Date()): Promise<void> {
    await this.db
      .update(categories)
      .set({ lastCrawledAt: at })
      .where(and(eq(categories.source, source), eq(categories.layer3Id, layer3Id)));
  }

  async saveRecord(
    posting: Posting,
    organization: Organization | null,
    categoryId: string | null,
    location: JobLocation | null,
  ): Promise<boolean> {
    try {
      await this.db.transaction(async tx => {
        if (organization) {
          await tx
            .insert(companies)
            .values({
              source: organization.source,
              sourceId: organization.sourceId,
              name: organization.name,
              url: organization.url,
              website: organization.website,
              address: organization.address,
              description: organization.description,
              employeeCount: organization.employeeCount,
              provenance: organization.provenance,
            })
            .onConflictDoUpdate({
              target: [companies.source, companies.sourceId],
              set: {
                name: sql`excluded.name`,
                url: sql`coalesce(excluded.url, ${companies.url})`,
                website: sql`coalesce(excluded.website, ${companies.website})`,
                address: sql`coalesce(excluded.address, ${companies.address})`,
                description: sql`coalesce(excluded.description, ${companies.description})`,
                employeeCount: sql`coalesce(excluded.employee_count, ${companies.employeeCount})`,
                updatedAt: sql`now()`,
              },
            });
        }

        await tx
          .insert(jobs)
          .values({
            source: posting.source,
            sourceId: posting.sourceId,
            url: posting.url,
            title: posting.title,
            description: posting.description,
            companySourceId: posting.companySourceId ?? organization?.sourceId,
            companyName: posting.companyName ?? organization?.name,
            address: posting.address,
            region: posting.region,
            district: posting.district,
            salaryMin: posting.salaryMin,
            salaryMax: posting.salaryMax,
            salaryText: posting.salaryText,
            employmentType: posting.employmentType,
            categoryName: posting.categoryName,
            postedAt: posting.postedAt,
            validThrough: posting.validThrough,
            provenance: posting.provenance,
            rawJson: posting.raw ?? null,
          })
          .onConflictDoUpdate({
            target: [jobs.source, jobs.sourceId],
            set: {
              url: sql`excluded.url`,
              title: sql`excluded.title`,
              description: sql`excluded.description`,
              companySourceId: sql`excluded.company_source_id`,
              companyName: sql`excluded.company_name`,
              address: sql`excluded.address`,
              region: sql`excluded.region`,
              district: sql`excluded.district`,
              salaryMin: sql`excluded.salary_min`,
              salaryMax: sql`excluded.salary_max`,
              salaryText: sql`excluded.salary_text`,
              employmentType: sql`excluded.employment_type`,
              categoryName: sql`coalesce(excluded.category_name, ${jobs.categoryName})`,
              postedAt: sql`excluded.posted_at`,
              validThrough: sql`excluded.valid_through`,
              provenance: sql`excluded.provenance`,
              rawJson: sql`excluded.raw_json`,
              updatedAt: sql`now()`,
            },
          });

        if (location) {
          await tx
            .insert(jobLocations)
            .values({ source: posting.source, jobSourceId: posting.sourceId, ...location })
            .onConflictDoUpdate({
              target: [jobLocations.source, jobLocations.jobSourceId],
              set: {
                latitude: location.latitude,
                longitude: location.longitude,
                formattedAddress: location.formattedAddress,
                provider: location.provider,
                updatedAt: sql`now()`,
              },
            });
        }

        if (categoryId) {
          await tx
            .insert(categoryJobs)
            .values({ source: posting.source, categoryId, jobSourceId: posting.sourceId })
            .onConflictDoNothing();
        }
      });
      return true;
    } catch (err) {
      log.error({ err, source: posting.source, sourceId: posting.sourceId }, 'Failed to save record');
      return false;
    }
  }

  async saveSkills(source: Source, sourceId: string, skills: SkillTag[]): Promise<void> {
    if (skills.length === 0) return;
    await this.db
      .insert(jobSkills)
      .values(skills.map(s => ({ source, jobSourceId: sourceId, skillName: s.name, skillType: s.type })))
      .onConflictDoNothing();
  }

  async saveLocation(source: Source, sourceId: string, location: JobLocation): Promise<void> {
    await this.db
      .insert(jobLocations)
      .values({ source, jobSourceId: sourceId, ...location })
      .onConflictDoNothing();
  }

  /** Upserts counters; latency is an exponentially weighted average (0.9 old, 0.1 new). */
  async recordHealth(report: HealthReport): Promise<void> {
    const ok = report.fetchOk ? 1 : 0;
    const extracted = report.extractionOk ? 1 : 0;
    await this.db
      .insert(sourceHealth)
      .values({
        source: report.source,
        totalRequests: 1,
        successCount: ok,
        failureCount: 1 - ok,
        extractionSuccessCount: extracted,
        avgLatencyMs: report.latencyMs,
        lastError: report.error ?? null,
      })
      .onConflictDoUpdate({
        target: sourceHealth.source,
        set: {
          totalRequests: sql`${sourceHealth.totalRequests} + 1`,
          successCount: sql`${sourceHealth.successCount} + ${ok}`,
          failureCount: sql`${sourceHealth.failureCount} + ${1 - ok}`,
          extractionSuccessCount: sql`${sourceHealth.extractionSuccessCount} + ${extracted}`,
          avgLatencyMs: sql`${sourceHealth.avgLatencyMs} * 0.9 + ${report.latencyMs} * 0.1`,
          lastError: report.error ? report.error : sql`${sourceHealth.lastError}`,
          updatedAt: sql`now()`,
        },
      });
  }
}
