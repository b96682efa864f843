import {
  pgTable,
  serial,
  text,
  integer,
  doublePrecision,
  jsonb,
  timestamp,
  uniqueIndex,
  index,
  primaryKey,
} from 'drizzle-orm/pg-core';

export const categories = pgTable('categories', {
  id: serial('id').primaryKey(),
  source: text('source').notNull(),
  layer1Id: text('layer1_id'),
  layer1Name: text('layer1_name'),
  layer2Id: text('layer2_id'),
  layer2Name: text('layer2_name'),
  layer3Id: text('layer3_id').notNull(),
  layer3Name: text('layer3_name').notNull(),
  lastCrawledAt: timestamp('last_crawled_at', { withTimezone: true }),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow(),
}, (table) => [
  uniqueIndex('uq_categories_source_layer3').on(table.source, table.layer3Id),
  index('idx_categories_last_crawled').on(table.source, table.lastCrawledAt),
]);

export const companies = pgTable('companies', {
  id: serial('id').primaryKey(),
  source: text('source').notNull(),
  sourceId: text('source_id').notNull(),
  name: text('name').notNull(),
  url: text('url'),
  website: text('website'),
  address: text('address'),
  description: text('description'),
  employeeCount: text('employee_count'),
  provenance: text('provenance').notNull().default('native'),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow(),
}, (table) => [
  uniqueIndex('uq_companies_source_id').on(table.source, table.sourceId),
]);

export const jobs = pgTable('jobs', {
  id: serial('id').primaryKey(),
  source: text('source').notNull(),
  sourceId: text('source_id').notNull(),
  url: text('url').notNull(),
  title: text('title').notNull(),
  description: text('description'),
  companySourceId: text('company_source_id'),
  companyName: text('company_name'),
  address: text('address'),
  region: text('region'),
  district: text('district'),
  salaryMin: integer('salary_min'),
  salaryMax: integer('salary_max'),
  salaryText: text('salary_text'),
  employmentType: text('employment_type'),
  categoryName: text('category_name'),
  postedAt: timestamp('posted_at', { withTimezone: true }),
  validThrough: timestamp('valid_through', { withTimezone: true }),
  provenance: text('provenance').notNull().default('native'),
  rawJson: jsonb('raw_json'),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow(),
}, (table) => [
  uniqueIndex('uq_jobs_source_id').on(table.source, table.sourceId),
  index('idx_jobs_company').on(table.source, table.companySourceId),
  index('idx_jobs_region').on(table.region),
]);

export const jobLocations = pgTable('job_locations', {
  source: text('source').notNull(),
  jobSourceId: text('job_source_id').notNull(),
  latitude: doublePrecision('latitude').notNull(),
  longitude: doublePrecision('longitude').notNull(),
  formattedAddress: text('formatted_address'),
  provider: text('provider').notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow(),
}, (table) => [
  primaryKey({ columns: [table.source, table.jobSourceId] }),
]);

export const jobSkills = pgTable('job_skills', {
  source: text('source').notNull(),
  jobSourceId: text('job_source_id').notNull(),
  skillName: text('skill_name').notNull(),
  skillType: text('skill_type').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow(),
}, (table) => [
  primaryKey({ columns: [table.source, table.jobSourceId, table.skillName] }),
  index('idx_job_skills_name').on(table.skillName),
]);

export const categoryJobs = pgTable('category_jobs', {
  source: text('source').notNull(),
  categoryId: text('category_id').notNull(),
  jobSourceId: text('job_source_id').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow(),
}, (table) => [
  primaryKey({ columns: [table.source, table.categoryId, table.jobSourceId] }),
]);

export const sourceHealth = pgTable('source_health', {
  source: text('source').primaryKey(),
  totalRequests: integer('total_requests').notNull().default(0),
  successCount: integer('success_count').notNull().default(0),
  failureCount: integer('failure_count').notNull().default(0),
  extractionSuccessCount: integer('extraction_success_count').notNull().default(0),
  avgLatencyMs: doublePrecision('avg_latency_ms').notNull().default(0),
  lastError: text('last_error'),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow(),
});

export type CategoryRow = typeof categories.$inferSelect;
export type NewJobRow = typeof jobs.$inferInsert;
export type NewCompanyRow = typeof companies.$inferInsert;
export type SourceHealthRow = typeof sourceHealth.$inferSelect;
