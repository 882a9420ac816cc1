/**
 * Compliance Feed - Database Schema
 *
 * This schema supports:
 * - Feed runs with stats and run metadata
 * - Feed fetch provenance for replay/audit
 * - Ranked per-property risk assessments, one row per BBL per run
 */

import {
  pgTable,
  text,
  timestamp,
  jsonb,
  integer,
  numeric,
  date,
  uuid,
  uniqueIndex,
  index,
} from "drizzle-orm/pg-core";
import { relations } from "drizzle-orm";

// ============================================================================
// 1) Compliance Runs
// ============================================================================

export const complianceRuns = pgTable("compliance_runs", {
  id: uuid("id").primaryKey().defaultRandom(),
  triggeredBy: text("triggered_by").notNull(), // "cli", "cron", "api"
  startedAt: timestamp("started_at").notNull().defaultNow(),
  finishedAt: timestamp("finished_at"),
  status: text("status").notNull().default("running"), // "running", "succeeded", "failed", "partial"
  dataFreshnessDate: date("data_freshness_date"),
  dataCoverageDays: integer("data_coverage_days"),
  stats: jsonb("stats").notNull().default({}), // { recordsIn, rejected, properties, ... }
  error: text("error"),
});

// ============================================================================
// 2) Feed Fetches (Provenance)
// ============================================================================

export const feedFetches = pgTable("feed_fetches", {
  id: uuid("id").primaryKey().defaultRandom(),
  runId: uuid("run_id").notNull().references(() => complianceRuns.id, { onDelete: "cascade" }),
  sourceKey: text("source_key").notNull(), // e.g. "nyc-hpd-violations"
  requestUrl: text("request_url").notNull(),
  responseStatus: integer("response_status"),
  rowCount: integer("row_count").notNull().default(0),
  parserVersion: text("parser_version"),
  warnings: jsonb("warnings").notNull().default([]),
  bodySha256: text("body_sha256"), // hash for change detection between runs
  fetchedAt: timestamp("fetched_at").notNull().defaultNow(),
}, (table) => [
  index("feed_fetches_run_idx").on(table.runId),
  index("feed_fetches_source_fetched_idx").on(table.sourceKey, table.fetchedAt),
]);

// ============================================================================
// 3) Property Risk Assessments
// ============================================================================

export const propertyRiskAssessments = pgTable("property_risk_assessments", {
  id: uuid("id").primaryKey().defaultRandom(),
  runId: uuid("run_id").notNull().references(() => complianceRuns.id, { onDelete: "cascade" }),
  bbl: text("bbl").notNull(), // 10-digit Borough-Block-Lot
  borough: text("borough").notNull(),
  rank: integer("rank").notNull(),
  exposure: integer("exposure").notNull(),
  riskScore: numeric("risk_score").notNull(),
  fixPriority: text("fix_priority").notNull(), // "CRITICAL" | "HIGH" | "MEDIUM" | "LOW" | "CLEAN"
  classA: integer("class_a").notNull().default(0),
  classB: integer("class_b").notNull().default(0),
  classC: integer("class_c").notNull().default(0),
  violationCount: integer("violation_count").notNull().default(0),
  openViolations: integer("open_violations").notNull().default(0),
  relevantComplaints: integer("relevant_complaints").notNull().default(0),
  lastEventDate: date("last_event_date"), // null when unknown
  createdAt: timestamp("created_at").notNull().defaultNow(),
}, (table) => [
  uniqueIndex("property_risk_assessments_run_bbl").on(table.runId, table.bbl),
  index("property_risk_assessments_bbl_idx").on(table.bbl),
]);

// ============================================================================
// Relations
// ============================================================================

export const complianceRunsRelations = relations(complianceRuns, ({ many }) => ({
  fetches: many(feedFetches),
  assessments: many(propertyRiskAssessments),
}));

export const feedFetchesRelations = relations(feedFetches, ({ one }) => ({
  run: one(complianceRuns, {
    fields: [feedFetches.runId],
    references: [complianceRuns.id],
  }),
}));

export const propertyRiskAssessmentsRelations = relations(propertyRiskAssessments, ({ one }) => ({
  run: one(complianceRuns, {
    fields: [propertyRiskAssessments.runId],
    references: [complianceRuns.id],
  }),
}));

// ============================================================================
// Type Exports
// ============================================================================

export type ComplianceRun = typeof complianceRuns.$inferSelect;
export type NewComplianceRun = typeof complianceRuns.$inferInsert;

export type FeedFetch = typeof feedFetches.$inferSelect;
export type NewFeedFetch = typeof feedFetches.$inferInsert;

export type PropertyRiskAssessmentRow = typeof propertyRiskAssessments.$inferSelect;
export type NewPropertyRiskAssessment = typeof propertyRiskAssessments.$inferInsert;
