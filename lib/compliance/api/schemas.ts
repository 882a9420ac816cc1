/**
 * Schemas for Feed Rows, Requests and Export Records
 */

import { z } from "zod";

// ============================================================================
// Feed Rows (Socrata JSON)
// ============================================================================

const looseId = z.union([z.string(), z.number()]).optional();

export const hpdViolationRowSchema = z
  .object({
    violationid: looseId,
    bbl: looseId,
    class: z.string().optional(),
    novdescription: z.string().optional(),
    inspectiondate: z.string().optional(),
    violationstatus: z.string().optional(),
  })
  .passthrough();

export type HpdViolationRow = z.infer<typeof hpdViolationRowSchema>;

export const dobViolationRowSchema = z
  .object({
    number: z.string().optional(),
    boro: looseId,
    block: looseId,
    lot: looseId,
    issue_date: z.string().optional(),
    violation_category: z.string().optional(),
    violation_type: z.string().optional(),
    description: z.string().optional(),
  })
  .passthrough();

export type DobViolationRow = z.infer<typeof dobViolationRowSchema>;

export const complaint311RowSchema = z
  .object({
    unique_key: looseId,
    bbl: looseId,
    complaint_type: z.string().optional(),
    created_date: z.string().optional(),
  })
  .passthrough();

export type Complaint311Row = z.infer<typeof complaint311RowSchema>;

// ============================================================================
// Ingest Request
// ============================================================================

export const ingestRequestSchema = z.object({
  sources: z.array(z.string().min(1)).optional(),
  daysBack: z.number().int().positive().optional(),
  limit: z.number().int().positive().optional(),
  bbl: z
    .string()
    .regex(/^[1-5][0-9]{9}$/, "BBL must be 10 digits with borough 1-5")
    .optional(),
});

export type IngestRequest = z.infer<typeof ingestRequestSchema>;

// ============================================================================
// Flat Export Record
// ============================================================================

const count = z.coerce.number().int().nonnegative();

export const flatAssessmentRecordSchema = z
  .object({
    bbl: z.string().min(1),
    exposure: z.coerce.number().int().nonnegative(),
    risk_score: z.coerce.number().nonnegative(),
    violation_count: count,
    open_class_a: count,
    open_class_b: count,
    open_class_c: count,
    relevant_complaints: count,
    open_violations: count,
    fix_priority: z.enum(["CRITICAL", "HIGH", "MEDIUM", "LOW", "CLEAN"]),
    last_event_date: z.union([z.string().regex(/^\d{4}-\d{2}-\d{2}$/), z.literal("unknown")]),
    data_freshness_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    data_coverage_days: count,
  })
  .refine(
    (record) =>
      record.violation_count === record.open_class_a + record.open_class_b + record.open_class_c,
    { message: "must equal open_class_a + open_class_b + open_class_c", path: ["violation_count"] }
  );
