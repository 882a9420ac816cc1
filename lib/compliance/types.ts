/**
 * Compliance Platform Types
 *
 * Core type definitions shared across the violation/complaint
 * risk pipeline.
 */

// ============================================================================
// Property Identifier
// ============================================================================

/** Borough-Block-Lot: borough digit (1-5) + 5-digit block + 4-digit lot. */
export type Bbl = string;

export type BoroughCode = "1" | "2" | "3" | "4" | "5";

export const BOROUGH_NAMES: Record<BoroughCode, string> = {
  "1": "Manhattan",
  "2": "Bronx",
  "3": "Brooklyn",
  "4": "Queens",
  "5": "Staten Island",
};

// ============================================================================
// Source Keys
// ============================================================================

export type ComplianceSourceKey =
  | "nyc-hpd-violations"
  | "nyc-dob-violations"
  | "nyc-311-complaints";

export type SourceKind = "violation" | "complaint";

// ============================================================================
// Dates
// ============================================================================

export const UNKNOWN_DATE = "unknown" as const;

/** Calendar date as YYYY-MM-DD, or the "unknown" sentinel. */
export type EventDate = string;

// ============================================================================
// Raw Record (as delivered by a feed adapter)
// ============================================================================

export interface RawRecord {
  bbl?: string | number | null;
  /** Violation category/description, or 311 complaint type */
  category?: string | null;
  eventDate?: string | null;
  disposition?: string | null;
  /** Severity class as reported by the feed itself, when it has one */
  reportedClass?: string | null;
  sourceKey?: ComplianceSourceKey;
  recordId?: string;
}

// ============================================================================
// Normalized Records
// ============================================================================

export type ViolationClass = "A" | "B" | "C";

export type ComplaintTag = "relevant" | "ignored";

interface NormalizedRecordBase {
  bbl: Bbl;
  borough: BoroughCode;
  eventDate: EventDate;
  sourceKey?: ComplianceSourceKey;
  recordId?: string;
}

export interface NormalizedViolation extends NormalizedRecordBase {
  kind: "violation";
  category: string;
  violationClass: ViolationClass;
  isOpen: boolean;
}

export interface NormalizedComplaint extends NormalizedRecordBase {
  kind: "complaint";
  complaintType: string;
  complaintTag: ComplaintTag;
}

export type NormalizedRecord = NormalizedViolation | NormalizedComplaint;

// ============================================================================
// Rejections
// ============================================================================

export type RejectionReason = "missing_bbl" | "malformed_bbl" | "invalid_borough";

export interface RecordRejection {
  reason: RejectionReason;
  kind: SourceKind;
  rawBbl: string;
  sourceKey?: ComplianceSourceKey;
  recordId?: string;
}

export type NormalizeOutcome =
  | { ok: true; record: NormalizedRecord }
  | { ok: false; rejection: RecordRejection };

// ============================================================================
// Rollup
// ============================================================================

export interface PropertyRollup {
  bbl: Bbl;
  borough: BoroughCode;
  classA: number;
  classB: number;
  classC: number;
  /** classA + classB + classC; complaints never count here */
  totalViolations: number;
  openViolations: number;
  relevantComplaints: number;
  /** relevant + ignored */
  totalComplaints: number;
  lastEventDate: EventDate;
}

// ============================================================================
// Assessment
// ============================================================================

export type FixPriority = "CRITICAL" | "HIGH" | "MEDIUM" | "LOW" | "CLEAN";

export interface RiskAssessment {
  readonly bbl: Bbl;
  readonly borough: BoroughCode;
  /** Estimated dollar fine liability */
  readonly exposure: number;
  readonly riskScore: number;
  readonly fixPriority: FixPriority;
  readonly classA: number;
  readonly classB: number;
  readonly classC: number;
  readonly violationCount: number;
  readonly openViolations: number;
  readonly relevantComplaints: number;
  readonly lastEventDate: EventDate;
}

export interface RunMetadata {
  /** YYYY-MM-DD date the feed was produced */
  freshnessDate: string;
  /** Days of history the inputs represent */
  coverageDays: number;
}

export interface RankedAssessment extends RiskAssessment {
  readonly rank: number;
  readonly dataFreshnessDate: string;
  readonly dataCoverageDays: number;
}

export interface Recommendation {
  priority: "CRITICAL" | "URGENT" | "HIGH" | "LOW";
  action: string;
  reason: string;
}

// ============================================================================
// Flat Export Record
// ============================================================================

export interface FlatAssessmentRecord {
  bbl: string;
  exposure: number;
  risk_score: number;
  violation_count: number;
  open_class_a: number;
  open_class_b: number;
  open_class_c: number;
  relevant_complaints: number;
  open_violations: number;
  fix_priority: FixPriority;
  last_event_date: string;
  data_freshness_date: string;
  data_coverage_days: number;
}

// ============================================================================
// Portfolio Summary
// ============================================================================

export interface PortfolioSummary {
  totalProperties: number;
  withViolations: number;
  withClassB: number;
  withClassC: number;
  withRelevantComplaints: number;
  totalViolations: number;
  totalClassB: number;
  totalRelevantComplaints: number;
  totalExposure: number;
  maxRiskScore: number;
  averageRiskScore: number;
  byFixPriority: Record<FixPriority, number>;
}

// ============================================================================
// Ingestion Status
// ============================================================================

export type IngestionStatus = "SUCCESS" | "FAILED" | "SKIPPED" | "PARTIAL";

// ============================================================================
// Source Config
// ============================================================================

export interface SourceConfig {
  sourceKey: ComplianceSourceKey;
  name: string;
  kind: SourceKind;
  agency: "HPD" | "DOB" | "311";
  datasetId: string;
  baseUrl: string;
  /** Field the feed is filtered and ordered on */
  dateField: string;
}
