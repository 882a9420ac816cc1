/**
 * Record Normalization
 *
 * Transforms raw feed records into the platform-standard
 * NormalizedRecord, or a rejection when the BBL is unusable.
 */

import type {
  ComplaintTag,
  NormalizeOutcome,
  NormalizedRecord,
  RawRecord,
  RecordRejection,
  SourceKind,
} from "../types";
import { UNKNOWN_DATE } from "../types";
import { classifyViolation, classifyWithReported } from "../classifier";
import { cleanBbl, parseBbl } from "../utils/bbl";
import { parseEventDate } from "../utils/dates";
import type { ComplianceRunObserver } from "../observability/types";

// ============================================================================
// Options
// ============================================================================

export const DEFAULT_RELEVANT_COMPLAINT_TYPES: readonly string[] = [
  "HEAT/HOT WATER",
  "PLUMBING",
];

export const CLOSED_DISPOSITIONS: readonly string[] = [
  "RESOLVED",
  "DISMISSED",
  "CLOSED",
  "CLOSE",
];

export type SeveritySource = "keywords" | "reported-first";

export interface NormalizeOptions {
  /** Exact-match allow-list for 311 complaint types (compared uppercased) */
  relevantComplaintTypes?: readonly string[];
  /** "reported-first" trusts a feed's own A/B/C class when present */
  severitySource?: SeveritySource;
}

// ============================================================================
// Single Record
// ============================================================================

export function normalizeRecord(
  raw: RawRecord,
  kind: SourceKind,
  options: NormalizeOptions = {}
): NormalizeOutcome {
  const parsed = parseBbl(raw.bbl);
  if (!parsed.ok) {
    const rejection: RecordRejection = {
      reason: parsed.reason,
      kind,
      rawBbl: cleanBbl(raw.bbl),
      sourceKey: raw.sourceKey,
      recordId: raw.recordId,
    };
    return { ok: false, rejection };
  }

  const eventDate = parseEventDate(raw.eventDate);
  const category = (raw.category ?? "").trim().toUpperCase();

  if (kind === "violation") {
    const violationClass =
      options.severitySource === "reported-first"
        ? classifyWithReported(category, raw.reportedClass)
        : classifyViolation(category);

    return {
      ok: true,
      record: {
        kind: "violation",
        bbl: parsed.bbl,
        borough: parsed.borough,
        eventDate,
        category,
        violationClass,
        isOpen: isOpenDisposition(raw.disposition),
        sourceKey: raw.sourceKey,
        recordId: raw.recordId,
      },
    };
  }

  return {
    ok: true,
    record: {
      kind: "complaint",
      bbl: parsed.bbl,
      borough: parsed.borough,
      eventDate,
      complaintType: category,
      complaintTag: tagComplaint(category, options.relevantComplaintTypes),
      sourceKey: raw.sourceKey,
      recordId: raw.recordId,
    },
  };
}

/**
 * A violation is open unless its disposition says otherwise.
 * Missing dispositions count as open.
 */
export function isOpenDisposition(disposition: string | null | undefined): boolean {
  const value = disposition?.trim().toUpperCase();
  if (!value) return true;
  return !CLOSED_DISPOSITIONS.includes(value);
}

export function tagComplaint(
  complaintType: string,
  relevantTypes: readonly string[] = DEFAULT_RELEVANT_COMPLAINT_TYPES
): ComplaintTag {
  const upper = complaintType.trim().toUpperCase();
  return relevantTypes.some((type) => type.trim().toUpperCase() === upper)
    ? "relevant"
    : "ignored";
}

// ============================================================================
// Batch
// ============================================================================

export interface NormalizeBatchResult {
  records: NormalizedRecord[];
  rejections: RecordRejection[];
}

export function normalizeBatch(
  raws: readonly RawRecord[],
  kind: SourceKind,
  options: NormalizeOptions = {},
  observer?: ComplianceRunObserver
): NormalizeBatchResult {
  const records: NormalizedRecord[] = [];
  const rejections: RecordRejection[] = [];

  for (const raw of raws) {
    const outcome = normalizeRecord(raw, kind, options);

    if (!outcome.ok) {
      rejections.push(outcome.rejection);
      observer?.increment("records_rejected", 1, {
        kind,
        reason: outcome.rejection.reason,
      });
      continue;
    }

    const record = outcome.record;
    records.push(record);
    observer?.increment("records_normalized", 1, { kind });

    if (record.eventDate === UNKNOWN_DATE) {
      observer?.increment("dates_unknown", 1, { kind });
    }
    if (record.kind === "complaint" && record.complaintTag === "ignored") {
      observer?.increment("complaints_ignored");
    }
  }

  return { records, rejections };
}
