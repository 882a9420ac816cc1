/**
 * Flat Export Records
 *
 * Serializes ranked assessments to flat rows for CSV/JSON delivery and
 * re-ingests them. A re-ingested row re-derives the same risk score.
 */

import type { FlatAssessmentRecord, RankedAssessment } from "../types";
import { flatAssessmentRecordSchema } from "../api/schemas";
import { computeRiskScore } from "../scoring";

// ============================================================================
// Flat Record
// ============================================================================

export const FLAT_RECORD_COLUMNS = [
  "bbl",
  "exposure",
  "risk_score",
  "violation_count",
  "open_class_a",
  "open_class_b",
  "open_class_c",
  "relevant_complaints",
  "open_violations",
  "fix_priority",
  "last_event_date",
  "data_freshness_date",
  "data_coverage_days",
] as const satisfies ReadonlyArray<keyof FlatAssessmentRecord>;

export function toFlatRecord(assessment: RankedAssessment): FlatAssessmentRecord {
  return {
    bbl: assessment.bbl,
    exposure: assessment.exposure,
    risk_score: assessment.riskScore,
    violation_count: assessment.violationCount,
    open_class_a: assessment.classA,
    open_class_b: assessment.classB,
    open_class_c: assessment.classC,
    relevant_complaints: assessment.relevantComplaints,
    open_violations: assessment.openViolations,
    fix_priority: assessment.fixPriority,
    last_event_date: assessment.lastEventDate,
    data_freshness_date: assessment.dataFreshnessDate,
    data_coverage_days: assessment.dataCoverageDays,
  };
}

export type ParseFlatRecordResult =
  | { ok: true; record: FlatAssessmentRecord }
  | { ok: false; error: string };

/**
 * Validate a row read back from CSV (all strings) or JSON.
 */
export function parseFlatRecord(input: unknown): ParseFlatRecordResult {
  const parsed = flatAssessmentRecordSchema.safeParse(input);
  if (!parsed.success) {
    const error = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "record"}: ${issue.message}`)
      .join("; ");
    return { ok: false, error };
  }
  return { ok: true, record: parsed.data };
}

/**
 * Re-derive the risk score of an exported row from its counts.
 */
export function rescoreFlatRecord(record: FlatAssessmentRecord): number {
  return computeRiskScore({
    classB: record.open_class_b,
    relevantComplaints: record.relevant_complaints,
    totalViolations: record.open_class_a + record.open_class_b + record.open_class_c,
  });
}

/**
 * Replace BBLs with positional SAMPLE-0001 style labels for public demos.
 */
export function anonymizeForDemo(records: readonly FlatAssessmentRecord[]): FlatAssessmentRecord[] {
  return records.map((record, index) => ({
    ...record,
    bbl: `SAMPLE-${String(index + 1).padStart(4, "0")}`,
  }));
}

// ============================================================================
// CSV
// ============================================================================

function escapeCsvCell(value: string | number): string {
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function toCsv(records: readonly FlatAssessmentRecord[]): string {
  const lines = [FLAT_RECORD_COLUMNS.join(",")];
  for (const record of records) {
    lines.push(FLAT_RECORD_COLUMNS.map((column) => escapeCsvCell(record[column])).join(","));
  }
  return `${lines.join("\n")}\n`;
}

/**
 * Parse CSV text with a header row into string-valued rows.
 * Handles quoted cells with embedded commas, quotes and newlines.
 */
export function parseCsv(text: string): Array<Record<string, string>> {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = "";
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          cell += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        cell += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ",") {
      row.push(cell);
      cell = "";
    } else if (char === "\n" || char === "\r") {
      if (char === "\r" && text[i + 1] === "\n") i++;
      row.push(cell);
      rows.push(row);
      row = [];
      cell = "";
    } else {
      cell += char;
    }
  }

  if (cell !== "" || row.length > 0) {
    row.push(cell);
    rows.push(row);
  }

  const [header, ...body] = rows;
  if (!header) return [];

  return body
    .filter((cells) => cells.length > 1 || cells[0] !== "")
    .map((cells) => {
      const record: Record<string, string> = {};
      header.forEach((column, index) => {
        record[column] = cells[index] ?? "";
      });
      return record;
    });
}

// ============================================================================
// JSON
// ============================================================================

export function toJson(records: readonly FlatAssessmentRecord[]): string {
  return JSON.stringify(records, null, 2);
}
