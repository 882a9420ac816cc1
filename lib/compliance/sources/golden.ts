/**
 * Golden Feed Cases
 *
 * Shared harness for the per-source golden cases: feed rows in,
 * extraction + normalization counts out.
 */

import type { ComplianceSourceAdapter, FeedExtractResult } from "../adapters/types";
import type { ViolationClass } from "../types";
import { UNKNOWN_DATE } from "../types";
import { normalizeBatch, type NormalizeBatchResult, type NormalizeOptions } from "../normalize";

export interface GoldenFeedCase {
  id: string;
  name: string;
  fixturePath: string;
  options?: NormalizeOptions;
  expect: {
    records: number;
    warnings: number;
    normalized: number;
    rejected: number;
    /** Distinct BBLs in order of first appearance */
    bbls: string[];
    classes?: Record<ViolationClass, number>;
    open?: number;
    relevant?: number;
    unknownDates?: number;
  };
}

export interface GoldenRunResult {
  extracted: FeedExtractResult;
  normalized: NormalizeBatchResult;
}

export function runGoldenCase(
  adapter: ComplianceSourceAdapter,
  rows: readonly unknown[],
  options: NormalizeOptions = {}
): GoldenRunResult {
  const extracted = adapter.extract(rows, {
    runId: "golden",
    now: () => 0,
    timestamp: () => new Date(0).toISOString(),
  });
  const normalized = normalizeBatch(extracted.records, adapter.kind, options);
  return { extracted, normalized };
}

export function validateGoldenCase(
  result: GoldenRunResult,
  expected: GoldenFeedCase["expect"]
): { passed: boolean; failures: string[] } {
  const failures: string[] = [];
  const check = (label: string, actual: unknown, want: unknown) => {
    if (JSON.stringify(actual) !== JSON.stringify(want)) {
      failures.push(`${label}: expected ${JSON.stringify(want)}, got ${JSON.stringify(actual)}`);
    }
  };

  const records = result.normalized.records;

  check("records", result.extracted.records.length, expected.records);
  check("warnings", result.extracted.warnings.length, expected.warnings);
  check("normalized", records.length, expected.normalized);
  check("rejected", result.normalized.rejections.length, expected.rejected);
  check("bbls", Array.from(new Set(records.map((record) => record.bbl))), expected.bbls);

  if (expected.classes) {
    const classes: Record<ViolationClass, number> = { A: 0, B: 0, C: 0 };
    for (const record of records) {
      if (record.kind === "violation") classes[record.violationClass]++;
    }
    check("classes", classes, expected.classes);
  }

  if (expected.open !== undefined) {
    const open = records.filter((record) => record.kind === "violation" && record.isOpen).length;
    check("open", open, expected.open);
  }

  if (expected.relevant !== undefined) {
    const relevant = records.filter(
      (record) => record.kind === "complaint" && record.complaintTag === "relevant"
    ).length;
    check("relevant", relevant, expected.relevant);
  }

  if (expected.unknownDates !== undefined) {
    const unknown = records.filter((record) => record.eventDate === UNKNOWN_DATE).length;
    check("unknownDates", unknown, expected.unknownDates);
  }

  return { passed: failures.length === 0, failures };
}
