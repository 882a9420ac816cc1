/**
 * DOB Violations Adapter
 *
 * The DOB feed has no BBL column; it is assembled from boro/block/lot.
 * Block and lot are matched in the feed's five-character padded form.
 * Resolution is encoded in the category ("V*-DOB VIOLATION - Resolved").
 */

import type {
  ComplianceSourceAdapter,
  FeedExtractResult,
  FeedFetchInput,
  FeedFetchResult,
  FeedIngestionContext,
} from "../../adapters/types";
import type { RawRecord } from "../../types";
import { dobViolationRowSchema } from "../../api/schemas";
import { buildBbl, parseBbl } from "../../utils/bbl";
import { fetchSocrataRows, rowString, soqlString } from "../socrata";
import {
  DOB_VIOLATIONS_CONFIG,
  DOB_VIOLATIONS_SOURCE_KEY,
  PARSER_VERSION,
} from "./constants";

const RESOLVED_CATEGORY = /^V\*|RESOLVED|DISMISSED/i;

export class DobViolationsAdapter implements ComplianceSourceAdapter {
  key = DOB_VIOLATIONS_SOURCE_KEY;
  displayName = "DOB Violations";
  kind = "violation" as const;
  config = DOB_VIOLATIONS_CONFIG;

  async fetch(input: FeedFetchInput, ctx: FeedIngestionContext): Promise<FeedFetchResult> {
    const clauses = [`${this.config.dateField} >= ${soqlString(input.since.replace(/-/g, ""))}`];

    if (input.bbl) {
      const parsed = parseBbl(input.bbl);
      if (parsed.ok) {
        clauses.push(
          `boro = ${soqlString(parsed.borough)}`,
          `block = ${soqlString(parsed.block)}`,
          `lot = ${soqlString(parsed.lot.padStart(5, "0"))}`
        );
      }
    }

    return fetchSocrataRows(
      this.config,
      {
        where: clauses.join(" AND "),
        order: `${this.config.dateField} DESC`,
        limit: input.limit,
      },
      ctx
    );
  }

  extract(rows: readonly unknown[]): FeedExtractResult {
    const records: RawRecord[] = [];
    const warnings: string[] = [];

    rows.forEach((row, index) => {
      const parsed = dobViolationRowSchema.safeParse(row);
      if (!parsed.success) {
        warnings.push(`row ${index}: not a DOB violation row`);
        return;
      }

      const data = parsed.data;
      const category = [data.violation_category, data.violation_type, data.description]
        .map((part) => part?.trim())
        .filter((part): part is string => Boolean(part))
        .join(" ");

      records.push({
        bbl: buildBbl(data.boro, data.block, data.lot),
        category,
        eventDate: data.issue_date ?? null,
        disposition: RESOLVED_CATEGORY.test(data.violation_category ?? "") ? "RESOLVED" : null,
        sourceKey: this.key,
        recordId: rowString(data.number),
      });
    });

    return { records, parserVersion: PARSER_VERSION, warnings };
  }
}

export function createDobViolationsAdapter(): DobViolationsAdapter {
  return new DobViolationsAdapter();
}
