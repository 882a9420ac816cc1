/**
 * HPD Violations Adapter
 */

import type {
  ComplianceSourceAdapter,
  FeedExtractResult,
  FeedFetchInput,
  FeedFetchResult,
  FeedIngestionContext,
} from "../../adapters/types";
import type { RawRecord } from "../../types";
import { hpdViolationRowSchema } from "../../api/schemas";
import { fetchSocrataRows, rowString, soqlString } from "../socrata";
import {
  HPD_VIOLATIONS_CONFIG,
  HPD_VIOLATIONS_SOURCE_KEY,
  PARSER_VERSION,
} from "./constants";

export class HpdViolationsAdapter implements ComplianceSourceAdapter {
  key = HPD_VIOLATIONS_SOURCE_KEY;
  displayName = "HPD Housing Maintenance Code Violations";
  kind = "violation" as const;
  config = HPD_VIOLATIONS_CONFIG;

  async fetch(input: FeedFetchInput, ctx: FeedIngestionContext): Promise<FeedFetchResult> {
    const clauses = [`${this.config.dateField} >= ${soqlString(input.since)}`];
    if (input.bbl) {
      clauses.push(`bbl = ${soqlString(input.bbl)}`);
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
      const parsed = hpdViolationRowSchema.safeParse(row);
      if (!parsed.success) {
        warnings.push(`row ${index}: not an HPD violation row`);
        return;
      }

      const data = parsed.data;
      records.push({
        bbl: rowString(data.bbl) ?? null,
        category: data.novdescription ?? "",
        eventDate: data.inspectiondate ?? null,
        disposition: data.violationstatus ?? null,
        reportedClass: data.class ?? null,
        sourceKey: this.key,
        recordId: rowString(data.violationid),
      });
    });

    return { records, parserVersion: PARSER_VERSION, warnings };
  }
}

export function createHpdViolationsAdapter(): HpdViolationsAdapter {
  return new HpdViolationsAdapter();
}
