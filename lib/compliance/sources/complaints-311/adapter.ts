/**
 * 311 Complaints Adapter
 */

import type {
  ComplianceSourceAdapter,
  FeedExtractResult,
  FeedFetchInput,
  FeedFetchResult,
  FeedIngestionContext,
} from "../../adapters/types";
import type { RawRecord } from "../../types";
import { complaint311RowSchema } from "../../api/schemas";
import { fetchSocrataRows, rowString, soqlString } from "../socrata";
import {
  COMPLAINTS_311_CONFIG,
  COMPLAINTS_311_SOURCE_KEY,
  PARSER_VERSION,
} from "./constants";

export class Complaints311Adapter implements ComplianceSourceAdapter {
  key = COMPLAINTS_311_SOURCE_KEY;
  displayName = "311 Service Requests";
  kind = "complaint" as const;
  config = COMPLAINTS_311_CONFIG;

  async fetch(input: FeedFetchInput, ctx: FeedIngestionContext): Promise<FeedFetchResult> {
    const clauses = [`${this.config.dateField} >= ${soqlString(input.since)}`];

    // The feed is huge; only request the types that can count
    if (input.complaintTypes && input.complaintTypes.length > 0) {
      const types = input.complaintTypes.map((type) => `complaint_type = ${soqlString(type)}`);
      clauses.push(`(${types.join(" OR ")})`);
    }
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
      const parsed = complaint311RowSchema.safeParse(row);
      if (!parsed.success) {
        warnings.push(`row ${index}: not a 311 complaint row`);
        return;
      }

      const data = parsed.data;
      records.push({
        bbl: rowString(data.bbl) ?? null,
        category: data.complaint_type ?? "",
        eventDate: data.created_date ?? null,
        sourceKey: this.key,
        recordId: rowString(data.unique_key),
      });
    });

    return { records, parserVersion: PARSER_VERSION, warnings };
  }
}

export function createComplaints311Adapter(): Complaints311Adapter {
  return new Complaints311Adapter();
}
