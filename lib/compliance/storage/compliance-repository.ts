/**
 * Compliance Repository
 *
 * Persistence of runs, feed fetch provenance and ranked assessments.
 * The pipeline only sees the ComplianceRepository interface.
 */

import { eq } from "drizzle-orm";

import type { ComplianceDb } from "@/lib/db";
import {
  complianceRuns,
  feedFetches,
  propertyRiskAssessments,
  type NewPropertyRiskAssessment,
  type PropertyRiskAssessmentRow,
} from "@/lib/db/schema";
import type {
  ComplianceSourceKey,
  FixPriority,
  RankedAssessment,
  RunMetadata,
} from "../types";
import { UNKNOWN_DATE } from "../types";
import { isBoroughCode } from "../utils/bbl";

// ============================================================================
// Interface
// ============================================================================

export type RunStatus = "succeeded" | "failed" | "partial";

export interface StoredAssessment extends RankedAssessment {
  runId: string;
}

export interface StoreFeedFetchParams {
  runId: string;
  sourceKey: ComplianceSourceKey;
  requestUrl: string;
  responseStatus?: number;
  rowCount: number;
  parserVersion?: string;
  warnings?: string[];
  bodySha256?: string;
}

export interface ComplianceRepository {
  createRun(params: { triggeredBy: string; metadata: RunMetadata }): Promise<string>;
  finishRun(
    runId: string,
    params: { status: RunStatus; stats?: Record<string, unknown>; error?: string }
  ): Promise<void>;
  storeFeedFetch(params: StoreFeedFetchParams): Promise<string>;
  storeAssessments(
    runId: string,
    ranked: readonly RankedAssessment[]
  ): Promise<{ inserted: number }>;
  listRunAssessments(runId: string, options?: { limit?: number }): Promise<StoredAssessment[]>;
}

// ============================================================================
// Drizzle Implementation
// ============================================================================

const INSERT_CHUNK_SIZE = 1000;

export class DrizzleComplianceRepository implements ComplianceRepository {
  constructor(private readonly db: ComplianceDb) {}

  async createRun(params: { triggeredBy: string; metadata: RunMetadata }): Promise<string> {
    const [run] = await this.db
      .insert(complianceRuns)
      .values({
        triggeredBy: params.triggeredBy,
        status: "running",
        dataFreshnessDate: params.metadata.freshnessDate,
        dataCoverageDays: params.metadata.coverageDays,
      })
      .returning({ id: complianceRuns.id });

    return run.id;
  }

  async finishRun(
    runId: string,
    params: { status: RunStatus; stats?: Record<string, unknown>; error?: string }
  ): Promise<void> {
    await this.db
      .update(complianceRuns)
      .set({
        status: params.status,
        ...(params.stats && { stats: params.stats }),
        ...(params.error && { error: params.error }),
        finishedAt: new Date(),
      })
      .where(eq(complianceRuns.id, runId));
  }

  async storeFeedFetch(params: StoreFeedFetchParams): Promise<string> {
    const [fetch] = await this.db
      .insert(feedFetches)
      .values({
        runId: params.runId,
        sourceKey: params.sourceKey,
        requestUrl: params.requestUrl,
        responseStatus: params.responseStatus,
        rowCount: params.rowCount,
        parserVersion: params.parserVersion,
        warnings: params.warnings || [],
        bodySha256: params.bodySha256,
      })
      .returning({ id: feedFetches.id });

    return fetch.id;
  }

  async storeAssessments(
    runId: string,
    ranked: readonly RankedAssessment[]
  ): Promise<{ inserted: number }> {
    let inserted = 0;

    for (let i = 0; i < ranked.length; i += INSERT_CHUNK_SIZE) {
      const chunk = ranked.slice(i, i + INSERT_CHUNK_SIZE);
      const values: NewPropertyRiskAssessment[] = chunk.map((assessment) => ({
        runId,
        bbl: assessment.bbl,
        borough: assessment.borough,
        rank: assessment.rank,
        exposure: assessment.exposure,
        riskScore: assessment.riskScore.toString(),
        fixPriority: assessment.fixPriority,
        classA: assessment.classA,
        classB: assessment.classB,
        classC: assessment.classC,
        violationCount: assessment.violationCount,
        openViolations: assessment.openViolations,
        relevantComplaints: assessment.relevantComplaints,
        lastEventDate: assessment.lastEventDate === UNKNOWN_DATE ? null : assessment.lastEventDate,
      }));

      await this.db.insert(propertyRiskAssessments).values(values);
      inserted += values.length;
    }

    return { inserted };
  }

  async listRunAssessments(
    runId: string,
    options: { limit?: number } = {}
  ): Promise<StoredAssessment[]> {
    const [run] = await this.db
      .select()
      .from(complianceRuns)
      .where(eq(complianceRuns.id, runId))
      .limit(1);

    if (!run) return [];

    const query = this.db
      .select()
      .from(propertyRiskAssessments)
      .where(eq(propertyRiskAssessments.runId, runId))
      .orderBy(propertyRiskAssessments.rank);

    const rows = options.limit ? await query.limit(options.limit) : await query;
    const metadata: RunMetadata = {
      freshnessDate: run.dataFreshnessDate ?? "",
      coverageDays: run.dataCoverageDays ?? 0,
    };

    return rows.map((row) => toStoredAssessment(row, metadata));
  }
}

// ============================================================================
// Row Mapping
// ============================================================================

const FIX_PRIORITIES: readonly FixPriority[] = ["CRITICAL", "HIGH", "MEDIUM", "LOW", "CLEAN"];

function toFixPriority(value: string): FixPriority {
  const match = FIX_PRIORITIES.find((priority) => priority === value);
  if (!match) {
    throw new Error(`Unexpected fix priority in storage: ${value}`);
  }
  return match;
}

function toStoredAssessment(
  row: PropertyRiskAssessmentRow,
  metadata: RunMetadata
): StoredAssessment {
  if (!isBoroughCode(row.borough)) {
    throw new Error(`Unexpected borough in storage: ${row.borough}`);
  }

  return {
    runId: row.runId,
    bbl: row.bbl,
    borough: row.borough,
    rank: row.rank,
    exposure: row.exposure,
    riskScore: Number(row.riskScore),
    fixPriority: toFixPriority(row.fixPriority),
    classA: row.classA,
    classB: row.classB,
    classC: row.classC,
    violationCount: row.violationCount,
    openViolations: row.openViolations,
    relevantComplaints: row.relevantComplaints,
    lastEventDate: row.lastEventDate ?? UNKNOWN_DATE,
    dataFreshnessDate: metadata.freshnessDate,
    dataCoverageDays: metadata.coverageDays,
  };
}

/**
 * Repository over a drizzle database handle.
 */
export function createDrizzleComplianceRepository(db: ComplianceDb): ComplianceRepository {
  return new DrizzleComplianceRepository(db);
}
