/**
 * Compliance Feed Pipeline
 *
 * Orchestrates the full flow:
 * fetch → extract → normalize → aggregate → score → rank → store
 *
 * `runComplianceCore` is the synchronous half and never touches the
 * network or the database. `ingestComplianceFeed` wraps it with feed
 * fetching and optional persistence.
 */

import { randomUUID } from "crypto";

import type { FeedIngestionContext, FetchLike } from "../adapters/types";
import type {
  Bbl,
  ComplianceSourceKey,
  IngestionStatus,
  NormalizedRecord,
  PortfolioSummary,
  PropertyRollup,
  RankedAssessment,
  RawRecord,
  RecordRejection,
  RunMetadata,
  SourceKind,
} from "../types";
import { aggregateRecords, mergeRollups } from "../aggregate";
import {
  DEFAULT_RELEVANT_COMPLAINT_TYPES,
  normalizeBatch,
  type NormalizeOptions,
} from "../normalize";
import { scoreRollup } from "../scoring";
import { rankAssessments, summarizePortfolio } from "../ranking";
import { getComplianceSource, resolveSourceKeys } from "../registry";
import { createConsoleObserver, type ComplianceRunObserver } from "../observability";
import type { ComplianceRepository, RunStatus } from "../storage";
import { daysBefore, toIsoDate } from "../utils/dates";

// Import the sources to auto-register them
import "../sources";

// ============================================================================
// Core (synchronous)
// ============================================================================

export interface ComplianceCoreInput {
  violations: readonly RawRecord[];
  complaints: readonly RawRecord[];
  metadata: RunMetadata;
  options?: NormalizeOptions;
  observer?: ComplianceRunObserver;
  runId?: string;
}

export interface ComplianceCoreStats {
  violationsIn: number;
  complaintsIn: number;
  normalized: number;
  rejected: number;
  properties: number;
}

export interface ComplianceCoreResult {
  ranked: RankedAssessment[];
  summary: PortfolioSummary;
  rejections: RecordRejection[];
  stats: ComplianceCoreStats;
}

export function runComplianceCore(input: ComplianceCoreInput): ComplianceCoreResult {
  const runId = input.runId ?? randomUUID();
  const observer = input.observer;
  const options = input.options ?? {};

  const step = <T>(name: string, fn: () => T, describe?: (result: T) => unknown): T => {
    observer?.onStepStart({ runId, step: name });
    const start = Date.now();
    const result = fn();
    observer?.onStepEnd({
      runId,
      step: name,
      ok: true,
      durationMs: Date.now() - start,
      data: describe?.(result),
    });
    return result;
  };

  const normalizeKind = (raws: readonly RawRecord[], kind: SourceKind) =>
    step(
      `normalize_${kind}s`,
      () => normalizeBatch(raws, kind, options, observer),
      (result) => ({ records: result.records.length, rejected: result.rejections.length })
    );

  const violations = normalizeKind(input.violations, "violation");
  const complaints = normalizeKind(input.complaints, "complaint");

  const rollups = step(
    "aggregate",
    () => aggregateBatches([violations.records, complaints.records]),
    (result) => ({ properties: result.size })
  );

  const assessments = step("score", () => Array.from(rollups.values(), scoreRollup));

  const ranked = step(
    "rank",
    () => rankAssessments(assessments, input.metadata),
    (result) => ({ ranked: result.length })
  );

  const rejections = [...violations.rejections, ...complaints.rejections];

  return {
    ranked,
    summary: summarizePortfolio(ranked),
    rejections,
    stats: {
      violationsIn: input.violations.length,
      complaintsIn: input.complaints.length,
      normalized: violations.records.length + complaints.records.length,
      rejected: rejections.length,
      properties: rollups.size,
    },
  };
}

function aggregateBatches(
  batches: ReadonlyArray<readonly NormalizedRecord[]>
): Map<Bbl, PropertyRollup> {
  return mergeRollups(...batches.map((batch) => aggregateRecords(batch)));
}

// ============================================================================
// Feed Ingestion (async)
// ============================================================================

export interface IngestComplianceRequest {
  /** Source keys; empty or absent means every registered source */
  sources?: readonly string[];
  daysBack?: number;
  limit?: number;
  /** Restrict every feed to one property */
  bbl?: string;
  normalize?: NormalizeOptions;
  appToken?: string;
  fetchImpl?: FetchLike;
  /** Bound on each feed request; defaults to 60s */
  fetchTimeoutMs?: number;
  repository?: ComplianceRepository;
  observer?: ComplianceRunObserver;
  triggeredBy?: string;
  now?: () => Date;
}

export interface SourceOutcome {
  sourceKey: ComplianceSourceKey;
  ok: boolean;
  rows: number;
  records: number;
  warnings: string[];
  error?: string;
}

export interface ComplianceIngestionResult {
  runId: string;
  status: IngestionStatus;
  error?: string;
  /** Repository run id, when persisted */
  storedRunId?: string;
  metadata?: RunMetadata;
  sources: SourceOutcome[];
  ranked: RankedAssessment[];
  summary?: PortfolioSummary;
  rejections: RecordRejection[];
  stats?: ComplianceCoreStats;
}

export const DEFAULT_DAYS_BACK = 90;
export const DEFAULT_RECORD_LIMIT = 50000;

function createIngestionContext(
  runId: string,
  request: IngestComplianceRequest,
  observer: ComplianceRunObserver
): FeedIngestionContext {
  const clock = request.now ?? (() => new Date());
  return {
    runId,
    now: () => Date.now(),
    timestamp: () => clock().toISOString(),
    observer,
    appToken: request.appToken,
    fetchImpl: request.fetchImpl,
    fetchTimeoutMs: request.fetchTimeoutMs,
  };
}

interface FetchedSource {
  sourceKey: ComplianceSourceKey;
  kind: SourceKind;
  records: RawRecord[];
  outcome: SourceOutcome;
  provenance: {
    requestUrl: string;
    responseStatus: number;
    bodySha256: string;
    parserVersion: string;
  };
}

export async function ingestComplianceFeed(
  request: IngestComplianceRequest = {}
): Promise<ComplianceIngestionResult> {
  const runId = randomUUID();
  const observer = request.observer || createConsoleObserver();
  const runStart = Date.now();
  const now = (request.now ?? (() => new Date()))();

  const daysBack = request.daysBack ?? DEFAULT_DAYS_BACK;
  const limit = request.limit ?? DEFAULT_RECORD_LIMIT;
  const { keys, unknown } = resolveSourceKeys(request.sources);

  const input = { sources: keys, daysBack, limit, bbl: request.bbl };
  observer.onRunStart({ runId, input });

  const base: ComplianceIngestionResult = {
    runId,
    status: "FAILED",
    sources: [],
    ranked: [],
    rejections: [],
  };

  if (unknown.length > 0) {
    const error = `Unknown compliance source(s): ${unknown.join(", ")}`;
    observer.onRunEnd({ runId, ok: false, durationMs: Date.now() - runStart, error });
    return { ...base, error };
  }

  if (keys.length === 0) {
    const error = "No compliance sources registered";
    observer.onRunEnd({ runId, ok: false, durationMs: Date.now() - runStart, error });
    return { ...base, status: "SKIPPED", error };
  }

  const metadata: RunMetadata = {
    freshnessDate: toIsoDate(now),
    coverageDays: daysBack,
  };
  const since = daysBefore(now, daysBack);
  const ctx = createIngestionContext(runId, request, observer);

  let storedRunId: string | undefined;

  try {
    if (request.repository) {
      storedRunId = await request.repository.createRun({
        triggeredBy: request.triggeredBy ?? "api",
        metadata,
      });
    }

    // ========================================================================
    // FETCH + EXTRACT
    // ========================================================================
    observer.onStepStart({ runId, step: "fetch" });
    const fetchStart = Date.now();

    const settled = await Promise.allSettled(
      keys.map(async (sourceKey): Promise<FetchedSource> => {
        const adapter = getComplianceSource(sourceKey);
        const fetchResult = await adapter.fetch(
          {
            since,
            limit,
            bbl: request.bbl,
            complaintTypes:
              adapter.kind === "complaint"
                ? request.normalize?.relevantComplaintTypes ?? DEFAULT_RELEVANT_COMPLAINT_TYPES
                : undefined,
          },
          ctx
        );
        const extractResult = adapter.extract(fetchResult.rows, ctx);

        return {
          sourceKey,
          kind: adapter.kind,
          records: extractResult.records,
          outcome: {
            sourceKey,
            ok: true,
            rows: fetchResult.rows.length,
            records: extractResult.records.length,
            warnings: extractResult.warnings,
          },
          provenance: {
            requestUrl: fetchResult.requestUrl,
            responseStatus: fetchResult.responseStatus,
            bodySha256: fetchResult.bodySha256,
            parserVersion: extractResult.parserVersion,
          },
        };
      })
    );

    const fetched: FetchedSource[] = [];
    const sources: SourceOutcome[] = [];

    settled.forEach((result, index) => {
      const sourceKey = keys[index];
      if (result.status === "fulfilled") {
        fetched.push(result.value);
        sources.push(result.value.outcome);
        observer.increment("source_rows", result.value.outcome.rows, { source: sourceKey });
        return;
      }

      const reason: unknown = result.reason;
      const error = reason instanceof Error ? reason.message : String(reason);
      console.error(`[Pipeline] ${sourceKey} failed: ${error}`);
      observer.increment("source_failures", 1, { source: sourceKey });
      sources.push({ sourceKey, ok: false, rows: 0, records: 0, warnings: [], error });
    });

    observer.onStepEnd({
      runId,
      step: "fetch",
      ok: fetched.length > 0,
      durationMs: Date.now() - fetchStart,
      data: sources.map(({ sourceKey, ok, rows }) => ({ sourceKey, ok, rows })),
    });

    if (fetched.length === 0) {
      const error = `All sources failed: ${sources
        .map((source) => `${source.sourceKey}: ${source.error}`)
        .join("; ")}`;
      if (request.repository && storedRunId) {
        await request.repository.finishRun(storedRunId, { status: "failed", error });
      }
      observer.onRunEnd({ runId, ok: false, durationMs: Date.now() - runStart, error });
      return { ...base, storedRunId, metadata, sources, error };
    }

    // ========================================================================
    // CORE
    // ========================================================================
    const core = runComplianceCore({
      violations: fetched.filter((source) => source.kind === "violation").flatMap((s) => s.records),
      complaints: fetched.filter((source) => source.kind === "complaint").flatMap((s) => s.records),
      metadata,
      options: request.normalize,
      observer,
      runId,
    });

    const status: IngestionStatus = fetched.length === keys.length ? "SUCCESS" : "PARTIAL";

    // ========================================================================
    // STORE
    // ========================================================================
    if (request.repository && storedRunId) {
      for (const source of fetched) {
        await request.repository.storeFeedFetch({
          runId: storedRunId,
          sourceKey: source.sourceKey,
          requestUrl: source.provenance.requestUrl,
          responseStatus: source.provenance.responseStatus,
          rowCount: source.outcome.rows,
          parserVersion: source.provenance.parserVersion,
          warnings: source.outcome.warnings,
          bodySha256: source.provenance.bodySha256,
        });
      }

      const { inserted } = await request.repository.storeAssessments(storedRunId, core.ranked);
      const runStatus: RunStatus = status === "SUCCESS" ? "succeeded" : "partial";
      await request.repository.finishRun(storedRunId, {
        status: runStatus,
        stats: { ...core.stats, inserted, failedSources: sources.filter((s) => !s.ok).length },
      });
    }

    observer.onRunEnd({ runId, ok: true, durationMs: Date.now() - runStart });

    return {
      runId,
      status,
      storedRunId,
      metadata,
      sources,
      ranked: core.ranked,
      summary: core.summary,
      rejections: core.rejections,
      stats: core.stats,
    };
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);

    if (request.repository && storedRunId) {
      try {
        await request.repository.finishRun(storedRunId, { status: "failed", error });
      } catch (finishErr) {
        const message = finishErr instanceof Error ? finishErr.message : String(finishErr);
        console.error(`[Pipeline] Could not mark run ${storedRunId} failed: ${message}`);
      }
    }

    observer.onRunEnd({ runId, ok: false, durationMs: Date.now() - runStart, error });

    return { ...base, storedRunId, metadata, error };
  }
}
