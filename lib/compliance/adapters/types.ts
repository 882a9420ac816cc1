/**
 * Feed Source Adapter Interface
 *
 * Defines the contract for source adapters that implement the
 * fetch → extract half of the pipeline. Normalization and everything
 * after it belong to the core and are shared by all sources.
 */

import type {
  ComplianceSourceKey,
  RawRecord,
  SourceConfig,
  SourceKind,
} from "../types";
import type { ComplianceRunObserver } from "../observability/types";

// Re-export for convenience
export type { ComplianceRunObserver };

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

// ============================================================================
// Ingestion Context
// ============================================================================

export interface FeedIngestionContext {
  runId: string;
  now(): number; // Performance timing (Date.now())
  timestamp(): string; // ISO timestamp
  observer?: ComplianceRunObserver;
  /** Socrata app token; public access is rate-limited without one */
  appToken?: string;
  /** Injected fetch; defaults to the global fetch */
  fetchImpl?: FetchLike;
  /** Per-request bound on a feed fetch, body included */
  fetchTimeoutMs?: number;
}

// ============================================================================
// Fetch Phase
// ============================================================================

export interface FeedFetchInput {
  /** YYYY-MM-DD lower bound on the event date */
  since: string;
  limit: number;
  /** Restrict to one property */
  bbl?: string;
  /** Complaint types to request (complaint feeds only) */
  complaintTypes?: readonly string[];
}

export interface FeedFetchResult {
  rows: unknown[];
  requestUrl: string;
  fetchedAt: string;
  responseStatus: number;
  bodySha256: string;
}

// ============================================================================
// Extract Phase
// ============================================================================

export interface FeedExtractResult {
  records: RawRecord[];
  parserVersion: string;
  warnings: string[];
}

// ============================================================================
// Source Adapter Interface
// ============================================================================

export interface ComplianceSourceAdapter {
  /** Unique source key */
  key: ComplianceSourceKey;

  /** Human-readable display name */
  displayName: string;

  kind: SourceKind;

  config: SourceConfig;

  /**
   * Fetch: Retrieve raw feed rows
   */
  fetch(input: FeedFetchInput, ctx: FeedIngestionContext): Promise<FeedFetchResult>;

  /**
   * Extract: Map feed rows onto RawRecord
   */
  extract(rows: readonly unknown[], ctx: FeedIngestionContext): FeedExtractResult;
}

// ============================================================================
// Adapter Factory
// ============================================================================

export type ComplianceAdapterFactory = () => ComplianceSourceAdapter;
