/**
 * NYC Open Data (Socrata SODA) Client
 *
 * Shared fetch for every feed adapter. Set SOCRATA_APP_TOKEN to lift
 * the public rate limit.
 */

import type { FeedFetchResult, FeedIngestionContext } from "../adapters/types";
import type { SourceConfig } from "../types";
import { computeFeedDigest } from "../utils/hash";

export interface SocrataQuery {
  where: string;
  order: string;
  limit: number;
}

/**
 * Quote a value as a SoQL string literal.
 */
export function soqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function buildSocrataUrl(config: SourceConfig, query: SocrataQuery): string {
  const url = new URL(`${config.baseUrl}/resource/${config.datasetId}.json`);
  url.searchParams.set("$where", query.where);
  url.searchParams.set("$order", query.order);
  url.searchParams.set("$limit", String(query.limit));
  return url.toString();
}

export const DEFAULT_FETCH_TIMEOUT_MS = 60000;

interface SocrataResponse {
  status: number;
  ok: boolean;
  data: unknown;
}

/**
 * Reject once the signal aborts, even when the underlying fetch ignores it.
 */
function abortable<T>(promise: Promise<T>, signal: AbortSignal, onAbort: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const abort = () => reject(onAbort());
    if (signal.aborted) {
      abort();
      return;
    }
    signal.addEventListener("abort", abort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", abort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", abort);
        reject(error);
      }
    );
  });
}

export async function fetchSocrataRows(
  config: SourceConfig,
  query: SocrataQuery,
  ctx: FeedIngestionContext
): Promise<FeedFetchResult> {
  const requestUrl = buildSocrataUrl(config, query);
  const fetchImpl = ctx.fetchImpl ?? fetch;
  const timeoutMs = ctx.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;

  const headers: Record<string, string> = { Accept: "application/json" };
  if (ctx.appToken) {
    headers["X-App-Token"] = ctx.appToken;
  }

  console.log(`[Socrata] Fetching ${config.datasetId}: ${query.where}`);
  const start = ctx.now();
  const signal = AbortSignal.timeout(timeoutMs);

  const request = async (): Promise<SocrataResponse> => {
    const response = await fetchImpl(requestUrl, { method: "GET", headers, signal });
    if (!response.ok) {
      return { status: response.status, ok: false, data: null };
    }
    const data: unknown = await response.json();
    return { status: response.status, ok: true, data };
  };

  const response = await abortable(request(), signal, () => {
    console.error(`[Socrata] Timed out after ${timeoutMs}ms for ${config.datasetId}`);
    return new Error(
      `Socrata API error: timed out after ${timeoutMs}ms for dataset ${config.datasetId}`
    );
  });
  ctx.observer?.timing("feed_fetch_ms", ctx.now() - start, { source: config.sourceKey });

  if (!response.ok) {
    console.error(`[Socrata] HTTP ${response.status} for ${config.datasetId}`);
    throw new Error(
      `Socrata API error: HTTP ${response.status} for dataset ${config.datasetId}`
    );
  }

  const data = response.data;
  if (!Array.isArray(data)) {
    throw new Error(`Socrata API error: expected an array of rows from ${config.datasetId}`);
  }

  console.log(`[Socrata] ${data.length} rows from ${config.datasetId}`);

  return {
    rows: data,
    requestUrl,
    fetchedAt: ctx.timestamp(),
    responseStatus: response.status,
    bodySha256: computeFeedDigest(data),
  };
}

/**
 * Stringify an identifier column; Socrata delivers text but older
 * exports carry numbers.
 */
export function rowString(value: string | number | undefined): string | undefined {
  if (value === undefined) return undefined;
  const text = String(value).trim();
  return text || undefined;
}
