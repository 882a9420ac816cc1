/**
 * NYC Compliance Risk Platform
 *
 * Main entry point for the violation/complaint risk feed.
 */

// Core types
export * from "./types";

// Observability (export first to avoid conflicts)
export * from "./observability";

// Adapters (excluding ComplianceRunObserver which is exported from observability)
export {
  type FetchLike,
  type FeedIngestionContext,
  type FeedFetchInput,
  type FeedFetchResult,
  type FeedExtractResult,
  type ComplianceSourceAdapter,
  type ComplianceAdapterFactory,
} from "./adapters/types";

// Core pipeline stages
export * from "./classifier";
export * from "./normalize";
export * from "./aggregate";
export * from "./scoring";
export * from "./ranking";
export * from "./export";
export * from "./export/files";

// Registry
export * from "./registry";

// Ingestion pipeline
export * from "./ingestion";

// Storage
export * from "./storage";

// Configuration and schemas
export * from "./config";
export * from "./api/schemas";

// Utils
export * from "./utils/bbl";
export * from "./utils/dates";
export * from "./utils/hash";

// Sources (auto-registers adapters)
export * from "./sources";
