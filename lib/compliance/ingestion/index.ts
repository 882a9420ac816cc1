/**
 * Ingestion Module
 */

export * from "./pipeline";
