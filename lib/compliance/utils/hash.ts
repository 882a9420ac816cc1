/**
 * Hashing Utilities for the Compliance Platform
 */

import { createHash } from "crypto";

/**
 * Compute SHA256 hash of a string.
 */
export function sha256(input: string): string {
  return createHash("sha256").update(input).digest("hex");
}

/**
 * Digest of a fetched feed body, stored with the fetch for change
 * detection between runs.
 */
export function computeFeedDigest(rows: readonly unknown[]): string {
  return sha256(JSON.stringify(rows));
}
