/**
 * BBL Normalization Utilities
 */

import type { Bbl, BoroughCode, RejectionReason } from "../types";

export type BblParseResult =
  | { ok: true; bbl: Bbl; borough: BoroughCode; block: string; lot: string }
  | { ok: false; reason: RejectionReason };

/**
 * Strip whitespace and hyphens from a raw identifier.
 * Numbers are stringified first (some feeds deliver BBL as a number).
 */
export function cleanBbl(raw: string | number | null | undefined): string {
  if (raw === null || raw === undefined) return "";
  return String(raw).replace(/[\s-]/g, "");
}

/**
 * Validate a raw identifier as a BBL.
 *
 * Never pads or truncates: an identifier that is not exactly ten digits
 * after cleaning is malformed.
 */
export function parseBbl(raw: string | number | null | undefined): BblParseResult {
  const clean = cleanBbl(raw);
  if (!clean) {
    return { ok: false, reason: "missing_bbl" };
  }
  if (!/^[0-9]{10}$/.test(clean)) {
    return { ok: false, reason: "malformed_bbl" };
  }

  const borough = clean.charAt(0);
  if (!isBoroughCode(borough)) {
    return { ok: false, reason: "invalid_borough" };
  }

  return {
    ok: true,
    bbl: clean,
    borough,
    block: clean.substring(1, 6),
    lot: clean.substring(6, 10),
  };
}

export function isBoroughCode(value: string): value is BoroughCode {
  return value === "1" || value === "2" || value === "3" || value === "4" || value === "5";
}

/**
 * Build a BBL from separate borough/block/lot columns.
 * DOB pads lots to five characters; a leading zero beyond the four lot
 * digits is dropped. Returns an empty string when any part is unusable,
 * so the normalizer rejects the record as missing_bbl.
 */
export function buildBbl(
  borough: string | number | null | undefined,
  block: string | number | null | undefined,
  lot: string | number | null | undefined
): string {
  const boro = String(borough ?? "").trim();
  if (!isBoroughCode(boro)) return "";

  const blk = String(block ?? "").trim();
  const lt = String(lot ?? "").trim();
  if (!/^[0-9]{1,5}$/.test(blk) || !/^0?[0-9]{1,4}$/.test(lt)) return "";

  return `${boro}${blk.padStart(5, "0")}${lt.slice(-4).padStart(4, "0")}`;
}
