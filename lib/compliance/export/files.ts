/**
 * Feed Export Files
 *
 * Writes the three delivery files for a ranked run: the full CSV, a
 * top-N JSON sample for outreach, and an anonymized demo CSV.
 */

import { mkdirSync, writeFileSync } from "fs";
import { resolve } from "path";

import type { RankedAssessment } from "../types";
import { anonymizeForDemo, toCsv, toFlatRecord, toJson } from "./index";

export const SAMPLE_SIZE = 100;
export const DEMO_SIZE = 50;

export interface FeedExportPaths {
  full: string;
  sample: string;
  demo: string;
}

/**
 * YYYYMMDD_HHmm in local time, used to suffix export file names.
 */
export function exportTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}`
  );
}

export function writeFeedExports(
  ranked: readonly RankedAssessment[],
  options: { outputDir: string; now?: Date }
): FeedExportPaths {
  const stamp = exportTimestamp(options.now ?? new Date());
  mkdirSync(options.outputDir, { recursive: true });

  const records = ranked.map(toFlatRecord);
  const paths: FeedExportPaths = {
    full: resolve(options.outputDir, `nyc_compliance_full_${stamp}.csv`),
    sample: resolve(options.outputDir, `nyc_compliance_sample_${stamp}.json`),
    demo: resolve(options.outputDir, `nyc_compliance_demo_${stamp}.csv`),
  };

  writeFileSync(paths.full, toCsv(records));
  writeFileSync(paths.sample, toJson(records.slice(0, SAMPLE_SIZE)));
  writeFileSync(paths.demo, toCsv(anonymizeForDemo(records.slice(0, DEMO_SIZE))));

  return paths;
}
