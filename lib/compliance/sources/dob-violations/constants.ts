/**
 * DOB Violations Constants
 */

import type { SourceConfig } from "../../types";

export const DOB_VIOLATIONS_SOURCE_KEY = "nyc-dob-violations" as const;

export const DOB_VIOLATIONS_CONFIG: SourceConfig = {
  sourceKey: DOB_VIOLATIONS_SOURCE_KEY,
  name: "DOB Violations",
  kind: "violation",
  agency: "DOB",
  datasetId: "3h2n-5cm9",
  baseUrl: "https://data.cityofnewyork.us",
  // Stored as YYYYMMDD text
  dateField: "issue_date",
};

export const PARSER_VERSION = "dob-violations-v1.0.0";
