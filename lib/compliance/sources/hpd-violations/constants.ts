/**
 * HPD Housing Maintenance Code Violations Constants
 */

import type { SourceConfig } from "../../types";

export const HPD_VIOLATIONS_SOURCE_KEY = "nyc-hpd-violations" as const;

export const HPD_VIOLATIONS_CONFIG: SourceConfig = {
  sourceKey: HPD_VIOLATIONS_SOURCE_KEY,
  name: "HPD Housing Maintenance Code Violations",
  kind: "violation",
  agency: "HPD",
  datasetId: "wvxf-dwi5",
  baseUrl: "https://data.cityofnewyork.us",
  dateField: "inspectiondate",
};

export const PARSER_VERSION = "hpd-violations-v1.0.0";
