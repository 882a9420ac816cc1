/**
 * 311 Service Requests Constants
 */

import type { SourceConfig } from "../../types";

export const COMPLAINTS_311_SOURCE_KEY = "nyc-311-complaints" as const;

export const COMPLAINTS_311_CONFIG: SourceConfig = {
  sourceKey: COMPLAINTS_311_SOURCE_KEY,
  name: "311 Service Requests",
  kind: "complaint",
  agency: "311",
  datasetId: "erm2-nwe9",
  baseUrl: "https://data.cityofnewyork.us",
  dateField: "created_date",
};

export const PARSER_VERSION = "complaints-311-v1.0.0";
