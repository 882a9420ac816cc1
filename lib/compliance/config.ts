/**
 * Compliance Feed Configuration
 *
 * Read from the environment and validated once at startup.
 */

import { z } from "zod";

import { DEFAULT_RELEVANT_COMPLAINT_TYPES } from "./normalize";

const commaList = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((part) => part.trim())
      .filter(Boolean)
  );

const emptyToUndefined = (value: unknown) => (value === "" ? undefined : value);

const envSchema = z.object({
  SOCRATA_APP_TOKEN: z.preprocess(emptyToUndefined, z.string().optional()),
  COMPLIANCE_DAYS_BACK: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(90)
  ),
  COMPLIANCE_RECORD_LIMIT: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(50000)
  ),
  COMPLIANCE_RELEVANT_COMPLAINT_TYPES: z.preprocess(
    emptyToUndefined,
    commaList.optional()
  ),
  COMPLIANCE_SOURCES: z.preprocess(emptyToUndefined, commaList.optional()),
  COMPLIANCE_SEVERITY_SOURCE: z.preprocess(
    emptyToUndefined,
    z.enum(["keywords", "reported-first"]).default("keywords")
  ),
  COMPLIANCE_FETCH_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(60000)
  ),
  COMPLIANCE_OUTPUT_DIR: z.preprocess(emptyToUndefined, z.string().default("output")),
  DATABASE_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
});

export interface ComplianceConfig {
  appToken?: string;
  daysBack: number;
  recordLimit: number;
  relevantComplaintTypes: string[];
  /** Empty means every registered source */
  sources: string[];
  severitySource: "keywords" | "reported-first";
  fetchTimeoutMs: number;
  outputDir: string;
  databaseUrl?: string;
}

export function loadComplianceConfig(
  env: Record<string, string | undefined> = process.env
): ComplianceConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid compliance configuration: ${problems}`);
  }

  const data = parsed.data;
  return {
    appToken: data.SOCRATA_APP_TOKEN,
    daysBack: data.COMPLIANCE_DAYS_BACK,
    recordLimit: data.COMPLIANCE_RECORD_LIMIT,
    relevantComplaintTypes: (
      data.COMPLIANCE_RELEVANT_COMPLAINT_TYPES ?? [...DEFAULT_RELEVANT_COMPLAINT_TYPES]
    ).map((type) => type.toUpperCase()),
    sources: data.COMPLIANCE_SOURCES ?? [],
    severitySource: data.COMPLIANCE_SEVERITY_SOURCE,
    fetchTimeoutMs: data.COMPLIANCE_FETCH_TIMEOUT_MS,
    outputDir: data.COMPLIANCE_OUTPUT_DIR,
    databaseUrl: data.DATABASE_URL,
  };
}
