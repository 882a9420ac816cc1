#!/usr/bin/env tsx
/**
 * Compliance Feed Runner
 *
 * Fetches the configured NYC feeds, ranks every property by risk and
 * writes the export files.
 * Run with: npm run feed
 *
 * Usage:
 *   npm run feed                                  - All sources, defaults from env
 *   npm run feed -- --sources=nyc-hpd-violations  - Only HPD
 *   npm run feed -- --days=30 --limit=1000        - Narrower window
 *   npm run feed -- --bbl=3012340056              - One property
 *   npm run feed -- --no-export                   - Skip writing files
 */

import { config } from "dotenv";
// Load .env.local first, then .env as fallback
config({ path: ".env.local" });
config(); // Load .env file as fallback

import { loadComplianceConfig } from "../lib/compliance/config";
import { ingestRequestSchema } from "../lib/compliance/api/schemas";
import { ingestComplianceFeed } from "../lib/compliance/ingestion";
import { writeFeedExports } from "../lib/compliance/export/files";
import { buildRecommendations, fixPriorityNote } from "../lib/compliance/scoring";
import { createDrizzleComplianceRepository } from "../lib/compliance/storage";
import { BOROUGH_NAMES } from "../lib/compliance/types";
import { createDb, type DbHandle } from "../lib/db";

// Colors for terminal output
const colors = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  dim: "\x1b[2m",
};

const TOP_N = 10;

function argValue(args: string[], name: string): string | undefined {
  return args.find((a) => a.startsWith(`--${name}=`))?.split("=")[1];
}

function optionalInt(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const settings = loadComplianceConfig();

  const parsed = ingestRequestSchema.safeParse({
    sources: argValue(args, "sources")?.split(",").filter(Boolean),
    daysBack: optionalInt(argValue(args, "days")),
    limit: optionalInt(argValue(args, "limit")),
    bbl: argValue(args, "bbl"),
  });
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      console.error(`${colors.red}--${issue.path.join(".")}: ${issue.message}${colors.reset}`);
    }
    process.exit(1);
  }
  const request = parsed.data;

  let handle: DbHandle | undefined;
  if (settings.databaseUrl) {
    handle = createDb(settings.databaseUrl);
  }

  console.log(`\n${colors.blue}=== NYC Compliance Feed ===${colors.reset}\n`);

  try {
    const result = await ingestComplianceFeed({
      sources: request.sources ?? settings.sources,
      daysBack: request.daysBack ?? settings.daysBack,
      limit: request.limit ?? settings.recordLimit,
      bbl: request.bbl,
      normalize: {
        relevantComplaintTypes: settings.relevantComplaintTypes,
        severitySource: settings.severitySource,
      },
      appToken: settings.appToken,
      fetchTimeoutMs: settings.fetchTimeoutMs,
      repository: handle ? createDrizzleComplianceRepository(handle.db) : undefined,
      triggeredBy: "cli",
    });

    for (const source of result.sources) {
      if (source.ok) {
        console.log(
          `  ${colors.green}✓ ${source.sourceKey}${colors.reset} ${source.rows} rows, ${source.records} records` +
            (source.warnings.length > 0 ? `, ${source.warnings.length} warnings` : "")
        );
      } else {
        console.log(`  ${colors.red}✗ ${source.sourceKey}: ${source.error}${colors.reset}`);
      }
    }

    if (result.status === "FAILED" || result.status === "SKIPPED") {
      console.error(`\n${colors.red}Run ${result.status}: ${result.error}${colors.reset}`);
      process.exitCode = 1;
      return;
    }

    const summary = result.summary;
    if (summary) {
      console.log(`\n${colors.blue}=== Portfolio Summary ===${colors.reset}`);
      console.log(`  Properties:              ${summary.totalProperties}`);
      console.log(`  With violations:         ${summary.withViolations}`);
      console.log(`  With Class C:            ${summary.withClassC}`);
      console.log(`  With heat/plumbing:      ${summary.withRelevantComplaints}`);
      console.log(`  Total exposure:          $${summary.totalExposure.toLocaleString("en-US")}`);
      console.log(`  Max / avg risk score:    ${summary.maxRiskScore} / ${summary.averageRiskScore}`);
      for (const [priority, count] of Object.entries(summary.byFixPriority)) {
        console.log(`  ${colors.dim}${priority.padEnd(9)}${count}${colors.reset}`);
      }
    }

    if (result.rejections.length > 0) {
      console.log(`\n${colors.yellow}Rejected records: ${result.rejections.length}${colors.reset}`);
    }

    console.log(`\n${colors.blue}=== Top ${TOP_N} ===${colors.reset}`);
    for (const assessment of result.ranked.slice(0, TOP_N)) {
      console.log(
        `  #${assessment.rank} ${assessment.bbl} (${BOROUGH_NAMES[assessment.borough]}) ` +
          `score ${assessment.riskScore} ${assessment.fixPriority}`
      );
      console.log(`     ${colors.dim}${fixPriorityNote(assessment.fixPriority)}${colors.reset}`);
      for (const recommendation of buildRecommendations(assessment)) {
        console.log(`     [${recommendation.priority}] ${recommendation.action}`);
      }
    }

    if (!args.includes("--no-export") && result.ranked.length > 0) {
      const paths = writeFeedExports(result.ranked, { outputDir: settings.outputDir });
      console.log(`\n${colors.blue}=== Exports ===${colors.reset}`);
      console.log(`  Full:   ${paths.full}`);
      console.log(`  Sample: ${paths.sample}`);
      console.log(`  Demo:   ${paths.demo}`);
    }

    const color = result.status === "SUCCESS" ? colors.green : colors.yellow;
    console.log(`\n${color}Run ${result.status} (${result.runId})${colors.reset}\n`);
  } finally {
    await handle?.close();
  }
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
