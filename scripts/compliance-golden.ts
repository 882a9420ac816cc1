#!/usr/bin/env tsx
/**
 * Golden Feed Test Runner
 *
 * Validates that extraction + normalization produce stable outputs
 * from known feed rows.
 * Run with: npm run feed:golden
 */

import { readFileSync } from "fs";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";

import type { ComplianceSourceAdapter } from "../lib/compliance/adapters/types";
import { createHpdViolationsAdapter } from "../lib/compliance/sources/hpd-violations/adapter";
import { createDobViolationsAdapter } from "../lib/compliance/sources/dob-violations/adapter";
import { createComplaints311Adapter } from "../lib/compliance/sources/complaints-311/adapter";
import { hpdViolationsGoldenCases } from "../lib/compliance/sources/hpd-violations/golden/cases";
import { dobViolationsGoldenCases } from "../lib/compliance/sources/dob-violations/golden/cases";
import { complaints311GoldenCases } from "../lib/compliance/sources/complaints-311/golden/cases";
import {
  runGoldenCase,
  validateGoldenCase,
  type GoldenFeedCase,
} from "../lib/compliance/sources/golden";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Colors for terminal output
const colors = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  dim: "\x1b[2m",
};

interface TestSuite {
  name: string;
  goldenDir: string;
  cases: GoldenFeedCase[];
  adapter: ComplianceSourceAdapter;
}

const testSuites: TestSuite[] = [
  {
    name: "HPD Violations",
    goldenDir: resolve(__dirname, "../lib/compliance/sources/hpd-violations/golden"),
    cases: hpdViolationsGoldenCases,
    adapter: createHpdViolationsAdapter(),
  },
  {
    name: "DOB Violations",
    goldenDir: resolve(__dirname, "../lib/compliance/sources/dob-violations/golden"),
    cases: dobViolationsGoldenCases,
    adapter: createDobViolationsAdapter(),
  },
  {
    name: "311 Complaints",
    goldenDir: resolve(__dirname, "../lib/compliance/sources/complaints-311/golden"),
    cases: complaints311GoldenCases,
    adapter: createComplaints311Adapter(),
  },
];

function loadFixture(goldenDir: string, fixturePath: string): unknown[] {
  const content: unknown = JSON.parse(readFileSync(resolve(goldenDir, fixturePath), "utf-8"));
  if (!Array.isArray(content)) {
    throw new Error(`Fixture ${fixturePath} is not an array of rows`);
  }
  return content;
}

function runGoldenTests(): void {
  console.log(`\n${colors.blue}=== Feed Golden Tests ===${colors.reset}\n`);

  let totalPassed = 0;
  let totalFailed = 0;
  const allFailures: Array<{ suite: string; case: GoldenFeedCase; errors: string[] }> = [];

  for (const suite of testSuites) {
    console.log(`\n${colors.blue}--- ${suite.name} ---${colors.reset}\n`);

    let passed = 0;
    let failed = 0;

    for (const testCase of suite.cases) {
      console.log(`${colors.dim}Testing: ${testCase.name} (${testCase.id})${colors.reset}`);

      try {
        const rows = loadFixture(suite.goldenDir, testCase.fixturePath);
        const result = validateGoldenCase(
          runGoldenCase(suite.adapter, rows, testCase.options),
          testCase.expect
        );

        if (result.passed) {
          console.log(`  ${colors.green}✓ PASSED${colors.reset}`);
          passed++;
        } else {
          console.log(`  ${colors.red}✗ FAILED${colors.reset}`);
          result.failures.forEach((f) => {
            console.log(`    ${colors.red}- ${f}${colors.reset}`);
          });
          failed++;
          allFailures.push({ suite: suite.name, case: testCase, errors: result.failures });
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.log(`  ${colors.red}✗ ERROR: ${message}${colors.reset}`);
        failed++;
        allFailures.push({ suite: suite.name, case: testCase, errors: [message] });
      }
    }

    console.log(`\n  ${suite.name} Summary: ${colors.green}${passed} passed${colors.reset}, ${colors.red}${failed} failed${colors.reset}`);
    totalPassed += passed;
    totalFailed += failed;
  }

  console.log(`\n${colors.blue}=== Overall Summary ===${colors.reset}`);
  console.log(`  Total: ${totalPassed + totalFailed}`);
  console.log(`  ${colors.green}Passed: ${totalPassed}${colors.reset}`);
  console.log(`  ${colors.red}Failed: ${totalFailed}${colors.reset}`);

  if (allFailures.length > 0) {
    console.log(`\n${colors.yellow}=== Failure Details ===${colors.reset}`);
    for (const failure of allFailures) {
      console.log(`\n  [${failure.suite}] ${failure.case.name} (${failure.case.id}):`);
      failure.errors.forEach((e) => {
        console.log(`    - ${e}`);
      });
    }
    process.exit(1);
  }

  console.log(`\n${colors.green}All golden tests passed!${colors.reset}\n`);
}

runGoldenTests();
