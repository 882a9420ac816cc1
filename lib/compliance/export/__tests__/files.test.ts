import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { basename, join } from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { exportTimestamp, writeFeedExports } from "../files";
import type { RankedAssessment } from "../../types";

function ranked(rank: number, bbl: string): RankedAssessment {
  return {
    bbl,
    borough: "3",
    exposure: 27450,
    riskScore: 1,
    fixPriority: "LOW",
    classA: 2,
    classB: 0,
    classC: 0,
    violationCount: 2,
    openViolations: 2,
    relevantComplaints: 0,
    lastEventDate: "2024-03-01",
    rank,
    dataFreshnessDate: "2024-03-31",
    dataCoverageDays: 90,
  };
}

describe("exportTimestamp", () => {
  it("formats local time as YYYYMMDD_HHmm", () => {
    expect(exportTimestamp(new Date(2024, 2, 5, 9, 7))).toBe("20240305_0907");
  });
});

describe("writeFeedExports", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "compliance-export-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes the full, sample and demo files", () => {
    const outputDir = join(dir, "output");
    const paths = writeFeedExports([ranked(1, "3012340056"), ranked(2, "3012340057")], {
      outputDir,
      now: new Date(2024, 2, 5, 9, 7),
    });

    expect(basename(paths.full)).toBe("nyc_compliance_full_20240305_0907.csv");
    expect(basename(paths.sample)).toBe("nyc_compliance_sample_20240305_0907.json");
    expect(basename(paths.demo)).toBe("nyc_compliance_demo_20240305_0907.csv");

    const full = readFileSync(paths.full, "utf-8").split("\n");
    expect(full[1]).toBe("3012340056,27450,1,2,2,0,0,0,2,LOW,2024-03-01,2024-03-31,90");
    expect(full).toHaveLength(4);

    const sample: unknown = JSON.parse(readFileSync(paths.sample, "utf-8"));
    expect(Array.isArray(sample) && sample.length).toBe(2);

    const demo = readFileSync(paths.demo, "utf-8").split("\n");
    expect(demo[2]).toBe("SAMPLE-0002,27450,1,2,2,0,0,0,2,LOW,2024-03-01,2024-03-31,90");
  });
});
