import { describe, it, expect } from "vitest";
import { compareAssessments, rankAssessments, summarizePortfolio } from "../index";
import type { RiskAssessment } from "../../types";

function assessment(overrides: Partial<RiskAssessment> = {}): RiskAssessment {
  return {
    bbl: "3012340056",
    borough: "3",
    exposure: 27450,
    riskScore: 0,
    fixPriority: "CLEAN",
    classA: 0,
    classB: 0,
    classC: 0,
    violationCount: 0,
    openViolations: 0,
    relevantComplaints: 0,
    lastEventDate: "unknown",
    ...overrides,
  };
}

const metadata = { freshnessDate: "2024-03-31", coverageDays: 90 };

describe("rankAssessments", () => {
  it("returns an empty list for no assessments", () => {
    expect(rankAssessments([], metadata)).toEqual([]);
  });

  it("sorts by score descending, then BBL ascending", () => {
    const ranked = rankAssessments(
      [
        assessment({ bbl: "3000020001", riskScore: 1.5 }),
        assessment({ bbl: "1000010001", riskScore: 4 }),
        assessment({ bbl: "2000010001", riskScore: 1.5 }),
      ],
      metadata
    );

    expect(ranked.map((r) => [r.rank, r.bbl])).toEqual([
      [1, "1000010001"],
      [2, "2000010001"],
      [3, "3000020001"],
    ]);
  });

  it("attaches run metadata", () => {
    const [ranked] = rankAssessments([assessment()], metadata);
    expect(ranked.dataFreshnessDate).toBe("2024-03-31");
    expect(ranked.dataCoverageDays).toBe(90);
  });

  it("keeps the highest-scoring entry for a repeated BBL", () => {
    const ranked = rankAssessments(
      [
        assessment({ bbl: "1000010001", riskScore: 1 }),
        assessment({ bbl: "1000010001", riskScore: 3 }),
        assessment({ bbl: "2000010001", riskScore: 2 }),
      ],
      metadata
    );

    expect(ranked.map((r) => [r.rank, r.bbl, r.riskScore])).toEqual([
      [1, "1000010001", 3],
      [2, "2000010001", 2],
    ]);
  });

  it("is deterministic and leaves its input untouched", () => {
    const input = [
      assessment({ bbl: "2000010001", riskScore: 1 }),
      assessment({ bbl: "1000010001", riskScore: 1 }),
    ];

    const first = rankAssessments(input, metadata);
    const second = rankAssessments(input, metadata);

    expect(first).toEqual(second);
    expect(input.map((a) => a.bbl)).toEqual(["2000010001", "1000010001"]);
  });
});

describe("compareAssessments", () => {
  it("compares BBLs by code unit", () => {
    expect(compareAssessments(assessment({ bbl: "1" }), assessment({ bbl: "2" }))).toBe(-1);
    expect(compareAssessments(assessment({ bbl: "2" }), assessment({ bbl: "2" }))).toBe(0);
  });
});

describe("summarizePortfolio", () => {
  it("totals a portfolio", () => {
    const summary = summarizePortfolio([
      assessment({
        bbl: "1000010001",
        exposure: 32940,
        riskScore: 5,
        fixPriority: "CRITICAL",
        classB: 1,
        classC: 1,
        violationCount: 3,
        relevantComplaints: 1,
      }),
      assessment({ bbl: "3012340056", riskScore: 0.5, fixPriority: "LOW", violationCount: 1 }),
      assessment({ bbl: "5000010001", exposure: 23332 }),
    ]);

    expect(summary).toEqual({
      totalProperties: 3,
      withViolations: 2,
      withClassB: 1,
      withClassC: 1,
      withRelevantComplaints: 1,
      totalViolations: 4,
      totalClassB: 1,
      totalRelevantComplaints: 1,
      totalExposure: 83722,
      maxRiskScore: 5,
      averageRiskScore: 1.83,
      byFixPriority: { CRITICAL: 1, HIGH: 0, MEDIUM: 0, LOW: 1, CLEAN: 1 },
    });
  });

  it("returns zeros for an empty portfolio", () => {
    const summary = summarizePortfolio([]);
    expect(summary.totalProperties).toBe(0);
    expect(summary.averageRiskScore).toBe(0);
    expect(summary.maxRiskScore).toBe(0);
  });
});
