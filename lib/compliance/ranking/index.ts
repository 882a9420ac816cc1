/**
 * Portfolio Ranking
 */

import type {
  FixPriority,
  PortfolioSummary,
  RankedAssessment,
  RiskAssessment,
  RunMetadata,
} from "../types";

/**
 * Risk score descending, then BBL ascending.
 */
export function compareAssessments(a: RiskAssessment, b: RiskAssessment): number {
  if (a.riskScore !== b.riskScore) {
    return b.riskScore - a.riskScore;
  }
  if (a.bbl < b.bbl) return -1;
  if (a.bbl > b.bbl) return 1;
  return 0;
}

/**
 * Sort, drop repeated BBLs (first after sort wins) and attach run
 * metadata. The input array is left untouched.
 */
export function rankAssessments(
  assessments: readonly RiskAssessment[],
  metadata: RunMetadata
): RankedAssessment[] {
  const sorted = [...assessments].sort(compareAssessments);
  const seen = new Set<string>();
  const ranked: RankedAssessment[] = [];

  for (const assessment of sorted) {
    if (seen.has(assessment.bbl)) continue;
    seen.add(assessment.bbl);

    ranked.push({
      ...assessment,
      rank: ranked.length + 1,
      dataFreshnessDate: metadata.freshnessDate,
      dataCoverageDays: metadata.coverageDays,
    });
  }

  return ranked;
}

export function summarizePortfolio(ranked: readonly RiskAssessment[]): PortfolioSummary {
  const byFixPriority: Record<FixPriority, number> = {
    CRITICAL: 0,
    HIGH: 0,
    MEDIUM: 0,
    LOW: 0,
    CLEAN: 0,
  };

  let withViolations = 0;
  let withClassB = 0;
  let withClassC = 0;
  let withRelevantComplaints = 0;
  let totalViolations = 0;
  let totalClassB = 0;
  let totalRelevantComplaints = 0;
  let totalExposure = 0;
  let maxRiskScore = 0;
  let scoreSum = 0;

  for (const assessment of ranked) {
    byFixPriority[assessment.fixPriority]++;

    if (assessment.violationCount > 0) withViolations++;
    if (assessment.classB > 0) withClassB++;
    if (assessment.classC > 0) withClassC++;
    if (assessment.relevantComplaints > 0) withRelevantComplaints++;

    totalViolations += assessment.violationCount;
    totalClassB += assessment.classB;
    totalRelevantComplaints += assessment.relevantComplaints;
    totalExposure += assessment.exposure;
    maxRiskScore = Math.max(maxRiskScore, assessment.riskScore);
    scoreSum += assessment.riskScore;
  }

  const averageRiskScore =
    ranked.length > 0 ? Math.round((scoreSum / ranked.length) * 100) / 100 : 0;

  return {
    totalProperties: ranked.length,
    withViolations,
    withClassB,
    withClassC,
    withRelevantComplaints,
    totalViolations,
    totalClassB,
    totalRelevantComplaints,
    totalExposure,
    maxRiskScore,
    averageRiskScore,
    byFixPriority,
  };
}
