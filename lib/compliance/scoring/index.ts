/**
 * Risk scoring module
 *
 * Weighted risk score, borough-indexed fine exposure and a fix-priority
 * label for one property rollup. The score and the label are computed
 * independently; neither is derived from the other.
 */

import type {
  BoroughCode,
  FixPriority,
  PropertyRollup,
  Recommendation,
  RiskAssessment,
} from "../types";

// ============================================================================
// Constants
// ============================================================================

export const RISK_WEIGHTS = {
  classB: 2.0,
  relevantComplaint: 1.5,
  totalViolation: 0.5,
} as const;

export const BASE_EXPOSURE = 27450;

export const BOROUGH_EXPOSURE_MULTIPLIERS: Record<BoroughCode, number> = {
  "1": 1.2, // Manhattan
  "2": 1.1, // Bronx
  "3": 1.0, // Brooklyn
  "4": 0.9, // Queens
  "5": 0.85, // Staten Island
};

// ============================================================================
// Score
// ============================================================================

export interface RiskScoreInput {
  classB: number;
  relevantComplaints: number;
  totalViolations: number;
}

/**
 * classB * 2.0 + relevantComplaints * 1.5 + totalViolations * 0.5,
 * rounded to two decimals.
 */
export function computeRiskScore(input: RiskScoreInput): number {
  const raw =
    input.classB * RISK_WEIGHTS.classB +
    input.relevantComplaints * RISK_WEIGHTS.relevantComplaint +
    input.totalViolations * RISK_WEIGHTS.totalViolation;

  return Math.round(raw * 100) / 100;
}

/**
 * Base exposure scaled by the borough multiplier, truncated to whole
 * dollars. Multipliers are applied as integer percentages so 0.85 of
 * 27450 truncates to 23332 rather than drifting on float error.
 */
export function computeExposure(borough: BoroughCode): number {
  const percent = Math.round(BOROUGH_EXPOSURE_MULTIPLIERS[borough] * 100);
  return Math.trunc((BASE_EXPOSURE * percent) / 100);
}

// ============================================================================
// Fix Priority
// ============================================================================

export function deriveFixPriority(
  rollup: Pick<PropertyRollup, "classB" | "classC" | "openViolations" | "totalViolations">
): FixPriority {
  if (rollup.classC > 0) {
    return "CRITICAL";
  } else if (rollup.classB > 2) {
    return "HIGH";
  } else if (rollup.openViolations > 5) {
    return "MEDIUM";
  } else if (rollup.totalViolations > 0) {
    return "LOW";
  }
  return "CLEAN";
}

const FIX_PRIORITY_NOTES: Record<FixPriority, string> = {
  CRITICAL: "Immediately hazardous conditions / heat system inspection (Class C = $5k+ fine/violation)",
  HIGH: "Multiple hazardous (Class B) violations: schedule repairs this week",
  MEDIUM: "Backlog of open violations: clear before escalation",
  LOW: "Minor open items: address in routine maintenance",
  CLEAN: "No violations in the coverage window",
};

export function fixPriorityNote(priority: FixPriority): string {
  return FIX_PRIORITY_NOTES[priority];
}

// ============================================================================
// Assessment
// ============================================================================

export function scoreRollup(rollup: PropertyRollup): RiskAssessment {
  return {
    bbl: rollup.bbl,
    borough: rollup.borough,
    exposure: computeExposure(rollup.borough),
    riskScore: computeRiskScore(rollup),
    fixPriority: deriveFixPriority(rollup),
    classA: rollup.classA,
    classB: rollup.classB,
    classC: rollup.classC,
    violationCount: rollup.totalViolations,
    openViolations: rollup.openViolations,
    relevantComplaints: rollup.relevantComplaints,
    lastEventDate: rollup.lastEventDate,
  };
}

// ============================================================================
// Recommendations
// ============================================================================

/**
 * Outreach action list for a property, most urgent first.
 */
export function buildRecommendations(
  rollup: Pick<PropertyRollup, "classC" | "relevantComplaints" | "openViolations">
): Recommendation[] {
  const recommendations: Recommendation[] = [];

  if (rollup.classC > 0) {
    recommendations.push({
      priority: "CRITICAL",
      action: `Address ${rollup.classC} Class C violation(s) IMMEDIATELY`,
      reason:
        "Class C violations indicate immediate hazards and can result in $1,000-$5,000 fines per violation",
    });
  }

  if (rollup.relevantComplaints > 0) {
    recommendations.push({
      priority: "URGENT",
      action: `Resolve ${rollup.relevantComplaints} heat/plumbing complaint(s) within 24 hours`,
      reason: "Heat violations can result in $250-$500 per day fines during heating season",
    });
  }

  if (rollup.openViolations > 2) {
    recommendations.push({
      priority: "HIGH",
      action: `Clear ${rollup.openViolations} open violation(s)`,
      reason: "Long-standing violations increase risk of escalation and additional fines",
    });
  }

  if (recommendations.length === 0) {
    recommendations.push({
      priority: "LOW",
      action: "Continue monitoring",
      reason: "Property is in good standing",
    });
  }

  return recommendations;
}
