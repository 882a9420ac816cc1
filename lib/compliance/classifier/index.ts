/**
 * Violation Classifier
 *
 * Keyword-based severity classification. Feeds disagree on (or omit)
 * their own class field, so severity is derived from the description.
 */

import type { ViolationClass } from "../types";

/**
 * Evaluated in order; the first rule with a matching keyword wins.
 */
export const SEVERITY_RULES: ReadonlyArray<readonly [readonly string[], ViolationClass]> = [
  [["IMMEDIATELY HAZARDOUS", "EMERGENCY", "COLLAPSE", "STRUCTURAL"], "C"],
  [["HAZARDOUS", "SAFETY", "FIRE", "ELECTRICAL", "PLUMBING"], "B"],
];

export const DEFAULT_VIOLATION_CLASS: ViolationClass = "A";

export function classifyViolation(category: string): ViolationClass {
  const upper = category.toUpperCase();

  for (const [keywords, violationClass] of SEVERITY_RULES) {
    if (keywords.some((keyword) => upper.includes(keyword))) {
      return violationClass;
    }
  }

  return DEFAULT_VIOLATION_CLASS;
}

/**
 * Prefer the class the feed reports (HPD carries one), falling back to
 * keywords when it is missing or not one of A/B/C.
 */
export function classifyWithReported(
  category: string,
  reportedClass: string | null | undefined
): ViolationClass {
  const reported = reportedClass?.trim().toUpperCase();
  if (reported === "A" || reported === "B" || reported === "C") {
    return reported;
  }
  return classifyViolation(category);
}
