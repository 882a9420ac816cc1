/**
 * Golden Cases for HPD Violations
 */

import type { GoldenFeedCase } from "../../golden";

export const hpdViolationsGoldenCases: GoldenFeedCase[] = [
  {
    id: "hpd-mixed-1",
    name: "Mixed rows, keyword severity",
    fixturePath: "./fixtures/mixed-1.json",
    expect: {
      records: 6,
      warnings: 1,
      normalized: 4,
      rejected: 2,
      bbls: ["3012340056", "1000010001"],
      classes: { A: 1, B: 2, C: 1 },
      open: 3,
      unknownDates: 1,
    },
  },
  {
    id: "hpd-mixed-1-reported",
    name: "Mixed rows, reported class first",
    fixturePath: "./fixtures/mixed-1.json",
    options: { severitySource: "reported-first" },
    expect: {
      records: 6,
      warnings: 1,
      normalized: 4,
      rejected: 2,
      bbls: ["3012340056", "1000010001"],
      classes: { A: 0, B: 3, C: 1 },
      open: 3,
    },
  },
];
