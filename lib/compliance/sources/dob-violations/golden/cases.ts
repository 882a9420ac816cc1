/**
 * Golden Cases for DOB Violations
 */

import type { GoldenFeedCase } from "../../golden";

export const dobViolationsGoldenCases: GoldenFeedCase[] = [
  {
    id: "dob-mixed-1",
    name: "Boro/block/lot assembly, padded lots and resolved categories",
    fixturePath: "./fixtures/mixed-1.json",
    expect: {
      records: 6,
      warnings: 0,
      normalized: 4,
      rejected: 2,
      bbls: ["3012340056", "1000010001", "2004500012", "1000160001"],
      classes: { A: 2, B: 1, C: 1 },
      open: 3,
      unknownDates: 1,
    },
  },
];
