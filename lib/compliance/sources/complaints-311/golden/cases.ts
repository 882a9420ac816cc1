/**
 * Golden Cases for 311 Complaints
 */

import type { GoldenFeedCase } from "../../golden";

export const complaints311GoldenCases: GoldenFeedCase[] = [
  {
    id: "311-mixed-1",
    name: "Relevant and ignored complaint types",
    fixturePath: "./fixtures/mixed-1.json",
    expect: {
      records: 5,
      warnings: 1,
      normalized: 3,
      rejected: 2,
      bbls: ["3012340056", "1000010001"],
      relevant: 2,
      unknownDates: 0,
    },
  },
];
