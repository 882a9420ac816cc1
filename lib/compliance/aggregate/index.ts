/**
 * Per-Property Aggregation
 *
 * Groups normalized records by BBL into rollups. Map iteration order is
 * the order in which each BBL first appears in the input.
 */

import type { Bbl, BoroughCode, NormalizedRecord, PropertyRollup } from "../types";
import { UNKNOWN_DATE } from "../types";
import { latestDate } from "../utils/dates";

export function emptyRollup(bbl: Bbl, borough: BoroughCode): PropertyRollup {
  return {
    bbl,
    borough,
    classA: 0,
    classB: 0,
    classC: 0,
    totalViolations: 0,
    openViolations: 0,
    relevantComplaints: 0,
    totalComplaints: 0,
    lastEventDate: UNKNOWN_DATE,
  };
}

export function aggregateRecords(
  records: Iterable<NormalizedRecord>
): Map<Bbl, PropertyRollup> {
  const rollups = new Map<Bbl, PropertyRollup>();

  for (const record of records) {
    let rollup = rollups.get(record.bbl);
    if (!rollup) {
      rollup = emptyRollup(record.bbl, record.borough);
      rollups.set(record.bbl, rollup);
    }

    rollup.lastEventDate = latestDate(rollup.lastEventDate, record.eventDate);

    if (record.kind === "violation") {
      switch (record.violationClass) {
        case "A":
          rollup.classA++;
          break;
        case "B":
          rollup.classB++;
          break;
        case "C":
          rollup.classC++;
          break;
      }
      rollup.totalViolations++;
      if (record.isOpen) {
        rollup.openViolations++;
      }
    } else {
      rollup.totalComplaints++;
      if (record.complaintTag === "relevant") {
        rollup.relevantComplaints++;
      }
    }
  }

  return rollups;
}

/**
 * Combine partial aggregates from separate batches.
 * The same BBL in several batches has its counts summed.
 */
export function mergeRollups(
  ...partials: ReadonlyArray<ReadonlyMap<Bbl, PropertyRollup>>
): Map<Bbl, PropertyRollup> {
  const merged = new Map<Bbl, PropertyRollup>();

  for (const partial of partials) {
    for (const [bbl, rollup] of partial) {
      const existing = merged.get(bbl);
      if (!existing) {
        merged.set(bbl, { ...rollup });
        continue;
      }

      existing.classA += rollup.classA;
      existing.classB += rollup.classB;
      existing.classC += rollup.classC;
      existing.totalViolations += rollup.totalViolations;
      existing.openViolations += rollup.openViolations;
      existing.relevantComplaints += rollup.relevantComplaints;
      existing.totalComplaints += rollup.totalComplaints;
      existing.lastEventDate = latestDate(existing.lastEventDate, rollup.lastEventDate);
    }
  }

  return merged;
}
