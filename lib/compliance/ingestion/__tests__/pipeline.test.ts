import { describe, it, expect } from "vitest";
import { ingestComplianceFeed, runComplianceCore } from "../pipeline";
import { createConsoleObserver } from "../../observability";
import type { FetchLike } from "../../adapters/types";
import { MemoryComplianceRepository } from "./memory-repository";

const NOW = () => new Date("2024-03-31T12:00:00.000Z");

const HPD_ROWS = [
  {
    violationid: "1",
    bbl: "3012340056",
    class: "B",
    novdescription: "FIRE EXTINGUISHER MISSING",
    inspectiondate: "2024-03-05T00:00:00.000",
    violationstatus: "Open",
  },
  {
    violationid: "2",
    bbl: "9012340056",
    class: "A",
    novdescription: "PAINT",
    inspectiondate: "2024-03-06T00:00:00.000",
    violationstatus: "Open",
  },
];

const DOB_ROWS = [
  {
    number: "V1",
    boro: "1",
    block: "1",
    lot: "1",
    issue_date: "20240310",
    violation_category: "V-DOB VIOLATION - ACTIVE",
    violation_type: "C-CONSTRUCTION",
    description: "STRUCTURAL DEFECT",
  },
];

const COMPLAINT_ROWS = [
  {
    unique_key: "10",
    bbl: "3012340056",
    complaint_type: "HEAT/HOT WATER",
    created_date: "2024-03-08T10:00:00.000",
  },
  {
    unique_key: "11",
    bbl: "2004500012",
    complaint_type: "NOISE",
    created_date: "2024-03-09T10:00:00.000",
  },
];

type Route = { status?: number; body: unknown };

function stubFetch(routes: Record<string, Route>) {
  const urls: string[] = [];
  const fetchImpl: FetchLike = async (input) => {
    urls.push(input);
    const datasetId = new URL(input).pathname.replace("/resource/", "").replace(".json", "");
    const route = routes[datasetId];
    if (!route) {
      return new Response("not found", { status: 404 });
    }
    return new Response(JSON.stringify(route.body), { status: route.status ?? 200 });
  };
  return { fetchImpl, urls };
}

const ALL_OK: Record<string, Route> = {
  "wvxf-dwi5": { body: HPD_ROWS },
  "3h2n-5cm9": { body: DOB_ROWS },
  "erm2-nwe9": { body: COMPLAINT_ROWS },
};

function quietObserver() {
  const lines: string[] = [];
  const observer = createConsoleObserver({ sink: (line) => lines.push(line), now: NOW });
  return { observer, lines };
}

describe("runComplianceCore", () => {
  const metadata = { freshnessDate: "2024-03-31", coverageDays: 90 };

  it("scores a property with a class B violation and a heat complaint", () => {
    const result = runComplianceCore({
      violations: [{ bbl: "3012340056", category: "FIRE ESCAPE BLOCKED", eventDate: "2024-03-05" }],
      complaints: [{ bbl: "3012340056", category: "HEAT/HOT WATER", eventDate: "2024-03-08" }],
      metadata,
    });

    expect(result.ranked).toEqual([
      {
        bbl: "3012340056",
        borough: "3",
        exposure: 27450,
        riskScore: 4,
        fixPriority: "LOW",
        classA: 0,
        classB: 1,
        classC: 0,
        violationCount: 1,
        openViolations: 1,
        relevantComplaints: 1,
        lastEventDate: "2024-03-08",
        rank: 1,
        dataFreshnessDate: "2024-03-31",
        dataCoverageDays: 90,
      },
    ]);
  });

  it("rejects records with an invalid borough before aggregation", () => {
    const result = runComplianceCore({
      violations: [{ bbl: "9012340056", category: "FIRE", eventDate: "2024-03-05" }],
      complaints: [],
      metadata,
    });

    expect(result.ranked).toEqual([]);
    expect(result.rejections).toEqual([
      { reason: "invalid_borough", kind: "violation", rawBbl: "9012340056" },
    ]);
    expect(result.stats).toEqual({
      violationsIn: 1,
      complaintsIn: 0,
      normalized: 0,
      rejected: 1,
      properties: 0,
    });
  });

  it("returns empty output for empty input", () => {
    const result = runComplianceCore({ violations: [], complaints: [], metadata });

    expect(result.ranked).toEqual([]);
    expect(result.summary.totalProperties).toBe(0);
    expect(result.summary.averageRiskScore).toBe(0);
  });

  it("reports each step to the observer", () => {
    const { observer, lines } = quietObserver();
    runComplianceCore({ violations: [], complaints: [], metadata, observer, runId: "run-1" });

    const ends = lines
      .map((line) => JSON.parse(line))
      .filter((event) => event.event === "compliance_step_end")
      .map((event) => event.step);
    expect(ends).toEqual(["normalize_violations", "normalize_complaints", "aggregate", "score", "rank"]);
  });
});

describe("ingestComplianceFeed", () => {
  it("fetches every source, ranks and stores the run", async () => {
    const { fetchImpl, urls } = stubFetch(ALL_OK);
    const { observer, lines } = quietObserver();
    const repository = new MemoryComplianceRepository();

    const result = await ingestComplianceFeed({
      fetchImpl,
      observer,
      repository,
      now: NOW,
      triggeredBy: "test",
    });

    expect(result.status).toBe("SUCCESS");
    expect(result.error).toBeUndefined();
    expect(result.metadata).toEqual({ freshnessDate: "2024-03-31", coverageDays: 90 });
    expect(result.ranked.map((r) => [r.rank, r.bbl, r.riskScore, r.exposure, r.fixPriority])).toEqual([
      [1, "3012340056", 4, 27450, "LOW"],
      [2, "1000010001", 0.5, 32940, "CRITICAL"],
      [3, "2004500012", 0, 30195, "CLEAN"],
    ]);
    expect(result.ranked[0].lastEventDate).toBe("2024-03-08");
    expect(result.rejections).toEqual([
      {
        reason: "invalid_borough",
        kind: "violation",
        rawBbl: "9012340056",
        sourceKey: "nyc-hpd-violations",
        recordId: "2",
      },
    ]);
    expect(result.sources.map((s) => [s.sourceKey, s.ok, s.rows, s.records])).toEqual([
      ["nyc-hpd-violations", true, 2, 2],
      ["nyc-dob-violations", true, 1, 1],
      ["nyc-311-complaints", true, 2, 2],
    ]);

    const complaintUrl = urls.find((url) => url.includes("erm2-nwe9"));
    expect(complaintUrl && new URL(complaintUrl).searchParams.get("$where")).toBe(
      "created_date >= '2024-01-01' AND (complaint_type = 'HEAT/HOT WATER' OR complaint_type = 'PLUMBING')"
    );

    expect(repository.runs).toHaveLength(1);
    expect(repository.runs[0]).toMatchObject({
      id: "run-1",
      triggeredBy: "test",
      status: "succeeded",
      stats: {
        violationsIn: 3,
        complaintsIn: 2,
        normalized: 4,
        rejected: 1,
        properties: 3,
        inserted: 3,
        failedSources: 0,
      },
    });
    expect(repository.fetches.map((f) => [f.sourceKey, f.rowCount, f.parserVersion])).toEqual([
      ["nyc-hpd-violations", 2, "hpd-violations-v1.0.0"],
      ["nyc-dob-violations", 1, "dob-violations-v1.0.0"],
      ["nyc-311-complaints", 2, "complaints-311-v1.0.0"],
    ]);
    expect(await repository.listRunAssessments("run-1", { limit: 1 })).toMatchObject([
      { bbl: "3012340056", rank: 1, runId: "run-1" },
    ]);
    expect(result.storedRunId).toBe("run-1");

    const events = lines.map((line) => JSON.parse(line));
    expect(events[0].event).toBe("compliance_run_start");
    expect(events[events.length - 1]).toMatchObject({ event: "compliance_run_end", ok: true });
  });

  it("reports PARTIAL when one source fails", async () => {
    const { fetchImpl } = stubFetch({ ...ALL_OK, "3h2n-5cm9": { status: 500, body: {} } });
    const repository = new MemoryComplianceRepository();

    const result = await ingestComplianceFeed({
      fetchImpl,
      observer: quietObserver().observer,
      repository,
      now: NOW,
    });

    expect(result.status).toBe("PARTIAL");
    expect(result.sources[1]).toEqual({
      sourceKey: "nyc-dob-violations",
      ok: false,
      rows: 0,
      records: 0,
      warnings: [],
      error: "Socrata API error: HTTP 500 for dataset 3h2n-5cm9",
    });
    expect(result.ranked.map((r) => r.bbl)).toEqual(["3012340056", "2004500012"]);
    expect(repository.runs[0].status).toBe("partial");
  });

  it("reports FAILED when every source fails", async () => {
    const { fetchImpl } = stubFetch({});
    const repository = new MemoryComplianceRepository();

    const result = await ingestComplianceFeed({
      sources: ["nyc-hpd-violations", "nyc-311-complaints"],
      fetchImpl,
      observer: quietObserver().observer,
      repository,
      now: NOW,
    });

    expect(result.status).toBe("FAILED");
    expect(result.error).toBe(
      "All sources failed: nyc-hpd-violations: Socrata API error: HTTP 404 for dataset wvxf-dwi5; " +
        "nyc-311-complaints: Socrata API error: HTTP 404 for dataset erm2-nwe9"
    );
    expect(result.ranked).toEqual([]);
    expect(repository.runs[0].status).toBe("failed");
  });

  it("rejects unknown sources without fetching", async () => {
    const { fetchImpl, urls } = stubFetch(ALL_OK);

    const result = await ingestComplianceFeed({
      sources: ["nyc-hpd-violations", "nyc-ecb-violations"],
      fetchImpl,
      observer: quietObserver().observer,
      now: NOW,
    });

    expect(result.status).toBe("FAILED");
    expect(result.error).toBe("Unknown compliance source(s): nyc-ecb-violations");
    expect(urls).toEqual([]);
  });

  it("marks the run FAILED when persistence fails", async () => {
    const { fetchImpl } = stubFetch(ALL_OK);
    const repository = new MemoryComplianceRepository({ failOn: "storeAssessments" });

    const result = await ingestComplianceFeed({
      fetchImpl,
      observer: quietObserver().observer,
      repository,
      now: NOW,
    });

    expect(result.status).toBe("FAILED");
    expect(result.error).toBe("connection terminated");
    expect(repository.runs[0]).toMatchObject({ status: "failed", error: "connection terminated" });
  });

  it("runs without a repository", async () => {
    const { fetchImpl } = stubFetch(ALL_OK);

    const result = await ingestComplianceFeed({
      sources: ["nyc-dob-violations"],
      daysBack: 30,
      fetchImpl,
      observer: quietObserver().observer,
      now: NOW,
    });

    expect(result.status).toBe("SUCCESS");
    expect(result.storedRunId).toBeUndefined();
    expect(result.metadata).toEqual({ freshnessDate: "2024-03-31", coverageDays: 30 });
    expect(result.ranked.map((r) => r.bbl)).toEqual(["1000010001"]);
  });

  it("times out a source that never answers and reports PARTIAL", async () => {
    const { fetchImpl: answering } = stubFetch(ALL_OK);
    const fetchImpl: FetchLike = (input, init) =>
      input.includes("3h2n-5cm9") ? new Promise<Response>(() => {}) : answering(input, init);

    const result = await ingestComplianceFeed({
      fetchImpl,
      fetchTimeoutMs: 20,
      observer: quietObserver().observer,
      now: NOW,
    });

    expect(result.status).toBe("PARTIAL");
    expect(result.sources[1]).toMatchObject({
      sourceKey: "nyc-dob-violations",
      ok: false,
      error: "Socrata API error: timed out after 20ms for dataset 3h2n-5cm9",
    });
    expect(result.ranked.map((r) => r.bbl)).toEqual(["3012340056", "2004500012"]);
  });

  it("reports FAILED when the only source never answers", async () => {
    const result = await ingestComplianceFeed({
      sources: ["nyc-hpd-violations"],
      fetchImpl: () => new Promise<Response>(() => {}),
      fetchTimeoutMs: 20,
      observer: quietObserver().observer,
      now: NOW,
    });

    expect(result.status).toBe("FAILED");
    expect(result.error).toBe(
      "All sources failed: nyc-hpd-violations: Socrata API error: timed out after 20ms for dataset wvxf-dwi5"
    );
  });
});
