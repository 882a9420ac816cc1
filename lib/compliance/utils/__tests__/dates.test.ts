import { describe, it, expect } from "vitest";
import { daysBefore, latestDate, parseEventDate, toIsoDate } from "../dates";

describe("parseEventDate", () => {
  it("parses ISO dates and Socrata timestamps", () => {
    expect(parseEventDate("2024-03-05T00:00:00.000")).toBe("2024-03-05");
    expect(parseEventDate("2024-03-05 10:00")).toBe("2024-03-05");
    expect(parseEventDate("2024-03-05")).toBe("2024-03-05");
  });

  it("parses compact and slashed dates", () => {
    expect(parseEventDate("20240310")).toBe("2024-03-10");
    expect(parseEventDate("3/1/2024")).toBe("2024-03-01");
  });

  it("checks the calendar", () => {
    expect(parseEventDate("2024-02-29")).toBe("2024-02-29");
    expect(parseEventDate("2023-02-29")).toBe("unknown");
    expect(parseEventDate("2024-02-30")).toBe("unknown");
    expect(parseEventDate("20241301")).toBe("unknown");
  });

  it("returns unknown for missing or unparseable input", () => {
    expect(parseEventDate(null)).toBe("unknown");
    expect(parseEventDate("")).toBe("unknown");
    expect(parseEventDate("garbage")).toBe("unknown");
    expect(parseEventDate("2024-03-05extra")).toBe("unknown");
  });
});

describe("latestDate", () => {
  it("prefers known dates", () => {
    expect(latestDate("unknown", "2024-01-01")).toBe("2024-01-01");
    expect(latestDate("2024-01-01", "unknown")).toBe("2024-01-01");
    expect(latestDate("unknown", "unknown")).toBe("unknown");
  });

  it("returns the later date", () => {
    expect(latestDate("2024-01-02", "2024-01-01")).toBe("2024-01-02");
    expect(latestDate("2023-12-31", "2024-01-01")).toBe("2024-01-01");
  });
});

describe("daysBefore", () => {
  it("counts back in UTC", () => {
    expect(daysBefore(new Date("2024-03-31T12:00:00Z"), 90)).toBe("2024-01-01");
    expect(toIsoDate(new Date("2024-03-31T23:59:00Z"))).toBe("2024-03-31");
  });
});
