import { describe, it, expect } from "vitest";
import { buildBbl, cleanBbl, parseBbl } from "../bbl";

describe("parseBbl", () => {
  it("splits a valid BBL into borough, block and lot", () => {
    expect(parseBbl("3012340056")).toEqual({
      ok: true,
      bbl: "3012340056",
      borough: "3",
      block: "01234",
      lot: "0056",
    });
  });

  it("strips whitespace and hyphens before validating", () => {
    const result = parseBbl(" 3-01234-0056 ");
    expect(result.ok && result.bbl).toBe("3012340056");
  });

  it("accepts numeric identifiers", () => {
    const result = parseBbl(1000010001);
    expect(result.ok && result.bbl).toBe("1000010001");
  });

  it("rejects boroughs outside 1-5", () => {
    expect(parseBbl("9012340056")).toEqual({ ok: false, reason: "invalid_borough" });
    expect(parseBbl("0012340056")).toEqual({ ok: false, reason: "invalid_borough" });
  });

  it("rejects identifiers that are not exactly ten digits", () => {
    expect(parseBbl("301234005")).toEqual({ ok: false, reason: "malformed_bbl" });
    expect(parseBbl("30123400567")).toEqual({ ok: false, reason: "malformed_bbl" });
    expect(parseBbl("30123A0056")).toEqual({ ok: false, reason: "malformed_bbl" });
  });

  it("reports missing identifiers", () => {
    expect(parseBbl(null)).toEqual({ ok: false, reason: "missing_bbl" });
    expect(parseBbl(undefined)).toEqual({ ok: false, reason: "missing_bbl" });
    expect(parseBbl("  ")).toEqual({ ok: false, reason: "missing_bbl" });
  });
});

describe("cleanBbl", () => {
  it("returns an empty string for absent values", () => {
    expect(cleanBbl(null)).toBe("");
    expect(cleanBbl("1-00001-0001")).toBe("1000010001");
  });
});

describe("buildBbl", () => {
  it("pads block and lot", () => {
    expect(buildBbl("3", "1234", "56")).toBe("3012340056");
    expect(buildBbl(1, 1, 1)).toBe("1000010001");
  });

  it("accepts five-character zero-padded lots", () => {
    expect(buildBbl("1", "00016", "00001")).toBe("1000160001");
    expect(buildBbl("2", "1", "01234")).toBe("2000011234");
  });

  it("returns an empty string for unusable parts", () => {
    expect(buildBbl("6", "1", "1")).toBe("");
    expect(buildBbl("2", "123456", "1")).toBe("");
    expect(buildBbl("2", "1", "12345")).toBe("");
    expect(buildBbl("2", "1", "000001")).toBe("");
    expect(buildBbl("2", null, "1")).toBe("");
  });
});
