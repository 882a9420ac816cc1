import { describe, it, expect } from "vitest";
import {
  getComplianceSource,
  hasComplianceSource,
  listComplianceSources,
  listRegisteredSources,
  registerComplianceSource,
  resolveSourceKeys,
} from "../index";
import { createHpdViolationsAdapter, HPD_VIOLATIONS_SOURCE_KEY } from "../../sources";

describe("source registry", () => {
  it("registers the built-in sources on import", () => {
    expect(listRegisteredSources()).toEqual([
      "nyc-hpd-violations",
      "nyc-dob-violations",
      "nyc-311-complaints",
    ]);
    expect(listComplianceSources().map((source) => source.config.datasetId)).toEqual([
      "wvxf-dwi5",
      "3h2n-5cm9",
      "erm2-nwe9",
    ]);
  });

  it("creates each adapter once", () => {
    expect(getComplianceSource("nyc-dob-violations")).toBe(getComplianceSource("nyc-dob-violations"));
  });

  it("replaces the cached adapter when a source is re-registered", () => {
    const before = getComplianceSource(HPD_VIOLATIONS_SOURCE_KEY);
    registerComplianceSource(HPD_VIOLATIONS_SOURCE_KEY, createHpdViolationsAdapter);
    const after = getComplianceSource(HPD_VIOLATIONS_SOURCE_KEY);

    expect(after).not.toBe(before);
    expect(after.key).toBe("nyc-hpd-violations");
  });

  it("checks keys against the registry", () => {
    expect(hasComplianceSource("nyc-311-complaints")).toBe(true);
    expect(hasComplianceSource("nyc-ecb-violations")).toBe(false);
  });
});

describe("resolveSourceKeys", () => {
  it("selects every source when none are requested", () => {
    expect(resolveSourceKeys()).toEqual({
      keys: ["nyc-hpd-violations", "nyc-dob-violations", "nyc-311-complaints"],
      unknown: [],
    });
    expect(resolveSourceKeys([]).keys).toHaveLength(3);
  });

  it("reports unknown keys and drops repeats", () => {
    expect(resolveSourceKeys(["nyc-311-complaints", "bogus", "nyc-311-complaints"])).toEqual({
      keys: ["nyc-311-complaints"],
      unknown: ["bogus"],
    });
  });
});
