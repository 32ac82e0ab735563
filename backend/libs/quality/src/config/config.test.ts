import { describe, it, expect } from "vitest";
import { ConfigError } from "../errors.js";
import { createConfig, defaults, loadConfig, overridesFromEnv } from "./index.js";

describe("createConfig", () => {
  it("matches the defaults without overrides and is deeply frozen", () => {
    const cfg = createConfig();
    expect(cfg).toEqual(defaults);
    expect(Object.isFrozen(cfg.drift.psi)).toBe(true);
    expect(Object.isFrozen(cfg.inference.missingMarkers)).toBe(true);
  });

  it("merges nested overrides onto defaults", () => {
    const cfg = createConfig({ profile: { topN: 3 }, drift: { psi: { bins: 20 } } });
    expect(cfg.profile).toEqual({ topN: 3, sampleSize: 5, outlierIqrMultiplier: 1.5 });
    expect(cfg.drift.psi).toEqual({ bins: 20, critical: 0.25, warning: 0.1, epsilon: 1e-4 });
  });

  it("rejects inconsistent thresholds with a path", () => {
    expect(() => createConfig({ drift: { meanShift: { critical: 0.5 } } })).toThrow(
      "drift.meanShift.critical: must be >= warning"
    );
    expect(() => createConfig({ profile: { topN: 0 } })).toThrow(ConfigError);
  });
});

describe("loadConfig", () => {
  it("reads QUALITY_* variables", () => {
    const cfg = loadConfig({
      QUALITY_TOP_N: "4",
      QUALITY_MISSING_MARKERS: "|NA",
      QUALITY_NEW_CATEGORY_SEVERITY: "Critical",
      QUALITY_CONCURRENCY: "2",
    });
    expect(cfg.profile.topN).toBe(4);
    expect(cfg.inference.missingMarkers).toEqual(["", "NA"]);
    expect(cfg.drift.category.newSeverity).toBe("critical");
    expect(cfg.runtime.concurrency).toBe(2);
  });

  it("leaves unset variables at their defaults", () => {
    expect(loadConfig({})).toEqual(defaults);
    expect(overridesFromEnv({ QUALITY_TOP_N: " " }).profile?.topN).toBeUndefined();
  });

  it("names the variable that failed", () => {
    expect(() => loadConfig({ QUALITY_PSI_BINS: "abc" })).toThrow('QUALITY_PSI_BINS: expected a number, got "abc"');
    expect(() => loadConfig({ QUALITY_MISSING_CATEGORY_SEVERITY: "loud" })).toThrow(ConfigError);
  });
});
