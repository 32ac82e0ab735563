// profile/profiler.ts
// Per-column statistical profiles.
//
// profileColumn() returns both the public profile and a private summary that
// the drift detector needs (sorted numeric values, the full category
// frequency table). Columns whose values can't be read under their type are
// profiled as text instead of failing the run.

import type { ProfileConfig } from "../config/schema.js";
import { errorMessage } from "../errors.js";
import { parseBoolean, parseDatetime, parseNumber, presentValues, type DatetimePrecision } from "../table/values.js";
import type {
  ColumnProfile,
  ColumnType,
  Granularity,
  RawValue,
  TextProfile,
  TopValue,
} from "../types.js";
import { iqrOutliers, mean, quantileSorted, sortAsc, stdev } from "./stats.js";

/* ================================= Types ================================ */

export type NumericSummary = {
  type: "numeric";
  sorted: number[];              // valid values, ascending
  mean: number | null;
  std: number | null;
};

export type DiscreteSummary = {
  type: "categorical" | "boolean";
  frequencies: Map<string, number>;  // insertion order = first appearance
  total: number;                     // valid non-null values
};

export type OpaqueSummary = { type: "datetime" | "text" };

export type ColumnSummary = NumericSummary | DiscreteSummary | OpaqueSummary;

export type ColumnAnalysis = {
  profile: ColumnProfile;
  summary: ColumnSummary;
  /** Set when the column fell back to text. */
  degradedFrom?: { type: ColumnType; reason: string };
};

type Base = {
  name: string;
  rowCount: number;
  nullCount: number;
  nullRate: number | null;
  sampleValues: string[];
};

/* ================================ Helpers =============================== */

function firstDistinct(values: readonly string[], k: number): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  for (const v of values) {
    if (out.length >= k) break;
    if (seen.has(v)) continue;
    seen.add(v);
    out.push(v);
  }
  return out;
}

function frequencies(values: readonly string[]): Map<string, number> {
  const m = new Map<string, number>();
  for (const v of values) m.set(v, (m.get(v) ?? 0) + 1);
  return m;
}

/** Most frequent first; ties keep first-appearance order (sort is stable). */
export function topValues(freq: ReadonlyMap<string, number>, total: number, n: number): TopValue[] {
  return Array.from(freq, ([value, count]) => ({ value, count, share: total ? count / total : 0 }))
    .sort((a, b) => b.count - a.count)
    .slice(0, n);
}

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

const PRECISION_RANK: Record<DatetimePrecision, number> = { day: 0, minute: 1, second: 2, millisecond: 3 };

/**
 * Spacing of the series: the smallest gap between distinct instants, or the
 * finest written precision when every value is the same instant.
 */
export function inferGranularity(sortedEpochs: readonly number[], precision: DatetimePrecision): Granularity {
  let gap = Infinity;
  for (let i = 1; i < sortedEpochs.length; i++) {
    const d = sortedEpochs[i] - sortedEpochs[i - 1];
    if (d > 0 && d < gap) gap = d;
  }
  if (gap === Infinity) return precision;
  if (gap >= 365 * DAY) return "year";
  if (gap >= 28 * DAY) return "month";
  if (gap >= DAY) return "day";
  if (gap >= HOUR) return "hour";
  if (gap >= MINUTE) return "minute";
  if (gap >= SECOND) return "second";
  return "millisecond";
}

/* ============================== Per type ================================ */

function textProfile(base: Base, values: readonly string[], degraded: boolean, invalidCount: number): TextProfile {
  let min: number | null = null, max: number | null = null, total = 0;
  for (const v of values) {
    const len = [...v].length;   // code points
    total += len;
    if (min === null || len < min) min = len;
    if (max === null || len > max) max = len;
  }
  return {
    ...base,
    type: "text",
    distinctCount: new Set(values).size,
    invalidCount,
    degraded,
    minLength: min,
    meanLength: values.length ? total / values.length : null,
    maxLength: max,
  };
}

class Unparsable extends Error {
  constructor(type: ColumnType, public readonly invalid: number) {
    super(`no value parses as ${type}`);
    this.name = "Unparsable";
  }
}

function numeric(base: Base, values: readonly string[], cfg: ProfileConfig): ColumnAnalysis {
  const nums: number[] = [];
  for (const v of values) {
    const n = parseNumber(v);
    if (n !== null) nums.push(n);
  }
  if (values.length > 0 && nums.length === 0) throw new Unparsable("numeric", values.length);

  const sorted = sortAsc(nums);
  const mu = mean(sorted);
  const sd = stdev(sorted);
  const p25 = quantileSorted(sorted, 0.25);
  const p50 = quantileSorted(sorted, 0.5);
  const p75 = quantileSorted(sorted, 0.75);

  return {
    profile: {
      ...base,
      type: "numeric",
      distinctCount: new Set(sorted).size,
      invalidCount: values.length - nums.length,
      degraded: false,
      min: sorted.length ? sorted[0] : null,
      max: sorted.length ? sorted[sorted.length - 1] : null,
      mean: mu,
      std: sd,
      quantiles: p25 !== null && p50 !== null && p75 !== null ? { p25, p50, p75 } : null,
      outlierCount: iqrOutliers(sorted, cfg.outlierIqrMultiplier),
    },
    summary: { type: "numeric", sorted, mean: mu, std: sd },
  };
}

function discrete(
  base: Base,
  type: "categorical" | "boolean",
  values: readonly string[],
  cfg: ProfileConfig
): ColumnAnalysis {
  let canonical: string[];
  if (type === "boolean") {
    canonical = [];
    for (const v of values) {
      const b = parseBoolean(v);
      if (b !== null) canonical.push(String(b));
    }
    if (values.length > 0 && canonical.length === 0) throw new Unparsable("boolean", values.length);
  } else {
    canonical = [...values];
  }

  const freq = frequencies(canonical);
  const common = {
    ...base,
    distinctCount: freq.size,
    invalidCount: values.length - canonical.length,
    degraded: false,
    topValues: topValues(freq, canonical.length, cfg.topN),
  };
  return {
    profile: type === "boolean" ? { ...common, type: "boolean" as const } : { ...common, type: "categorical" as const },
    summary: { type, frequencies: freq, total: canonical.length },
  };
}

function datetime(base: Base, values: readonly string[]): ColumnAnalysis {
  const epochs: number[] = [];
  let precision: DatetimePrecision = "day";
  for (const v of values) {
    const d = parseDatetime(v);
    if (d === null) continue;
    epochs.push(d.epochMs);
    if (PRECISION_RANK[d.precision] > PRECISION_RANK[precision]) precision = d.precision;
  }
  if (values.length > 0 && epochs.length === 0) throw new Unparsable("datetime", values.length);

  const sorted = sortAsc(epochs);
  const distinct = sorted.filter((v, i) => i === 0 || v !== sorted[i - 1]);
  return {
    profile: {
      ...base,
      type: "datetime",
      distinctCount: distinct.length,
      invalidCount: values.length - epochs.length,
      degraded: false,
      min: sorted.length ? new Date(sorted[0]).toISOString() : null,
      max: sorted.length ? new Date(sorted[sorted.length - 1]).toISOString() : null,
      granularity: sorted.length ? inferGranularity(distinct, precision) : null,
    },
    summary: { type: "datetime" },
  };
}

/* ================================= Entry ================================ */

export function profileColumn(
  name: string,
  column: readonly RawValue[],
  type: ColumnType,
  cfg: ProfileConfig
): ColumnAnalysis {
  const values = presentValues(column);
  const rowCount = column.length;
  const nullCount = rowCount - values.length;
  const base: Base = {
    name,
    rowCount,
    nullCount,
    nullRate: rowCount ? nullCount / rowCount : null,
    sampleValues: firstDistinct(values, cfg.sampleSize),
  };

  try {
    switch (type) {
      case "numeric":
        return numeric(base, values, cfg);
      case "boolean":
      case "categorical":
        return discrete(base, type, values, cfg);
      case "datetime":
        return datetime(base, values);
      case "text":
      default:
        return { profile: textProfile(base, values, false, 0), summary: { type: "text" } };
    }
  } catch (err) {
    const invalid = err instanceof Unparsable ? err.invalid : 0;
    return {
      profile: textProfile(base, values, true, invalid),
      summary: { type: "text" },
      degradedFrom: { type, reason: errorMessage(err) },
    };
  }
}
