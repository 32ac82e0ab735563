// compare/psi.ts
// Population stability index over binned or categorical distributions.
//
//   PSI = Σ (a_i − e_i) · ln(a_i / e_i)
//
// with e = baseline proportions, a = dataset proportions. Empty buckets are
// floored at `epsilon` so the log stays finite.

import { minmax } from "../profile/stats.js";

/** PSI between two proportion vectors of equal length. */
export function psi(expected: readonly number[], actual: readonly number[], epsilon: number): number {
  if (expected.length !== actual.length) {
    throw new RangeError(`psi: ${expected.length} expected buckets vs ${actual.length} actual`);
  }
  let total = 0;
  for (let i = 0; i < expected.length; i++) {
    const e = Math.max(expected[i], epsilon);
    const a = Math.max(actual[i], epsilon);
    total += (a - e) * Math.log(a / e);
  }
  return total;
}

function proportions(counts: readonly number[], n: number): number[] {
  return counts.map((c) => (n ? c / n : 0));
}

/**
 * Bucket counts over `bins` equal-width bins spanning [min, max]. Values
 * outside the range fall into the edge bins. A zero-width range has three
 * buckets instead: below, at, above.
 */
export function binCounts(values: readonly number[], min: number, max: number, bins: number): number[] {
  if (max === min) {
    const counts = [0, 0, 0];
    for (const v of values) counts[v < min ? 0 : v > min ? 2 : 1]++;
    return counts;
  }
  const width = (max - min) / bins;
  const counts = new Array<number>(bins).fill(0);
  for (const v of values) {
    const idx = Math.floor((v - min) / width);
    counts[Math.min(bins - 1, Math.max(0, idx))]++;
  }
  return counts;
}

/** PSI for numeric columns with bins fit to the baseline range; null if a side is empty. */
export function numericPsi(
  baseline: readonly number[],
  dataset: readonly number[],
  bins: number,
  epsilon: number
): number | null {
  const range = minmax(baseline);
  if (!range || !dataset.length) return null;
  const e = proportions(binCounts(baseline, range.min, range.max, bins), baseline.length);
  const a = proportions(binCounts(dataset, range.min, range.max, bins), dataset.length);
  return psi(e, a, epsilon);
}

/**
 * PSI for categorical columns over the union of categories (baseline order,
 * then dataset-only categories in dataset order); null if a side is empty.
 */
export function categoricalPsi(
  baseline: ReadonlyMap<string, number>,
  baselineTotal: number,
  dataset: ReadonlyMap<string, number>,
  datasetTotal: number,
  epsilon: number
): number | null {
  if (!baselineTotal || !datasetTotal) return null;
  const keys = [...baseline.keys()];
  for (const k of dataset.keys()) if (!baseline.has(k)) keys.push(k);
  const e = keys.map((k) => (baseline.get(k) ?? 0) / baselineTotal);
  const a = keys.map((k) => (dataset.get(k) ?? 0) / datasetTotal);
  return psi(e, a, epsilon);
}
