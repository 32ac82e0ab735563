// profile/stats.ts
// Numeric helpers for column profiles. All inputs are finite numbers;
// empty inputs return null instead of NaN.

/* ============================== Basics ============================== */

export function sum(a: readonly number[]): number {
  let s = 0;
  for (let i = 0; i < a.length; i++) s += a[i];
  return s;
}

export function mean(a: readonly number[]): number | null {
  return a.length ? sum(a) / a.length : null;
}

/** Population variance (divides by N), Welford's update. */
export function variance(a: readonly number[]): number | null {
  if (!a.length) return null;
  let n = 0, m = 0, M2 = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i];
    n++;
    const delta = x - m;
    m += delta / n;
    M2 += delta * (x - m);
  }
  return M2 / n;
}

export function stdev(a: readonly number[]): number | null {
  const v = variance(a);
  return v === null ? null : Math.sqrt(v);
}

export function minmax(a: readonly number[]): { min: number; max: number } | null {
  if (!a.length) return null;
  let mn = Infinity, mx = -Infinity;
  for (let i = 0; i < a.length; i++) {
    const v = a[i];
    if (v < mn) mn = v;
    if (v > mx) mx = v;
  }
  return { min: mn, max: mx };
}

export function sortAsc(a: readonly number[]): number[] {
  return [...a].sort((x, y) => x - y);
}

/* ============================ Quantiles ============================= */

/** Linear interpolation between order statistics; `sorted` must be ascending. */
export function quantileSorted(sorted: readonly number[], q: number): number | null {
  if (!sorted.length) return null;
  const p = Math.min(1, Math.max(0, q));
  const idx = (sorted.length - 1) * p;
  const lo = Math.floor(idx), hi = Math.ceil(idx);
  if (lo === hi) return sorted[lo];
  const t = idx - lo;
  return sorted[lo] + (sorted[hi] - sorted[lo]) * t;
}

/** Count of values outside [q1 - k·IQR, q3 + k·IQR]. */
export function iqrOutliers(sorted: readonly number[], k: number): number {
  const q1 = quantileSorted(sorted, 0.25);
  const q3 = quantileSorted(sorted, 0.75);
  if (q1 === null || q3 === null) return 0;
  const iqr = q3 - q1;
  if (iqr === 0) return 0;
  const lower = q1 - k * iqr;
  const upper = q3 + k * iqr;
  let n = 0;
  for (const v of sorted) if (v < lower || v > upper) n++;
  return n;
}
