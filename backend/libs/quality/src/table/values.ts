// table/values.ts
// Raw cell constructors and locale-invariant literal parsers.

import type { MissingValue, RawValue, TextValue } from "../types.js";

export const MISSING: MissingValue = Object.freeze({ kind: "missing" });

export function text(value: string): TextValue {
  return { kind: "text", value };
}

export function isMissing(v: RawValue): v is MissingValue {
  return v.kind === "missing";
}

/** Non-missing cell text in column order. */
export function presentValues(column: readonly RawValue[]): string[] {
  const out: string[] = [];
  for (const v of column) if (v.kind === "text") out.push(v.value);
  return out;
}

/** Classify one input cell; `null`/`undefined` and configured markers are missing. */
export function toRawValue(cell: string | null | undefined, markers: ReadonlySet<string>): RawValue {
  if (cell === null || cell === undefined) return MISSING;
  if (markers.has(cell.trim())) return MISSING;
  return text(cell);
}

/* ─────────────────────────────── Numbers ─────────────────────────────── */

const NUMBER_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function parseNumber(s: string): number | null {
  const t = s.trim();
  if (!NUMBER_RE.test(t)) return null;
  const n = Number(t);
  return Number.isFinite(n) ? n : null;
}

/* ─────────────────────────────── Booleans ────────────────────────────── */

export function parseBoolean(s: string): boolean | null {
  const t = s.trim().toLowerCase();
  if (t === "true") return true;
  if (t === "false") return false;
  return null;
}

/* ─────────────────────────────── Datetimes ───────────────────────────── */

export type DatetimePrecision = "day" | "minute" | "second" | "millisecond";

export type ParsedDatetime = {
  epochMs: number;
  precision: DatetimePrecision;   // finest component present in the literal
};

const ISO_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}:?\d{2})?)?$/;
const YMD_SLASH_RE = /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/;
const MDY_SLASH_RE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

function daysInMonth(y: number, m: number): number {
  if (m === 2) return (y % 4 === 0 && y % 100 !== 0) || y % 400 === 0 ? 29 : 28;
  return [4, 6, 9, 11].includes(m) ? 30 : 31;
}

function utc(y: number, mo: number, d: number, h = 0, mi = 0, s = 0, ms = 0): number {
  // Date.UTC maps years 0..99 onto 1900..1999
  const dt = new Date(Date.UTC(2000, mo - 1, d, h, mi, s, ms));
  dt.setUTCFullYear(y);
  return dt.getTime();
}

function validDate(y: number, mo: number, d: number): boolean {
  return mo >= 1 && mo <= 12 && d >= 1 && d <= daysInMonth(y, mo);
}

function offsetMinutes(zone: string | undefined): number | null {
  if (!zone || zone === "Z") return 0;
  const m = /^([+-])(\d{2}):?(\d{2})$/.exec(zone);
  if (!m) return null;
  const hh = Number(m[2]);
  const mm = Number(m[3]);
  if (hh > 23 || mm > 59) return null;
  return (m[1] === "-" ? -1 : 1) * (hh * 60 + mm);
}

export function parseDatetime(s: string): ParsedDatetime | null {
  const t = s.trim();

  const iso = ISO_RE.exec(t);
  if (iso) {
    const [y, mo, d] = [Number(iso[1]), Number(iso[2]), Number(iso[3])];
    if (!validDate(y, mo, d)) return null;
    if (iso[4] === undefined) return { epochMs: utc(y, mo, d), precision: "day" };

    const h = Number(iso[4]);
    const mi = Number(iso[5]);
    const sec = iso[6] === undefined ? 0 : Number(iso[6]);
    const frac = iso[7];
    const ms = frac === undefined ? 0 : Number(frac.slice(0, 3).padEnd(3, "0"));
    if (h > 23 || mi > 59 || sec > 59) return null;
    const off = offsetMinutes(iso[8]);
    if (off === null) return null;

    const precision: DatetimePrecision =
      frac !== undefined ? "millisecond" : iso[6] !== undefined ? "second" : "minute";
    return { epochMs: utc(y, mo, d, h, mi, sec, ms) - off * 60_000, precision };
  }

  const ymd = YMD_SLASH_RE.exec(t);
  if (ymd) {
    const [y, mo, d] = [Number(ymd[1]), Number(ymd[2]), Number(ymd[3])];
    return validDate(y, mo, d) ? { epochMs: utc(y, mo, d), precision: "day" } : null;
  }

  const mdy = MDY_SLASH_RE.exec(t);
  if (mdy) {
    const [mo, d, y] = [Number(mdy[1]), Number(mdy[2]), Number(mdy[3])];
    return validDate(y, mo, d) ? { epochMs: utc(y, mo, d), precision: "day" } : null;
  }

  return null;
}
