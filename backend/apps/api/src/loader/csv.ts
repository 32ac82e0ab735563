// loader/csv.ts
// CSV text -> Table. The first record is the header; every cell stays raw text
// until the core decides what it is.

import Papa from "papaparse";

import {
  QualityError,
  defaultConfig,
  isMissing,
  tableFromRows,
  type Table,
} from "../../../../libs/quality/src/index.js";

export class CsvParseError extends QualityError {
  readonly table: string;
  constructor(table: string, message: string) {
    super("invalid-csv", `${table}: ${message}`);
    this.name = "CsvParseError";
    this.table = table;
  }
}

export type CsvOptions = {
  label?: string;                       // "dataset" | "baseline", used in messages
  missingMarkers?: readonly string[];
};

/**
 * Blank header names become `Unnamed: i`; repeats get `.1`, `.2`, ... suffixes,
 * skipping any suffix already taken.
 */
export function normalizeHeader(raw: readonly string[]): string[] {
  const seen = new Set<string>();
  const counts = new Map<string, number>();
  return raw.map((cell, i) => {
    const base = cell.trim() === "" ? `Unnamed: ${i}` : cell;
    let name = base;
    let n = counts.get(base) ?? 0;
    while (seen.has(name)) {
      n += 1;
      name = `${base}.${n}`;
    }
    counts.set(base, n);
    seen.add(name);
    return name;
  });
}

export function parseCsv(input: string, opts: CsvOptions = {}): Table {
  const label = opts.label ?? "dataset";
  const markers = opts.missingMarkers ?? defaultConfig.inference.missingMarkers;

  const result = Papa.parse<string[]>(input.replace(/^\uFEFF/, ""), { skipEmptyLines: true });
  // A single-column file has no delimiter to detect; that is not an error.
  const fatal = result.errors.find((e) => e.code !== "UndetectableDelimiter");
  if (fatal) {
    const where = typeof fatal.row === "number" ? ` (row ${fatal.row + 1})` : "";
    throw new CsvParseError(label, `${fatal.message}${where}`);
  }

  const [header, ...rows] = result.data;
  if (!header) throw new CsvParseError(label, "no header row");
  return tableFromRows(normalizeHeader(header), rows, markers, label);
}

export type SampleRow = Record<string, string | null>;

/** First `limit` rows as records keyed by column name; missing cells are null. */
export function sampleRows(table: Table, limit = 20): SampleRow[] {
  const out: SampleRow[] = [];
  const n = Math.min(limit, table.rowCount);
  for (let r = 0; r < n; r++) {
    out.push(
      Object.fromEntries(
        table.names.map((name, c) => {
          const cell = table.columns[c][r];
          return [name, isMissing(cell) ? null : cell.value];
        })
      )
    );
  }
  return out;
}
