import { readFile } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";

import { AnalysisError } from "../errors.js";
import type { SongRow } from "../core/types.js";
import { nonEmpty, parseYear } from "./validation.js";

export type CsvRecord = Record<string, string>;

export interface CsvDataset {
  columns: string[];
  records: CsvRecord[];
}

export const SONG_COLUMNS = ["year", "lyrics"] as const;

/** Parses CSV text with a header row. Cells may span lines when quoted. */
export function parseCsv(text: string): CsvDataset {
  let parsed: unknown;
  try {
    parsed = parse(text, { bom: true, skip_empty_lines: true, relax_column_count: true });
  } catch (e) {
    throw new AnalysisError("SOURCE_UNAVAILABLE", `cannot parse csv: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }

  const rows = Array.isArray(parsed) ? parsed.filter(isStringRow) : [];
  const [header, ...body] = rows;
  if (!header) return { columns: [], records: [] };

  const records = body.map((cells) => {
    const rec: CsvRecord = {};
    header.forEach((col, i) => {
      rec[col] = cells[i] ?? "";
    });
    return rec;
  });
  return { columns: header, records };
}

export async function readCsv(path: string): Promise<CsvDataset> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (e) {
    const detail = isErrno(e) && e.code === "ENOENT" ? `file not found: ${path}` : `cannot read ${path}`;
    throw new AnalysisError("SOURCE_UNAVAILABLE", detail, { cause: e });
  }
  return parseCsv(text);
}

export function requireColumns(dataset: CsvDataset, required: readonly string[]): void {
  const missing = required.filter((c) => !dataset.columns.includes(c));
  if (missing.length) {
    throw new AnalysisError("MISSING_COLUMNS", `missing required columns: ${missing.join(", ")}`, {
      errors: missing.map((c) => ({ path: c, message: "column not found" })),
    });
  }
}

export async function readSongCsv(path: string): Promise<CsvDataset> {
  const dataset = await readCsv(path);
  requireColumns(dataset, SONG_COLUMNS);
  return dataset;
}

export function toSongRow(record: CsvRecord): SongRow {
  return { year: parseYear(record.year), lyrics: nonEmpty(record.lyrics) };
}

export function* songRows(records: Iterable<CsvRecord>): Generator<SongRow> {
  for (const r of records) yield toSongRow(r);
}

/** Songs per parseable year, ascending by year. */
export function yearDistribution(records: Iterable<CsvRecord>): Map<number, number> {
  const counts = new Map<number, number>();
  for (const r of records) {
    const y = parseYear(r.year);
    if (y !== null) counts.set(y, (counts.get(y) ?? 0) + 1);
  }
  return new Map(Array.from(counts).sort((a, b) => a[0] - b[0]));
}

export function formatCsv(dataset: CsvDataset): string {
  return stringify(dataset.records, { header: true, columns: dataset.columns });
}

function isStringRow(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((c) => typeof c === "string");
}

function isErrno(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}
