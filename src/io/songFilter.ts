import { AnalysisError } from "../errors.js";
import defaultLogger, { type Logger } from "../logger.js";
import { codePointLength } from "../core/impl/scriptClassifier.js";
import type { CsvDataset, CsvRecord } from "./csvSource.js";
import { requireColumns } from "./csvSource.js";
import { parseYear } from "./validation.js";

export type RapDetection = "tag" | "lyrics" | "comprehensive";

export const RAP_DETECTIONS: readonly RapDetection[] = ["tag", "lyrics", "comprehensive"];

export const RAP_TAG_PATTERN = /(rap|hip.?hop|hiphop|嘻哈|说唱|饶舌)/i;

export const RAP_LYRIC_KEYWORDS = [
  "rap",
  "hip hop",
  "hiphop",
  "嘻哈",
  "说唱",
  "饶舌",
  "freestyle",
  "beat",
  "rhyme",
  "flow",
  "mic",
  "mc",
  "dj",
  "battle",
];

export const EARLIEST_YEAR = 1900;

export interface YearBounds {
  start: number;
  end: number;
}

export interface SongFilterOptions {
  language?: string;
  rap?: RapDetection;
  years?: YearBounds;
  minLyricsLength?: number;
  /** case-insensitive substring of the lyrics */
  lyricsKeyword?: string;
  /** case-insensitive substring of the artist */
  artist?: string;
}

/** Fills an open bound: no start means 1900, no end means the current year. */
export function resolveYearBounds(start: number | undefined, end: number | undefined, now: Date = new Date()): YearBounds | undefined {
  if (start === undefined && end === undefined) return undefined;
  return { start: start ?? EARLIEST_YEAR, end: end ?? now.getFullYear() };
}

export function matchesRapTag(record: CsvRecord): boolean {
  return RAP_TAG_PATTERN.test(record.tag ?? "");
}

export function matchesRapLyrics(record: CsvRecord): boolean {
  const lyrics = (record.lyrics ?? "").toLowerCase();
  return RAP_LYRIC_KEYWORDS.some((k) => lyrics.includes(k));
}

/** Tag matches come first, then lyric matches not already picked. */
export function detectRap(records: readonly CsvRecord[], method: RapDetection): CsvRecord[] {
  switch (method) {
    case "tag":
      return records.filter(matchesRapTag);
    case "lyrics":
      return records.filter(matchesRapLyrics);
    case "comprehensive": {
      const byTag = records.filter(matchesRapTag);
      const picked = new Set(byTag);
      return [...byTag, ...records.filter((r) => !picked.has(r) && matchesRapLyrics(r))];
    }
  }
}

function containsIgnoreCase(haystack: string | undefined, needle: string): boolean {
  return (haystack ?? "").toLowerCase().includes(needle.toLowerCase());
}

/**
 * Applies the filters in a fixed order: language, rap detection, years,
 * lyrics length, lyrics keyword, artist. Language and tag-based detection
 * need their columns; the other filters are skipped when theirs is absent.
 */
export function filterSongs(dataset: CsvDataset, opts: SongFilterOptions, logger: Logger = defaultLogger): CsvRecord[] {
  const has = (col: string): boolean => dataset.columns.includes(col);
  let out = dataset.records;

  const step = (name: string, col: string, fn: (rows: CsvRecord[]) => CsvRecord[]): void => {
    if (!has(col)) {
      logger.warn({ filter: name, column: col }, `column "${col}" not found, ${name} filter skipped`);
      return;
    }
    out = fn(out);
    logger.info({ filter: name, rows: out.length }, `after ${name} filter: ${out.length} rows`);
  };

  const { language, rap, years, minLyricsLength, lyricsKeyword, artist } = opts;

  if (language) {
    requireColumns(dataset, ["language"]);
    step("language", "language", (rows) => rows.filter((r) => r.language === language));
  }
  if (rap) {
    requireColumns(dataset, rap === "lyrics" ? ["lyrics"] : ["tag", "lyrics"]);
    step("rap", "lyrics", (rows) => detectRap(rows, rap));
  }
  if (years) {
    step("year", "year", (rows) =>
      rows.filter((r) => {
        const y = parseYear(r.year);
        return y !== null && y >= years.start && y <= years.end;
      }),
    );
  }
  if (minLyricsLength) {
    step("lyrics length", "lyrics", (rows) => rows.filter((r) => codePointLength(r.lyrics ?? "") >= minLyricsLength));
  }
  if (lyricsKeyword) {
    step("keyword", "lyrics", (rows) => rows.filter((r) => containsIgnoreCase(r.lyrics, lyricsKeyword)));
  }
  if (artist) {
    step("artist", "artist", (rows) => rows.filter((r) => containsIgnoreCase(r.artist, artist)));
  }

  return out;
}

/** Like filterSongs, but an empty result is an error. */
export function filterDataset(dataset: CsvDataset, opts: SongFilterOptions, logger: Logger = defaultLogger): CsvDataset {
  const records = filterSongs(dataset, opts, logger);
  if (records.length === 0) {
    throw new AnalysisError("INVALID_ARGUMENT", "no songs match the filter criteria");
  }
  return { columns: dataset.columns, records };
}
