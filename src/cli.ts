import { parseArgs } from "node:util";

import { AnalysisError, pushErr, toProblem, type FieldError } from "./errors.js";
import type { Logger } from "./logger.js";
import { DEFAULT_KEYWORDS, DEFAULT_SUMMARY_TOP_N, DEFAULT_TOP_N, type Config } from "./config.js";
import { createVocabularyAnalyzer } from "./core/impl/vocabularyAnalyzer.js";
import { formatCsv, readCsv, readSongCsv, songRows, yearDistribution, type CsvDataset } from "./io/csvSource.js";
import { buildKeywordReport, buildVocabularyReport, writeReport, writeText } from "./io/resultWriter.js";
import { formatKeywordSummary, formatVocabularySummary } from "./io/report.js";
import { filterDataset, RAP_DETECTIONS, resolveYearBounds, type RapDetection, type SongFilterOptions } from "./io/songFilter.js";
import { parseIntCell } from "./io/validation.js";

export const DEFAULT_SONGS_CSV = "chinese_raphiphop.csv";
export const DEFAULT_VOCABULARY_JSON = "rap_vocabulary_analysis.json";
export const DEFAULT_KEYWORDS_JSON = "rap_keyword_freq.json";
export const DEFAULT_FILTER_INPUT = "dataset/song_lyrics.csv";
export const DEFAULT_FILTER_OUTPUT = "filtered_songs.csv";

export const USAGE = `usage: lyrics-vocab <command> [options]

commands:
  vocab      rank the vocabulary of every year
             --input <csv> --output <json> --top <n> --summary-top <n>
  keywords   count fixed keywords per year
             --input <csv> --output <json> --keywords <k1,k2> [keyword ...]
  extract    print the vocabulary of the given text as JSON
  filter     select songs into a new csv
             --input <csv> --output <csv> --language <code> --year-start <y> --year-end <y>
             --min-lyrics <n> --keyword <text> --artist <text> --rap <tag|lyrics|comprehensive>`;

const OPTIONS = {
  input: { type: "string", short: "i" },
  output: { type: "string", short: "o" },
  top: { type: "string" },
  "summary-top": { type: "string" },
  keywords: { type: "string", short: "k", multiple: true },
  language: { type: "string" },
  "year-start": { type: "string" },
  "year-end": { type: "string" },
  "min-lyrics": { type: "string" },
  keyword: { type: "string" },
  artist: { type: "string" },
  rap: { type: "string" },
  help: { type: "boolean", short: "h" },
} as const;

export interface CliContext {
  config: Config;
  logger: Logger;
  /** receives report text meant for stdout */
  out: (text: string) => void;
  now?: () => Date;
}

type Values = ReturnType<typeof parse>["values"];

function parse(argv: string[]) {
  return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
}

export async function runCli(argv: string[], ctx: CliContext): Promise<number> {
  try {
    let parsed: ReturnType<typeof parse>;
    try {
      parsed = parse(argv);
    } catch (e) {
      throw new AnalysisError("INVALID_ARGUMENT", e instanceof Error ? e.message : String(e), { cause: e });
    }
    const [command, ...rest] = parsed.positionals;
    const { values } = parsed;

    if (values.help || !command) {
      ctx.out(USAGE);
      return values.help ? 0 : 1;
    }

    switch (command) {
      case "vocab":
        return await runVocabulary(values, ctx);
      case "keywords":
        return await runKeywords(values, rest, ctx);
      case "extract":
        return runExtract(rest, ctx);
      case "filter":
        return await runFilter(values, ctx);
      default:
        throw new AnalysisError("INVALID_ARGUMENT", `unknown command: ${command}`);
    }
  } catch (e) {
    const p = toProblem(e);
    ctx.logger.error({ problem: p }, p.detail ?? p.title);
    return 1;
  }
}

async function runVocabulary(values: Values, ctx: CliContext): Promise<number> {
  const errors: FieldError[] = [];
  const topN = positiveInt(values.top, "--top", DEFAULT_TOP_N, errors);
  const summaryTop = positiveInt(values["summary-top"], "--summary-top", DEFAULT_SUMMARY_TOP_N, errors);
  assertValid(errors);

  const input = values.input ?? DEFAULT_SONGS_CSV;
  const output = values.output ?? DEFAULT_VOCABULARY_JSON;

  const dataset = await loadSongs(input, ctx.logger);
  const analyzer = createAnalyzer(ctx);
  if (!analyzer.analyze(songRows(dataset.records))) return 1;

  const written = await writeReport(output, buildVocabularyReport(analyzer, topN, now(ctx)));
  if (!written.ok) throw written.error;
  ctx.logger.info({ output }, `results saved to: ${output}`);

  ctx.out(formatVocabularySummary(analyzer, summaryTop));
  return 0;
}

async function runKeywords(values: Values, positionals: string[], ctx: CliContext): Promise<number> {
  const keywords = splitKeywords([...(values.keywords ?? []), ...positionals]);
  const list = keywords.length ? keywords : DEFAULT_KEYWORDS;
  const input = values.input ?? DEFAULT_SONGS_CSV;
  const output = values.output ?? DEFAULT_KEYWORDS_JSON;

  const dataset = await loadSongs(input, ctx.logger);
  ctx.logger.info({ keywords: list }, `keywords to analyze: ${list.join(", ")}`);
  const analyzer = createAnalyzer(ctx);
  if (!analyzer.analyze(songRows(dataset.records), list)) return 1;

  const written = await writeReport(output, buildKeywordReport(analyzer, now(ctx)));
  if (!written.ok) throw written.error;
  ctx.logger.info({ output }, `results saved to: ${output}`);

  ctx.out(formatKeywordSummary(analyzer));
  return 0;
}

function runExtract(words: string[], ctx: CliContext): number {
  const analyzer = createAnalyzer(ctx);
  ctx.out(JSON.stringify(analyzer.extractVocabulary(words.join(" "))));
  return 0;
}

async function runFilter(values: Values, ctx: CliContext): Promise<number> {
  const errors: FieldError[] = [];
  const start = optionalInt(values["year-start"], "--year-start", errors);
  const end = optionalInt(values["year-end"], "--year-end", errors);
  const minLyricsLength = optionalInt(values["min-lyrics"], "--min-lyrics", errors);

  let rap: RapDetection | undefined;
  if (values.rap !== undefined) {
    rap = RAP_DETECTIONS.find((m) => m === values.rap);
    if (!rap) pushErr(errors, "--rap", `must be one of: ${RAP_DETECTIONS.join(", ")}`);
  }
  assertValid(errors);

  const opts: SongFilterOptions = {
    language: values.language,
    rap,
    years: resolveYearBounds(start, end, now(ctx)),
    minLyricsLength,
    lyricsKeyword: values.keyword,
    artist: values.artist,
  };

  const input = values.input ?? DEFAULT_FILTER_INPUT;
  const output = values.output ?? DEFAULT_FILTER_OUTPUT;

  const dataset = await readCsv(input);
  ctx.logger.info({ rows: dataset.records.length, columns: dataset.columns }, `read ${dataset.records.length} rows from ${input}`);
  const filtered: CsvDataset = filterDataset(dataset, opts, ctx.logger);

  const written = await writeText(output, formatCsv(filtered));
  if (!written.ok) throw written.error;
  ctx.logger.info({ output, rows: filtered.records.length }, `filtered songs saved to: ${output}`);
  ctx.out(`${filtered.records.length} songs written to ${output}`);
  return 0;
}

async function loadSongs(input: string, logger: Logger): Promise<CsvDataset> {
  logger.info({ input }, `reading csv file: ${input}`);
  const dataset = await readSongCsv(input);
  logger.info({ songs: dataset.records.length }, `total songs in dataset: ${dataset.records.length}`);
  const head = Array.from(yearDistribution(dataset.records)).slice(0, 10);
  logger.info({ years: Object.fromEntries(head) }, "year distribution");
  return dataset;
}

function createAnalyzer(ctx: CliContext) {
  return createVocabularyAnalyzer({
    locale: ctx.config.segmenterLocale,
    logger: ctx.logger,
    progressInterval: ctx.config.progressInterval,
  });
}

function now(ctx: CliContext): Date {
  return ctx.now ? ctx.now() : new Date();
}

export function splitKeywords(raw: readonly string[]): string[] {
  return raw
    .flatMap((k) => k.split(","))
    .map((k) => k.trim())
    .filter((k) => k.length > 0);
}

function positiveInt(raw: string | undefined, path: string, fallback: number, errors: FieldError[]): number {
  if (raw === undefined) return fallback;
  const n = parseIntCell(raw);
  if (n === undefined || n < 1) {
    pushErr(errors, path, "must be a positive integer");
    return fallback;
  }
  return n;
}

function optionalInt(raw: string | undefined, path: string, errors: FieldError[]): number | undefined {
  if (raw === undefined) return undefined;
  const n = parseIntCell(raw);
  if (n === undefined) pushErr(errors, path, "must be an integer");
  return n;
}

function assertValid(errors: FieldError[]): void {
  if (errors.length) throw new AnalysisError("INVALID_ARGUMENT", "invalid arguments", { errors });
}
