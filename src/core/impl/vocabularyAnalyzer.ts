import { AnalysisError, toProblem, type ErrorCode } from "../../errors.js";
import defaultLogger, { type Logger } from "../../logger.js";
import type { YearAggregator } from "../aggregator.js";
import type { FrequencySeries, KeywordStats, RankingEmitter, VocabularyStats, YearlyRankings } from "../ranker.js";
import type { Segmenter, Tokenizer, VocabularyFilter } from "../tokenizer.js";
import type { Result, SongRow, Word, Year } from "../types.js";
import { IntlWordSegmenter } from "./intlSegmenter.js";
import { KeywordFrequencyAggregator } from "./keywordFrequencyAggregator.js";
import { MixedScriptTokenizer } from "./mixedScriptTokenizer.js";
import { FrequencyRankingEmitter } from "./rankingEmitter.js";
import { keywordStats, vocabularyStats } from "./statistics.js";
import { WordShapeFilter } from "./vocabularyFilter.js";
import { YearFrequencyAggregator } from "./yearFrequencyAggregator.js";

export const DEFAULT_PROGRESS_INTERVAL = 10_000;

export type AnalysisMode = "vocabulary" | "keywords";

export interface AnalyzerDeps {
  tokenizer: Tokenizer;
  filter: VocabularyFilter;
  emitter?: RankingEmitter;
  logger?: Logger;
  /** rows between progress notifications */
  progressInterval?: number;
  onProgress?: (rowsSeen: number) => void;
}

export type RowOutcome =
  | { status: "skipped" }
  | { status: "empty" }
  | { status: "counted"; words: number; counted: number };

export interface RowError {
  index: number;
  code: ErrorCode;
  message: string;
}

export type RowResult = Result<RowOutcome, RowError>;

export type AnalysisStatistics = ({ mode: "vocabulary" } & VocabularyStats) | ({ mode: "keywords" } & KeywordStats);

/**
 * Owns the aggregation state of one analysis. Rows are processed strictly
 * in order; a failing row is logged and skipped, never fatal to the batch.
 */
export class VocabularyAnalyzer {
  private readonly vocabulary = new YearFrequencyAggregator();
  private keywordAggregator: KeywordFrequencyAggregator | undefined;
  private readonly emitter: RankingEmitter;
  private readonly logger: Logger;
  private readonly progressInterval: number;
  private mode: AnalysisMode = "vocabulary";
  private songsProcessed = 0;
  private errors: RowError[] = [];

  constructor(private readonly deps: AnalyzerDeps) {
    this.emitter = deps.emitter ?? new FrequencyRankingEmitter();
    this.logger = deps.logger ?? defaultLogger;
    this.progressInterval = deps.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;
  }

  extractVocabulary(text: string | null | undefined): Word[] {
    return this.deps.filter.filter(this.deps.tokenizer.tokenize(text));
  }

  /**
   * Full-vocabulary mode without keywords, fixed-keyword mode with them.
   * Passing a different keyword list than the previous call starts over.
   * Returns false when the row source itself fails; the state is reset then.
   */
  analyze(rows: Iterable<SongRow>, keywords?: readonly string[]): boolean {
    const aggregator: YearAggregator<unknown> = keywords ? this.keywordMode(keywords) : this.vocabularyMode();
    let seen = 0;

    try {
      for (const row of rows) {
        const result = this.processRow(row, seen, aggregator);
        if (!result.ok) {
          this.errors.push(result.error);
          this.logger.warn({ row: result.error.index, code: result.error.code }, `error processing song ${result.error.index}: ${result.error.message}`);
        } else if (result.value.status === "counted") {
          this.songsProcessed++;
        }

        seen++;
        if (seen % this.progressInterval === 0) {
          this.logger.info({ rows: seen }, `processed ${seen} songs...`);
          this.deps.onProgress?.(seen);
        }
      }
    } catch (e) {
      this.logger.error({ problem: toProblem(e) }, "analysis aborted");
      this.reset();
      return false;
    }

    this.logger.info(
      { mode: this.mode, rows: seen, songsProcessed: this.songsProcessed, total: aggregator.total(), rowErrors: this.errors.length },
      "analysis complete",
    );
    return true;
  }

  processRow(row: SongRow, index: number, aggregator: YearAggregator<unknown>): RowResult {
    const year = validYear(row.year);
    if (year === null || !row.lyrics) return { ok: true, value: { status: "skipped" } };

    try {
      const words = this.extractVocabulary(row.lyrics);
      if (words.length === 0) return { ok: true, value: { status: "empty" } };
      const counted = aggregator.add(year, words);
      return { ok: true, value: { status: "counted", words: words.length, counted } };
    } catch (e) {
      const code: ErrorCode = e instanceof AnalysisError ? e.code : "ROW_FAILED";
      return { ok: false, error: { index, code, message: e instanceof Error ? e.message : String(e) } };
    }
  }

  generateRankings(topN: number): YearlyRankings {
    return this.emitter.rankings(this.vocabulary.table(), topN);
  }

  generateFrequencySeries(): FrequencySeries {
    return this.keywordAggregator ? this.emitter.series(this.keywordAggregator.table()) : new Map();
  }

  getVocabularyStats(): VocabularyStats {
    return vocabularyStats(this.vocabulary.table(), this.songsProcessed);
  }

  getKeywordStats(): KeywordStats {
    return keywordStats(this.generateFrequencySeries(), {
      keywords: this.keywordAggregator?.keywords.length ?? 0,
      matches: this.totalMatches,
      songsProcessed: this.songsProcessed,
    });
  }

  getStatistics(): AnalysisStatistics {
    return this.mode === "keywords"
      ? { mode: "keywords", ...this.getKeywordStats() }
      : { mode: "vocabulary", ...this.getVocabularyStats() };
  }

  get analysisMode(): AnalysisMode {
    return this.mode;
  }

  get processed(): number {
    return this.songsProcessed;
  }

  get totalOccurrences(): number {
    return this.vocabulary.total();
  }

  get totalMatches(): number {
    return this.keywordAggregator?.total() ?? 0;
  }

  get keywords(): readonly string[] {
    return this.keywordAggregator?.keywords ?? [];
  }

  get rowErrors(): readonly RowError[] {
    return this.errors;
  }

  reset(): void {
    this.vocabulary.reset();
    this.keywordAggregator?.reset();
    this.songsProcessed = 0;
    this.errors = [];
  }

  private vocabularyMode(): YearFrequencyAggregator {
    if (this.mode !== "vocabulary") {
      this.reset();
      this.keywordAggregator = undefined;
      this.mode = "vocabulary";
    }
    return this.vocabulary;
  }

  private keywordMode(keywords: readonly string[]): KeywordFrequencyAggregator {
    const current = this.keywordAggregator;
    if (this.mode === "keywords" && current && sameList(current.keywords, keywords)) return current;

    this.reset();
    this.mode = "keywords";
    this.keywordAggregator = new KeywordFrequencyAggregator(keywords);
    return this.keywordAggregator;
  }
}

export interface CreateAnalyzerOptions {
  segmenter?: Segmenter;
  locale?: string;
  logger?: Logger;
  progressInterval?: number;
  onProgress?: (rowsSeen: number) => void;
}

export function createVocabularyAnalyzer(opts: CreateAnalyzerOptions = {}): VocabularyAnalyzer {
  const segmenter = opts.segmenter ?? new IntlWordSegmenter(opts.locale);
  return new VocabularyAnalyzer({
    tokenizer: new MixedScriptTokenizer(segmenter),
    filter: new WordShapeFilter(),
    logger: opts.logger,
    progressInterval: opts.progressInterval,
    onProgress: opts.onProgress,
  });
}

/** Year 0 counts as absent, like a missing year. */
function validYear(year: Year | null): Year | null {
  return typeof year === "number" && Number.isInteger(year) && year !== 0 ? year : null;
}

function sameList(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}
