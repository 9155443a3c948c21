import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { AnalysisError } from "../errors.js";
import type { Result } from "../core/types.js";
import type { VocabularyAnalyzer } from "../core/impl/vocabularyAnalyzer.js";

export interface VocabularyReport {
  analysis_info: {
    total_songs_processed: number;
    total_vocabulary_count: number;
    years_analyzed: number;
    analysis_date: string;
    top_words_per_year: number;
  };
  yearly_rankings: Record<string, Array<{ word: string; frequency: number }>>;
  statistics: {
    total_unique_words: number;
    total_unique_years: number;
    words_with_data: number;
    year_range: { start: number | null; end: number | null };
  };
}

export interface KeywordReport {
  analysis_info: {
    total_songs_processed: number;
    total_keyword_matches: number;
    keywords_analyzed: string[];
    analysis_date: string;
    years_covered: number;
  };
  keyword_frequencies: Record<string, Array<[number, number]>>;
  statistics: {
    total_unique_years: number;
    keywords_with_data: number;
  };
}

export function buildVocabularyReport(analyzer: VocabularyAnalyzer, topN: number, now: Date = new Date()): VocabularyReport {
  const stats = analyzer.getVocabularyStats();
  const yearly_rankings: VocabularyReport["yearly_rankings"] = {};
  for (const [year, words] of analyzer.generateRankings(topN)) {
    yearly_rankings[String(year)] = words.map((w) => ({ word: w.word, frequency: w.count }));
  }

  return {
    analysis_info: {
      total_songs_processed: analyzer.processed,
      total_vocabulary_count: analyzer.totalOccurrences,
      years_analyzed: stats.totalYears,
      analysis_date: now.toISOString(),
      top_words_per_year: topN,
    },
    yearly_rankings,
    statistics: {
      total_unique_words: stats.totalUniqueWords,
      total_unique_years: stats.totalYears,
      words_with_data: stats.wordsWithData,
      year_range: { start: stats.yearRange?.start ?? null, end: stats.yearRange?.end ?? null },
    },
  };
}

export function buildKeywordReport(analyzer: VocabularyAnalyzer, now: Date = new Date()): KeywordReport {
  const stats = analyzer.getKeywordStats();
  const keyword_frequencies: KeywordReport["keyword_frequencies"] = {};
  for (const [keyword, points] of analyzer.generateFrequencySeries()) {
    keyword_frequencies[keyword] = points.map((p): [number, number] => [p.year, p.count]);
  }

  return {
    analysis_info: {
      total_songs_processed: analyzer.processed,
      total_keyword_matches: analyzer.totalMatches,
      keywords_analyzed: [...analyzer.keywords],
      analysis_date: now.toISOString(),
      years_covered: stats.totalYears,
    },
    keyword_frequencies,
    statistics: {
      total_unique_years: stats.totalYears,
      keywords_with_data: stats.keywordsWithData,
    },
  };
}

/** Pretty-printed JSON; non-ASCII text is written as-is. */
export function serializeReport(report: VocabularyReport | KeywordReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

export async function writeText(file: string, text: string): Promise<Result<string, AnalysisError>> {
  try {
    await mkdir(path.dirname(path.resolve(file)), { recursive: true });
    await writeFile(file, text, "utf8");
    return { ok: true, value: file };
  } catch (e) {
    return { ok: false, error: new AnalysisError("SERIALIZATION_FAILED", `cannot write ${file}`, { cause: e }) };
  }
}

export function writeReport(file: string, report: VocabularyReport | KeywordReport): Promise<Result<string, AnalysisError>> {
  return writeText(file, serializeReport(report));
}
