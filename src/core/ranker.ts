import type { KeywordFrequencyTable, WordCount, Year, YearCount, YearFrequencyTable } from "./types.js";

export type YearlyRankings = Map<Year, WordCount[]>;
export type FrequencySeries = Map<string, YearCount[]>;

export interface YearRange {
  start: Year;
  end: Year;
}

export interface VocabularyStats {
  totalYears: number;
  /** distinct words summed per year */
  totalUniqueWords: number;
  /** distinct words across all years */
  wordsWithData: number;
  totalWordOccurrences: number;
  songsProcessed: number;
  yearRange?: YearRange;
}

export interface KeywordDetail {
  totalFrequency: number;
  yearsActive: number;
  averagePerYear: number;
  yearRange: YearRange;
}

export interface KeywordStats {
  totalYears: number;
  totalKeywords: number;
  keywordsWithData: number;
  totalMatches: number;
  songsProcessed: number;
  keywordDetails: Map<string, KeywordDetail>;
}

/**
 * Converts aggregated tables into ordered outputs.
 *
 * Years are always emitted ascending. Equal counts within a year keep
 * the order in which the words were first counted.
 */
export interface RankingEmitter {
  rankings(table: YearFrequencyTable, topN: number): YearlyRankings;
  series(table: KeywordFrequencyTable): FrequencySeries;
}
