import type { KeywordFrequencyTable, Word, Year, YearFrequencyTable } from "./types.js";

/**
 * Accumulates the filtered words of one song at a time.
 *
 * `add` returns how many occurrences it counted for the song
 * (every word in full-vocabulary mode, keyword matches otherwise).
 */
export interface YearAggregator<TTable> {
  add(year: Year, words: readonly Word[]): number;
  table(): TTable;
  /** total occurrences counted so far */
  total(): number;
  reset(): void;
}

export type VocabularyAggregator = YearAggregator<YearFrequencyTable>;

export interface KeywordAggregator extends YearAggregator<KeywordFrequencyTable> {
  readonly keywords: readonly string[];
}
