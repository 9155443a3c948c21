/** Shared core types used by module contracts. */

export type Year = number;
/** A string produced by tokenization, before filtering. */
export type VocabularyUnit = string;
/** A vocabulary unit accepted by the filter; the unit of counting. */
export type Word = string;

export type ScriptClass = "chinese" | "latin" | "other";

/** One song as handed over by the row source. */
export interface SongRow {
  year: Year | null;
  lyrics: string | null;
}

export interface WordCount {
  word: Word;
  count: number;
}

export interface YearCount {
  year: Year;
  count: number;
}

/** year -> word -> occurrences (insertion order of first occurrence is kept) */
export type YearFrequencyTable = Map<Year, Map<Word, number>>;

/** keyword -> year -> occurrences */
export type KeywordFrequencyTable = Map<string, Map<Year, number>>;

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };
