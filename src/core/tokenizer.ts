import type { VocabularyUnit, Word } from "./types.js";

/**
 * Word-boundary detector for unsegmented Chinese text.
 *
 * Contract notes:
 * - segments are returned in text order
 * - implementations are expected (not guaranteed) to be deterministic
 */
export interface Segmenter {
  segment(text: string): string[];
}

/**
 * Turns raw lyrics into vocabulary units.
 *
 * Contract notes:
 * - pure: the same input yields the same units, in input order
 * - Chinese segments shorter than 2 code points are already dropped
 */
export interface Tokenizer {
  tokenize(text: string | null | undefined): VocabularyUnit[];
}

export interface VocabularyFilter {
  filter(units: Iterable<VocabularyUnit>): Word[];
}
