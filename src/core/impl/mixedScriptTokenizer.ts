import { AnalysisError } from "../../errors.js";
import type { Segmenter, Tokenizer } from "../tokenizer.js";
import type { VocabularyUnit } from "../types.js";
import { codePointLength, isChinese, isLatinEligible, trimWordPunctuation } from "./scriptClassifier.js";

export const MIN_WORD_LENGTH = 2;

const WHITESPACE = /\s+/u;

/**
 * Whitespace tokenizer for mixed Chinese/English lyrics:
 * - Chinese runs go through the segmenter, segments < 2 code points dropped
 * - Latin tokens are lower-cased with edge punctuation trimmed
 * - mixed tokens split by script: Chinese segments first, then the Latin remainder
 * - tokens made only of other characters produce nothing
 */
export class MixedScriptTokenizer implements Tokenizer {
  constructor(private readonly segmenter: Segmenter) {}

  tokenize(text: string | null | undefined): VocabularyUnit[] {
    if (!text) return [];
    const trimmed = text.trim();
    if (!trimmed) return [];

    const units: VocabularyUnit[] = [];
    for (const raw of trimmed.split(WHITESPACE)) {
      const token = raw.trim();
      if (token) this.tokenizeToken(token, units);
    }
    return units;
  }

  private tokenizeToken(token: string, out: VocabularyUnit[]): void {
    const chars = Array.from(token);
    const hasChinese = chars.some(isChinese);
    const hasLatin = chars.some(isLatinEligible);

    if (hasChinese && hasLatin) {
      this.pushSegments(chars.filter(isChinese).join(""), out);
      const latin = chars.filter(isLatinEligible).join("");
      // length is checked later by the filter, not here
      if (latin) out.push(latin.toLowerCase());
      return;
    }

    if (hasChinese) {
      this.pushSegments(token, out);
      return;
    }

    if (hasLatin) {
      const cleaned = trimWordPunctuation(token).toLowerCase();
      if (codePointLength(cleaned) >= MIN_WORD_LENGTH) out.push(cleaned);
    }
  }

  private pushSegments(text: string, out: VocabularyUnit[]): void {
    let segments: string[];
    try {
      segments = this.segmenter.segment(text);
    } catch (e) {
      throw new AnalysisError("SEGMENTATION_FAILED", `segmenter failed on "${text}"`, { cause: e });
    }
    for (const seg of segments) {
      if (codePointLength(seg) >= MIN_WORD_LENGTH) out.push(seg);
    }
  }
}
