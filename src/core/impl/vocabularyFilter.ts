import type { VocabularyFilter } from "../tokenizer.js";
import type { VocabularyUnit, Word } from "../types.js";
import { codePointLength, isChinese, isEnglishWord } from "./scriptClassifier.js";
import { MIN_WORD_LENGTH } from "./mixedScriptTokenizer.js";

/**
 * Accepts units of at least `minLength` code points that are either
 * plain English words or start with a Chinese character.
 */
export class WordShapeFilter implements VocabularyFilter {
  constructor(private readonly minLength: number = MIN_WORD_LENGTH) {}

  filter(units: Iterable<VocabularyUnit>): Word[] {
    const words: Word[] = [];
    for (const unit of units) {
      const word = unit.trim();
      if (codePointLength(word) < this.minLength) continue;
      // isChinese looks at the first code point
      if (isEnglishWord(word) || isChinese(word)) words.push(word);
    }
    return words;
  }
}
