import type { KeywordAggregator } from "../aggregator.js";
import type { KeywordFrequencyTable, Word, Year } from "../types.js";

/**
 * Fixed-keyword mode. A keyword matches a word only on exact,
 * case-insensitive equality: "rapper" never counts for "rap".
 */
export class KeywordFrequencyAggregator implements KeywordAggregator {
  readonly keywords: readonly string[];
  private readonly byKeyword: KeywordFrequencyTable = new Map();
  private matches = 0;

  constructor(keywords: Iterable<string>) {
    this.keywords = Array.from(keywords);
    this.init();
  }

  add(year: Year, words: readonly Word[]): number {
    if (words.length === 0) return 0;

    const lowered = new Map<string, number>();
    for (const w of words) {
      const key = w.toLowerCase();
      lowered.set(key, (lowered.get(key) ?? 0) + 1);
    }

    let added = 0;
    for (const keyword of this.keywords) {
      const n = lowered.get(keyword.toLowerCase()) ?? 0;
      if (n === 0) continue;
      const years = this.byKeyword.get(keyword);
      if (!years) continue;
      years.set(year, (years.get(year) ?? 0) + n);
      added += n;
    }
    this.matches += added;
    return added;
  }

  table(): KeywordFrequencyTable {
    return this.byKeyword;
  }

  total(): number {
    return this.matches;
  }

  reset(): void {
    this.byKeyword.clear();
    this.matches = 0;
    this.init();
  }

  private init(): void {
    for (const k of this.keywords) {
      if (!this.byKeyword.has(k)) this.byKeyword.set(k, new Map());
    }
  }
}
