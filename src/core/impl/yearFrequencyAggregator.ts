import type { VocabularyAggregator } from "../aggregator.js";
import type { Word, Year, YearFrequencyTable } from "../types.js";

/** Full-vocabulary mode: counts every filtered word under its year. */
export class YearFrequencyAggregator implements VocabularyAggregator {
  private readonly byYear: YearFrequencyTable = new Map();
  private occurrences = 0;

  add(year: Year, words: readonly Word[]): number {
    if (words.length === 0) return 0;

    let counts = this.byYear.get(year);
    if (!counts) {
      counts = new Map();
      this.byYear.set(year, counts);
    }
    for (const word of words) {
      counts.set(word, (counts.get(word) ?? 0) + 1);
    }
    this.occurrences += words.length;
    return words.length;
  }

  table(): YearFrequencyTable {
    return this.byYear;
  }

  total(): number {
    return this.occurrences;
  }

  reset(): void {
    this.byYear.clear();
    this.occurrences = 0;
  }
}
