import type { TopKSelector } from "../heap.js";
import type { FrequencySeries, RankingEmitter, YearlyRankings } from "../ranker.js";
import type { KeywordFrequencyTable, WordCount, YearCount, YearFrequencyTable } from "../types.js";
import { MinHeapTopKSelector } from "./minHeapTopK.js";

const byCountDesc = (a: WordCount, b: WordCount): number => b.count - a.count;

export class FrequencyRankingEmitter implements RankingEmitter {
  constructor(private readonly topK: TopKSelector<WordCount> = new MinHeapTopKSelector<WordCount>()) {}

  rankings(table: YearFrequencyTable, topN: number): YearlyRankings {
    const out: YearlyRankings = new Map();
    for (const year of sortedKeys(table)) {
      const counts = table.get(year);
      if (!counts) continue;
      // map iteration order is first-seen order, which the selector keeps for ties
      const entries = Array.from(counts, ([word, count]) => ({ word, count }));
      out.set(year, this.topK.topK(entries, topN, byCountDesc));
    }
    return out;
  }

  series(table: KeywordFrequencyTable): FrequencySeries {
    const out: FrequencySeries = new Map();
    for (const [keyword, years] of table) {
      const points: YearCount[] = [];
      for (const year of sortedKeys(years)) {
        const count = years.get(year) ?? 0;
        if (count > 0) points.push({ year, count });
      }
      out.set(keyword, points);
    }
    return out;
  }
}

function sortedKeys<V>(m: Map<number, V>): number[] {
  return Array.from(m.keys()).sort((a, b) => a - b);
}
