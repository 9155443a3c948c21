import type { FrequencySeries, KeywordDetail, KeywordStats, VocabularyStats, YearRange } from "../ranker.js";
import type { Word, Year, YearFrequencyTable } from "../types.js";

export function yearRange(years: Iterable<Year>): YearRange | undefined {
  let start: Year | undefined;
  let end: Year | undefined;
  for (const y of years) {
    if (start === undefined || y < start) start = y;
    if (end === undefined || y > end) end = y;
  }
  return start === undefined || end === undefined ? undefined : { start, end };
}

/** Rounds to 2 decimals; exact binary halves (multiples of 1/8) go to the even neighbour. */
export function round2(n: number): number {
  const scaled = n * 100;
  const floor = Math.floor(scaled);
  if (Number.isInteger(n * 8) && scaled - floor === 0.5) {
    return (floor % 2 === 0 ? floor : floor + 1) / 100;
  }
  return Math.round(scaled) / 100;
}

export function vocabularyStats(table: YearFrequencyTable, songsProcessed: number): VocabularyStats {
  const distinct = new Set<Word>();
  let totalUniqueWords = 0;
  let totalWordOccurrences = 0;

  for (const counts of table.values()) {
    totalUniqueWords += counts.size;
    for (const [word, n] of counts) {
      distinct.add(word);
      totalWordOccurrences += n;
    }
  }

  const stats: VocabularyStats = {
    totalYears: table.size,
    totalUniqueWords,
    wordsWithData: distinct.size,
    totalWordOccurrences,
    songsProcessed,
  };
  const range = yearRange(table.keys());
  if (range) stats.yearRange = range;
  return stats;
}

export function keywordStats(
  series: FrequencySeries,
  totals: { keywords: number; matches: number; songsProcessed: number },
): KeywordStats {
  const years = new Set<Year>();
  const keywordDetails = new Map<string, KeywordDetail>();

  for (const [keyword, points] of series) {
    const range = yearRange(points.map((p) => p.year));
    if (!range) continue;

    let totalFrequency = 0;
    for (const p of points) {
      totalFrequency += p.count;
      years.add(p.year);
    }
    keywordDetails.set(keyword, {
      totalFrequency,
      yearsActive: points.length,
      averagePerYear: round2(totalFrequency / points.length),
      yearRange: range,
    });
  }

  return {
    totalYears: years.size,
    totalKeywords: totals.keywords,
    keywordsWithData: keywordDetails.size,
    totalMatches: totals.matches,
    songsProcessed: totals.songsProcessed,
    keywordDetails,
  };
}
