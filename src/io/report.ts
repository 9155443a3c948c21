import type { VocabularyAnalyzer } from "../core/impl/vocabularyAnalyzer.js";

const RULE = "=".repeat(60);
const THIN_RULE = "-".repeat(40);

function n(value: number): string {
  return value.toLocaleString("en-US");
}

export function formatVocabularySummary(analyzer: VocabularyAnalyzer, topN: number): string {
  const stats = analyzer.getVocabularyStats();
  const lines = [
    "",
    RULE,
    "Lyrics Vocabulary Analysis Summary",
    RULE,
    `Total songs processed: ${analyzer.processed}`,
    `Total vocabulary count: ${analyzer.totalOccurrences}`,
    `Years analyzed: ${stats.totalYears}`,
  ];
  if (stats.yearRange) lines.push(`Year range: ${stats.yearRange.start} - ${stats.yearRange.end}`);

  for (const [year, words] of analyzer.generateRankings(topN)) {
    lines.push("", `${year} - Top ${topN} vocabulary:`, THIN_RULE);
    words.forEach((w, i) => {
      lines.push(`${String(i + 1).padStart(2)}. ${w.word.padEnd(15)} (frequency: ${w.count})`);
    });
  }

  lines.push(
    "",
    "Analysis Statistics:",
    `   Years analyzed: ${stats.totalYears}`,
    `   Unique words: ${n(stats.totalUniqueWords)}`,
    `   Total word occurrences: ${n(stats.totalWordOccurrences)}`,
    `   Songs processed: ${n(stats.songsProcessed)}`,
  );
  if (stats.yearRange) lines.push(`   Year range: ${stats.yearRange.start} - ${stats.yearRange.end}`);
  return lines.join("\n");
}

export function formatKeywordSummary(analyzer: VocabularyAnalyzer): string {
  const stats = analyzer.getKeywordStats();
  const series = analyzer.generateFrequencySeries();
  const lines = [
    "",
    RULE,
    "Keyword Frequency Analysis Summary",
    RULE,
    `Total songs processed: ${analyzer.processed}`,
    `Total keyword matches: ${analyzer.totalMatches}`,
    `Keywords analyzed: ${analyzer.keywords.length}`,
  ];

  for (const keyword of analyzer.keywords) {
    const points = series.get(keyword) ?? [];
    if (points.length === 0) {
      lines.push("", `${keyword} - No occurrences found`);
      continue;
    }
    lines.push("", `${keyword} - Frequency by year:`, THIN_RULE);
    for (const p of points) lines.push(`  ${p.year}: ${p.count} occurrences`);
    lines.push(`  Total: ${stats.keywordDetails.get(keyword)?.totalFrequency ?? 0} occurrences`);
  }

  lines.push(
    "",
    "Analysis Statistics:",
    `   Keywords analyzed: ${stats.totalKeywords}`,
    `   Keywords with data: ${stats.keywordsWithData}`,
    `   Total matches: ${n(stats.totalMatches)}`,
    `   Songs processed: ${n(stats.songsProcessed)}`,
  );
  return lines.join("\n");
}
