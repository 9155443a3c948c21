export { classify, codePointLength, isChinese, isEnglishWord, isLatinEligible, trimWordPunctuation, WORD_PUNCTUATION } from "./scriptClassifier.js";
export { IntlWordSegmenter } from "./intlSegmenter.js";
export { MixedScriptTokenizer, MIN_WORD_LENGTH } from "./mixedScriptTokenizer.js";
export { WordShapeFilter } from "./vocabularyFilter.js";
export { YearFrequencyAggregator } from "./yearFrequencyAggregator.js";
export { KeywordFrequencyAggregator } from "./keywordFrequencyAggregator.js";
export { MinHeapTopKSelector } from "./minHeapTopK.js";
export { FrequencyRankingEmitter } from "./rankingEmitter.js";
export { keywordStats, round2, vocabularyStats, yearRange } from "./statistics.js";
export {
  createVocabularyAnalyzer,
  DEFAULT_PROGRESS_INTERVAL,
  VocabularyAnalyzer,
  type AnalysisMode,
  type AnalysisStatistics,
  type AnalyzerDeps,
  type CreateAnalyzerOptions,
  type RowError,
  type RowOutcome,
  type RowResult,
} from "./vocabularyAnalyzer.js";
