import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";

import { createVocabularyAnalyzer } from "../../core/impl/vocabularyAnalyzer.js";
import { DictionarySegmenter, SONGS, silentLogger } from "../../core/impl/__tests__/fixtures.js";
import { buildKeywordReport, buildVocabularyReport, serializeReport, writeReport, writeText } from "../resultWriter.js";

const NOW = new Date("2024-01-01T12:00:00.000Z");

function analyzer() {
  return createVocabularyAnalyzer({ segmenter: new DictionarySegmenter(), logger: silentLogger });
}

describe("buildVocabularyReport", () => {
  it("lays out rankings per year with analysis info", () => {
    const a = analyzer();
    a.analyze(SONGS);
    expect(buildVocabularyReport(a, 2, NOW)).toEqual({
      analysis_info: {
        total_songs_processed: 3,
        total_vocabulary_count: 11,
        years_analyzed: 2,
        analysis_date: "2024-01-01T12:00:00.000Z",
        top_words_per_year: 2,
      },
      yearly_rankings: {
        "2020": [
          { word: "rap", frequency: 3 },
          { word: "love", frequency: 1 },
        ],
        "2021": [
          { word: "hip-hop", frequency: 1 },
          { word: "嘻哈", frequency: 1 },
        ],
      },
      statistics: {
        total_unique_words: 9,
        total_unique_years: 2,
        words_with_data: 9,
        year_range: { start: 2020, end: 2021 },
      },
    });
  });

  it("uses null bounds when nothing was counted", () => {
    const report = buildVocabularyReport(analyzer(), 5, NOW);
    expect(report.statistics.year_range).toEqual({ start: null, end: null });
    expect(report.yearly_rankings).toEqual({});
  });
});

describe("buildKeywordReport", () => {
  it("lists every keyword with its year series", () => {
    const a = analyzer();
    a.analyze(SONGS, ["rap", "说唱", "嘻哈", "家"]);
    expect(buildKeywordReport(a, NOW)).toEqual({
      analysis_info: {
        total_songs_processed: 3,
        total_keyword_matches: 5,
        keywords_analyzed: ["rap", "说唱", "嘻哈", "家"],
        analysis_date: "2024-01-01T12:00:00.000Z",
        years_covered: 2,
      },
      keyword_frequencies: {
        rap: [[2020, 3]],
        说唱: [[2020, 1]],
        嘻哈: [[2021, 1]],
        家: [],
      },
      statistics: { total_unique_years: 2, keywords_with_data: 3 },
    });
  });
});

describe("writing reports", () => {
  it("writes indented JSON with Chinese text unescaped", async () => {
    const a = analyzer();
    a.analyze(SONGS);
    const report = buildVocabularyReport(a, 3, NOW);
    const text = serializeReport(report);
    expect(text).toContain('"word": "嘻哈"');

    const dir = await mkdtemp(path.join(tmpdir(), "lyrics-vocab-"));
    const file = path.join(dir, "out", "vocab.json");
    const res = await writeReport(file, report);
    expect(res).toEqual({ ok: true, value: file });
    expect(JSON.parse(await readFile(file, "utf8"))).toEqual(report);
  });

  it("returns SERIALIZATION_FAILED instead of throwing", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "lyrics-vocab-"));
    const blocker = path.join(dir, "file.txt");
    await writeFile(blocker, "x", "utf8");

    const res = await writeText(path.join(blocker, "out.json"), "{}");
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.code).toBe("SERIALIZATION_FAILED");
  });
});
