import { pino } from "pino";

import type { Segmenter } from "../../tokenizer.js";
import type { SongRow } from "../../types.js";

export const silentLogger = pino({ level: "silent" });

export const LYRIC_WORDS = [
  "爱你",
  "嘻哈",
  "文化",
  "说唱",
  "音乐",
  "自由",
  "比赛",
  "节拍",
  "节奏",
  "麦克风",
  "第一",
  "喜欢",
];

/** Forward maximum matching over a fixed word list; unknown characters come out alone. */
export class DictionarySegmenter implements Segmenter {
  private readonly words: Set<string>;
  private readonly maxLen: number;

  constructor(words: Iterable<string> = LYRIC_WORDS) {
    this.words = new Set(words);
    this.maxLen = Math.max(1, ...Array.from(this.words, (w) => Array.from(w).length));
  }

  segment(text: string): string[] {
    const chars = Array.from(text);
    const out: string[] = [];
    let i = 0;
    while (i < chars.length) {
      let len = Math.min(this.maxLen, chars.length - i);
      while (len > 1 && !this.words.has(chars.slice(i, i + len).join(""))) len--;
      out.push(chars.slice(i, i + len).join(""));
      i += len;
    }
    return out;
  }
}

export const SONGS: SongRow[] = [
  { year: 2020, lyrics: "I love you 我爱你 rap music" },
  { year: 2020, lyrics: "rap 说唱 rap" },
  { year: null, lyrics: "rap" },
  { year: 2021, lyrics: null },
  { year: 2021, lyrics: "hip-hop 嘻哈文化" },
  { year: 2021, lyrics: "🎵 a" },
];
