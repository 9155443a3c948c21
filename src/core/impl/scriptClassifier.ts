import type { ScriptClass } from "../types.js";

/** Punctuation that may appear inside (or around) an English word. */
export const WORD_PUNCTUATION = "'\".!?-:;";

const PUNCTUATION_SET = new Set(WORD_PUNCTUATION);
const ALPHANUMERIC = /^[\p{L}\p{N}]$/u;
const ENGLISH_WORD = /^[a-zA-Z0-9'".!?\-:;]+$/;

const CJK_START = 0x4e00;
const CJK_END = 0x9fff;

export function isChinese(ch: string): boolean {
  const code = ch.codePointAt(0);
  return code !== undefined && code >= CJK_START && code <= CJK_END;
}

export function isWordPunctuation(ch: string): boolean {
  return PUNCTUATION_SET.has(ch);
}

export function isLatinEligible(ch: string): boolean {
  return !isChinese(ch) && (ALPHANUMERIC.test(ch) || isWordPunctuation(ch));
}

/** Classifies a single code point. The Chinese check wins over alphanumeric. */
export function classify(ch: string): ScriptClass {
  if (isChinese(ch)) return "chinese";
  if (isLatinEligible(ch)) return "latin";
  return "other";
}

/** ASCII letters, digits and word punctuation only, over the whole string. */
export function isEnglishWord(word: string): boolean {
  return ENGLISH_WORD.test(word);
}

export function codePointLength(s: string): number {
  return Array.from(s).length;
}

/** Trims word punctuation from both ends, leaving interior marks alone. */
export function trimWordPunctuation(token: string): string {
  const chars = Array.from(token);
  let start = 0;
  let end = chars.length;
  while (start < end && isWordPunctuation(chars[start]!)) start++;
  while (end > start && isWordPunctuation(chars[end - 1]!)) end--;
  return chars.slice(start, end).join("");
}
