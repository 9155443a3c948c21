import type { Segmenter } from "../tokenizer.js";

/**
 * Segmenter backed by the ICU word breaker that ships with Node.js.
 * Every segment is kept, so joining the output gives back the input.
 */
export class IntlWordSegmenter implements Segmenter {
  private readonly segmenter: Intl.Segmenter;

  constructor(locale = "zh") {
    this.segmenter = new Intl.Segmenter(locale, { granularity: "word" });
  }

  segment(text: string): string[] {
    const out: string[] = [];
    for (const s of this.segmenter.segment(text)) out.push(s.segment);
    return out;
  }
}
