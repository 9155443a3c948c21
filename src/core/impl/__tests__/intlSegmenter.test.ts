import { describe, expect, it } from "vitest";
import { IntlWordSegmenter } from "../intlSegmenter.js";

describe("IntlWordSegmenter", () => {
  const segmenter = new IntlWordSegmenter("zh");
  const text = "我爱你中国说唱音乐";

  it("covers the input without gaps", () => {
    const segments = segmenter.segment(text);
    expect(segments.join("")).toBe(text);
    expect(segments.every((s) => s.length > 0)).toBe(true);
  });

  it("gives the same segments on every call", () => {
    expect(segmenter.segment(text)).toEqual(segmenter.segment(text));
  });

  it("returns nothing for empty text", () => {
    expect(segmenter.segment("")).toEqual([]);
  });
});
