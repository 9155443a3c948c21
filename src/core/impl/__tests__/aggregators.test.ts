import { describe, expect, it } from "vitest";
import { KeywordFrequencyAggregator } from "../keywordFrequencyAggregator.js";
import { YearFrequencyAggregator } from "../yearFrequencyAggregator.js";

describe("YearFrequencyAggregator", () => {
  it("counts every word under its year", () => {
    const agg = new YearFrequencyAggregator();
    expect(agg.add(2020, ["rap", "说唱", "rap"])).toBe(3);
    expect(agg.add(2021, ["flow"])).toBe(1);

    expect(agg.table().get(2020)).toEqual(new Map([["rap", 2], ["说唱", 1]]));
    expect(agg.table().get(2021)).toEqual(new Map([["flow", 1]]));
    expect(agg.total()).toBe(4);
  });

  it("creates no year for a song without words", () => {
    const agg = new YearFrequencyAggregator();
    expect(agg.add(2022, [])).toBe(0);
    expect(agg.table().has(2022)).toBe(false);
  });

  it("starts over on reset", () => {
    const agg = new YearFrequencyAggregator();
    agg.add(2020, ["rap"]);
    agg.reset();
    expect(agg.table().size).toBe(0);
    expect(agg.total()).toBe(0);
  });
});

describe("KeywordFrequencyAggregator", () => {
  it("matches whole words case-insensitively", () => {
    const agg = new KeywordFrequencyAggregator(["Rap", "爱你"]);
    expect(agg.add(2020, ["rap", "rapper", "RAP", "爱你"])).toBe(3);

    expect(agg.table().get("Rap")).toEqual(new Map([[2020, 2]]));
    expect(agg.table().get("爱你")).toEqual(new Map([[2020, 1]]));
    expect(agg.total()).toBe(3);
  });

  it("never counts a substring", () => {
    const agg = new KeywordFrequencyAggregator(["rap"]);
    expect(agg.add(2021, ["rapper", "trap"])).toBe(0);
    expect(agg.table().get("rap")?.has(2021)).toBe(false);
  });

  it("keeps every keyword in the table, with or without data", () => {
    const agg = new KeywordFrequencyAggregator(["家", "钱"]);
    agg.add(2019, ["家"]);
    expect(Array.from(agg.table().keys())).toEqual(["家", "钱"]);
    agg.reset();
    expect(agg.table().get("家")?.size).toBe(0);
    expect(agg.keywords).toEqual(["家", "钱"]);
  });
});
