import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";

import { AnalysisError } from "../../errors.js";
import { formatCsv, parseCsv, readCsv, readSongCsv, requireColumns, toSongRow, yearDistribution } from "../csvSource.js";
import { parseYear } from "../validation.js";

const CSV = 'year,lyrics,title\n2020,"line one\nline two",A\n,rap,B\n2019.0,"say ""yo""",C\n';

describe("parseCsv", () => {
  it("reads a header and quoted multi-line cells", () => {
    const ds = parseCsv(CSV);
    expect(ds.columns).toEqual(["year", "lyrics", "title"]);
    expect(ds.records).toHaveLength(3);
    expect(ds.records[0]).toEqual({ year: "2020", lyrics: "line one\nline two", title: "A" });
    expect(ds.records[2]?.lyrics).toBe('say "yo"');
  });

  it("returns an empty dataset for empty text", () => {
    expect(parseCsv("")).toEqual({ columns: [], records: [] });
  });

  it("maps records to song rows without throwing on bad years", () => {
    const rows = parseCsv(CSV).records.map(toSongRow);
    expect(rows).toEqual([
      { year: 2020, lyrics: "line one\nline two" },
      { year: null, lyrics: "rap" },
      { year: 2019, lyrics: 'say "yo"' },
    ]);
    expect(toSongRow({ year: "soon", lyrics: "" })).toEqual({ year: null, lyrics: null });
  });

  it("counts songs per year in ascending order", () => {
    const dist = yearDistribution([{ year: "2021" }, { year: "2019" }, { year: "x" }, { year: "2021" }]);
    expect(Array.from(dist)).toEqual([
      [2019, 1],
      [2021, 2],
    ]);
  });

  it("writes records back with quoting", () => {
    expect(formatCsv({ columns: ["a", "b"], records: [{ a: "1", b: "x,y" }] })).toBe('a,b\n1,"x,y"\n');
  });
});

describe("parseYear", () => {
  it("truncates numeric cells and nulls the rest", () => {
    expect(parseYear("2020")).toBe(2020);
    expect(parseYear(" 2019.0 ")).toBe(2019);
    expect(parseYear(2018.7)).toBe(2018);
    expect(parseYear("")).toBeNull();
    expect(parseYear("abc")).toBeNull();
    expect(parseYear(undefined)).toBeNull();
  });
});

describe("reading files", () => {
  it("fails with SOURCE_UNAVAILABLE for a missing file", async () => {
    await expect(readCsv("/nonexistent/songs.csv")).rejects.toMatchObject({ code: "SOURCE_UNAVAILABLE" });
  });

  it("requires year and lyrics columns", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "lyrics-vocab-"));
    const file = path.join(dir, "songs.csv");
    await writeFile(file, "title,lyrics\nA,rap\n", "utf8");
    await expect(readSongCsv(file)).rejects.toMatchObject({ code: "MISSING_COLUMNS" });
  });

  it("lists every missing column", () => {
    try {
      requireColumns({ columns: ["title"], records: [] }, ["year", "lyrics"]);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(AnalysisError);
      expect(e instanceof AnalysisError && e.errors).toEqual([
        { path: "year", message: "column not found" },
        { path: "lyrics", message: "column not found" },
      ]);
    }
  });
});
