import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { pino } from "pino";
import { describe, expect, it } from "vitest";

import { runCli, splitKeywords, USAGE, type CliContext } from "../cli.js";
import { loadConfig } from "../config.js";

function context(): CliContext & { printed: string[] } {
  const printed: string[] = [];
  return {
    config: loadConfig({}),
    logger: pino({ level: "silent" }),
    out: (text) => printed.push(text),
    now: () => new Date("2024-01-01T00:00:00.000Z"),
    printed,
  };
}

async function workspace(csv: string): Promise<{ dir: string; input: string }> {
  const dir = await mkdtemp(path.join(tmpdir(), "lyrics-vocab-cli-"));
  const input = path.join(dir, "songs.csv");
  await writeFile(input, csv, "utf8");
  return { dir, input };
}

const SONGS_CSV = "title,year,lyrics\nA,2020,rap rap beat\nB,2021,Flow!\nC,,rap\n";

describe("runCli", () => {
  it("prints usage without a command", async () => {
    const ctx = context();
    expect(await runCli([], ctx)).toBe(1);
    expect(ctx.printed).toEqual([USAGE]);
    expect(await runCli(["--help"], ctx)).toBe(0);
  });

  it("rejects unknown commands and options", async () => {
    expect(await runCli(["bogus"], context())).toBe(1);
    expect(await runCli(["vocab", "--nope"], context())).toBe(1);
    expect(await runCli(["vocab", "--top", "x"], context())).toBe(1);
  });

  it("extracts vocabulary from text", async () => {
    const ctx = context();
    expect(await runCli(["extract", "Hello,", "WORLD!", "a"], ctx)).toBe(0);
    expect(ctx.printed).toEqual(['["world"]']);
  });

  it("writes yearly rankings", async () => {
    const { dir, input } = await workspace(SONGS_CSV);
    const output = path.join(dir, "vocab.json");
    const ctx = context();

    expect(await runCli(["vocab", "--input", input, "--output", output, "--top", "5"], ctx)).toBe(0);
    const report = JSON.parse(await readFile(output, "utf8"));
    expect(report.yearly_rankings).toEqual({
      "2020": [
        { word: "rap", frequency: 2 },
        { word: "beat", frequency: 1 },
      ],
      "2021": [{ word: "flow", frequency: 1 }],
    });
    expect(report.analysis_info.analysis_date).toBe("2024-01-01T00:00:00.000Z");
    expect(ctx.printed).toHaveLength(1);
  });

  it("writes keyword series from flags and positionals", async () => {
    const { dir, input } = await workspace(SONGS_CSV);
    const output = path.join(dir, "keywords.json");

    expect(await runCli(["keywords", "--input", input, "--output", output, "--keywords", "rap,flow", "beat"], context())).toBe(0);
    const report = JSON.parse(await readFile(output, "utf8"));
    expect(report.analysis_info.keywords_analyzed).toEqual(["rap", "flow", "beat"]);
    expect(report.keyword_frequencies).toEqual({
      rap: [[2020, 2]],
      flow: [[2021, 1]],
      beat: [[2020, 1]],
    });
  });

  it("fails when the input file is missing", async () => {
    expect(await runCli(["vocab", "--input", "/nonexistent/songs.csv"], context())).toBe(1);
  });

  it("filters songs into a new csv", async () => {
    const { dir, input } = await workspace("title,year,tag,lyrics\nA,2020,rap,yo\nB,2021,pop,la\n");
    const output = path.join(dir, "rap.csv");

    expect(await runCli(["filter", "--input", input, "--output", output, "--rap", "tag"], context())).toBe(0);
    expect(await readFile(output, "utf8")).toBe("title,year,tag,lyrics\nA,2020,rap,yo\n");
    expect(await runCli(["filter", "--input", input, "--output", output, "--rap", "vibes"], context())).toBe(1);
  });
});

describe("splitKeywords", () => {
  it("splits on commas and drops blanks", () => {
    expect(splitKeywords(["家, 钱", "", "梦想,"])).toEqual(["家", "钱", "梦想"]);
  });
});
