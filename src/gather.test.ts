import { describe, expect, it } from "vitest";
import { formatGatherReport, gatherData, summarize } from "./gather";
import { CONTRADICTION } from "./play";
import { bundledRoster, byName } from "./testing";

const roster = bundledRoster();

describe("gatherData", () => {
  const stats = gatherData(roster);

  it("plays every sinner once", () => {
    expect(stats.results.map((r) => r.target)).toEqual(roster);
  });

  it("opens with the best splitter", () => {
    expect(stats.firstGuess?.name).toBe("Rook");
  });

  it("collects the distribution of guess counts", () => {
    expect(stats.maxGuesses).toBe(3);
    expect([...stats.distribution]).toEqual([
      [1, 1],
      [2, 27],
      [3, 8],
    ]);
    expect(stats.mean).toBeCloseTo(79 / 36);
  });

  it("names the hardest sinners in roster order", () => {
    expect(stats.hardest.map((s) => s.name)).toEqual([
      "Ember",
      "Marlowe",
      "Sable",
      "Umber",
      "Vesper",
      "Alder",
      "Hazel",
      "Juniper",
    ]);
  });

  it("formats the report", () => {
    const lines = formatGatherReport(stats).split("\n");
    expect(lines[0]).toBe("Goto first sinner to play: Rook");
    expect(lines[1]).toBe("It takes 3 or less guesses to guess any sinner.");
    expect(lines[2]).toBe("    1 sinners take 1 guesses (2.78%)");
    expect(lines[3]).toBe("    27 sinners take 2 guesses (75.00%)");
    expect(lines[4]).toBe("    8 sinners take 3 guesses (22.22%)");
    expect(lines[5]).toBe("The sinners that take the maximum number of guesses rounds are:");
    expect(lines[6]).toBe("    Ember");
    expect(lines[lines.length - 1]).toBe("The mean number of guesses is 2.19");
  });
});

describe("summarize", () => {
  it("leaves contradictions out of the statistics", () => {
    const stats = summarize([
      { target: byName(roster, "Rook"), guesses: 1 },
      { target: byName(roster, "Wren"), guesses: CONTRADICTION },
    ]);
    expect(stats.maxGuesses).toBe(1);
    expect(stats.mean).toBe(1);
    const report = formatGatherReport(stats).split("\n");
    expect(report).toContain("Contradictions (255) for: Wren");
    expect(report).toContain("    1 sinners take 1 guesses (50.00%)");
  });
});
