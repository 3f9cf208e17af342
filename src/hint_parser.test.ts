import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { HintParseError, SeedParseError } from "./errors";
import { packHint, unpackHint, WINNING_HINT } from "./hint";
import { formatHintText, parseHint, parseSeed, parseSeeds } from "./hint_parser";
import { hintFieldsArb } from "./testing";
import { Comparison } from "./types";

describe("parseHint", () => {
  it("reads a row in column order", () => {
    const h = parseHint("^^ 0 0 ~ 1");
    expect(unpackHint(h)).toEqual({
      code: Comparison.FarGreater,
      alignment: false,
      tendency: false,
      height: Comparison.Near,
      birthplace: true,
    });
    expect(formatHintText(h)).toBe("^^ 0 0 ~ 1");
  });

  it("accepts every boolean spelling and loose whitespace", () => {
    expect(parseHint("  =\ty  T\t=  1\n")).toBe(WINNING_HINT);
    expect(parseHint("= y T = 1")).toBe(WINNING_HINT);
    expect(parseHint("x n F vv 0")).toBe(
      packHint({ alignment: false, tendency: false, height: Comparison.FarLess, birthplace: false }),
    );
  });

  it("rejects a wrong number of entries", () => {
    expect(() => parseHint("= 1 1 =")).toThrow(HintParseError);
    expect(() => parseHint("= 1 1 = 1 1")).toThrow("expected 5 entries, got 6");
  });

  it("rejects unknown glyphs", () => {
    expect(() => parseHint("> 1 1 = 1")).toThrow("unknown comparison `>`");
    expect(() => parseHint("= yes 1 = 1")).toThrow("unknown boolean `yes`");
  });

  it("does not take object property names for glyphs", () => {
    expect(() => parseHint("toString 1 1 constructor 1")).toThrow("unknown comparison `constructor`");
    expect(() => parseHint("toString 1 1 = 1")).toThrow("unknown comparison `toString`");
    expect(() => parseHint("__proto__ 1 1 = 1")).toThrow(HintParseError);
  });

  it("rejects an absent height", () => {
    expect(() => parseHint("= 1 1 x 1")).toThrow("height cannot be `x`");
  });

  it("round-trips every hint through its text form", () => {
    fc.assert(
      fc.property(hintFieldsArb, (fields) => {
        const h = packHint(fields);
        expect(parseHint(formatHintText(h))).toBe(h);
      }),
    );
  });
});

describe("parseSeeds", () => {
  it("splits name:row pairs", () => {
    expect(parseSeeds("Rook:^ 0 0 vv 0, Wren : ^^ 0 0 vv 0")).toEqual([
      { name: "Rook", hint: parseHint("^ 0 0 vv 0") },
      { name: "Wren", hint: parseHint("^^ 0 0 vv 0") },
    ]);
  });

  it("treats empty input as no seeds", () => {
    expect(parseSeeds("")).toEqual([]);
  });

  it("reports a missing colon", () => {
    expect(() => parseSeed("Rook ^ 0 0 vv 0")).toThrow("no `:` in input");
  });

  it("reports a bad row", () => {
    expect(() => parseSeeds("Rook:^ 0 0")).toThrow(SeedParseError);
  });
});
