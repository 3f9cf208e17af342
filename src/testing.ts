import { readFileSync } from "node:fs";
import fc from "fast-check";
import { BUNDLED_ROSTER_PATH, parseRoster } from "./roster";
import { ALIGNMENTS, BIRTHPLACES, COMPARISONS, HintFields, Sinner, TENDENCIES } from "./types";

export function bundledRoster(): Sinner[] {
  return parseRoster(readFileSync(BUNDLED_ROSTER_PATH, "utf8"));
}

export function byName(roster: readonly Sinner[], name: string): Sinner {
  const s = roster.find((x) => x.name === name);
  if (s === undefined) throw new Error(`no ${name} in roster`);
  return s;
}

export function sinner(overrides: Partial<Sinner> & { name: string }): Sinner {
  return {
    code: 100,
    alignment: "Death",
    tendency: "Catalyst",
    height: 168,
    birthplace: "Other",
    ...overrides,
  };
}

export const hintFieldsArb: fc.Arbitrary<HintFields> = fc.record({
  code: fc.option(fc.constantFrom(...COMPARISONS), { nil: undefined }),
  alignment: fc.boolean(),
  tendency: fc.boolean(),
  height: fc.constantFrom(...COMPARISONS),
  birthplace: fc.boolean(),
});

export const sinnerArb: fc.Arbitrary<Sinner> = fc.record({
  name: fc.string({ minLength: 1, maxLength: 8 }),
  code: fc.option(fc.integer({ min: 0, max: 0xffff }), { nil: undefined }),
  alignment: fc.constantFrom(...ALIGNMENTS),
  tendency: fc.constantFrom(...TENDENCIES),
  height: fc.integer({ min: 1, max: 255 }),
  birthplace: fc.constantFrom(...BIRTHPLACES),
});
