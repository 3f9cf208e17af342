import { HintParseError, SeedParseError } from "./errors";
import { hintAlignment, hintBirthplace, hintCode, hintHeight, hintTendency, packHint } from "./hint";
import { Comparison, Hint, NameAndHint } from "./types";

// Row tokens, in the order the game shows the columns:
//   code alignment tendency height birthplace
// e.g. "^^ 0 0 ~ 1"

const COMPARISON_TOKENS = new Map<string, Comparison>([
  ["=", Comparison.Correct],
  ["vv", Comparison.FarLess],
  ["v", Comparison.Less],
  ["~", Comparison.Near],
  ["^", Comparison.Greater],
  ["^^", Comparison.FarGreater],
]);

const TOKEN_OF: Record<Comparison, string> = {
  [Comparison.Correct]: "=",
  [Comparison.FarLess]: "vv",
  [Comparison.Less]: "v",
  [Comparison.Near]: "~",
  [Comparison.Greater]: "^",
  [Comparison.FarGreater]: "^^",
};

const ABSENT_TOKENS = new Set(["x", "X"]);
const TRUE_TOKENS = new Set(["y", "Y", "t", "T", "1"]);
const FALSE_TOKENS = new Set(["n", "N", "f", "F", "0"]);

function parseComparison(input: string, token: string): Comparison | undefined {
  if (ABSENT_TOKENS.has(token)) return undefined;
  const c = COMPARISON_TOKENS.get(token);
  if (c === undefined) throw new HintParseError(input, `unknown comparison \`${token}\``);
  return c;
}

function parseBool(input: string, token: string): boolean {
  if (TRUE_TOKENS.has(token)) return true;
  if (FALSE_TOKENS.has(token)) return false;
  throw new HintParseError(input, `unknown boolean \`${token}\``);
}

export function parseHint(input: string): Hint {
  const tokens = input.trim().split(/\s+/).filter((t) => t.length > 0);
  if (tokens.length !== 5) {
    throw new HintParseError(input, `expected 5 entries, got ${tokens.length}`);
  }
  const [code, alignment, tendency, height, birthplace] = tokens;
  const heightCmp = parseComparison(input, height);
  if (heightCmp === undefined) throw new HintParseError(input, "height cannot be `x`");
  return packHint({
    code: parseComparison(input, code),
    alignment: parseBool(input, alignment),
    tendency: parseBool(input, tendency),
    height: heightCmp,
    birthplace: parseBool(input, birthplace),
  });
}

export function formatHintText(h: Hint): string {
  const code = hintCode(h);
  const b = (v: boolean) => (v ? "1" : "0");
  return [
    code === undefined ? "x" : TOKEN_OF[code],
    b(hintAlignment(h)),
    b(hintTendency(h)),
    TOKEN_OF[hintHeight(h)],
    b(hintBirthplace(h)),
  ].join(" ");
}

/** Parses a single `Name:hint` pair; the name is trimmed. */
export function parseSeed(input: string): NameAndHint {
  const colon = input.indexOf(":");
  if (colon < 0) throw new SeedParseError(input, "no `:` in input");
  const name = input.slice(0, colon).trim();
  try {
    return { name, hint: parseHint(input.slice(colon + 1)) };
  } catch (e) {
    if (e instanceof HintParseError) throw new SeedParseError(input, "invalid guess format");
    throw e;
  }
}

/** Comma-separated `Name:hint` pairs, e.g. "Rook:^ 0 0 vv 0,Wren:^^ 0 0 vv 0". */
export function parseSeeds(input: string): NameAndHint[] {
  if (input.trim().length === 0) return [];
  return input.split(",").map((s) => parseSeed(s.trim()));
}
