import { codeThreshold, heightThreshold, compare } from "./compare";
import { Comparison, Hint, HintFields, Sinner } from "./types";

// bits 0-2 code comparison, 3-5 height comparison, 6 alignment,
// 7 code comparison present, 8 tendency, 9 birthplace
export const CODE_SHIFT = 0;
export const HEIGHT_SHIFT = 3;
export const ALIGNMENT_BIT = 1 << 6;
export const CODE_PRESENT_BIT = 1 << 7;
export const TENDENCY_BIT = 1 << 8;
export const BIRTHPLACE_BIT = 1 << 9;
export const COMPARISON_MASK = 0b111;
export const HINT_MASK = (1 << 10) - 1;

export function packHint(fields: HintFields): Hint {
  let h = 0;
  if (fields.code !== undefined) h |= CODE_PRESENT_BIT | (fields.code << CODE_SHIFT);
  h |= fields.height << HEIGHT_SHIFT;
  if (fields.alignment) h |= ALIGNMENT_BIT;
  if (fields.tendency) h |= TENDENCY_BIT;
  if (fields.birthplace) h |= BIRTHPLACE_BIT;
  return h;
}

function toComparison(bits: number): Comparison {
  if (bits > Comparison.FarGreater) throw new RangeError(`invalid comparison bits ${bits}`);
  return bits;
}

export function hintCode(h: Hint): Comparison | undefined {
  if ((h & CODE_PRESENT_BIT) === 0) return undefined;
  return toComparison((h >> CODE_SHIFT) & COMPARISON_MASK);
}

export function hintHeight(h: Hint): Comparison {
  return toComparison((h >> HEIGHT_SHIFT) & COMPARISON_MASK);
}

export function hintAlignment(h: Hint): boolean {
  return (h & ALIGNMENT_BIT) !== 0;
}

export function hintTendency(h: Hint): boolean {
  return (h & TENDENCY_BIT) !== 0;
}

export function hintBirthplace(h: Hint): boolean {
  return (h & BIRTHPLACE_BIT) !== 0;
}

export function unpackHint(h: Hint): HintFields {
  return {
    code: hintCode(h),
    alignment: hintAlignment(h),
    tendency: hintTendency(h),
    height: hintHeight(h),
    birthplace: hintBirthplace(h),
  };
}

export const WINNING_HINT: Hint = packHint({
  code: Comparison.Correct,
  alignment: true,
  tendency: true,
  height: Comparison.Correct,
  birthplace: true,
});

/**
 * The hint row shown after guessing `guess` while `target` is the secret.
 * NOX guessed against NOX reports a correct code so that it stays winnable.
 */
export function computeHint(target: Sinner, guess: Sinner): Hint {
  let code: Comparison | undefined;
  if (target.code === undefined && guess.code === undefined) {
    code = Comparison.Correct;
  } else if (target.code !== undefined && guess.code !== undefined) {
    code = compare(codeThreshold(target.code), target.code, guess.code);
  }
  return packHint({
    code,
    alignment: target.alignment === guess.alignment,
    tendency: target.tendency === guess.tendency,
    height: compare(heightThreshold(target.height), target.height, guess.height),
    birthplace: target.birthplace === guess.birthplace,
  });
}
