import { MOST_COMMON_HEIGHT } from "./compare";
import { hintAlignment, hintBirthplace, hintCode, hintHeight, hintTendency } from "./hint";
import { Comparison, Hint, Sinner } from "./types";

const H0 = MOST_COMMON_HEIGHT;

// integer division truncating toward zero
function div(a: number, b: number): number {
  return Math.trunc(a / b);
}

/**
 * Would a secret with code `target` produce `comparison` when `guess` is
 * played? The bands belong to the secret, so each edge is linear in `target`:
 * near = (100 + 2t) / 20 and far = (1000 + 7t) / 20.
 */
export function codeMatches(guess: number, target: number, comparison: Comparison): boolean {
  switch (comparison) {
    case Comparison.Correct:
      return target === guess;
    case Comparison.FarLess:
      return 27 * target < 20 * guess - 1000;
    case Comparison.Less:
      return 27 * target >= 20 * guess - 1000 && 11 * target < 10 * guess - 50;
    case Comparison.Near:
      return target !== guess && 11 * target >= 10 * guess - 50 && 9 * target <= 10 * guess + 50;
    case Comparison.Greater:
      return 9 * target > 10 * guess + 50 && 13 * target <= 20 * guess + 1000;
    case Comparison.FarGreater:
      return 13 * target > 20 * guess + 1000;
  }
}

// The height bands widen with |t - 168|, so every edge is piecewise in the
// guess depending on which side of 168 the edge itself lands.

export function heightBelowUpperNear(guess: number, target: number): boolean {
  if (guess <= H0 - 3) return target <= div(10 * guess + H0 + 30, 11);
  return target <= div(10 * guess - H0 + 30, 9);
}

export function heightAboveLowerNear(guess: number, target: number): boolean {
  if (guess <= H0 + 3) return target >= div(10 * guess - H0 - 30 + 8, 9);
  return target >= div(10 * guess + H0 - 30 + 10, 11);
}

export function heightBelowUpperFar(guess: number, target: number): boolean {
  if (guess <= H0 - 15) return target <= div(20 * guess + 7 * H0 + 300, 27);
  return target <= div(20 * guess - 7 * H0 + 300, 13);
}

export function heightAboveLowerFar(guess: number, target: number): boolean {
  if (guess <= H0 + 15) return target >= div(20 * guess - 7 * H0 - 300 + 12, 13);
  return target >= div(20 * guess + 7 * H0 - 300 + 26, 27);
}

export function heightMatches(guess: number, target: number, comparison: Comparison): boolean {
  switch (comparison) {
    case Comparison.Correct:
      return guess === target;
    case Comparison.Near:
      return guess !== target && heightBelowUpperNear(guess, target) && heightAboveLowerNear(guess, target);
    case Comparison.Greater:
      return !heightBelowUpperNear(guess, target) && heightBelowUpperFar(guess, target);
    case Comparison.FarGreater:
      return !heightBelowUpperNear(guess, target) && !heightBelowUpperFar(guess, target);
    case Comparison.Less:
      return !heightAboveLowerNear(guess, target) && heightAboveLowerFar(guess, target);
    case Comparison.FarLess:
      return !heightAboveLowerNear(guess, target) && !heightAboveLowerFar(guess, target);
  }
}

function codeSlotMatches(h: Hint, guess: Sinner, candidate: Sinner): boolean {
  const comparison = hintCode(h);
  const g = guess.code;
  const t = candidate.code;
  if (comparison === undefined) {
    // absent only when exactly one side is NOX
    return (g === undefined) !== (t === undefined);
  }
  if (g === undefined || t === undefined) {
    return g === undefined && t === undefined && comparison === Comparison.Correct;
  }
  return codeMatches(g, t, comparison);
}

/** True iff `computeHint(candidate, guess)` would equal `h`. */
export function matchesHint(h: Hint, guess: Sinner, candidate: Sinner): boolean {
  if ((candidate.alignment === guess.alignment) !== hintAlignment(h)) return false;
  if ((candidate.tendency === guess.tendency) !== hintTendency(h)) return false;
  if ((candidate.birthplace === guess.birthplace) !== hintBirthplace(h)) return false;
  if (!codeSlotMatches(h, guess, candidate)) return false;
  return heightMatches(guess.height, candidate.height, hintHeight(h));
}
