import { computeHint, WINNING_HINT } from "./hint";
import { matchesHint } from "./matches";
import type { SyncPlayer } from "./play";
import { debugLog } from "./log";
import { Hint, Sinner, sameSinner } from "./types";

export type GuessScore = {
  guess: Sinner;
  total: number; // sum over secrets of surviving candidates
  mean: number; // total / |candidates|
};

/**
 * Mean number of candidates that would survive playing `guess`, taken over
 * every other candidate as the secret. Divides by the full set size,
 * including the guess itself.
 */
export function scoreGuess(candidates: readonly Sinner[], guess: Sinner): GuessScore {
  let total = 0;
  for (const target of candidates) {
    if (sameSinner(target, guess)) continue;
    const h = computeHint(target, guess);
    for (const c of candidates) {
      if (matchesHint(h, guess, c)) total++;
    }
  }
  return { guess, total, mean: total / candidates.length };
}

/** Candidates consistent with seeing `h` after playing `guess`. */
export function filterCandidates(candidates: readonly Sinner[], h: Hint, guess: Sinner): Sinner[] {
  if (h === WINNING_HINT) return candidates.filter((c) => sameSinner(c, guess));
  return candidates.filter((c) => matchesHint(h, guess, c) && c.code !== guess.code);
}

/**
 * Picks the candidate minimizing the expected size of the surviving set.
 * Ties go to the earliest candidate.
 */
export function bestGuess(candidates: readonly Sinner[]): GuessScore | undefined {
  if (candidates.length === 0) return undefined;
  if (candidates.length === 1) return { guess: candidates[0], total: 0, mean: 0 };
  let best: GuessScore | undefined;
  for (const guess of candidates) {
    const score = scoreGuess(candidates, guess);
    if (best === undefined || score.total < best.total) best = score;
  }
  return best;
}

/** A player guessing by minimum expected remaining candidates. */
export class OptimalPlayer implements SyncPlayer {
  private candidates: Sinner[];

  constructor(roster: readonly Sinner[]) {
    this.candidates = [...roster];
  }

  get remaining(): readonly Sinner[] {
    return this.candidates;
  }

  update(h: Hint, guess: Sinner): void {
    const before = this.candidates.length;
    this.candidates = filterCandidates(this.candidates, h, guess);
    debugLog(`filtered ${before} -> ${this.candidates.length} candidates after ${guess.name}`);
  }

  nextGuess(): Sinner | undefined {
    const best = bestGuess(this.candidates);
    if (best !== undefined) debugLog(`best guess ${best.guess.name} (mean ${best.mean.toFixed(3)})`);
    return best?.guess;
  }
}
