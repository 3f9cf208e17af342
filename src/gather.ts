import { CONTRADICTION, Output, playGameSync } from "./play";
import { OptimalPlayer } from "./solver";
import { Sinner } from "./types";

export type GameResult = {
  target: Sinner;
  guesses: number;
};

export type GatherStats = {
  firstGuess?: Sinner;
  results: GameResult[];
  maxGuesses: number;
  distribution: Map<number, number>; // guesses -> number of targets
  hardest: Sinner[];
  mean: number;
};

const silent: Output = () => {};

export function summarize(results: GameResult[], firstGuess?: Sinner): GatherStats {
  const solved = results.filter((r) => r.guesses !== CONTRADICTION);
  const maxGuesses = solved.reduce((m, r) => Math.max(m, r.guesses), 0);
  const distribution = new Map<number, number>();
  for (let rounds = 1; rounds <= maxGuesses; rounds++) {
    distribution.set(rounds, solved.filter((r) => r.guesses === rounds).length);
  }
  const sum = solved.reduce((acc, r) => acc + r.guesses, 0);
  return {
    firstGuess,
    results,
    maxGuesses,
    distribution,
    hardest: solved.filter((r) => r.guesses === maxGuesses).map((r) => r.target),
    mean: solved.length > 0 ? sum / solved.length : 0,
  };
}

/** Plays every roster entry as the secret with a fresh optimal player. */
export function gatherData(roster: readonly Sinner[], out: Output = silent): GatherStats {
  const results = roster.map((target) => ({
    target,
    guesses: playGameSync(target, new OptimalPlayer(roster), out),
  }));
  return summarize(results, new OptimalPlayer(roster).nextGuess());
}

export function formatGatherReport(stats: GatherStats): string {
  const lines: string[] = [];
  const total = stats.results.length;
  lines.push(`Goto first sinner to play: ${stats.firstGuess?.name ?? "none"}`);
  lines.push(`It takes ${stats.maxGuesses} or less guesses to guess any sinner.`);
  for (const [rounds, count] of stats.distribution) {
    lines.push(`    ${count} sinners take ${rounds} guesses (${((count * 100) / total).toFixed(2)}%)`);
  }
  lines.push("The sinners that take the maximum number of guesses rounds are:");
  for (const s of stats.hardest) lines.push(`    ${s.name}`);
  const failed = stats.results.filter((r) => r.guesses === CONTRADICTION);
  if (failed.length > 0) {
    lines.push(`Contradictions (${CONTRADICTION}) for: ${failed.map((r) => r.target.name).join(", ")}`);
  }
  lines.push(`The mean number of guesses is ${stats.mean.toFixed(2)}`);
  return lines.join("\n");
}
