import { ContradictionError, HintParseError, UnknownSinnerError } from "./errors";
import { parseHint } from "./hint_parser";
import { findSinner, Output } from "./play";
import type { LinePrompt } from "./prompt";
import { OptimalPlayer } from "./solver";
import { Hint, NameAndHint, Sinner } from "./types";

export type SolveIo = {
  prompt: LinePrompt;
  out: Output;
  err: Output;
};

const INSTRUCTIONS = [
  "======== Welcome to the Sinnerdle Solver ========",
  "This solver picks the guess that leaves the fewest sinners on average.\n",
  "======== Instructions ========",
  "Enter a row as seen on the website when prompted and guess the sinner you are prompted to play.",
  "Entries in the row are separated by whitespace.",
  "Comparisons are entered as vv/v/~/=/^/^^ and booleans are entered as 0 or 1.",
  "An example input is ^^ 0 0 ~ 1",
  "==============================",
];

function names(sinners: readonly Sinner[]): string {
  return sinners.map((s) => s.name).join(", ");
}

/** Feeds previously seen rows to a fresh player. */
export function seedPlayer(roster: readonly Sinner[], seeds: readonly NameAndHint[]): OptimalPlayer {
  const player = new OptimalPlayer(roster);
  for (const { name, hint } of seeds) {
    const sinner = findSinner(roster, name);
    if (sinner === undefined) throw new UnknownSinnerError(name);
    player.update(hint, sinner);
  }
  return player;
}

async function readRow(io: SolveIo): Promise<Hint | undefined> {
  for (;;) {
    const line = await io.prompt.ask("Enter row or q to quit: ");
    if (line === undefined || line.trim() === "q") return undefined;
    try {
      return parseHint(line);
    } catch (e) {
      if (!(e instanceof HintParseError)) throw e;
      io.err(e.message);
    }
  }
}

/**
 * Recommends guesses for a game played elsewhere until one sinner is left.
 * Resolves to that sinner, or `undefined` if the user quit.
 */
export async function runSolveSession(
  roster: readonly Sinner[],
  seeds: readonly NameAndHint[],
  io: SolveIo,
): Promise<Sinner | undefined> {
  for (const line of INSTRUCTIONS) io.out(line);
  const player = seedPlayer(roster, seeds);
  if (seeds.length > 0) io.out(`Possible Sinners: ${names(player.remaining)}`);

  for (;;) {
    const sinner = player.nextGuess();
    if (sinner === undefined) throw new ContradictionError();
    io.out(`Guess ${sinner.name}`);
    if (player.remaining.length === 1) {
      io.out("GG! You won.");
      return sinner;
    }
    const h = await readRow(io);
    if (h === undefined) return undefined;
    player.update(h, sinner);
    io.out(`Possible Sinners: ${names(player.remaining)}`);
  }
}
