import { ConsistencyError, QuitRequested, SinnerdleError } from "./errors";
import { computeHint } from "./hint";
import { matchesHint } from "./matches";
import type { LinePrompt } from "./prompt";
import { formatHint, formatSinnerInfo, paint } from "./render";
import { Hint, Sinner, sameSinner } from "./types";

export const CONTRADICTION = 255;

export type Output = (line: string) => void;

export interface Player {
  /** Records the hint shown after playing `guess`. */
  update(h: Hint, guess: Sinner): void;
  /** The next sinner to play; `undefined` when the state is contradictory. */
  nextGuess(): Sinner | undefined | Promise<Sinner | undefined>;
}

export interface SyncPlayer extends Player {
  nextGuess(): Sinner | undefined;
}

export class Game {
  private guessNum = 1;

  constructor(readonly target: Sinner) {}

  get guessNumber(): number {
    return this.guessNum;
  }

  /** Plays `guess`; `undefined` means it was the target. */
  guess(guess: Sinner): Hint | undefined {
    if (sameSinner(guess, this.target)) return undefined;
    const h = computeHint(this.target, guess);
    this.guessNum++;
    return h;
  }
}

// One round of the loop; a number means the game is over.
function takeTurn(game: Game, player: Player, play: Sinner | undefined, out: Output): number | undefined {
  if (play === undefined) {
    out("No possible guesses in this state. There is likely a contradiction.");
    return CONTRADICTION;
  }
  out(`Guessed ${play.name}`);
  const h = game.guess(play);
  if (h === undefined) {
    out(paint(" =  1  1  =  1", "green"));
    out(`Won! The sinner was ${game.target.name}!`);
    out(`Won in ${game.guessNumber} guesses!\n`);
    return game.guessNumber;
  }
  out(formatHint(h));
  if (!matchesHint(h, play, game.target)) {
    throw new ConsistencyError(
      `Target (${game.target.name}) does not match its own result (${formatHint(h, false)}) ` +
        `based on guess (${play.name}). This is a bug.`,
    );
  }
  player.update(h, play);
  return undefined;
}

/** Runs a game to the end and returns the number of guesses taken. */
export async function playGame(target: Sinner, player: Player, out: Output = console.log): Promise<number> {
  const game = new Game(target);
  for (;;) {
    const result = takeTurn(game, player, await player.nextGuess(), out);
    if (result !== undefined) return result;
  }
}

export function playGameSync(target: Sinner, player: SyncPlayer, out: Output = console.log): number {
  const game = new Game(target);
  for (;;) {
    const result = takeTurn(game, player, player.nextGuess(), out);
    if (result !== undefined) return result;
  }
}

export function findSinner(roster: readonly Sinner[], name: string): Sinner | undefined {
  const lower = name.trim().toLowerCase();
  return roster.find((s) => s.name.toLowerCase() === lower);
}

export function humanCompletions(roster: readonly Sinner[]): string[] {
  return [...roster.map((s) => `info ${s.name}`), ...roster.map((s) => `guess ${s.name}`), "quit"];
}

/** A player typing commands at the terminal; it sees the hints directly. */
export class HumanPlayer implements Player {
  constructor(
    private readonly choices: readonly Sinner[],
    private readonly prompt: LinePrompt,
    private readonly out: Output = console.log,
    private readonly err: Output = console.error,
  ) {}

  update(): void {}

  async nextGuess(): Promise<Sinner | undefined> {
    for (;;) {
      const line = await this.prompt.ask("sinnerdle >> ");
      if (line === undefined) throw new SinnerdleError("Aborted!");
      const buffer = line.trim();
      if (buffer === "quit") throw new QuitRequested();
      const space = buffer.indexOf(" ");
      if (space < 0) {
        this.err(`Unknown command: \`${buffer}\``);
        continue;
      }
      const cmd = buffer.slice(0, space);
      const arg = buffer.slice(space + 1);
      if (cmd !== "info" && cmd !== "guess") {
        this.err(`Unknown command: \`${cmd}\``);
        continue;
      }
      const sinner = findSinner(this.choices, arg);
      if (sinner === undefined) {
        this.err(`Unknown Sinner: \`${arg}\``);
        continue;
      }
      if (cmd === "guess") return sinner;
      this.out(formatSinnerInfo(sinner));
    }
  }
}
