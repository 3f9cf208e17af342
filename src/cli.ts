#!/usr/bin/env node
import { randomInt } from "node:crypto";
import { Command } from "commander";
import { loadConfig } from "./config";
import { QuitRequested, SinnerdleError } from "./errors";
import { formatGatherReport, gatherData } from "./gather";
import { inDepthHelp, PLAY_WELCOME } from "./help";
import { parseSeeds } from "./hint_parser";
import { setDebug } from "./log";
import { HumanPlayer, humanCompletions, playGame } from "./play";
import { createLinePrompt, type LinePrompt } from "./prompt";
import { loadRoster } from "./roster";
import { runSolveSession } from "./solve_session";
import { Sinner } from "./types";

type GlobalOptions = {
  forceCacheUpdate?: boolean;
};

export type CliDeps = {
  env: NodeJS.ProcessEnv;
  openPrompt: (completions?: readonly string[]) => LinePrompt;
};

const defaultDeps: CliDeps = {
  env: process.env,
  openPrompt: (completions) => createLinePrompt(completions),
};

export function buildProgram(deps: Partial<CliDeps> = {}): Command {
  const { env, openPrompt } = { ...defaultDeps, ...deps };
  const program = new Command();

  const roster = async (): Promise<Sinner[]> => {
    const config = loadConfig(env, program.opts<GlobalOptions>());
    setDebug(config.debug);
    return loadRoster(config);
  };

  program
    .name("sinnerdle")
    .description(
      "Play and solve games of Sinnerdle, a daily puzzle for guessing sinners based on their characteristics.",
    )
    .option("-f, --force-cache-update", "force-fetch the latest sinner data and store it in the cache")
    .helpCommand(false);

  program
    .command("help")
    .description("view in-depth help for a command")
    .argument("<command>", "the command to view help for")
    .action((command: string) => {
      console.error(inDepthHelp(command));
    });

  program
    .command("gather")
    .description("play every possible game and gather statistical data about the solver's performance")
    .action(async () => {
      const stats = gatherData(await roster(), console.log);
      console.log(formatGatherReport(stats));
    });

  program
    .command("play")
    .description("play a game from the terminal")
    .action(async () => {
      const sinners = await roster();
      console.log(PLAY_WELCOME);
      const target = sinners[randomInt(sinners.length)];
      const prompt = openPrompt(humanCompletions(sinners));
      try {
        await playGame(target, new HumanPlayer(sinners, prompt));
      } finally {
        prompt.close();
      }
    });

  program
    .command("solve")
    .description("solve a game from an optional set of starting guesses")
    .argument("[guesses]", "comma-separated list of previous guesses as name:row, see `help solve`")
    .action(async (guesses: string | undefined) => {
      const seeds = parseSeeds(guesses ?? "");
      const sinners = await roster();
      const prompt = openPrompt();
      try {
        await runSolveSession(sinners, seeds, { prompt, out: console.log, err: console.error });
      } finally {
        prompt.close();
      }
    });

  return program;
}

export async function main(argv: string[] = process.argv, deps: Partial<CliDeps> = {}): Promise<number> {
  try {
    await buildProgram(deps).parseAsync(argv);
    return 0;
  } catch (e) {
    if (e instanceof QuitRequested) return 0;
    if (e instanceof SinnerdleError) {
      console.error(e.message);
      return 1;
    }
    throw e;
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      console.error(e);
      process.exitCode = 1;
    },
  );
}
