import { SinnerdleError } from "./errors";

const HELP_IN_DEPTH_HELP = `USAGE: sinnerdle help [command]

View in-depth help for a command`;

const GATHER_IN_DEPTH_HELP = `USAGE: sinnerdle gather

Play every possible game of Sinnerdle and gather statistical data about
the solver's performance.

The results of playing each game are sent to stdout along with a summary of the gathered data
containing the following information:
    - The first sinner the solver chooses to play
    - The maximum number of guesses it takes to guess any sinner
    - The distribution of the number of guesses it takes to guess sinners
    - The sinners that take the maximum number of guesses to guess
    - The mean number of guesses it takes to guess a sinner`;

const PLAY_IN_DEPTH_HELP = `USAGE: sinnerdle play

Play a game of Sinnerdle from the terminal

You will be put into an interactive shell with the following commands:

info [sinner]:  View info on a sinner
guess [sinner]: Guess a sinner
quit:           Quit`;

const SOLVE_IN_DEPTH_HELP = `USAGE: sinnerdle solve [guesses]

Solve a game of Sinnerdle from an optional set of starting guesses.

Guesses are made up of 5 whitespace-separated components, Code (comparison),
Alignment (boolean), Tendency (boolean), Height (comparison), and Birthplace (boolean).
Booleans are entered as 0 or 1 and comparisons are entered as follows:

    N/A:         x
    Correct:     =
    Far Less:    vv
    Less:        v
    Near:        ~
    Greater:     ^
    Far Greater: ^^

An example input for a guess is ^^ 0 0 ~ 1 and an example input for the guesses argument
is "Rook:^ 0 0 vv 0,Wren:^^ 0 0 vv 0"`;

export const PLAY_WELCOME = `
Welcome to Sinnerdle, terminal edition.
To guess a sinner, use the \`guess\` command.
To view a sinner's info, use the \`info\` command.
To quit, type \`quit\` or press Ctrl + D.

You can press tab to attempt to complete a command at any time`;

export const IN_DEPTH_HELP: ReadonlyMap<string, string> = new Map([
  ["gather", GATHER_IN_DEPTH_HELP],
  ["solve", SOLVE_IN_DEPTH_HELP],
  ["play", PLAY_IN_DEPTH_HELP],
  ["help", HELP_IN_DEPTH_HELP],
]);

export function inDepthHelp(command: string): string {
  const text = IN_DEPTH_HELP.get(command);
  if (text === undefined) throw new SinnerdleError(`Unknown command: \`${command}\``);
  return text;
}
