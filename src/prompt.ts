import * as readline from "node:readline";

export type LinePrompt = {
  /** Resolves to `undefined` once input has ended. */
  ask(prompt: string): Promise<string | undefined>;
  close(): void;
};

export function createLinePrompt(
  completions: readonly string[] = [],
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): LinePrompt {
  const rl = readline.createInterface({
    input,
    output,
    completer: (line: string): [string[], string] => {
      const lower = line.toLowerCase();
      return [completions.filter((c) => c.toLowerCase().startsWith(lower)), line];
    },
  });
  // the iterator buffers lines that arrive before the next ask()
  const lines = rl[Symbol.asyncIterator]();
  return {
    async ask(prompt: string) {
      rl.setPrompt(prompt);
      rl.prompt();
      const next = await lines.next();
      return next.done ? undefined : next.value;
    },
    close() {
      rl.close();
    },
  };
}
