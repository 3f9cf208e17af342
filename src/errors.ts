export class SinnerdleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class HintParseError extends SinnerdleError {
  constructor(readonly input: string, reason: string) {
    super(`Invalid hint \`${input.trim()}\`: ${reason}`);
  }
}

export class SeedParseError extends SinnerdleError {
  constructor(readonly input: string, reason: string) {
    super(`Invalid guess \`${input.trim()}\`: ${reason}`);
  }
}

export class UnknownSinnerError extends SinnerdleError {
  constructor(readonly sinnerName: string) {
    super(`No sinner with name ${sinnerName} found`);
  }
}

export class RosterError extends SinnerdleError {}

export class ContradictionError extends SinnerdleError {
  constructor() {
    super("No possible guesses in this state. There is likely a contradiction.");
  }
}

// Not a SinnerdleError: the CLI must not treat it as bad input.
export class ConsistencyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConsistencyError";
  }
}

// Raised by an interactive player when the user asks to leave.
export class QuitRequested extends Error {
  constructor() {
    super("quit");
    this.name = "QuitRequested";
  }
}
