export type CmdlineErrorCode = "syntax" | "shell-syntax" | "mnemonic" | "usage";

export abstract class CmdlineError extends Error {
  abstract readonly code: CmdlineErrorCode;
  abstract readonly exitCode: number;
}

/**
 * Malformed token on the command line (illegal characters, miswritten short
 * options, missing hyphens, obsolete switches).
 */
export class CmdlineSyntaxError extends CmdlineError {
  readonly code = "syntax";
  readonly exitCode = 1;

  constructor(message: string) {
    super(message);
    this.name = "CmdlineSyntaxError";
  }
}

export class ShellSyntaxError extends CmdlineError {
  readonly code = "shell-syntax";
  readonly exitCode = 1;

  constructor(detail: string) {
    super(`something went wrong during command line parsing ('${detail}')`);
    this.name = "ShellSyntaxError";
  }
}

export class MnemonicError extends CmdlineError {
  readonly code = "mnemonic";
  readonly exitCode = 1;

  constructor(message: string) {
    super(message);
    this.name = "MnemonicError";
  }
}

export class UsageError extends CmdlineError {
  readonly code = "usage";

  constructor(
    message: string,
    readonly exitCode: number = 2
  ) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * Raised when the user leaves the interactive shell. Not a failure.
 */
export class ShellQuitError extends Error {
  constructor() {
    super("shell quit requested");
    this.name = "ShellQuitError";
  }
}
