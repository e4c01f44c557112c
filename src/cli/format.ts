import type { OptionValue } from "../catalogue/types.js";
import type { CanonicalArgs } from "../cmdline/parse-cmdline.js";

export interface ConsoleSink {
  out: (text: string) => void;
  err: (text: string) => void;
  /** Whether ANSI colours should be applied. */
  colors: boolean;
}

export function createProcessSink(): ConsoleSink {
  return {
    out: (text) => {
      process.stdout.write(text);
    },
    err: (text) => {
      process.stderr.write(text);
    },
    colors: Boolean(process.stdout.isTTY)
  };
}

export function printProblem(sink: ConsoleSink, message: string): void {
  sink.out(`${paint(sink, color.red, "[!]")} ${message}\n`);
}

export function printInfo(sink: ConsoleSink, message: string): void {
  sink.out(`${paint(sink, color.dim, "[i]")} ${message}\n`);
}

export function printWarning(sink: ConsoleSink, message: string): void {
  sink.err(`${paint(sink, color.yellow, `warning: ${message}`)}\n`);
}

function paint(sink: ConsoleSink, style: (value: string) => string, value: string): string {
  return sink.colors ? style(value) : value;
}

export const color = {
  dim: (value: string) => `\u001b[2m${value}\u001b[0m`,
  red: (value: string) => `\u001b[31m${value}\u001b[0m`,
  yellow: (value: string) => `\u001b[33m${value}\u001b[0m`
};

/**
 * JSON summary of a parsed command line. Unset switches and empty values are
 * left out.
 */
export function formatCanonicalArgs(args: CanonicalArgs, stdinLines: readonly string[] = []): string {
  const options: Record<string, OptionValue> = {};
  for (const [dest, value] of Object.entries(args.values)) {
    if (value !== false && value !== "") {
      options[dest] = value;
    }
  }

  return JSON.stringify(
    {
      options,
      verbose: args.verbose,
      skipThreadCheck: args.skipThreadCheck,
      shellMode: args.shellMode,
      positionals: args.positionals,
      stdin: stdinLines
    },
    null,
    2
  );
}
