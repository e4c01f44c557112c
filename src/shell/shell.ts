import { createInterface, type Interface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import type { OptionCatalogue } from "../catalogue/catalogue.js";
import { printInfo, printProblem, type ConsoleSink } from "../cli/format.js";
import { ShellQuitError } from "../cmdline/errors.js";
import type { ProbeConfig } from "../config/env.js";
import { ensureRuntimePaths, resolveRuntimePaths } from "../config/runtime-paths.js";
import { HistoryStore, type ShellHistory } from "./history.js";
import { tokenizeCommandLine } from "./tokenize.js";

export const SHELL_PROMPT = "probe > ";
export const SHELL_COMMANDS = ["x", "q", "exit", "quit", "clear"] as const;

const QUIT_COMMANDS = new Set(["x", "q", "exit", "quit"]);
const VALID_EXAMPLE = "valid example: '-u http://www.site.com/vuln.php?id=1 --banner'";

export interface LineReader {
  /** Resolves to null when the user interrupts or input ends. */
  question(prompt: string): Promise<string | null>;
  close(): void;
}

export interface ShellSession {
  sink: ConsoleSink;
  history: ShellHistory;
  reader: LineReader;
}

export type ShellStep = { kind: "prompt" } | { kind: "done"; tokens: string[] };

/**
 * Prompts until an option line is entered and returns its words. Leaving the
 * shell (quit command, Ctrl+C, end of input) throws {@link ShellQuitError}.
 */
export async function runShellSession(session: ShellSession): Promise<string[]> {
  while (true) {
    const line = await session.reader.question(SHELL_PROMPT);
    if (line === null) {
      session.sink.out("\n");
      throw new ShellQuitError();
    }

    const step = evaluateShellLine(line, session);
    if (step.kind === "done") {
      return step.tokens;
    }
  }
}

export function evaluateShellLine(line: string, session: Pick<ShellSession, "sink" | "history">): ShellStep {
  const command = line.trim().replace(/^new\s+/i, "");
  const lowered = command.toLowerCase();

  if (command.length === 0) {
    return { kind: "prompt" };
  }

  if (lowered === "clear") {
    session.history.clear("cli");
    printInfo(session.sink, "history cleared");
    return { kind: "prompt" };
  }

  if (QUIT_COMMANDS.has(lowered)) {
    throw new ShellQuitError();
  }

  if (!command.startsWith("-")) {
    if (!/^(\?|help)$/i.test(command)) {
      printProblem(session.sink, "invalid option(s) provided");
    }
    printInfo(session.sink, VALID_EXAMPLE);
    return { kind: "prompt" };
  }

  session.history.append("cli", command);
  return { kind: "done", tokens: tokenizeCommandLine(command) };
}

export function buildCompletionVocabulary(catalogue: OptionCatalogue): string[] {
  return [...new Set<string>([...SHELL_COMMANDS, ...catalogue.invocations])].sort();
}

/** Completes the last word of the line against the vocabulary. */
export function createCompleter(vocabulary: readonly string[]): (line: string) => [string[], string] {
  return (line) => {
    const word = line.split(/\s+/).pop() ?? "";
    const hits = vocabulary.filter((candidate) => candidate.startsWith(word));
    return [hits.length > 0 ? hits : [...vocabulary], word];
  };
}

export class ReadlineLineReader implements LineReader {
  private readonly rl: Interface;

  constructor(options: { history: string[]; historySize: number; completer: (line: string) => [string[], string] }) {
    this.rl = createInterface({
      input,
      output,
      terminal: Boolean(input.isTTY),
      history: options.history,
      historySize: options.historySize,
      completer: options.completer
    });
  }

  async question(prompt: string): Promise<string | null> {
    const controller = new AbortController();
    const abort = (): void => controller.abort();
    this.rl.once("SIGINT", abort);
    this.rl.once("close", abort);

    try {
      return await this.rl.question(prompt, { signal: controller.signal });
    } catch (error) {
      if (controller.signal.aborted) {
        return null;
      }
      throw error;
    } finally {
      this.rl.off("SIGINT", abort);
      this.rl.off("close", abort);
    }
  }

  close(): void {
    this.rl.close();
  }
}

export interface InteractiveShellInput {
  catalogue: OptionCatalogue;
  sink: ConsoleSink;
  config: ProbeConfig;
}

export async function startInteractiveShell({ catalogue, sink, config }: InteractiveShellInput): Promise<string[]> {
  const paths = resolveRuntimePaths(config.homeDir);
  ensureRuntimePaths(paths);

  const history = new HistoryStore(paths.historyDbPath, config.historySize);
  const reader = new ReadlineLineReader({
    history: history.load("cli"),
    historySize: config.historySize,
    completer: createCompleter(buildCompletionVocabulary(catalogue))
  });

  try {
    return await runShellSession({ sink, history, reader });
  } finally {
    reader.close();
    history.close();
  }
}
