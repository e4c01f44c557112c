import { loadOptionCatalogue, type OptionCatalogue } from "../catalogue/catalogue.js";
import { createProcessSink, printProblem, printWarning, type ConsoleSink } from "../cli/format.js";
import { OptionParser } from "../cli/program.js";
import { loadProbeConfig } from "../config/env.js";
import { startInteractiveShell } from "../shell/shell.js";
import { CmdlineError, ShellQuitError, UsageError, type CmdlineErrorCode } from "./errors.js";
import { loadLegacyOptions, type LegacyOptions } from "./legacy.js";
import { rewriteArgv } from "./rewriter.js";
import { processStdin, type StdinSource } from "./stdin.js";
import { validateOptions, type OptionValues, type ValidatedOptions, type ValidationInput } from "./validator.js";
import { displayVersion, readVersionString } from "./version.js";

export interface CanonicalArgs {
  /** Resolved value of every destination the parser knows, after merging and expansion. */
  values: OptionValues;
  /** Lines piped on standard input; null when stdin is a terminal or reading it is disabled. */
  stdinPipe: AsyncIterable<string> | null;
  verbose: number;
  skipThreadCheck: boolean;
  shellMode: boolean;
  positionals: string[];
}

export type CmdlineOutcome =
  | { kind: "parsed"; args: CanonicalArgs }
  | { kind: "exit"; exitCode: 0 }
  | { kind: "quit" }
  | { kind: "error"; code: CmdlineErrorCode; message: string; exitCode: number };

export type ShellLauncher = (catalogue: OptionCatalogue, sink: ConsoleSink) => Promise<string[]>;

export interface CmdlineDependencies {
  catalogue?: OptionCatalogue;
  legacy?: LegacyOptions;
  sink?: ConsoleSink;
  stdin?: StdinSource;
  env?: NodeJS.ProcessEnv;
  isFile?: (candidate: string) => boolean;
  shell?: ShellLauncher;
  versionString?: string;
}

const FULL_HELP_HINT = "to see full list of options run with '-hh'";

/**
 * Runs the whole command-line pipeline over the user-supplied tokens (the
 * program name excluded) and reports the result as an outcome instead of
 * exiting. Diagnostics are written to the sink before returning.
 */
export async function parseCmdline(argv: readonly string[], deps: CmdlineDependencies = {}): Promise<CmdlineOutcome> {
  const sink = deps.sink ?? createProcessSink();
  const env = deps.env ?? process.env;

  try {
    const catalogue = deps.catalogue ?? loadOptionCatalogue();
    const legacy = deps.legacy ?? loadLegacyOptions();
    const tokens = [...argv];
    const shellMode = tokens.includes("--shell");

    if (shellMode) {
      const launchShell = deps.shell ?? defaultShell(env);
      tokens.push(...(await launchShell(catalogue, sink)));
    }

    const rewritten = rewriteArgv(tokens, { catalogue, legacy, isFile: deps.isFile });
    if (rewritten.kind === "version") {
      sink.out(`${displayVersion(deps.versionString ?? readVersionString())}\n`);
      return { kind: "exit", exitCode: 0 };
    }

    for (const warning of rewritten.warnings) {
      printWarning(sink, warning);
    }

    const parser = new OptionParser(catalogue, { basicHelp: rewritten.basicHelp, shellMode, sink });
    const parsed = parser.parse(rewritten.tokens);
    if (parsed.kind === "help") {
      if (rewritten.basicHelp) {
        sink.out("\n");
        printProblem(sink, FULL_HELP_HINT);
      }
      return { kind: "exit", exitCode: 0 };
    }

    const validated = validateOrReport(parser, {
      values: parsed.values,
      tokens: rewritten.tokens,
      extraHeaders: rewritten.extraHeaders,
      catalogue,
      stdin: deps.stdin ?? processStdin(),
      env
    });

    for (const warning of validated.warnings) {
      printWarning(sink, warning);
    }

    const parsedVerbose = validated.values.verbose;
    return {
      kind: "parsed",
      args: {
        values: validated.values,
        stdinPipe: validated.stdinPipe,
        verbose: rewritten.verbose ?? (typeof parsedVerbose === "number" ? parsedVerbose : 1),
        skipThreadCheck: rewritten.skipThreadCheck,
        shellMode,
        positionals: parsed.positionals
      }
    };
  } catch (error) {
    if (error instanceof ShellQuitError) {
      return { kind: "quit" };
    }

    if (error instanceof CmdlineError) {
      // Usage errors were already printed by the parser.
      if (!(error instanceof UsageError)) {
        printProblem(sink, error.message);
      }
      return { kind: "error", code: error.code, message: error.message, exitCode: error.exitCode };
    }

    throw error;
  }
}

function validateOrReport(parser: OptionParser, input: ValidationInput): ValidatedOptions {
  try {
    return validateOptions(input);
  } catch (error) {
    if (error instanceof UsageError) {
      parser.reportUsage(error.message);
    }
    throw error;
  }
}

function defaultShell(env: NodeJS.ProcessEnv): ShellLauncher {
  return (catalogue, sink) => startInteractiveShell({ catalogue, sink, config: loadProbeConfig(env) });
}
