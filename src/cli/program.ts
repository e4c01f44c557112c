import { Command, CommanderError, Option } from "commander";
import type { OptionCatalogue } from "../catalogue/catalogue.js";
import type { OptionGroup, OptionSpec, OptionValue } from "../catalogue/types.js";
import { UsageError } from "../cmdline/errors.js";
import type { ConsoleSink } from "./format.js";
import { parseInteger, parseNumber } from "./option-parsers.js";

export const PROGRAM_NAME = "probe";
export const HELP_HINT = "(use -h for basic and -hh for advanced help)";

export interface OptionParserSettings {
  /** Hide everything outside the basic help allow-list. */
  basicHelp: boolean;
  /** Inside the interactive shell the usage banner and the help hint are dropped. */
  shellMode: boolean;
  sink: ConsoleSink;
}

export type ParseResult =
  | { kind: "parsed"; values: Record<string, OptionValue>; positionals: string[] }
  | { kind: "help" };

/**
 * Commander program built from the option catalogue. Errors never exit the
 * process: help comes back as a "help" result and parse failures as
 * {@link UsageError} after commander has printed them.
 */
export class OptionParser {
  readonly command: Command;
  private readonly bindings = new Map<Option, OptionSpec>();

  constructor(
    catalogue: OptionCatalogue,
    private readonly settings: OptionParserSettings
  ) {
    const { sink } = settings;
    const visible = settings.basicHelp ? visibleDestinations(catalogue.basicHelpGroups()) : null;

    this.command = new Command(PROGRAM_NAME)
      .usage("[options]")
      .helpOption("-h, --help", "Show basic help message and exit")
      .allowExcessArguments(true)
      .exitOverride()
      .configureOutput({
        writeOut: (text) => sink.out(text),
        writeErr: (text) => sink.err(text)
      });

    if (settings.shellMode) {
      this.command.configureHelp({ commandUsage: () => "" });
    } else {
      this.command.showHelpAfterError(HELP_HINT);
    }

    for (const group of catalogue.groups) {
      for (const spec of group.options) {
        const option = createOption(spec, group);
        if (spec.hidden || (visible !== null && !visible.has(spec.dest))) {
          option.hideHelp();
        }
        this.command.addOption(option);
        this.bindings.set(option, spec);
      }
    }
  }

  parse(tokens: readonly string[]): ParseResult {
    try {
      this.command.parse([...tokens], { from: "user" });
    } catch (error) {
      if (error instanceof CommanderError) {
        if (error.exitCode === 0) {
          return { kind: "help" };
        }
        throw new UsageError(error.message.replace(/^error: /, ""));
      }
      throw error;
    }

    return { kind: "parsed", values: this.collectValues(), positionals: [...this.command.args] };
  }

  /** Prints a usage error the way commander prints its own. */
  reportUsage(message: string): void {
    this.settings.sink.err(`error: ${message}\n`);
    if (!this.settings.shellMode) {
      this.settings.sink.err(`${HELP_HINT}\n`);
    }
  }

  helpText(): string {
    return this.command.helpInformation();
  }

  private collectValues(): Record<string, OptionValue> {
    const parsed = this.command.opts<Record<string, unknown>>();
    const values: Record<string, OptionValue> = {};

    for (const [option, spec] of this.bindings) {
      const value = parsed[option.attributeName()];
      if (option.negate) {
        values[spec.dest] = value === false;
      } else if (spec.kind === "switch") {
        values[spec.dest] = value === true;
      } else if (typeof value === "string" || typeof value === "number") {
        values[spec.dest] = value;
      }
    }

    return values;
  }
}

function createOption(spec: OptionSpec, group: OptionGroup): Option {
  const flags = spec.flags.join(", ");
  const option = new Option(spec.kind === "value" ? `${flags} <${spec.dest.toUpperCase()}>` : flags, spec.help);

  if (spec.type === "integer") {
    option.argParser(parseInteger);
  } else if (spec.type === "number") {
    option.argParser(parseNumber);
  }

  if (spec.defaultValue !== undefined && spec.kind === "value") {
    option.default(spec.defaultValue);
  }

  if (group.title !== null) {
    option.helpGroup(group.description ? `${group.title}:\n  ${group.description}` : `${group.title}:`);
  }

  return option;
}

function visibleDestinations(groups: readonly OptionGroup[]): Set<string> {
  const visible = new Set<string>();
  for (const group of groups) {
    for (const option of group.options) {
      visible.add(option.dest);
    }
  }
  return visible;
}
