import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type { OptionGroup, OptionKind, OptionSpec, OptionValue, OptionValueType } from "./types.js";

export const DEFAULT_CATALOGUE_PATH = fileURLToPath(new URL("../../data/option-catalogue.json", import.meta.url));

const HELP_INVOCATIONS = ["-h", "--help", "-hh"];

/**
 * Read-only view over the declarative option schema. Built once per process
 * and handed to the rewriter, the shell and the parser builder.
 */
export class OptionCatalogue {
  readonly groups: readonly OptionGroup[];
  readonly basicHelp: ReadonlySet<string>;
  /** Long names (without dashes) of options that take a value. */
  readonly longOptions: ReadonlySet<string>;
  /** Long names (without dashes) of boolean switches. */
  readonly longSwitches: ReadonlySet<string>;
  readonly invocations: ReadonlySet<string>;
  private readonly byFlag: ReadonlyMap<string, OptionSpec>;

  constructor(groups: OptionGroup[], basicHelp: string[]) {
    this.groups = groups;
    this.basicHelp = new Set(basicHelp);

    const longOptions = new Set<string>();
    const longSwitches = new Set<string>();
    const invocations = new Set<string>(HELP_INVOCATIONS);
    const byFlag = new Map<string, OptionSpec>();

    for (const option of this.allOptions()) {
      for (const flag of option.flags) {
        if (byFlag.has(flag)) {
          throw new Error(`Duplicate option flag in catalogue: ${flag}`);
        }
        byFlag.set(flag, option);
        invocations.add(flag);

        if (flag.startsWith("--")) {
          const name = flag.slice(2);
          if (option.kind === "value") {
            longOptions.add(name);
          } else {
            longSwitches.add(name);
          }
        }
      }
    }

    this.longOptions = longOptions;
    this.longSwitches = longSwitches;
    this.invocations = invocations;
    this.byFlag = byFlag;
  }

  *allOptions(): Generator<OptionSpec> {
    for (const group of this.groups) {
      yield* group.options;
    }
  }

  findByFlag(flag: string): OptionSpec | undefined {
    return this.byFlag.get(flag);
  }

  takesValue(flag: string): boolean {
    return this.findByFlag(flag)?.kind === "value";
  }

  isKnownLongName(name: string): boolean {
    return this.longOptions.has(name) || this.longSwitches.has(name);
  }

  /**
   * Groups as shown by basic help: titled groups keep only their basic
   * destinations and disappear when nothing is left. The untitled top-level
   * group is never filtered.
   */
  basicHelpGroups(): OptionGroup[] {
    const groups: OptionGroup[] = [];
    for (const group of this.groups) {
      if (group.title === null) {
        groups.push(group);
        continue;
      }

      const options = group.options.filter((option) => this.basicHelp.has(option.dest));
      if (options.length > 0) {
        groups.push({ ...group, options });
      }
    }
    return groups;
  }
}

export function loadOptionCatalogue(filePath: string = DEFAULT_CATALOGUE_PATH): OptionCatalogue {
  const raw: unknown = JSON.parse(readFileSync(filePath, "utf8"));
  return parseOptionCatalogue(raw);
}

export function parseOptionCatalogue(raw: unknown): OptionCatalogue {
  if (!isRecord(raw) || !Array.isArray(raw.groups)) {
    throw new Error("Option catalogue must be an object with a groups array.");
  }

  const groups = raw.groups.map((group, index) => parseGroup(group, index));
  const basicHelp = Array.isArray(raw.basicHelp)
    ? raw.basicHelp.filter((value): value is string => typeof value === "string")
    : [];

  return new OptionCatalogue(groups, basicHelp);
}

function parseGroup(raw: unknown, index: number): OptionGroup {
  if (!isRecord(raw) || !Array.isArray(raw.options)) {
    throw new Error(`Option group #${index} must be an object with an options array.`);
  }

  return {
    title: typeof raw.title === "string" ? raw.title : null,
    description: typeof raw.description === "string" ? raw.description : null,
    options: raw.options.map((option) => parseOption(option))
  };
}

function parseOption(raw: unknown): OptionSpec {
  if (!isRecord(raw) || typeof raw.dest !== "string" || !Array.isArray(raw.flags)) {
    throw new Error(`Invalid option entry: ${JSON.stringify(raw)}`);
  }

  const flags = raw.flags.filter((flag): flag is string => typeof flag === "string" && flag.startsWith("-"));
  if (flags.length === 0) {
    throw new Error(`Option '${raw.dest}' has no flags.`);
  }

  const kind = parseKind(raw.kind, raw.dest);
  const spec: OptionSpec = {
    flags,
    dest: raw.dest,
    kind,
    type: kind === "switch" ? "string" : parseValueType(raw.type, raw.dest),
    help: typeof raw.help === "string" ? raw.help : "",
    hidden: raw.hidden === true
  };

  if (isOptionValue(raw.default)) {
    spec.defaultValue = raw.default;
  }

  return spec;
}

function parseKind(raw: unknown, dest: string): OptionKind {
  if (raw === "switch" || raw === "value") {
    return raw;
  }
  throw new Error(`Option '${dest}' has invalid kind: ${String(raw)}`);
}

function parseValueType(raw: unknown, dest: string): OptionValueType {
  if (raw === undefined) {
    return "string";
  }
  if (raw === "string" || raw === "integer" || raw === "number") {
    return raw;
  }
  throw new Error(`Option '${dest}' has invalid type: ${String(raw)}`);
}

function isOptionValue(value: unknown): value is OptionValue {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
