import type { OptionCatalogue } from "../catalogue/catalogue.js";
import type { OptionSpec, OptionValue } from "../catalogue/types.js";
import { convertOptionValue } from "../cli/option-parsers.js";
import { MnemonicError } from "./errors.js";

export interface MnemonicAssignment {
  mnemonic: string;
  dest: string;
  value: OptionValue;
}

export interface MnemonicExpansion {
  assignments: MnemonicAssignment[];
  warnings: string[];
}

interface Candidate {
  name: string;
  option: OptionSpec;
}

/**
 * Expands a macro such as "flu,bat,lev=3" into option assignments. Each code
 * is a dash-less prefix of an option name from a titled catalogue group.
 * Codes matching no option are skipped with a warning.
 */
export function expandMnemonics(macro: string, catalogue: OptionCatalogue): MnemonicExpansion {
  const vocabulary = buildVocabulary(catalogue);
  const assignments: MnemonicAssignment[] = [];
  const warnings: string[] = [];
  const claimed = new Map<string, string>();

  for (const mnemonic of macro.split(",")) {
    const separator = mnemonic.indexOf("=");
    const name = (separator === -1 ? mnemonic : mnemonic.slice(0, separator)).replace(/-/g, "").trim();
    const rawValue = separator === -1 ? null : mnemonic.slice(separator + 1);

    if (name.length === 0) {
      continue;
    }

    const resolved = resolveMnemonic(name, vocabulary, warnings);
    if (resolved === null) {
      warnings.push(`mnemonic '${name}' can't be resolved to any parameter name`);
      continue;
    }

    const value = resolveValue(name, resolved, rawValue);

    const owner = claimed.get(resolved.dest);
    if (owner !== undefined) {
      warnings.push(`mnemonic '${name}' ignored ('${resolved.dest}' already set by mnemonic '${owner}')`);
      continue;
    }

    claimed.set(resolved.dest, name);
    assignments.push({ mnemonic: name, dest: resolved.dest, value });
  }

  return { assignments, warnings };
}

function buildVocabulary(catalogue: OptionCatalogue): Candidate[] {
  const vocabulary: Candidate[] = [];
  for (const group of catalogue.groups) {
    if (group.title === null) {
      continue;
    }
    for (const option of group.options) {
      for (const flag of option.flags) {
        vocabulary.push({ name: flag.replace(/-/g, ""), option });
      }
    }
  }
  return vocabulary;
}

function resolveMnemonic(name: string, vocabulary: Candidate[], warnings: string[]): OptionSpec | null {
  const matches = vocabulary.filter((candidate) => candidate.name.startsWith(name));
  if (matches.length === 0) {
    return null;
  }

  const exact = matches.find((candidate) => candidate.name === name);
  if (exact) {
    return exact.option;
  }

  const options = new Set(matches.map((candidate) => candidate.option));
  if (options.size === 1) {
    return matches[0].option;
  }

  const shortest = [...matches].sort((left, right) => left.name.length - right.name.length)[0];
  warnings.push(
    `detected ambiguity (mnemonic '${name}' can be resolved to any of: ${matches
      .map((candidate) => `'${candidate.name}'`)
      .join(", ")}). Resolving to shortest of those ('${shortest.name}')`
  );
  return shortest.option;
}

function resolveValue(name: string, option: OptionSpec, rawValue: string | null): OptionValue {
  if (option.kind === "switch") {
    return true;
  }

  const converted = rawValue === null ? null : convertOptionValue(option.type, rawValue);
  if (converted === null) {
    throw new MnemonicError(`mnemonic '${name}' requires value of type '${option.type}'`);
  }
  return converted;
}
