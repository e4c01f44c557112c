import type { OptionCatalogue } from "../catalogue/catalogue.js";
import type { OptionValue } from "../catalogue/types.js";
import { UsageError } from "./errors.js";
import { expandMnemonics } from "./mnemonics.js";
import { isCiEnvironment, type StdinSource } from "./stdin.js";

export const DUMMY_URL = "http://foo/bar?id=1";

/** Options that define what to work on. */
const TARGET_DESTINATIONS = [
  "direct",
  "url",
  "logFile",
  "bulkFile",
  "googleDork",
  "configFile",
  "requestFile"
] as const;

/** Modes that run without a target. */
const STANDALONE_DESTINATIONS = [
  "updateAll",
  "smokeTest",
  "vulnTest",
  "wizard",
  "dependencies",
  "purge",
  "listTampers",
  "hashFile"
] as const;

export const MISSING_TARGET_MESSAGE =
  "missing a mandatory option (-d, -u, -l, -m, -r, -g, -c, --wizard, --shell, --update, --purge, --list-tampers or --dependencies). " +
  "Use -h for basic and -hh for advanced help";

export type OptionValues = Record<string, OptionValue>;

export interface ValidationInput {
  values: OptionValues;
  /** Rewritten tokens as handed to the parser. */
  tokens: readonly string[];
  extraHeaders: readonly string[];
  catalogue: OptionCatalogue;
  stdin: StdinSource;
  env: NodeJS.ProcessEnv;
}

export interface ValidatedOptions {
  values: OptionValues;
  stdinPipe: AsyncIterable<string> | null;
  warnings: string[];
}

export function validateOptions(input: ValidationInput): ValidatedOptions {
  const values: OptionValues = { ...input.values };
  const warnings: string[] = [];

  const headers = mergeHeaders(stringValue(values, "headers"), input.extraHeaders);
  if (headers !== undefined) {
    values.headers = headers;
  }

  for (let i = 0; i < input.tokens.length - 1; i += 1) {
    if (input.tokens[i] !== "-z") {
      continue;
    }
    const expansion = expandMnemonics(input.tokens[i + 1], input.catalogue);
    warnings.push(...expansion.warnings);
    for (const assignment of expansion.assignments) {
      values[assignment.dest] = assignment.value;
    }
  }

  if (values.dummy === true && !isSet(values, "url")) {
    values.url = DUMMY_URL;
  }

  const stdinPipe = shouldReadStdin(values, input.stdin, input.env) ? input.stdin.lines() : null;

  assertTargetPresent(values, stdinPipe !== null);

  return { values, stdinPipe, warnings };
}

/**
 * Appends individually given headers to the bulk headers value, one per line.
 * Reuses the literal "\n" escape when the bulk value already separates with it.
 */
export function mergeHeaders(existing: string | undefined, extra: readonly string[]): string | undefined {
  if (extra.length === 0) {
    return existing;
  }

  const current = existing ?? "";
  const delimiter = current.includes("\\n") ? "\\n" : "\n";
  const joined = extra.join(delimiter);
  if (current.length === 0) {
    return joined;
  }
  return current.endsWith(delimiter) ? `${current}${joined}` : `${current}${delimiter}${joined}`;
}

export function assertTargetPresent(values: OptionValues, hasStdinPipe: boolean): void {
  const present =
    hasStdinPipe ||
    TARGET_DESTINATIONS.some((dest) => isSet(values, dest)) ||
    STANDALONE_DESTINATIONS.some((dest) => isSet(values, dest));

  if (!present) {
    throw new UsageError(MISSING_TARGET_MESSAGE);
  }
}

function shouldReadStdin(values: OptionValues, stdin: StdinSource, env: NodeJS.ProcessEnv): boolean {
  return !stdin.isTTY && values.api !== true && values.ignoreStdin !== true && !isCiEnvironment(env);
}

export function isSet(values: OptionValues, dest: string): boolean {
  const value = values[dest];
  return value !== undefined && value !== false && value !== "";
}

export function stringValue(values: OptionValues, dest: string): string | undefined {
  const value = values[dest];
  return typeof value === "string" ? value : undefined;
}
