import { existsSync, statSync } from "node:fs";
import type { OptionCatalogue } from "../catalogue/catalogue.js";
import { CmdlineSyntaxError } from "./errors.js";
import { checkLegacyOptions, type LegacyOptions } from "./legacy.js";
import { assertConsoleCharacters, sanitizeToken } from "./sanitize.js";

const URL_SHORTHAND = /^(http|www\.|\w[\w.-]+\.\w{2,})/;
const MALFORMED_SHORT = /^-\w=.+/;
const SINGLE_DASH_LONG = /^-\w{3,}/;
const MISTYPED_TAMPER = /^--tamper[^=\s]/;
const AGGREGATED = /^--(tamper|ignore-code|skip)(?==|$)/;
const FORCED_COUNT = /^\d+!$/;
const FORCED_THREADS = /^--threads.+\d+!$/;
const OPTION_LIKE = /^-{1,2}\w/;
const VERBOSITY = /^-v+$/;
const DIGITS = /^\d+$/;

const RENAMED_PREFIXES: ReadonlyArray<readonly [string, string]> = [
  ["--data-raw", "--data"],
  ["--auth-creds", "--auth-cred"],
  ["--drop-cookie", "--drop-set-cookie"]
];

const ALIASES: ReadonlyMap<string, string> = new Map([
  ["--deps", "--dependencies"],
  ["--disable-colouring", "--disable-coloring"]
]);

export interface RewriteContext {
  catalogue: OptionCatalogue;
  legacy: LegacyOptions;
  /** Filesystem probe used by the request-file loader. */
  isFile?: (candidate: string) => boolean;
}

export interface RewrittenArgv {
  kind: "rewritten";
  /** Tokens for the option parser, deleted positions already dropped. */
  tokens: string[];
  /** Values of every -H/--header occurrence, in argv order. */
  extraHeaders: string[];
  /** Verbosity forced by -s/--silent or -vvv shorthands. */
  verbose: number | null;
  skipThreadCheck: boolean;
  basicHelp: boolean;
  warnings: string[];
}

export type RewriteResult = RewrittenArgv | { kind: "version" };

/**
 * Single left-to-right pass over the user-supplied tokens (program name
 * excluded). For each token the first matching rule wins; deleted tokens
 * become empty strings so positions stay stable until the pass ends.
 */
export function rewriteArgv(input: readonly string[], context: RewriteContext): RewriteResult {
  const { catalogue, legacy } = context;
  const isFile = context.isFile ?? isExistingFile;

  const args = input.map(sanitizeToken);
  const warnings = checkLegacyOptions(args, legacy);
  const anchors = new Map<string, number>();
  const extraHeaders: string[] = [];
  let verbose: number | null = null;
  let skipThreadCheck = false;
  let basicHelp = false;

  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (token === "") {
      continue;
    }

    if (token === "-hh") {
      args[i] = "-h";
      continue;
    }

    if (i === 0 && URL_SHORTHAND.test(token)) {
      args[i] = `--url=${token}`;
      continue;
    }

    assertConsoleCharacters(token);

    if (MALFORMED_SHORT.test(token)) {
      throw new CmdlineSyntaxError(`potentially miswritten (illegal '=') short option detected ('${token}')`);
    }

    if (SINGLE_DASH_LONG.test(token)) {
      const name = stripDashes(token).split("=")[0];
      if (catalogue.isKnownLongName(name)) {
        args[i] = `-${token}`;
      }
      continue;
    }

    if (legacy.ignored.has(token) || legacy.deprecated.has(token)) {
      args[i] = "";
      continue;
    }

    if (token === "-s" || token === "--silent") {
      const next = nextIndex(args, i);
      if (next === -1 || args[next].startsWith("-")) {
        args[i] = "";
        verbose = 0;
      }
      continue;
    }

    const renamed = RENAMED_PREFIXES.find(([from]) => token.startsWith(from));
    if (renamed) {
      args[i] = token.replace(renamed[0], renamed[1]);
      continue;
    }

    if (MISTYPED_TAMPER.test(token)) {
      args[i] = "";
      continue;
    }

    const aggregated = AGGREGATED.exec(token);
    if (aggregated) {
      aggregate(args, i, aggregated[1], anchors);
      continue;
    }

    if (token === "-H" || token === "--header" || token.startsWith("--header=")) {
      const separator = token.indexOf("=");
      if (separator !== -1) {
        extraHeaders.push(token.slice(separator + 1));
      } else if (i + 1 < args.length) {
        extraHeaders.push(args[i + 1]);
      }
      continue;
    }

    const alias = ALIASES.get(token);
    if (alias) {
      args[i] = alias;
      continue;
    }

    if (token === "-r") {
      for (let j = i + 2; j < args.length && i + 1 < args.length; j += 1) {
        if (!isFile(args[j])) {
          break;
        }
        args[i + 1] = `${args[i + 1]},${args[j]}`;
        args[j] = "";
      }
      continue;
    }

    if ((FORCED_COUNT.test(token) && args[Math.max(0, i - 1)] === "--threads") || FORCED_THREADS.test(token)) {
      args[i] = token.slice(0, -1);
      skipThreadCheck = true;
      continue;
    }

    if (token === "--version") {
      return { kind: "version" };
    }

    if (token === "-h" || token === "--help") {
      basicHelp = true;
      continue;
    }

    if (
      token.includes("=") &&
      !token.startsWith("-") &&
      catalogue.takesValue(`--${token.split("=")[0]}`) &&
      !OPTION_LIKE.test(i > 0 ? args[i - 1] : "")
    ) {
      throw new CmdlineSyntaxError(`detected usage of long-option without a starting hyphen ('${token}')`);
    }
  }

  for (let i = 0; i < args.length; i += 1) {
    if (!VERBOSITY.test(args[i])) {
      continue;
    }

    const next = nextIndex(args, i);
    if (next === -1 || !DIGITS.test(args[next])) {
      verbose = args[i].length - 1;
      args[i] = "";
    }
  }

  return {
    kind: "rewritten",
    tokens: args.filter((token) => token.length > 0),
    extraHeaders,
    verbose,
    skipThreadCheck,
    basicHelp,
    warnings
  };
}

/**
 * The first occurrence of a multi-valued option designates where its value
 * lives; later occurrences append to that position and are removed together
 * with a separate value token.
 */
function aggregate(args: string[], i: number, key: string, anchors: Map<string, number>): void {
  const token = args[i];
  const separator = token.indexOf("=");
  const next = nextIndex(args, i);
  const valueIndex = separator === -1 && next !== -1 && !args[next].startsWith("-") ? next : -1;

  const anchor = anchors.get(key);
  if (anchor === undefined) {
    if (separator !== -1) {
      anchors.set(key, i);
    } else if (valueIndex !== -1) {
      anchors.set(key, valueIndex);
    }
    return;
  }

  const value = separator !== -1 ? token.slice(separator + 1) : valueIndex !== -1 ? args[valueIndex] : "";
  if (value.length > 0) {
    args[anchor] = `${args[anchor]},${value}`;
  }
  args[i] = "";
  if (valueIndex !== -1) {
    args[valueIndex] = "";
  }
}

function nextIndex(args: readonly string[], i: number): number {
  for (let j = i + 1; j < args.length; j += 1) {
    if (args[j] !== "") {
      return j;
    }
  }
  return -1;
}

function stripDashes(token: string): string {
  return token.replace(/^-+|-+$/g, "");
}

function isExistingFile(candidate: string): boolean {
  return candidate.length > 0 && existsSync(candidate) && statSync(candidate).isFile();
}
