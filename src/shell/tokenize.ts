import { ShellSyntaxError } from "../cmdline/errors.js";

const DOUBLE_QUOTE_ESCAPABLE = new Set(['"', "\\", "$", "`"]);

/**
 * Splits a typed command line into words the way a POSIX shell would,
 * without expansion: quotes group and are removed, backslashes escape.
 */
export function tokenizeCommandLine(input: string): string[] {
  const words: string[] = [];
  let current = "";
  let inWord = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < input.length; i += 1) {
    const ch = input[i];

    if (quote === "'") {
      if (ch === "'") {
        quote = null;
      } else {
        current += ch;
      }
      continue;
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null;
      } else if (ch === "\\" && i + 1 < input.length && DOUBLE_QUOTE_ESCAPABLE.has(input[i + 1])) {
        current += input[i + 1];
        i += 1;
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === "\\") {
      if (i + 1 >= input.length) {
        throw new ShellSyntaxError("No escaped character");
      }
      current += input[i + 1];
      inWord = true;
      i += 1;
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = ch;
      inWord = true;
      continue;
    }

    if (/\s/.test(ch)) {
      if (inWord) {
        words.push(current);
        current = "";
        inWord = false;
      }
      continue;
    }

    current += ch;
    inWord = true;
  }

  if (quote !== null) {
    throw new ShellSyntaxError("No closing quotation");
  }

  if (inWord) {
    words.push(current);
  }

  return words;
}
