import { CmdlineSyntaxError } from "./errors.js";

// Hyphen, en dash, minus sign, em dash, CJK "one", ogham space mark, small
// and full-width hyphen-minus.
const DASH_LOOKALIKES = /^[\u2010\u2013\u2212\u2014\u4e00\u1680\ufe63\uff0d]+/;

const QUOTE_MARKS = new Set(
  "\u00ab\u2039\u00bb\u203a\u201e\u201c\u201f\u201d\u2019\u275d\u275e\u276e\u276f\u2e42\u301d\u301e\u301f\uff02\u201a\u2018\u201b\u275b\u275c"
);

const FULLWIDTH_COMMA = "\uff0c";

export function normalizeDashes(token: string): string {
  return token.replace(DASH_LOOKALIKES, (run) => "-".repeat(run.length));
}

export function stripQuoteMarks(token: string): string {
  let start = 0;
  let end = token.length;
  while (start < end && QUOTE_MARKS.has(token[start])) {
    start += 1;
  }
  while (end > start && QUOTE_MARKS.has(token[end - 1])) {
    end -= 1;
  }
  return token.slice(start, end);
}

export function sanitizeToken(token: string): string {
  return stripQuoteMarks(normalizeDashes(token));
}

/**
 * Rejects tokens carrying typographic quotes or full-width commas around an
 * option value, as left behind by commands copied from web pages. Expects a
 * token that already went through {@link sanitizeToken}, so surrounding quote
 * marks are gone and only the ones next to the value remain.
 */
export function assertConsoleCharacters(token: string): void {
  if (token.length <= 1) {
    return;
  }

  const value = valuePart(token);
  const head = value.trim()[0] ?? " ";
  if (isTypographicQuote(head)) {
    throw new CmdlineSyntaxError(
      `copy-pasting illegal (non-console) quote characters from Internet is illegal (${token})`
    );
  }

  if (value.includes(FULLWIDTH_COMMA)) {
    throw new CmdlineSyntaxError(
      `copy-pasting illegal (non-console) comma characters from Internet is illegal (${token})`
    );
  }
}

function valuePart(token: string): string {
  const separator = token.indexOf("=");
  return separator === -1 ? token : token.slice(separator + 1);
}

function isTypographicQuote(char: string): boolean {
  const code = char.charCodeAt(0);
  return code >= 0x2018 && code < 0x2020;
}
