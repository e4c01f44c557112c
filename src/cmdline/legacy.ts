import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { isRecord } from "../catalogue/catalogue.js";
import { CmdlineSyntaxError } from "./errors.js";

export const DEFAULT_LEGACY_PATH = fileURLToPath(new URL("../../data/legacy-options.json", import.meta.url));

export interface LegacyOptions {
  ignored: ReadonlySet<string>;
  /** Option to hint (or null); warned about and dropped. */
  deprecated: ReadonlyMap<string, string | null>;
  /** Option to hint (or null); refused outright. */
  obsolete: ReadonlyMap<string, string | null>;
}

export function loadLegacyOptions(filePath: string = DEFAULT_LEGACY_PATH): LegacyOptions {
  const raw: unknown = JSON.parse(readFileSync(filePath, "utf8"));
  if (!isRecord(raw)) {
    throw new Error("Legacy option table must be a JSON object.");
  }

  return {
    ignored: new Set(
      Array.isArray(raw.ignored) ? raw.ignored.filter((value): value is string => typeof value === "string") : []
    ),
    deprecated: parseHintTable(raw.deprecated),
    obsolete: parseHintTable(raw.obsolete)
  };
}

function parseHintTable(raw: unknown): Map<string, string | null> {
  const table = new Map<string, string | null>();
  if (!isRecord(raw)) {
    return table;
  }

  for (const [option, hint] of Object.entries(raw)) {
    table.set(option, typeof hint === "string" ? hint : null);
  }
  return table;
}

/**
 * Throws on the first obsolete switch and returns a warning for every
 * deprecated one, in argv order.
 */
export function checkLegacyOptions(tokens: readonly string[], legacy: LegacyOptions): string[] {
  const warnings: string[] = [];

  for (const token of tokens) {
    const option = token.split("=")[0].trim();

    if (legacy.obsolete.has(option)) {
      throw new CmdlineSyntaxError(withHint(`switch/option '${option}' is obsolete`, legacy.obsolete.get(option)));
    }

    if (legacy.deprecated.has(option)) {
      warnings.push(withHint(`switch/option '${option}' is deprecated`, legacy.deprecated.get(option)));
    }
  }

  return warnings;
}

function withHint(message: string, hint: string | null | undefined): string {
  return hint ? `${message} (hint: ${hint})` : message;
}
