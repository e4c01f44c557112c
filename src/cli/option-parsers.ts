import { InvalidArgumentError } from "commander";
import type { OptionValueType } from "../catalogue/types.js";

const INTEGER_PATTERN = /^[+-]?\d+$/;
const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseInteger(value: string): number {
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new InvalidArgumentError(`Invalid integer value: ${value}`);
  }
  return Number.parseInt(trimmed, 10);
}

export function parseNumber(value: string): number {
  const trimmed = value.trim();
  if (!NUMBER_PATTERN.test(trimmed)) {
    throw new InvalidArgumentError(`Invalid number value: ${value}`);
  }
  return Number.parseFloat(trimmed);
}

/**
 * Converts a raw string into the option's declared type. Returns null when
 * the value does not convert.
 */
export function convertOptionValue(type: OptionValueType, value: string): string | number | null {
  if (type === "string") {
    return value;
  }

  try {
    return type === "integer" ? parseInteger(value) : parseNumber(value);
  } catch (error) {
    if (error instanceof InvalidArgumentError) {
      return null;
    }
    throw error;
  }
}
