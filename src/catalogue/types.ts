export type OptionKind = "switch" | "value";

export type OptionValueType = "string" | "integer" | "number";

export type OptionValue = string | number | boolean;

export interface OptionSpec {
  flags: string[];
  dest: string;
  kind: OptionKind;
  type: OptionValueType;
  help: string;
  defaultValue?: OptionValue;
  hidden: boolean;
}

export interface OptionGroup {
  title: string | null;
  description: string | null;
  options: OptionSpec[];
}
