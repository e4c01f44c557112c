import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { isRecord } from "../catalogue/catalogue.js";

const PACKAGE_JSON_PATH = fileURLToPath(new URL("../../package.json", import.meta.url));

/** Full version string, e.g. "probe/1.0.0#stable". */
export function readVersionString(packageJsonPath: string = PACKAGE_JSON_PATH): string {
  const raw: unknown = JSON.parse(readFileSync(packageJsonPath, "utf8"));
  const version = isRecord(raw) && typeof raw.version === "string" ? raw.version : "0.0.0";
  return `probe/${version}#stable`;
}

/** The part shown by --version: everything after the program name. */
export function displayVersion(versionString: string): string {
  const separator = versionString.indexOf("/");
  return separator === -1 ? versionString : versionString.slice(separator + 1);
}
