import test from "node:test";
import assert from "node:assert/strict";
import { CmdlineSyntaxError } from "./errors.js";
import { checkLegacyOptions, loadLegacyOptions, type LegacyOptions } from "./legacy.js";

const legacy: LegacyOptions = {
  ignored: new Set(["--compressed"]),
  deprecated: new Map<string, string | null>([
    ["--check-waf", null],
    ["--identify-waf", "functionality being done automatically"]
  ]),
  obsolete: new Map<string, string | null>([
    ["--binary", "use '--binary-fields' instead"],
    ["--check-payload", null]
  ])
};

test("checkLegacyOptions warns about deprecated switches in argv order", () => {
  const warnings = checkLegacyOptions(["-u", "http://x/?id=1", "--identify-waf", "--check-waf"], legacy);
  assert.deepEqual(warnings, [
    "switch/option '--identify-waf' is deprecated (hint: functionality being done automatically)",
    "switch/option '--check-waf' is deprecated"
  ]);
});

test("checkLegacyOptions refuses obsolete options, including their = form", () => {
  assert.throws(
    () => checkLegacyOptions(["--batch", "--binary=a"], legacy),
    (error: unknown) =>
      error instanceof CmdlineSyntaxError &&
      error.message === "switch/option '--binary' is obsolete (hint: use '--binary-fields' instead)"
  );
  assert.throws(() => checkLegacyOptions(["--check-payload"], legacy), /switch\/option '--check-payload' is obsolete$/);
});

test("loadLegacyOptions reads the bundled table", () => {
  const bundled = loadLegacyOptions();
  assert.equal(bundled.ignored.has("--compressed"), true);
  assert.equal(bundled.obsolete.get("--ignore-401"), "use '--ignore-code' instead");
  assert.equal(bundled.deprecated.get("--check-waf"), null);
});
