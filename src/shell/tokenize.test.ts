import test from "node:test";
import assert from "node:assert/strict";
import { ShellSyntaxError } from "../cmdline/errors.js";
import { tokenizeCommandLine } from "./tokenize.js";

test("tokenizeCommandLine removes quotes around a quoted value", () => {
  assert.deepEqual(tokenizeCommandLine('-u "http://x/y?id=1" --batch'), ["-u", "http://x/y?id=1", "--batch"]);
});

test("tokenizeCommandLine joins adjacent quoted and bare parts into one word", () => {
  assert.deepEqual(tokenizeCommandLine(`--data='id=1 AND 2>1'"&x=$y" -p id`), [
    "--data=id=1 AND 2>1&x=$y",
    "-p",
    "id"
  ]);
});

test("tokenizeCommandLine honours backslash escapes", () => {
  assert.deepEqual(tokenizeCommandLine("--cookie a\\ b"), ["--cookie", "a b"]);
  assert.deepEqual(tokenizeCommandLine('"say \\"hi\\" \\n"'), ['say "hi" \\n']);
  assert.deepEqual(tokenizeCommandLine("'no \\escape'"), ["no \\escape"]);
});

test("tokenizeCommandLine keeps empty quoted words and ignores extra whitespace", () => {
  assert.deepEqual(tokenizeCommandLine('  --answers ""  \t--batch  '), ["--answers", "", "--batch"]);
  assert.deepEqual(tokenizeCommandLine("   "), []);
});

test("tokenizeCommandLine reports unterminated quotes and dangling escapes", () => {
  assert.throws(
    () => tokenizeCommandLine('-u "http://x'),
    (error: unknown) =>
      error instanceof ShellSyntaxError &&
      error.message === "something went wrong during command line parsing ('No closing quotation')"
  );
  assert.throws(() => tokenizeCommandLine("--batch \\"), /No escaped character/);
});
