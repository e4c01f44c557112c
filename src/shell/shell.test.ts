import test from "node:test";
import assert from "node:assert/strict";
import { parseOptionCatalogue } from "../catalogue/catalogue.js";
import type { ConsoleSink } from "../cli/format.js";
import { ShellQuitError, ShellSyntaxError } from "../cmdline/errors.js";
import type { HistoryKind, ShellHistory } from "./history.js";
import { buildCompletionVocabulary, createCompleter, runShellSession, type LineReader } from "./shell.js";

class ScriptedReader implements LineReader {
  readonly prompts: string[] = [];

  constructor(private readonly lines: Array<string | null>) {}

  async question(prompt: string): Promise<string | null> {
    this.prompts.push(prompt);
    return this.lines.shift() ?? null;
  }

  close(): void {}
}

class MemoryHistory implements ShellHistory {
  entries: string[] = [];
  clearedKinds: HistoryKind[] = [];

  load(): string[] {
    return [...this.entries].reverse();
  }

  append(_kind: HistoryKind, line: string): void {
    this.entries.push(line);
  }

  clear(kind: HistoryKind): void {
    this.entries = [];
    this.clearedKinds.push(kind);
  }
}

function captureSink(): { sink: ConsoleSink; out: string[] } {
  const out: string[] = [];
  return { sink: { out: (text) => out.push(text), err: (text) => out.push(text), colors: false }, out };
}

const EXAMPLE_LINE = "[i] valid example: '-u http://www.site.com/vuln.php?id=1 --banner'\n";

test("runShellSession returns the words of the first option line", async () => {
  const reader = new ScriptedReader(["", "   ", "new -u 'http://x/?id=1' --batch"]);
  const history = new MemoryHistory();
  const { sink } = captureSink();

  const tokens = await runShellSession({ sink, history, reader });

  assert.deepEqual(tokens, ["-u", "http://x/?id=1", "--batch"]);
  assert.deepEqual(reader.prompts, ["probe > ", "probe > ", "probe > "]);
  assert.deepEqual(history.entries, ["-u 'http://x/?id=1' --batch"]);
});

test("runShellSession explains valid input and clears history on request", async () => {
  const reader = new ScriptedReader(["help", "foo", "Clear", "--wizard"]);
  const history = new MemoryHistory();
  history.entries.push("--purge");
  const { sink, out } = captureSink();

  const tokens = await runShellSession({ sink, history, reader });

  assert.deepEqual(tokens, ["--wizard"]);
  assert.deepEqual(out, [EXAMPLE_LINE, "[!] invalid option(s) provided\n", EXAMPLE_LINE, "[i] history cleared\n"]);
  assert.deepEqual(history.clearedKinds, ["cli"]);
  assert.deepEqual(history.entries, ["--wizard"]);
});

test("runShellSession treats quit commands and interrupts as a quit", async () => {
  for (const command of ["x", "q", "exit", "QUIT"]) {
    const { sink } = captureSink();
    await assert.rejects(
      runShellSession({ sink, history: new MemoryHistory(), reader: new ScriptedReader([command]) }),
      ShellQuitError
    );
  }

  const { sink, out } = captureSink();
  await assert.rejects(
    runShellSession({ sink, history: new MemoryHistory(), reader: new ScriptedReader([null]) }),
    ShellQuitError
  );
  assert.deepEqual(out, ["\n"]);
});

test("runShellSession reports malformed quoting as a syntax error", async () => {
  const history = new MemoryHistory();
  const { sink } = captureSink();

  await assert.rejects(
    runShellSession({ sink, history, reader: new ScriptedReader(['-u "http://x/?id=1']) }),
    ShellSyntaxError
  );
  assert.deepEqual(history.entries, ['-u "http://x/?id=1']);
});

test("completion covers shell commands and every option invocation", () => {
  const catalogue = parseOptionCatalogue({
    groups: [
      {
        title: "Target",
        options: [
          { flags: ["-u", "--url"], dest: "url", kind: "value" },
          { flags: ["--batch"], dest: "batch", kind: "switch" }
        ]
      }
    ],
    basicHelp: ["url"]
  });

  const vocabulary = buildCompletionVocabulary(catalogue);
  assert.deepEqual(vocabulary, ["--batch", "--help", "--url", "-h", "-hh", "-u", "clear", "exit", "q", "quit", "x"]);

  const complete = createCompleter(vocabulary);
  assert.deepEqual(complete("-u http://x/?id=1 --b"), [["--batch"], "--b"]);
  assert.deepEqual(complete("qu"), [["quit"], "qu"]);
  assert.deepEqual(complete("--zz"), [vocabulary, "--zz"]);
});
