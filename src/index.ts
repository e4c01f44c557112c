#!/usr/bin/env node

import { createProcessSink, formatCanonicalArgs } from "./cli/format.js";
import { shouldHoldConsole, waitForEnter } from "./cli/prompt.js";
import { parseCmdline, type CmdlineOutcome } from "./cmdline/parse-cmdline.js";
import { loadProbeConfig } from "./config/env.js";

async function main(): Promise<void> {
  const config = loadProbeConfig();
  const sink = createProcessSink();
  const argv = process.argv.slice(2);

  const outcome = await parseCmdline(argv, { sink });
  process.exitCode = exitCodeOf(outcome);

  if (outcome.kind === "parsed") {
    const stdinLines: string[] = [];
    if (outcome.args.stdinPipe) {
      for await (const line of outcome.args.stdinPipe) {
        stdinLines.push(line);
      }
    }
    sink.out(`${formatCanonicalArgs(outcome.args, stdinLines)}\n`);
    return;
  }

  if ((outcome.kind === "exit" || outcome.kind === "error") && shouldHoldConsole(argv, config.nonInteractive, process.platform)) {
    await waitForEnter();
  }
}

function exitCodeOf(outcome: CmdlineOutcome): number {
  switch (outcome.kind) {
    case "error":
      return outcome.exitCode;
    case "exit":
      return outcome.exitCode;
    default:
      return 0;
  }
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error: ${message}`);
  process.exitCode = 1;
});
