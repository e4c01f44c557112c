import { createInterface } from "node:readline";

export interface StdinSource {
  isTTY: boolean;
  /** Lazily reads the stream line by line; nothing is consumed until iterated. */
  lines: () => AsyncIterable<string>;
}

export function processStdin(): StdinSource {
  return {
    isTTY: Boolean(process.stdin.isTTY),
    lines: () => readLines(process.stdin)
  };
}

export async function* readLines(stream: NodeJS.ReadableStream): AsyncGenerator<string> {
  const rl = createInterface({ input: stream, crlfDelay: Infinity });
  try {
    for await (const line of rl) {
      yield line;
    }
  } finally {
    rl.close();
  }
}

export function isCiEnvironment(env: NodeJS.ProcessEnv): boolean {
  return ["GITHUB_ACTIONS", "CI"].some((name) => isTruthyFlag(env[name]));
}

function isTruthyFlag(raw: string | undefined): boolean {
  if (!raw) {
    return false;
  }
  const normalized = raw.trim().toLowerCase();
  return normalized.length > 0 && normalized !== "false" && normalized !== "0";
}
