import { createInterface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";

/**
 * Keeps a console window open until Enter is pressed. Does nothing when
 * there is no terminal to read from.
 */
export async function waitForEnter(message: string = "\nPress Enter to continue..."): Promise<void> {
  if (!process.stdin.isTTY) {
    return;
  }

  const rl = createInterface({ input, output });
  try {
    await rl.question(message);
  } finally {
    rl.close();
  }
}

/** Whether a finished run should hold the console open (Windows double-click launches). */
export function shouldHoldConsole(argv: readonly string[], nonInteractive: boolean, platform: NodeJS.Platform): boolean {
  return platform === "win32" && !nonInteractive && !argv.includes("--non-interactive");
}
