import os from "node:os";
import path from "node:path";
import { config as loadDotEnv } from "dotenv";

const MIN_HISTORY_SIZE = 1;
const MAX_HISTORY_SIZE = 10_000;

export interface ProbeConfig {
  homeDir: string;
  historySize: number;
  nonInteractive: boolean;
}

export function loadProbeConfig(env: NodeJS.ProcessEnv = process.env): ProbeConfig {
  loadDotEnv();

  return {
    homeDir: env.PROBE_HOME?.trim() || path.join(os.homedir(), ".probe"),
    historySize: parseBoundedInt(env.PROBE_HISTORY_SIZE, 500, MIN_HISTORY_SIZE, MAX_HISTORY_SIZE),
    nonInteractive: parseBoolean(env.PROBE_NON_INTERACTIVE, false)
  };
}

function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (!raw) {
    return fallback;
  }

  const normalized = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }

  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }

  return fallback;
}

function parseBoundedInt(raw: string | undefined, fallback: number, min: number, max: number): number {
  if (!raw) {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    return fallback;
  }

  if (parsed < min) {
    return min;
  }

  if (parsed > max) {
    return max;
  }

  return parsed;
}
