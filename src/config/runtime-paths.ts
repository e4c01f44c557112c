import { mkdirSync } from "node:fs";
import path from "node:path";

export interface RuntimePaths {
  rootDir: string;
  historyDir: string;
  historyDbPath: string;
  outputDir: string;
}

export function resolveRuntimePaths(homeDir: string): RuntimePaths {
  const historyDir = path.join(homeDir, "history");

  return {
    rootDir: homeDir,
    historyDir,
    historyDbPath: path.join(historyDir, "history.db"),
    outputDir: path.join(homeDir, "output")
  };
}

export function ensureRuntimePaths(paths: RuntimePaths): void {
  mkdirSync(paths.rootDir, { recursive: true });
  mkdirSync(paths.historyDir, { recursive: true });
  mkdirSync(paths.outputDir, { recursive: true });
}
