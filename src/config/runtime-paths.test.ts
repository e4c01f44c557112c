import test from "node:test";
import assert from "node:assert/strict";
import { existsSync, mkdtempSync, rmSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { ensureRuntimePaths, resolveRuntimePaths } from "./runtime-paths.js";

test("ensureRuntimePaths creates the history and output directories", () => {
  const tempDir = mkdtempSync(path.join(os.tmpdir(), "probe-home-"));
  const homeDir = path.join(tempDir, ".probe");
  const paths = resolveRuntimePaths(homeDir);

  try {
    assert.equal(paths.historyDbPath, path.join(homeDir, "history", "history.db"));
    ensureRuntimePaths(paths);
    assert.equal(existsSync(paths.historyDir), true);
    assert.equal(existsSync(paths.outputDir), true);
  } finally {
    rmSync(tempDir, { recursive: true, force: true });
  }
});
