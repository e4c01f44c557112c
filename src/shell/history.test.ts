import test from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, rmSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { HistoryStore } from "./history.js";

test("HistoryStore returns lines newest first and prunes past the limit", () => {
  const tempDir = mkdtempSync(path.join(os.tmpdir(), "probe-history-"));
  const store = new HistoryStore(path.join(tempDir, "history", "history.db"), 2);

  try {
    store.append("cli", "-u http://a/?id=1");
    store.append("cli", "-u http://b/?id=1 --batch");
    store.append("cli", "--wizard");

    assert.deepEqual(store.load("cli"), ["--wizard", "-u http://b/?id=1 --batch"]);
  } finally {
    store.close();
    rmSync(tempDir, { recursive: true, force: true });
  }
});

test("HistoryStore keeps lines across reopening until cleared", () => {
  const tempDir = mkdtempSync(path.join(os.tmpdir(), "probe-history-"));
  const dbPath = path.join(tempDir, "history.db");
  const store = new HistoryStore(dbPath, 10);

  try {
    store.append("cli", "--purge");
  } finally {
    store.close();
  }

  const reopened = new HistoryStore(dbPath, 10);
  try {
    assert.deepEqual(reopened.load("cli"), ["--purge"]);
    reopened.clear("cli");
    assert.deepEqual(reopened.load("cli"), []);
  } finally {
    reopened.close();
    rmSync(tempDir, { recursive: true, force: true });
  }
});
