import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { HISTORY_SCHEMA_SQL } from "./schema.js";

/** History namespace of the option prompt. */
export type HistoryKind = "cli";

type LineRow = {
  line: string;
};

export interface ShellHistory {
  load(kind: HistoryKind): string[];
  append(kind: HistoryKind, line: string): void;
  clear(kind: HistoryKind): void;
}

/**
 * Command history persisted in SQLite. Each kind keeps at most `maxEntries`
 * lines; older ones are pruned on append.
 */
export class HistoryStore implements ShellHistory {
  private readonly db: Database.Database;

  constructor(
    dbPath: string,
    private readonly maxEntries: number
  ) {
    mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma("busy_timeout = 5000");
    this.db.pragma("journal_mode = WAL");
    this.db.exec(HISTORY_SCHEMA_SQL);
  }

  close(): void {
    this.db.close();
  }

  /** Newest first, the order readline expects. */
  load(kind: HistoryKind): string[] {
    const rows = this.db
      .prepare<[HistoryKind, number], LineRow>(
        `
        SELECT line
        FROM history
        WHERE kind = ?
        ORDER BY id DESC
        LIMIT ?
      `
      )
      .all(kind, this.maxEntries);

    return rows.map((row) => row.line);
  }

  append(kind: HistoryKind, line: string): void {
    const insert = this.db.prepare<[HistoryKind, string, string]>(
      "INSERT INTO history (kind, line, created_at) VALUES (?, ?, ?)"
    );
    const prune = this.db.prepare<[HistoryKind, HistoryKind, number]>(
      `
      DELETE FROM history
      WHERE kind = ?
        AND id NOT IN (
          SELECT id FROM history WHERE kind = ? ORDER BY id DESC LIMIT ?
        )
    `
    );

    this.db.transaction(() => {
      insert.run(kind, line, new Date().toISOString());
      prune.run(kind, kind, this.maxEntries);
    })();
  }

  clear(kind: HistoryKind): void {
    this.db.prepare<[HistoryKind]>("DELETE FROM history WHERE kind = ?").run(kind);
  }
}
