import { existsSync, mkdirSync } from "node:fs"
import { readFile, writeFile } from "node:fs/promises"
import { dirname } from "node:path"
import initSqlJs, { type Database, type ParamsObject } from "sql.js"
import type { HistoryEntry, HistorySink } from "./history.ts"

export interface StoredPlay extends HistoryEntry {
  id: number
}

/**
 * Mirrors the play history into a SQLite database file. The database lives
 * in memory and is written back to disk after every change.
 */
export class SqliteHistorySink implements HistorySink {
  readonly name = "sqlite"

  private constructor(
    private readonly db: Database,
    private readonly path: string | null,
  ) {
    this.initSchema()
  }

  /** Opens (or creates) the database at `path`. Pass ":memory:" for a throwaway one. */
  static async open(path: string): Promise<SqliteHistorySink> {
    const SQL = await initSqlJs()
    if (path === ":memory:") {
      return new SqliteHistorySink(new SQL.Database(), null)
    }

    const dir = dirname(path)
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true })
    }
    const data = existsSync(path) ? await readFile(path) : null
    return new SqliteHistorySink(new SQL.Database(data), path)
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS plays (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        played_at TEXT NOT NULL,
        album TEXT NOT NULL,
        track TEXT NOT NULL,
        commentary TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_plays_played_at ON plays(played_at);
    `)
  }

  /** Record a play. */
  async write(entry: HistoryEntry): Promise<void> {
    this.db.run(
      `INSERT INTO plays (played_at, album, track, commentary)
       VALUES (?, ?, ?, ?)`,
      [entry.timestamp, entry.album, entry.track, entry.commentary],
    )
    await this.save()
  }

  /** Get recent plays (most recent first). */
  recent(limit = 10): StoredPlay[] {
    const statement = this.db.prepare(
      `SELECT id, played_at, album, track, commentary
       FROM plays
       ORDER BY id DESC
       LIMIT ?`,
    )

    const plays: StoredPlay[] = []
    try {
      statement.bind([limit])
      while (statement.step()) {
        plays.push(toPlay(statement.getAsObject()))
      }
    } finally {
      statement.free()
    }
    return plays
  }

  /** Clean up old plays (keep last N days). Returns how many were removed. */
  async cleanOld(days = 30): Promise<number> {
    this.db.run(
      `DELETE FROM plays
       WHERE datetime(played_at) < datetime('now', 'localtime', '-' || ? || ' days')`,
      [days],
    )
    const removed = this.db.getRowsModified()
    if (removed > 0) await this.save()
    return removed
  }

  close(): void {
    this.db.close()
  }

  private async save(): Promise<void> {
    if (!this.path) return
    await writeFile(this.path, this.db.export())
  }
}

function toPlay(row: ParamsObject): StoredPlay {
  return {
    id: Number(row.id),
    timestamp: String(row.played_at),
    album: String(row.album),
    track: String(row.track),
    commentary: String(row.commentary),
  }
}
