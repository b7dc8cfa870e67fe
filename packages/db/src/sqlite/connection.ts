import path from "node:path";
import { open, type Database } from "sqlite";
import sqlite3 from "sqlite3";
import { PathHelper } from "@clia/shared";

const IN_MEMORY_DB = ":memory:";
export const SQLITE_BUSY_TIMEOUT_MS = 5_000;

const isInMemory = (dbPath: string): boolean => dbPath === IN_MEMORY_DB;

/** Opens the history file (creating its directory) with WAL on disk and a busy timeout. */
export class SqliteConnection {
  private constructor(
    readonly db: Database,
    readonly dbPath: string,
  ) {}

  static async open(dbPath: string): Promise<SqliteConnection> {
    const resolved = isInMemory(dbPath) ? dbPath : PathHelper.expandHome(dbPath);
    if (!isInMemory(resolved)) await PathHelper.ensureDir(path.dirname(resolved));
    const db = await open({ filename: resolved, driver: sqlite3.Database });
    await db.exec("PRAGMA foreign_keys = ON;");
    await db.exec(`PRAGMA busy_timeout = ${SQLITE_BUSY_TIMEOUT_MS};`);
    if (!isInMemory(resolved)) await db.exec("PRAGMA journal_mode = WAL;");
    return new SqliteConnection(db, resolved);
  }

  async close(): Promise<void> {
    await this.db.close();
  }
}
