import type { DatabaseType } from "@clia/shared";
import type { SqlDriver } from "../drivers/SqlDriver.js";

const SQLITE_SCHEMA = [
  `CREATE TABLE IF NOT EXISTS users (
    id TEXT PRIMARY KEY,
    os_identity TEXT NOT NULL UNIQUE,
    created_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS chat_sessions (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL REFERENCES users(id),
    name TEXT NOT NULL,
    description TEXT,
    created_at TEXT NOT NULL,
    ended_at TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS history (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id TEXT NOT NULL,
    session_id TEXT,
    query_text TEXT NOT NULL,
    response_text TEXT NOT NULL,
    created_at TEXT NOT NULL
  )`,
  "CREATE INDEX IF NOT EXISTS idx_history_user_created ON history(user_id, created_at, id)",
  "CREATE INDEX IF NOT EXISTS idx_chat_sessions_user ON chat_sessions(user_id)",
];

const POSTGRES_SCHEMA = [
  `CREATE TABLE IF NOT EXISTS users (
    id TEXT PRIMARY KEY,
    os_identity TEXT NOT NULL UNIQUE,
    created_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS chat_sessions (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL REFERENCES users(id),
    name TEXT NOT NULL,
    description TEXT,
    created_at TEXT NOT NULL,
    ended_at TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS history (
    id BIGSERIAL PRIMARY KEY,
    user_id TEXT NOT NULL,
    session_id TEXT,
    query_text TEXT NOT NULL,
    response_text TEXT NOT NULL,
    created_at TEXT NOT NULL
  )`,
  "CREATE INDEX IF NOT EXISTS idx_history_user_created ON history(user_id, created_at, id)",
  "CREATE INDEX IF NOT EXISTS idx_chat_sessions_user ON chat_sessions(user_id)",
];

// MySQL cannot index unbounded TEXT columns and has no CREATE INDEX IF NOT
// EXISTS, so keys are declared inline.
const MYSQL_SCHEMA = [
  `CREATE TABLE IF NOT EXISTS users (
    id VARCHAR(36) PRIMARY KEY,
    os_identity VARCHAR(64) NOT NULL UNIQUE,
    created_at VARCHAR(32) NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS chat_sessions (
    id VARCHAR(36) PRIMARY KEY,
    user_id VARCHAR(36) NOT NULL,
    name VARCHAR(64) NOT NULL,
    description VARCHAR(256),
    created_at VARCHAR(32) NOT NULL,
    ended_at VARCHAR(32),
    KEY idx_chat_sessions_user (user_id),
    CONSTRAINT fk_chat_sessions_user FOREIGN KEY (user_id) REFERENCES users(id)
  )`,
  `CREATE TABLE IF NOT EXISTS history (
    id BIGINT AUTO_INCREMENT PRIMARY KEY,
    user_id VARCHAR(36) NOT NULL,
    session_id VARCHAR(36),
    query_text LONGTEXT NOT NULL,
    response_text LONGTEXT NOT NULL,
    created_at VARCHAR(32) NOT NULL,
    KEY idx_history_user_created (user_id, created_at, id)
  )`,
];

const SCHEMAS: Record<DatabaseType, string[]> = {
  sqlite: SQLITE_SCHEMA,
  postgresql: POSTGRES_SCHEMA,
  mysql: MYSQL_SCHEMA,
};

/**
 * Creates the history schema for the driver's dialect. Each backend keeps its
 * own schema; nothing is migrated between backend kinds.
 */
export class HistoryMigrations {
  static statementsFor(dialect: DatabaseType): readonly string[] {
    return SCHEMAS[dialect];
  }

  static async run(driver: SqlDriver): Promise<void> {
    for (const statement of SCHEMAS[driver.dialect]) {
      await driver.exec(statement);
    }
  }
}
