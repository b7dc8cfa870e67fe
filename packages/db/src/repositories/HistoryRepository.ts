import { randomUUID } from "node:crypto";
import {
  CliaError,
  StorageError,
  type AppendHistoryInput,
  type ChatSession,
  type ChatSessionDetails,
  type DatabaseType,
  type HistoryEntry,
  type HistoryFilter,
  type User,
} from "@clia/shared";
import type { SqlDriver, SqlRow } from "../drivers/SqlDriver.js";
import { toRowId } from "../drivers/SqlDriver.js";
import type { HistoryStore } from "../HistoryStore.js";

const HISTORY_COLUMNS = "id, user_id, session_id, query_text, response_text, created_at";
const USER_COLUMNS = "id, os_identity, created_at";
const SESSION_COLUMNS = "id, user_id, name, description, created_at, ended_at";

const readString = (row: SqlRow, column: string): string => {
  const value = row[column];
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "bigint") return String(value);
  throw new Error(`Column ${column} is missing or not text`);
};

const readOptionalString = (row: SqlRow, column: string): string | undefined => {
  const value = row[column];
  return value === null || value === undefined ? undefined : readString(row, column);
};

const mapHistoryRow = (row: SqlRow): HistoryEntry => ({
  id: toRowId(row.id),
  userId: readString(row, "user_id"),
  sessionId: readOptionalString(row, "session_id") ?? null,
  queryText: readString(row, "query_text"),
  responseText: readString(row, "response_text"),
  createdAt: readString(row, "created_at"),
});

const mapUserRow = (row: SqlRow): User => ({
  id: readString(row, "id"),
  osIdentity: readString(row, "os_identity"),
  createdAt: readString(row, "created_at"),
});

const mapSessionRow = (row: SqlRow): ChatSession => {
  const description = readOptionalString(row, "description");
  const endedAt = readOptionalString(row, "ended_at");
  return {
    id: readString(row, "id"),
    userId: readString(row, "user_id"),
    name: readString(row, "name"),
    ...(description ? { description } : {}),
    createdAt: readString(row, "created_at"),
    ...(endedAt ? { endedAt } : {}),
  };
};

const insertUserIfAbsent = (dialect: DatabaseType): string => {
  switch (dialect) {
    case "sqlite":
      return "INSERT OR IGNORE INTO users (id, os_identity, created_at) VALUES (?, ?, ?)";
    case "mysql":
      return "INSERT IGNORE INTO users (id, os_identity, created_at) VALUES (?, ?, ?)";
    case "postgresql":
      return "INSERT INTO users (id, os_identity, created_at) VALUES (?, ?, ?) ON CONFLICT (os_identity) DO NOTHING";
  }
};

// Under REPEATABLE READ a plain SELECT keeps the transaction's first snapshot
// and misses a row a concurrent first call committed; a locking read does not.
const lockedRead = (dialect: DatabaseType): string => (dialect === "sqlite" ? "" : " FOR UPDATE");

export const matchesKeyword = (entry: HistoryEntry, keyword: string, caseSensitive: boolean): boolean => {
  if (caseSensitive) {
    return entry.queryText.includes(keyword) || entry.responseText.includes(keyword);
  }
  const needle = keyword.toLowerCase();
  return entry.queryText.toLowerCase().includes(needle) || entry.responseText.toLowerCase().includes(needle);
};

export interface HistoryRepositoryOptions {
  now?: () => Date;
}

export class HistoryRepository implements HistoryStore {
  private now: () => Date;

  constructor(private driver: SqlDriver, options: HistoryRepositoryOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  get backend(): DatabaseType {
    return this.driver.dialect;
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof CliaError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new StorageError(`${operation} failed: ${reason}`, error);
    }
  }

  async append(input: AppendHistoryInput): Promise<HistoryEntry> {
    return this.guard("history append", () =>
      this.driver.transaction(async (tx) => {
        const createdAt = this.now().toISOString();
        const sessionId = input.sessionId ?? null;
        const id = await tx.insert(
          "INSERT INTO history (user_id, session_id, query_text, response_text, created_at) VALUES (?, ?, ?, ?, ?)",
          [input.userId, sessionId, input.queryText, input.responseText, createdAt],
          "id",
        );
        return {
          id,
          userId: input.userId,
          sessionId,
          queryText: input.queryText,
          responseText: input.responseText,
          createdAt,
        };
      }),
    );
  }

  async list(userId: string, filter: HistoryFilter): Promise<HistoryEntry[]> {
    return this.guard("history list", async () => {
      switch (filter.kind) {
        case "first":
          return this.select(`WHERE user_id = ? ORDER BY created_at ASC, id ASC LIMIT 1`, [userId]);
        case "last":
          return this.select(`WHERE user_id = ? ORDER BY created_at DESC, id DESC LIMIT 1`, [userId]);
        case "session":
          return this.select(`WHERE user_id = ? AND session_id = ? ORDER BY created_at ASC, id ASC`, [
            userId,
            filter.sessionId,
          ]);
        case "keyword": {
          const entries = await this.select(`WHERE user_id = ? ORDER BY created_at ASC, id ASC`, [userId]);
          return entries.filter((entry) => matchesKeyword(entry, filter.keyword, filter.caseSensitive));
        }
        case "all":
          return this.select(`WHERE user_id = ? ORDER BY created_at ASC, id ASC`, [userId]);
      }
    });
  }

  private async select(clause: string, params: string[]): Promise<HistoryEntry[]> {
    const rows = await this.driver.all(`SELECT ${HISTORY_COLUMNS} FROM history ${clause}`, params);
    return rows.map(mapHistoryRow);
  }

  async clear(userId: string): Promise<number> {
    return this.guard("history clear", () =>
      this.driver.transaction(async (tx) => {
        const result = await tx.run("DELETE FROM history WHERE user_id = ?", [userId]);
        return result.changes;
      }),
    );
  }

  async getUserByOsIdentity(osIdentity: string): Promise<User | undefined> {
    return this.guard("user lookup", async () => {
      const row = await this.driver.get(`SELECT ${USER_COLUMNS} FROM users WHERE os_identity = ?`, [osIdentity]);
      return row ? mapUserRow(row) : undefined;
    });
  }

  async ensureUser(osIdentity: string): Promise<User> {
    return this.guard("user creation", () =>
      this.driver.transaction(async (tx) => {
        const existing = await tx.get(`SELECT ${USER_COLUMNS} FROM users WHERE os_identity = ?`, [osIdentity]);
        if (existing) return mapUserRow(existing);
        await tx.run(insertUserIfAbsent(this.driver.dialect), [randomUUID(), osIdentity, this.now().toISOString()]);
        const created = await tx.get(
          `SELECT ${USER_COLUMNS} FROM users WHERE os_identity = ?${lockedRead(this.driver.dialect)}`,
          [osIdentity],
        );
        if (!created) {
          throw new StorageError(`User for identity ${osIdentity} was not persisted`);
        }
        return mapUserRow(created);
      }),
    );
  }

  async createSession(userId: string, details: ChatSessionDetails): Promise<ChatSession> {
    return this.guard("session creation", () =>
      this.driver.transaction(async (tx) => {
        const session: ChatSession = {
          id: randomUUID(),
          userId,
          name: details.name,
          ...(details.description ? { description: details.description } : {}),
          createdAt: this.now().toISOString(),
        };
        await tx.run(
          "INSERT INTO chat_sessions (id, user_id, name, description, created_at, ended_at) VALUES (?, ?, ?, ?, ?, NULL)",
          [session.id, session.userId, session.name, session.description ?? null, session.createdAt],
        );
        return session;
      }),
    );
  }

  async getSession(sessionId: string): Promise<ChatSession | undefined> {
    return this.guard("session lookup", async () => {
      const row = await this.driver.get(`SELECT ${SESSION_COLUMNS} FROM chat_sessions WHERE id = ?`, [sessionId]);
      return row ? mapSessionRow(row) : undefined;
    });
  }

  async endSession(sessionId: string): Promise<ChatSession | undefined> {
    return this.guard("session end", () =>
      this.driver.transaction(async (tx) => {
        await tx.run("UPDATE chat_sessions SET ended_at = ? WHERE id = ? AND ended_at IS NULL", [
          this.now().toISOString(),
          sessionId,
        ]);
        const row = await tx.get(`SELECT ${SESSION_COLUMNS} FROM chat_sessions WHERE id = ?`, [sessionId]);
        return row ? mapSessionRow(row) : undefined;
      }),
    );
  }

  async listSessions(userId: string): Promise<ChatSession[]> {
    return this.guard("session list", async () => {
      const rows = await this.driver.all(
        `SELECT ${SESSION_COLUMNS} FROM chat_sessions WHERE user_id = ? ORDER BY created_at DESC, id DESC`,
        [userId],
      );
      return rows.map(mapSessionRow);
    });
  }

  async latestSession(userId: string): Promise<ChatSession | undefined> {
    return this.guard("latest session lookup", async () => {
      const row = await this.driver.get(
        `SELECT ${SESSION_COLUMNS} FROM chat_sessions WHERE user_id = ? ORDER BY created_at DESC, id DESC LIMIT 1`,
        [userId],
      );
      return row ? mapSessionRow(row) : undefined;
    });
  }

  async deleteSessions(userId: string, name?: string): Promise<string[]> {
    return this.guard("session delete", () =>
      this.driver.transaction(async (tx) => {
        const scope = name === undefined ? "WHERE user_id = ?" : "WHERE user_id = ? AND name = ?";
        const params = name === undefined ? [userId] : [userId, name];
        const rows = await tx.all(`SELECT id FROM chat_sessions ${scope}`, params);
        await tx.run(`DELETE FROM chat_sessions ${scope}`, params);
        return rows.map((row) => readString(row, "id"));
      }),
    );
  }

  async close(): Promise<void> {
    await this.guard("store close", () => this.driver.close());
  }
}
