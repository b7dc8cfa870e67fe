import { SerialQueue } from "@clia/shared";
import { SqliteConnection } from "../sqlite/connection.js";
import type { RunResult, SqlDriver, SqlExecutor, SqlParam, SqlRow } from "./SqlDriver.js";

/**
 * Embedded driver. The single connection is shared by every caller, so every
 * statement and transaction goes through one queue: a transaction holds the
 * queue until it commits or rolls back.
 */
export class SqliteDriver implements SqlDriver {
  readonly dialect = "sqlite" as const;
  private queue = new SerialQueue();
  private executor: SqlExecutor;

  constructor(private connection: SqliteConnection) {
    const db = connection.db;
    this.executor = {
      all: (sql, params = []) => db.all<SqlRow[]>(sql, ...params),
      get: (sql, params = []) => db.get<SqlRow>(sql, ...params),
      run: async (sql, params = []) => {
        const result = await db.run(sql, ...params);
        return { changes: result.changes ?? 0 };
      },
      insert: async (sql, params) => {
        const result = await db.run(sql, ...params);
        if (result.lastID === undefined) {
          throw new Error("sqlite did not report a generated id");
        }
        return result.lastID;
      },
    };
  }

  static async open(dbPath: string): Promise<SqliteDriver> {
    return new SqliteDriver(await SqliteConnection.open(dbPath));
  }

  get dbPath(): string {
    return this.connection.dbPath;
  }

  all(sql: string, params?: SqlParam[]): Promise<SqlRow[]> {
    return this.queue.run(() => this.executor.all(sql, params));
  }

  get(sql: string, params?: SqlParam[]): Promise<SqlRow | undefined> {
    return this.queue.run(() => this.executor.get(sql, params));
  }

  run(sql: string, params?: SqlParam[]): Promise<RunResult> {
    return this.queue.run(() => this.executor.run(sql, params));
  }

  insert(sql: string, params: SqlParam[], idColumn: string): Promise<number> {
    return this.queue.run(() => this.executor.insert(sql, params, idColumn));
  }

  exec(sql: string): Promise<void> {
    return this.queue.run(() => this.connection.db.exec(sql));
  }

  transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    return this.queue.run(async () => {
      const db = this.connection.db;
      await db.exec("BEGIN IMMEDIATE");
      try {
        const result = await fn(this.executor);
        await db.exec("COMMIT");
        return result;
      } catch (error) {
        await db.exec("ROLLBACK");
        throw error;
      }
    });
  }

  async close(): Promise<void> {
    await this.queue.run(() => this.connection.close());
  }
}
