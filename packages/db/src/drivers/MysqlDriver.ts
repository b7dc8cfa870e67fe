import mysql from "mysql2/promise";
import type { RunResult, SqlDriver, SqlExecutor, SqlParam, SqlRow } from "./SqlDriver.js";
import { toRowId } from "./SqlDriver.js";

export interface MysqlQueryable {
  query(sql: string, values?: SqlParam[]): Promise<[unknown, unknown]>;
}

export interface MysqlConnectionLike extends MysqlQueryable {
  beginTransaction(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  release(): void;
}

export interface MysqlPoolLike extends MysqlQueryable {
  getConnection(): Promise<MysqlConnectionLike>;
  end(): Promise<void>;
}

export interface MysqlConnectOptions {
  uri?: string;
  host?: string;
  port?: number;
  user?: string;
  password?: string;
  database?: string;
}

const isRow = (value: unknown): value is SqlRow =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const toRows = (result: unknown): SqlRow[] => (Array.isArray(result) ? result.filter(isRow) : []);

interface WriteHeader {
  affectedRows: number;
  insertId: number;
}

const toHeader = (result: unknown): WriteHeader => {
  if (isRow(result) && typeof result.affectedRows === "number") {
    return { affectedRows: result.affectedRows, insertId: toRowId(result.insertId ?? 0) };
  }
  throw new Error("mysql did not return a result header for a write statement");
};

const executorFor = (target: MysqlQueryable): SqlExecutor => ({
  all: async (sql, params = []) => toRows((await target.query(sql, params))[0]),
  get: async (sql, params = []) => toRows((await target.query(sql, params))[0])[0],
  run: async (sql, params = []): Promise<RunResult> => {
    const [result] = await target.query(sql, params);
    return { changes: toHeader(result).affectedRows };
  },
  insert: async (sql, params) => {
    const [result] = await target.query(sql, params);
    return toHeader(result).insertId;
  },
});

export class MysqlDriver implements SqlDriver {
  readonly dialect = "mysql" as const;
  private executor: SqlExecutor;

  constructor(private pool: MysqlPoolLike) {
    this.executor = executorFor(pool);
  }

  /** Opens a pool and proves it can reach the server. */
  static async connect(options: MysqlConnectOptions): Promise<MysqlDriver> {
    const { uri, ...rest } = options;
    const pool = uri
      ? mysql.createPool({ uri, connectionLimit: 5 })
      : mysql.createPool({ ...rest, connectionLimit: 5 });
    try {
      await pool.query("SELECT 1");
    } catch (error) {
      await pool.end().catch(() => undefined);
      throw error;
    }
    return new MysqlDriver(pool);
  }

  all(sql: string, params?: SqlParam[]): Promise<SqlRow[]> {
    return this.executor.all(sql, params);
  }

  get(sql: string, params?: SqlParam[]): Promise<SqlRow | undefined> {
    return this.executor.get(sql, params);
  }

  run(sql: string, params?: SqlParam[]): Promise<RunResult> {
    return this.executor.run(sql, params);
  }

  insert(sql: string, params: SqlParam[], idColumn: string): Promise<number> {
    return this.executor.insert(sql, params, idColumn);
  }

  async exec(sql: string): Promise<void> {
    await this.pool.query(sql);
  }

  async transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    const connection = await this.pool.getConnection();
    try {
      await connection.beginTransaction();
      try {
        const result = await fn(executorFor(connection));
        await connection.commit();
        return result;
      } catch (error) {
        await connection.rollback();
        throw error;
      }
    } finally {
      connection.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
