import pg from "pg";
import type pino from "pino";
import type { RunResult, SqlDriver, SqlExecutor, SqlParam, SqlRow } from "./SqlDriver.js";
import { toNumberedPlaceholders, toRowId } from "./SqlDriver.js";

interface PgResult {
  rows: SqlRow[];
  rowCount: number | null;
}

export interface PgQueryable {
  query(text: string, values?: SqlParam[]): Promise<PgResult>;
}

export interface PgClientLike extends PgQueryable {
  release(): void;
}

export interface PgPoolLike extends PgQueryable {
  connect(): Promise<PgClientLike>;
  end(): Promise<void>;
  /** Raised for idle clients the server dropped; unhandled it would crash the process. */
  on(event: "error", listener: (error: Error) => void): unknown;
}

export interface PostgresConnectOptions {
  connectionString?: string;
  host?: string;
  port?: number;
  user?: string;
  password?: string;
  database?: string;
}

const executorFor = (target: PgQueryable): SqlExecutor => ({
  all: async (sql, params = []) => (await target.query(toNumberedPlaceholders(sql), params)).rows,
  get: async (sql, params = []) => (await target.query(toNumberedPlaceholders(sql), params)).rows[0],
  run: async (sql, params = []): Promise<RunResult> => {
    const result = await target.query(toNumberedPlaceholders(sql), params);
    return { changes: result.rowCount ?? 0 };
  },
  insert: async (sql, params, idColumn) => {
    const result = await target.query(`${toNumberedPlaceholders(sql)} RETURNING ${idColumn}`, params);
    return toRowId(result.rows[0]?.[idColumn]);
  },
});

export class PostgresDriver implements SqlDriver {
  readonly dialect = "postgresql" as const;
  private executor: SqlExecutor;

  constructor(
    private pool: PgPoolLike,
    logger: pino.Logger,
  ) {
    this.executor = executorFor(pool);
    // The pool discards the broken client; the next operation connects afresh.
    pool.on("error", (error) => logger.warn({ err: error }, "idle postgresql connection failed"));
  }

  /** Opens a pool and proves it can reach the server. */
  static async connect(options: PostgresConnectOptions, logger: pino.Logger): Promise<PostgresDriver> {
    const driver = new PostgresDriver(new pg.Pool({ ...options, max: 5 }), logger);
    try {
      await driver.exec("SELECT 1");
    } catch (error) {
      await driver.close().catch((closeError: unknown) =>
        logger.debug({ err: closeError }, "postgresql pool did not close after a failed connect"),
      );
      throw error;
    }
    return driver;
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
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      try {
        const result = await fn(executorFor(client));
        await client.query("COMMIT");
        return result;
      } catch (error) {
        await client.query("ROLLBACK");
        throw error;
      }
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
