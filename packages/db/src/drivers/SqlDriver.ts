import type { DatabaseType } from "@clia/shared";

export type SqlParam = string | number | null;
export type SqlRow = Record<string, unknown>;

export interface RunResult {
  changes: number;
}

/**
 * Statement surface shared by a driver and the executor it hands to a
 * transaction body. SQL is written with `?` placeholders; drivers rewrite them
 * for their dialect.
 */
export interface SqlExecutor {
  all(sql: string, params?: SqlParam[]): Promise<SqlRow[]>;
  get(sql: string, params?: SqlParam[]): Promise<SqlRow | undefined>;
  run(sql: string, params?: SqlParam[]): Promise<RunResult>;
  /** Inserts one row and returns the generated value of `idColumn`. */
  insert(sql: string, params: SqlParam[], idColumn: string): Promise<number>;
}

export interface SqlDriver extends SqlExecutor {
  readonly dialect: DatabaseType;
  /** Runs DDL; one statement per call. */
  exec(sql: string): Promise<void>;
  /** Commits when `fn` resolves, rolls back when it throws. */
  transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

/** Converts `?` placeholders to `$1..$n`, skipping quoted literals. */
export const toNumberedPlaceholders = (sql: string): string => {
  let index = 0;
  let inQuote = false;
  let output = "";
  for (const char of sql) {
    if (char === "'") {
      inQuote = !inQuote;
      output += char;
    } else if (char === "?" && !inQuote) {
      index += 1;
      output += `$${index}`;
    } else {
      output += char;
    }
  }
  return output;
};

export const toRowId = (value: unknown): number => {
  if (typeof value === "number" && Number.isSafeInteger(value)) return value;
  if (typeof value === "bigint") return Number(value);
  if (typeof value === "string" && /^\d+$/.test(value)) return Number(value);
  throw new Error(`Unexpected generated id: ${String(value)}`);
};
