import pino from "pino";
import { PathHelper, StorageError, type DatabaseConfig, type DatabaseType } from "@clia/shared";
import type { SqlDriver } from "./drivers/SqlDriver.js";
import { SqliteDriver } from "./drivers/SqliteDriver.js";
import { PostgresDriver } from "./drivers/PostgresDriver.js";
import { MysqlDriver } from "./drivers/MysqlDriver.js";
import { HistoryMigrations } from "./migrations/HistoryMigrations.js";
import { HistoryRepository, type HistoryRepositoryOptions } from "./repositories/HistoryRepository.js";
import type { HistoryStore } from "./HistoryStore.js";

export interface DatabaseCredentials {
  username?: string;
  password?: string;
}

export type DriverFactory = (
  config: DatabaseConfig,
  credentials: DatabaseCredentials,
  logger: pino.Logger,
) => Promise<SqlDriver>;

export interface OpenHistoryStoreOptions extends HistoryRepositoryOptions {
  /** Replaces the driver chosen from `config.type`. */
  driverFactory?: DriverFactory;
  /** Receives connection failures the pool reports outside any operation. */
  logger?: pino.Logger;
}

const isUrl = (value: string): boolean => /^[a-z][a-z0-9+.-]*:\/\//i.test(value);

export const createDriver: DriverFactory = async (config, credentials, logger) => {
  switch (config.type) {
    case "sqlite":
      return SqliteDriver.open(config.connectionString ?? PathHelper.getDefaultDbPath());
    case "postgresql":
      if (config.connectionString && isUrl(config.connectionString)) {
        return PostgresDriver.connect({ connectionString: config.connectionString }, logger);
      }
      return PostgresDriver.connect(
        {
          host: config.host,
          port: config.port,
          database: config.database,
          user: credentials.username,
          password: credentials.password,
        },
        logger,
      );
    case "mysql":
      if (config.connectionString && isUrl(config.connectionString)) {
        return MysqlDriver.connect({ uri: config.connectionString });
      }
      return MysqlDriver.connect({
        host: config.host,
        port: config.port,
        database: config.database,
        user: credentials.username,
        password: credentials.password,
      });
  }
};

const describeTarget = (config: DatabaseConfig): string => {
  if (config.type === "sqlite") return config.connectionString ?? PathHelper.getDefaultDbPath();
  if (config.connectionString && isUrl(config.connectionString)) {
    return config.connectionString.replace(/\/\/[^@/]*@/, "//***@");
  }
  return `${config.host ?? "localhost"}:${config.port ?? defaultPort(config.type)}/${config.database ?? ""}`;
};

const defaultPort = (type: DatabaseType): number | string => {
  if (type === "postgresql") return 5432;
  if (type === "mysql") return 3306;
  return "";
};

/**
 * Opens the configured backend and creates its schema. Any failure is fatal
 * for the caller: the store is either fully usable or not returned.
 */
export const openHistoryStore = async (
  config: DatabaseConfig,
  credentials: DatabaseCredentials = {},
  options: OpenHistoryStoreOptions = {},
): Promise<HistoryStore> => {
  const factory = options.driverFactory ?? createDriver;
  let driver: SqlDriver;
  try {
    driver = await factory(config, credentials, options.logger ?? pino({ level: "silent" }));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new StorageError(`Could not connect to ${config.type} database at ${describeTarget(config)}: ${reason}`, error);
  }
  try {
    await HistoryMigrations.run(driver);
  } catch (error) {
    await driver.close().catch(() => undefined);
    const reason = error instanceof Error ? error.message : String(error);
    throw new StorageError(`Could not create history tables in ${config.type} database: ${reason}`, error);
  }
  return new HistoryRepository(driver, { now: options.now });
};
