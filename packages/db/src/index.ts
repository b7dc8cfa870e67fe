export * from "./sqlite/connection.js";
export * from "./drivers/SqlDriver.js";
export * from "./drivers/SqliteDriver.js";
export * from "./drivers/PostgresDriver.js";
export * from "./drivers/MysqlDriver.js";
export * from "./migrations/HistoryMigrations.js";
export * from "./repositories/HistoryRepository.js";
export * from "./HistoryStore.js";
export * from "./HistoryStoreFactory.js";
export type { Database } from "sqlite";
