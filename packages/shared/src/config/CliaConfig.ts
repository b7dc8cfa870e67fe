import { PathHelper } from "../paths/PathHelper.js";

export const DATABASE_TYPES = ["sqlite", "mysql", "postgresql"] as const;
export type DatabaseType = (typeof DATABASE_TYPES)[number];

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface BackendAuthConfig {
  certFile: string;
  keyFile: string;
  verifySsl: boolean;
}

export interface BackendProxiesConfig {
  http?: string;
  https?: string;
}

export interface BackendConfig {
  endpoint: string;
  timeoutMs: number;
  proxies: BackendProxiesConfig;
  auth: BackendAuthConfig;
}

export interface HistoryConfig {
  enabled: boolean;
}

export interface DatabaseConfig {
  type: DatabaseType;
  /** File path for sqlite; a full connection URL for the client/server engines. */
  connectionString?: string;
  host?: string;
  port?: number;
  username?: string;
  password?: string;
  database?: string;
}

/** Where the recorded shell session writes the terminal output. */
export interface OutputConfig {
  /** Refuse to chat until the recorded session has produced `file`. */
  enforceScript: boolean;
  file: string;
  promptSeparator: string;
}

export interface QueryConfig {
  minLength: number;
  maxLength: number;
}

export interface AuditConfig {
  enabled: boolean;
  file: string;
}

export interface LoggingConfig {
  level: LogLevel;
  audit: AuditConfig;
}

export interface PolicyConfig {
  /** Absent means every caller is admitted. */
  file?: string;
}

export interface DaemonConfig {
  idleTimeoutMs: number;
  requestTimeoutMs: number;
}

export interface CliaConfig {
  backend: BackendConfig;
  history: HistoryConfig;
  database: DatabaseConfig;
  output: OutputConfig;
  query: QueryConfig;
  logging: LoggingConfig;
  policy: PolicyConfig;
  daemon: DaemonConfig;
}

export const DEFAULT_BACKEND: BackendConfig = {
  endpoint: "https://localhost:8080",
  timeoutMs: 30_000,
  proxies: {},
  auth: {
    certFile: "/etc/pki/consumer/cert.pem",
    keyFile: "/etc/pki/consumer/key.pem",
    verifySsl: true,
  },
};

export const DEFAULT_QUERY: QueryConfig = {
  minLength: 2,
  maxLength: 2048,
};

export const DEFAULT_DAEMON: DaemonConfig = {
  idleTimeoutMs: 300_000,
  requestTimeoutMs: 60_000,
};

export const createDefaultConfig = (): CliaConfig => ({
  backend: {
    ...DEFAULT_BACKEND,
    proxies: {},
    auth: { ...DEFAULT_BACKEND.auth },
  },
  history: { enabled: true },
  database: { type: "sqlite", connectionString: PathHelper.getDefaultDbPath() },
  output: { enforceScript: false, file: "/tmp/clia_output.txt", promptSeparator: "$" },
  query: { ...DEFAULT_QUERY },
  logging: {
    level: "info",
    audit: { enabled: true, file: PathHelper.getAuditLogPath() },
  },
  policy: {},
  daemon: { ...DEFAULT_DAEMON },
});
