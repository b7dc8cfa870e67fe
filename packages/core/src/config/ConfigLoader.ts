import { readFile } from "node:fs/promises";
import YAML from "yaml";
import {
  ConfigError,
  DATABASE_TYPES,
  LOG_LEVELS,
  PathHelper,
  createDefaultConfig,
  errnoCode,
  errorMessage,
  type CliaConfig,
  type DatabaseType,
  type LogLevel,
} from "@clia/shared";

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

type Section = Record<string, unknown>;

const isSection = (value: unknown): value is Section =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const sectionField = (parent: Section, key: string, label: string): Section => {
  const value = parent[key];
  if (value === undefined || value === null) return {};
  if (!isSection(value)) {
    throw new ConfigError(`Invalid ${label}: expected a mapping.`, { key: label });
  }
  return value;
};

const stringField = (value: unknown, label: string): string | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "number") return String(value);
  if (typeof value !== "string") {
    throw new ConfigError(`Invalid ${label}: expected string.`, { key: label });
  }
  return value.trim() || undefined;
};

const numberField = (value: unknown, label: string, min = 0): number | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
    throw new ConfigError(`Invalid ${label}: expected an integer >= ${min}.`, { key: label });
  }
  return value;
};

const booleanField = (value: unknown, label: string): boolean | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") {
    throw new ConfigError(`Invalid ${label}: expected boolean.`, { key: label });
  }
  return value;
};

const parseDatabaseType = (value: unknown, label: string): DatabaseType | undefined => {
  const raw = stringField(value, label);
  if (raw === undefined) return undefined;
  const normalized = raw.toLowerCase();
  const match = DATABASE_TYPES.find((type) => type === normalized);
  if (!match) {
    throw new ConfigError(`Invalid ${label}: '${raw}' is not one of ${DATABASE_TYPES.join(", ")}.`, { key: label });
  }
  return match;
};

const parseLogLevel = (value: unknown, label: string): LogLevel | undefined => {
  const raw = stringField(value, label);
  if (raw === undefined) return undefined;
  const normalized = raw.toLowerCase();
  const match = LOG_LEVELS.find((level) => level === normalized);
  if (!match) {
    throw new ConfigError(`Invalid ${label}: '${raw}' is not one of ${LOG_LEVELS.join(", ")}.`, { key: label });
  }
  return match;
};

const requireUrl = (value: string, label: string): string => {
  try {
    new URL(value);
  } catch {
    throw new ConfigError(`Invalid ${label}: '${value}' is not a URL.`, { key: label });
  }
  return value.replace(/\/+$/, "");
};

const readConfigFile = async (configPath: string): Promise<Section | undefined> => {
  let content: string;
  try {
    content = await readFile(configPath, "utf8");
  } catch (error) {
    if (errnoCode(error) === "ENOENT") return undefined;
    throw new ConfigError(`Could not read configuration file ${configPath}: ${errorMessage(error)}`, {
      path: configPath,
    });
  }
  if (!content.trim()) return undefined;
  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (error) {
    throw new ConfigError(`Could not parse configuration file ${configPath}: ${errorMessage(error)}`, {
      path: configPath,
    });
  }
  if (parsed === null || parsed === undefined) return undefined;
  if (!isSection(parsed)) {
    throw new ConfigError(`Configuration file ${configPath} must contain a mapping.`, { path: configPath });
  }
  return parsed;
};

/**
 * Applies the YAML file (snake_case keys) on top of the defaults. Keys the
 * file leaves out keep their default value.
 */
export const applyConfigFile = (config: CliaConfig, file: Section): CliaConfig => {
  const backend = sectionField(file, "backend", "backend");
  const proxies = sectionField(backend, "proxies", "backend.proxies");
  const auth = sectionField(backend, "auth", "backend.auth");
  const history = sectionField(file, "history", "history");
  const database = sectionField(file, "database", "database");
  const output = sectionField(file, "output", "output");
  const query = sectionField(file, "query", "query");
  const logging = sectionField(file, "logging", "logging");
  const audit = sectionField(logging, "audit", "logging.audit");
  const policy = sectionField(file, "policy", "policy");
  const daemon = sectionField(file, "daemon", "daemon");

  const endpoint = stringField(backend.endpoint, "backend.endpoint");
  const outputFile = stringField(output.file, "output.file");
  const auditFile = stringField(audit.file, "logging.audit.file");
  const policyFile = stringField(policy.file, "policy.file");

  return {
    backend: {
      endpoint: endpoint ? requireUrl(endpoint, "backend.endpoint") : config.backend.endpoint,
      timeoutMs: numberField(backend.timeout_ms, "backend.timeout_ms", 1) ?? config.backend.timeoutMs,
      proxies: {
        http: stringField(proxies.http, "backend.proxies.http") ?? config.backend.proxies.http,
        https: stringField(proxies.https, "backend.proxies.https") ?? config.backend.proxies.https,
      },
      auth: {
        certFile: stringField(auth.cert_file, "backend.auth.cert_file") ?? config.backend.auth.certFile,
        keyFile: stringField(auth.key_file, "backend.auth.key_file") ?? config.backend.auth.keyFile,
        verifySsl: booleanField(auth.verify_ssl, "backend.auth.verify_ssl") ?? config.backend.auth.verifySsl,
      },
    },
    history: {
      enabled: booleanField(history.enabled, "history.enabled") ?? config.history.enabled,
    },
    database: {
      type: parseDatabaseType(database.type, "database.type") ?? config.database.type,
      connectionString:
        stringField(database.connection_string, "database.connection_string") ?? config.database.connectionString,
      host: stringField(database.host, "database.host") ?? config.database.host,
      port: numberField(database.port, "database.port", 1) ?? config.database.port,
      username: stringField(database.username, "database.username") ?? config.database.username,
      password: stringField(database.password, "database.password") ?? config.database.password,
      database: stringField(database.database, "database.database") ?? config.database.database,
    },
    output: {
      enforceScript: booleanField(output.enforce_script, "output.enforce_script") ?? config.output.enforceScript,
      file: outputFile ? PathHelper.expandHome(outputFile) : config.output.file,
      promptSeparator: stringField(output.prompt_separator, "output.prompt_separator") ?? config.output.promptSeparator,
    },
    query: {
      minLength: numberField(query.min_length, "query.min_length", 1) ?? config.query.minLength,
      maxLength: numberField(query.max_length, "query.max_length", 1) ?? config.query.maxLength,
    },
    logging: {
      level: parseLogLevel(logging.level, "logging.level") ?? config.logging.level,
      audit: {
        enabled: booleanField(audit.enabled, "logging.audit.enabled") ?? config.logging.audit.enabled,
        file: auditFile ? PathHelper.expandHome(auditFile) : config.logging.audit.file,
      },
    },
    policy: policyFile ? { file: PathHelper.expandHome(policyFile) } : { ...config.policy },
    daemon: {
      idleTimeoutMs: numberField(daemon.idle_timeout_ms, "daemon.idle_timeout_ms") ?? config.daemon.idleTimeoutMs,
      requestTimeoutMs:
        numberField(daemon.request_timeout_ms, "daemon.request_timeout_ms") ?? config.daemon.requestTimeoutMs,
    },
  };
};

export const applyEnvOverrides = (config: CliaConfig, env: NodeJS.ProcessEnv): CliaConfig => {
  const level = parseLogLevel(env.CLIA_LOG_LEVEL, "CLIA_LOG_LEVEL");
  const endpoint = stringField(env.CLIA_BACKEND_ENDPOINT, "CLIA_BACKEND_ENDPOINT");
  const databaseType = parseDatabaseType(env.CLIA_DATABASE_TYPE, "CLIA_DATABASE_TYPE");
  const next: CliaConfig = {
    ...config,
    backend: endpoint ? { ...config.backend, endpoint: requireUrl(endpoint, "CLIA_BACKEND_ENDPOINT") } : config.backend,
    logging: level ? { ...config.logging, level } : config.logging,
  };
  if (databaseType && databaseType !== config.database.type) {
    // A connection string belongs to the engine it was written for.
    next.database = { ...config.database, type: databaseType, connectionString: undefined };
  }
  return next;
};

const validate = (config: CliaConfig): CliaConfig => {
  if (config.query.maxLength < config.query.minLength) {
    throw new ConfigError("Invalid query.max_length: must not be smaller than query.min_length.", {
      key: "query.max_length",
    });
  }
  return config;
};

export const resolveConfigPath = (options: LoadConfigOptions = {}): string => {
  const env = options.env ?? process.env;
  return options.configPath ?? (env.CLIA_CONFIG?.trim() || PathHelper.getSystemConfigPath());
};

/** Missing file means defaults; any invalid value is a ConfigError. */
export const loadConfig = async (options: LoadConfigOptions = {}): Promise<CliaConfig> => {
  const env = options.env ?? process.env;
  const configPath = resolveConfigPath(options);
  const defaults = createDefaultConfig();
  const file = await readConfigFile(configPath);
  const merged = file ? applyConfigFile(defaults, file) : defaults;
  return validate(applyEnvOverrides(merged, env));
};
