import { promises as fs } from "node:fs";
import path from "node:path";
import {
  CredentialMissingError,
  CredentialNamingError,
  RequestTimeoutError,
  StorageError,
  errnoCode,
  errorMessage,
  withTimeout,
  type DatabaseConfig,
  type DatabaseType,
} from "@clia/shared";
import type { DatabaseCredentials } from "@clia/db";

export type CredentialSource = "config-file" | "environment" | "secret-store";
export type CredentialName = "username" | "password";

export const CREDENTIAL_NAMES: readonly CredentialName[] = ["username", "password"];

export interface Credential {
  name: string;
  value: string;
  source: CredentialSource;
}

export interface CredentialResolverOptions {
  /** Prefix of secret-store entries and environment variables. */
  component?: string;
  configValues?: Partial<Record<CredentialName, string>>;
  env?: NodeJS.ProcessEnv;
  /** Bounds each secret-store read. 0 disables the bound. */
  readTimeoutMs?: number;
}

export interface ResolveOptions {
  required?: boolean;
}

const stripTrailingNewline = (value: string): string => value.replace(/\r?\n$/, "");

export const requiresAuthentication = (type: DatabaseType): boolean => type !== "sqlite";

/**
 * Looks a credential up in the configuration file, then the environment,
 * then the systemd credentials directory. A secret store whose entries do not
 * follow `<component>-username` / `<component>-password` fails loudly instead
 * of silently connecting without authentication.
 */
export class CredentialResolver {
  private readonly component: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly readTimeoutMs: number;
  private inspected?: Promise<Set<string>>;

  constructor(private options: CredentialResolverOptions = {}) {
    this.component = options.component ?? "database";
    this.env = options.env ?? process.env;
    this.readTimeoutMs = options.readTimeoutMs ?? 0;
  }

  static forDatabase(config: DatabaseConfig, env: NodeJS.ProcessEnv = process.env, readTimeoutMs = 0): CredentialResolver {
    return new CredentialResolver({
      component: "database",
      configValues: { username: config.username, password: config.password },
      env,
      readTimeoutMs,
    });
  }

  get secretStoreDir(): string | undefined {
    return this.env.CREDENTIALS_DIRECTORY?.trim() || undefined;
  }

  entryName(name: CredentialName): string {
    return `${this.component}-${name}`;
  }

  envName(name: CredentialName): string {
    return `CLIA_${this.component.toUpperCase()}_${name.toUpperCase()}`;
  }

  async resolve(name: CredentialName, options: ResolveOptions = {}): Promise<Credential | undefined> {
    const qualified = this.entryName(name);
    const fromConfig = this.options.configValues?.[name];
    if (fromConfig) return { name: qualified, value: fromConfig, source: "config-file" };

    const fromEnv = this.env[this.envName(name)];
    if (fromEnv) return { name: qualified, value: fromEnv, source: "environment" };

    const fromStore = await this.readSecret(name);
    if (fromStore !== undefined) return { name: qualified, value: fromStore, source: "secret-store" };

    if (options.required) throw new CredentialMissingError(qualified);
    return undefined;
  }

  async resolveDatabaseCredentials(type: DatabaseType): Promise<DatabaseCredentials> {
    const required = requiresAuthentication(type);
    const username = await this.resolve("username", { required });
    const password = await this.resolve("password", { required });
    return { username: username?.value, password: password?.value };
  }

  private async readSecret(name: CredentialName): Promise<string | undefined> {
    const dir = this.secretStoreDir;
    if (!dir) return undefined;
    const entries = await this.inspectSecretStore(dir);
    const entry = this.entryName(name);
    if (!entries.has(entry)) return undefined;
    const filePath = path.join(dir, entry);
    let raw: string;
    try {
      raw = await withTimeout(
        fs.readFile(filePath, "utf8"),
        this.readTimeoutMs,
        () => new RequestTimeoutError(`Reading credential ${entry}`, this.readTimeoutMs),
      );
    } catch (error) {
      if (error instanceof RequestTimeoutError) throw error;
      throw new StorageError(`Could not read credential ${entry}: ${errorMessage(error)}`, error);
    }
    const value = stripTrailingNewline(raw);
    if (!value.trim()) {
      throw new CredentialNamingError(`Credential file ${entry} is empty.`, { entry, directory: dir });
    }
    return value;
  }

  private inspectSecretStore(dir: string): Promise<Set<string>> {
    this.inspected ??= this.listComponentEntries(dir);
    return this.inspected;
  }

  private async listComponentEntries(dir: string): Promise<Set<string>> {
    let names: string[];
    try {
      names = await fs.readdir(dir);
    } catch (error) {
      if (errnoCode(error) === "ENOENT") return new Set();
      throw new StorageError(`Could not list credentials directory ${dir}: ${errorMessage(error)}`, error);
    }
    const expected = new Set(CREDENTIAL_NAMES.map((name) => this.entryName(name)));
    const related = names.filter((entry) => entry.toLowerCase().startsWith(this.component.toLowerCase()));
    const misnamed = related.filter((entry) => !expected.has(entry)).sort();
    if (misnamed.length) {
      throw new CredentialNamingError(
        `Credentials directory contains ${misnamed.join(", ")}; expected only ${[...expected].join(" and ")}.`,
        { directory: dir, misnamed },
      );
    }
    return new Set(related);
  }
}
