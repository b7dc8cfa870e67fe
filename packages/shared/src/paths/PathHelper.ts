import os from "node:os";
import path from "node:path";
import { promises as fs } from "node:fs";

/**
 * Well-known locations for the daemon (system scope) and the client (user scope).
 */
export class PathHelper {
  static getSystemConfigDir(): string {
    return path.join("/etc", "clia");
  }

  static getSystemConfigPath(): string {
    return path.join(this.getSystemConfigDir(), "config.yaml");
  }

  static getSystemStateDir(): string {
    return path.join("/var", "lib", "clia");
  }

  static getDefaultDbPath(): string {
    return path.join(this.getSystemStateDir(), "history.db");
  }

  static getSystemLogDir(): string {
    return path.join("/var", "log", "clia");
  }

  static getAuditLogPath(): string {
    return path.join(this.getSystemLogDir(), "audit.jsonl");
  }

  static expandHome(input: string): string {
    if (input === "~") return os.homedir();
    if (input.startsWith("~/")) return path.join(os.homedir(), input.slice(2));
    return input;
  }

  static async ensureDir(dir: string): Promise<void> {
    await fs.mkdir(dir, { recursive: true });
  }
}
