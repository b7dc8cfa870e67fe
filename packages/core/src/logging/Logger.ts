import pino from "pino";
import type { LogLevel } from "@clia/shared";

export type Logger = pino.Logger;

export interface CreateLoggerOptions {
  level?: LogLevel;
  name?: string;
  /** Defaults to stdout, which journald collects for the daemon unit. */
  destination?: pino.DestinationStream;
}

export const createLogger = (options: CreateLoggerOptions = {}): Logger => {
  const settings = { level: options.level ?? "info", name: options.name ?? "cliad" };
  return options.destination ? pino(settings, options.destination) : pino(settings);
};

export const createChildLogger = (parent: Logger, component: string): Logger => parent.child({ component });

/** A logger that drops everything; for tests and for callers that opt out. */
export const createSilentLogger = (): Logger => pino({ level: "silent" });
