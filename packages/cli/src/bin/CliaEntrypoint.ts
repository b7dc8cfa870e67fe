#!/usr/bin/env node
import packageJson from "../../package.json" with { type: "json" };
import { ChatCommand, chatUsage } from "../commands/chat/ChatCommand.js";
import { HistoryCommands, historyUsage } from "../commands/history/HistoryCommands.js";
import {
  consoleIO,
  createCommandContext,
  type CommandContext,
  type CommandContextFactory,
  type CommandIO,
} from "../commands/CommandContext.js";
import { UsageError, reportError } from "../errors/ErrorReporter.js";

export const usage = `Usage: clia <chat|history> [...args]
  ${chatUsage.replace(/\n/g, "\n  ")}
  ${historyUsage.replace(/\n/g, "\n  ")}
  clia --version`;

export interface EntrypointOptions {
  io?: CommandIO;
  createContext?: CommandContextFactory;
}

export class CliaEntrypoint {
  /** Runs one command and resolves with the process exit code. */
  static async run(argv: string[] = process.argv.slice(2), options: EntrypointOptions = {}): Promise<number> {
    const io = options.io ?? consoleIO;
    const [command, ...rest] = argv;
    if (command === "--version" || command === "-v" || command === "version") {
      io.out(packageJson.version);
      return 0;
    }
    if (command === "--help" || command === "-h" || command === "help") {
      io.out(usage);
      return 0;
    }
    let context: CommandContext | undefined;
    try {
      if (command !== "chat" && command !== "history") {
        throw new UsageError(command ? `Unknown command: ${command}` : "Missing command", usage);
      }
      context = await (options.createContext ?? createCommandContext)();
      if (command === "chat") {
        await ChatCommand.run(rest, context);
      } else {
        await HistoryCommands.run(rest, context);
      }
      return 0;
    } catch (error) {
      return reportError(error, context?.io ?? io);
    } finally {
      context?.client.close();
    }
  }
}

const invokedAs = process.argv[1] ?? "";
if (invokedAs.endsWith("CliaEntrypoint.js") || invokedAs.endsWith("clia")) {
  CliaEntrypoint.run()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}
