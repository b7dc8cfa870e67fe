export * from "./bus/DaemonClient.js";
export * from "./commands/CommandContext.js";
export * from "./commands/chat/ChatCommand.js";
export * from "./commands/history/HistoryCommands.js";
export * from "./errors/ErrorReporter.js";
export { CliaEntrypoint, type EntrypointOptions } from "./bin/CliaEntrypoint.js";
