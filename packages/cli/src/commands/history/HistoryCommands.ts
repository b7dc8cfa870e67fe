import type { HistoryEntry, HistoryFilter } from "@clia/shared";
import { UsageError } from "../../errors/ErrorReporter.js";
import type { CommandContext, CommandIO } from "../CommandContext.js";

export type HistoryAction =
  | { kind: "clear" }
  | { kind: "latest-session" }
  | { kind: "list"; filter: HistoryFilter };

interface HistoryArgs {
  action: HistoryAction;
  help: boolean;
}

export const historyUsage = `clia history \\
  [--all | --first | --last | --filter <KEYWORD> [--case-sensitive] | --session <ID> | --latest-session | --clear]`;

export const parseHistoryArgs = (argv: string[]): HistoryArgs => {
  const selected: HistoryAction[] = [];
  let keyword: string | undefined;
  let caseSensitive = false;
  let help = false;
  const needValue = (flag: string, value: string | undefined): string => {
    if (!value || value.startsWith("--")) throw new UsageError(`${flag} needs a value`, historyUsage);
    return value;
  };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case "--all":
        selected.push({ kind: "list", filter: { kind: "all" } });
        break;
      case "--first":
        selected.push({ kind: "list", filter: { kind: "first" } });
        break;
      case "--last":
        selected.push({ kind: "list", filter: { kind: "last" } });
        break;
      case "--filter":
        keyword = needValue(arg, argv[i + 1]);
        selected.push({ kind: "list", filter: { kind: "keyword", keyword, caseSensitive: false } });
        i += 1;
        break;
      case "--case-sensitive":
        caseSensitive = true;
        break;
      case "--session":
        selected.push({ kind: "list", filter: { kind: "session", sessionId: needValue(arg, argv[i + 1]) } });
        i += 1;
        break;
      case "--latest-session":
        selected.push({ kind: "latest-session" });
        break;
      case "--clear":
        selected.push({ kind: "clear" });
        break;
      case "-h":
      case "--help":
        help = true;
        break;
      default:
        throw new UsageError(`Unknown option: ${arg}`, historyUsage);
    }
  }
  if (selected.length > 1) {
    throw new UsageError(
      "Choose only one of --all, --first, --last, --filter, --session, --latest-session or --clear",
      historyUsage,
    );
  }
  if (caseSensitive && keyword === undefined) {
    throw new UsageError("--case-sensitive only applies to --filter", historyUsage);
  }
  const action: HistoryAction = selected[0] ?? { kind: "list", filter: { kind: "all" } };
  if (action.kind === "list" && action.filter.kind === "keyword") {
    return { action: { kind: "list", filter: { ...action.filter, caseSensitive } }, help };
  }
  return { action, help };
};

export const renderHistory = (entries: HistoryEntry[], io: CommandIO): void => {
  if (!entries.length) {
    io.out("No history found.");
    return;
  }
  const separated = entries.length > 1;
  for (const entry of entries) {
    io.out(`Query: ${entry.queryText}`);
    io.out(`Answer: ${entry.responseText}`);
    const timestamp = `Time: ${entry.createdAt}`;
    io.out(timestamp);
    if (separated) io.out("-".repeat(timestamp.length));
  }
};

export class HistoryCommands {
  static async run(argv: string[], context: CommandContext): Promise<void> {
    const { action, help } = parseHistoryArgs(argv);
    if (help) {
      context.io.out(`Usage: ${historyUsage}`);
      return;
    }
    if (action.kind === "clear") {
      const deleted = await context.client.clearHistory();
      context.io.out(`Deleted ${deleted} history ${deleted === 1 ? "entry" : "entries"}.`);
      return;
    }
    if (action.kind === "latest-session") {
      const session = await context.client.latestSession();
      if (!session) {
        context.io.out("No chat sessions found.");
        return;
      }
      renderHistory(await context.client.listHistory({ kind: "session", sessionId: session.id }), context.io);
      return;
    }
    renderHistory(await context.client.listHistory(action.filter), context.io);
  }
}
