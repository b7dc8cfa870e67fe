import {
  CliaError,
  ConfigError,
  ResponseGeneratedButNotStoredError,
  SessionNotFoundError,
  type ChatSession,
  type QueryInput,
  type StartSessionRequest,
} from "@clia/shared";
import { captureFileExists, composeQuery, readAttachment, readLastCapture } from "@clia/core";
import { formatError, UsageError } from "../../errors/ErrorReporter.js";
import type { CommandContext, CommandIO } from "../CommandContext.js";

export interface ChatArgs {
  query?: string;
  attachment?: string;
  withOutput: boolean;
  interactive: boolean;
  list: boolean;
  /** Name of the sessions to delete. */
  delete?: string;
  deleteAll: boolean;
  name?: string;
  description?: string;
  help: boolean;
}

export const chatUsage = `clia chat [QUERY] \\
  [-a|--attachment <FILE>] \\
  [-w|--with-output] \\
  [-i|--interactive [-n|--name <NAME>] [--description <TEXT>]] \\
  [-l|--list | -d|--delete <NAME> | --delete-all]`;

export const EXIT_COMMAND = ".exit";
const PROMPT = ">>> ";

const VALUE_FLAGS: Readonly<Record<string, "attachment" | "delete" | "name" | "description">> = {
  "-a": "attachment",
  "--attachment": "attachment",
  "-d": "delete",
  "--delete": "delete",
  "-n": "name",
  "--name": "name",
  "--description": "description",
};

export const parseChatArgs = (argv: string[]): ChatArgs => {
  const parsed: ChatArgs = { withOutput: false, interactive: false, list: false, deleteAll: false, help: false };
  const words: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const [flag, inline] = arg.startsWith("--") && arg.includes("=") ? splitInline(arg) : [arg, undefined];
    const target = Object.hasOwn(VALUE_FLAGS, flag) ? VALUE_FLAGS[flag] : undefined;
    if (target) {
      const value = inline ?? argv[i + 1];
      if (!value) throw new UsageError(`${flag} needs ${target === "attachment" ? "a file path" : "a value"}`, chatUsage);
      parsed[target] = value;
      if (inline === undefined) i += 1;
      continue;
    }
    switch (arg) {
      case "-w":
      case "--with-output":
        parsed.withOutput = true;
        break;
      case "-i":
      case "--interactive":
        parsed.interactive = true;
        break;
      case "-l":
      case "--list":
        parsed.list = true;
        break;
      case "--delete-all":
        parsed.deleteAll = true;
        break;
      case "-h":
      case "--help":
        parsed.help = true;
        break;
      case "--":
        words.push(...argv.slice(i + 1));
        i = argv.length;
        break;
      default:
        if (arg.startsWith("-") && arg.length > 1) throw new UsageError(`Unknown option: ${arg}`, chatUsage);
        words.push(arg);
        break;
    }
  }
  if (words.length) parsed.query = words.join(" ");
  checkCombination(parsed);
  return parsed;
};

const splitInline = (arg: string): [string, string] => {
  const at = arg.indexOf("=");
  return [arg.slice(0, at), arg.slice(at + 1)];
};

const checkCombination = (args: ChatArgs): void => {
  const management = [args.list, args.delete !== undefined, args.deleteAll].filter(Boolean).length;
  if (management > 1) throw new UsageError("Choose only one of --list, --delete or --delete-all", chatUsage);
  if (management === 1 && (args.interactive || args.query !== undefined)) {
    throw new UsageError("Session management options cannot be combined with a question", chatUsage);
  }
  if ((args.name !== undefined || args.description !== undefined) && !args.interactive) {
    throw new UsageError("--name and --description only apply to --interactive", chatUsage);
  }
};

const describeSession = (session: ChatSession): string => {
  const parts = [session.createdAt, session.name];
  if (session.description) parts.push(session.description);
  if (!session.endedAt) parts.push("(open)");
  return parts.join("  ");
};

export const renderSessions = (sessions: ChatSession[], io: CommandIO): void => {
  if (!sessions.length) {
    io.out("No chat sessions found.");
    return;
  }
  for (const session of sessions) io.out(describeSession(session));
};

export class ChatCommand {
  static async run(argv: string[], context: CommandContext): Promise<void> {
    const args = parseChatArgs(argv);
    if (args.help) {
      context.io.out(`Usage: ${chatUsage}`);
      return;
    }
    if (args.list) {
      renderSessions(await context.client.listSessions(), context.io);
      return;
    }
    if (args.delete !== undefined || args.deleteAll) {
      const deleted = await context.client.deleteSessions(args.delete);
      context.io.out(`Deleted ${deleted} chat ${deleted === 1 ? "session" : "sessions"}; their history is kept.`);
      return;
    }
    await ChatCommand.requireRecording(context);
    if (args.interactive) {
      await ChatCommand.interactive(args, context);
      return;
    }
    const input = await ChatCommand.gatherInput(args, context);
    // Fail fast on empty or too-short input before contacting the daemon.
    composeQuery(input, { minLength: context.config.query.minLength });
    await ChatCommand.ask(input, context);
  }

  private static async requireRecording(context: CommandContext): Promise<void> {
    const { enforceScript, file } = context.config.output;
    if (enforceScript && !(await captureFileExists(file))) {
      throw new ConfigError(
        `output.enforce_script is set but ${file} does not exist; start a recorded shell session first.`,
        { file },
      );
    }
  }

  private static async gatherInput(args: ChatArgs, context: CommandContext): Promise<QueryInput> {
    const input: QueryInput = {};
    if (args.query) input.positional = args.query;
    if (!context.stdin.isTTY) {
      const piped = await context.stdin.read();
      if (piped.trim()) input.stdin = piped;
    }
    if (args.attachment) input.attachment = await readAttachment(args.attachment);
    if (args.withOutput) {
      const { file, promptSeparator } = context.config.output;
      const capture = await readLastCapture(file, { promptSeparator });
      if (capture === undefined) {
        context.io.err(`warning: no terminal output was found in ${file}`);
      } else {
        input.lastCapture = capture;
      }
    }
    return input;
  }

  private static async ask(input: QueryInput, context: CommandContext): Promise<void> {
    const { io, config } = context;
    try {
      const reply = await context.client.submit(input);
      if (reply.truncated) {
        io.err(
          `warning: the question and its context exceeded ${config.query.maxLength} characters and were trimmed; some context may be lost.`,
        );
      }
      io.out(reply.response);
    } catch (error) {
      if (error instanceof ResponseGeneratedButNotStoredError) io.out(error.response);
      throw error;
    }
  }

  private static async interactive(args: ChatArgs, context: CommandContext): Promise<void> {
    const { client, io } = context;
    await client.getUserId(context.uid);
    const attachment = args.attachment ? await readAttachment(args.attachment) : undefined;
    const details: StartSessionRequest = {};
    if (args.name !== undefined) details.name = args.name;
    if (args.description !== undefined) details.description = args.description;
    let session = await client.startSession(details);
    io.out(`Interactive chat started. Type ${EXIT_COMMAND} to leave.`);
    const askInSession = (question: string): Promise<void> => {
      const input: QueryInput = { positional: question, sessionId: session.id };
      if (attachment !== undefined) input.attachment = attachment;
      return ChatCommand.ask(input, context);
    };
    try {
      for await (const line of context.prompt.lines(PROMPT)) {
        const question = line.trim();
        if (question === EXIT_COMMAND) break;
        if (!question) {
          io.err("Your question can't be empty. Please, try again.");
          continue;
        }
        try {
          try {
            await askInSession(question);
          } catch (error) {
            // The daemon restarted or the session was deleted; carry on in a new one.
            if (!(error instanceof SessionNotFoundError)) throw error;
            session = await client.startSession(details);
            io.err(`The chat session was lost; continuing in new session ${session.id}.`);
            await askInSession(question);
          }
        } catch (error) {
          // One bad question does not end the session.
          if (!(error instanceof CliaError)) throw error;
          io.err(formatError(error));
        }
      }
    } finally {
      await client.endSession(session.id).catch((error: unknown) => io.err(formatError(error)));
    }
  }
}
