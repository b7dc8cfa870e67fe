import {
  createDefaultConfig,
  type ChatSession,
  type CliaConfig,
  type HistoryEntry,
  type HistoryFilter,
  type QueryInput,
  type StartSessionRequest,
  type SubmitResponse,
} from "@clia/shared";
import type { DaemonClient } from "../../bus/DaemonClient.js";
import type { CommandContext } from "../../commands/CommandContext.js";

export class FakeDaemonClient implements DaemonClient {
  submitted: QueryInput[] = [];
  filters: HistoryFilter[] = [];
  ended: string[] = [];
  userIdLookups: number[] = [];
  entries: HistoryEntry[] = [];
  deleted = 0;
  closed = false;
  started: StartSessionRequest[] = [];
  sessions: ChatSession[] = [];
  sessionDeletes: Array<string | undefined> = [];
  answer: (input: QueryInput) => Promise<SubmitResponse> = async () => ({
    response: "ok",
    truncated: false,
    stored: true,
  });

  async submit(input: QueryInput): Promise<SubmitResponse> {
    this.submitted.push(input);
    return this.answer(input);
  }

  async startSession(details: StartSessionRequest = {}): Promise<ChatSession> {
    this.started.push(details);
    const session: ChatSession = {
      id: `session-${this.started.length}`,
      userId: "user-1",
      name: details.name ?? "default",
      createdAt: "2026-01-01T00:00:00.000Z",
    };
    if (details.description !== undefined) session.description = details.description;
    this.sessions.unshift(session);
    return session;
  }

  async listSessions(): Promise<ChatSession[]> {
    return this.sessions;
  }

  async latestSession(): Promise<ChatSession | undefined> {
    return this.sessions[0];
  }

  async deleteSessions(name?: string): Promise<number> {
    this.sessionDeletes.push(name);
    const before = this.sessions.length;
    this.sessions = this.sessions.filter((session) => name !== undefined && session.name !== name);
    return before - this.sessions.length;
  }

  async endSession(sessionId: string): Promise<void> {
    this.ended.push(sessionId);
  }

  async listHistory(filter: HistoryFilter): Promise<HistoryEntry[]> {
    this.filters.push(filter);
    return this.entries;
  }

  async clearHistory(): Promise<number> {
    return this.deleted;
  }

  async getUserId(uid: number): Promise<string> {
    this.userIdLookups.push(uid);
    return "user-1";
  }

  close(): void {
    this.closed = true;
  }
}

export interface FakeContext extends CommandContext {
  client: FakeDaemonClient;
  out: string[];
  err: string[];
}

export interface FakeContextOptions {
  stdin?: string;
  lines?: string[];
  config?: CliaConfig;
}

export const createFakeContext = (options: FakeContextOptions = {}): FakeContext => {
  const out: string[] = [];
  const err: string[] = [];
  const lines = options.lines ?? [];
  return {
    config: options.config ?? createDefaultConfig(),
    client: new FakeDaemonClient(),
    uid: 1000,
    out,
    err,
    io: { out: (line) => out.push(line), err: (line) => err.push(line) },
    stdin: {
      isTTY: options.stdin === undefined,
      read: async () => options.stdin ?? "",
    },
    prompt: {
      async *lines() {
        yield* lines;
      },
    },
  };
};
