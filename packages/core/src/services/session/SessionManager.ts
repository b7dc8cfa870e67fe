import {
  IdentityResolutionError,
  PermissionDeniedError,
  SessionNotFoundError,
  DEFAULT_SESSION_NAME,
  type ChatSession,
  type ChatSessionDetails,
  type User,
} from "@clia/shared";
import type { HistoryStore } from "@clia/db";
import type { Logger } from "../../logging/Logger.js";

/**
 * Maps OS callers to users and tracks the chat sessions this process opened
 * so they can be ended on shutdown. Sessions carry the owning user id only.
 */
export class SessionManager {
  private openSessions = new Map<string, string>();

  constructor(
    private store: HistoryStore,
    private logger?: Logger,
  ) {}

  get openSessionCount(): number {
    return this.openSessions.size;
  }

  async resolveUser(osIdentity: number): Promise<User> {
    if (!Number.isSafeInteger(osIdentity) || osIdentity < 0) {
      throw new IdentityResolutionError(`Invalid OS identity: ${osIdentity}`);
    }
    return this.store.ensureUser(String(osIdentity));
  }

  async startSession(user: User, details: ChatSessionDetails = { name: DEFAULT_SESSION_NAME }): Promise<ChatSession> {
    const session = await this.store.createSession(user.id, details);
    this.openSessions.set(session.id, user.id);
    this.logger?.debug({ sessionId: session.id }, "chat session started");
    return session;
  }

  /** Returns the session when it exists, belongs to `userId` and is still open. */
  async requireOpenSession(sessionId: string, userId: string): Promise<ChatSession> {
    const session = await this.store.getSession(sessionId);
    if (!session || session.endedAt) throw new SessionNotFoundError(sessionId);
    if (session.userId !== userId) {
      throw new PermissionDeniedError("Chat session belongs to another user.", { sessionId });
    }
    return session;
  }

  async endSession(sessionId: string, userId: string): Promise<ChatSession> {
    const session = await this.store.getSession(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    if (session.userId !== userId) {
      throw new PermissionDeniedError("Chat session belongs to another user.", { sessionId });
    }
    const ended = await this.store.endSession(sessionId);
    this.openSessions.delete(sessionId);
    if (!ended) throw new SessionNotFoundError(sessionId);
    return ended;
  }

  listSessions(user: User): Promise<ChatSession[]> {
    return this.store.listSessions(user.id);
  }

  latestSession(user: User): Promise<ChatSession | undefined> {
    return this.store.latestSession(user.id);
  }

  /**
   * Deletes the user's sessions, or only those called `name`. History written
   * in them is kept. A name that matches nothing is reported as not found.
   */
  async deleteSessions(user: User, name?: string): Promise<number> {
    const deleted = await this.store.deleteSessions(user.id, name);
    for (const id of deleted) this.openSessions.delete(id);
    if (name !== undefined && deleted.length === 0) throw new SessionNotFoundError(name);
    this.logger?.debug({ deleted: deleted.length, name }, "chat sessions deleted");
    return deleted.length;
  }

  /** Hands the open sessions to the manager that replaces this one on reload. */
  detach(): ReadonlyMap<string, string> {
    const open = this.openSessions;
    this.openSessions = new Map();
    return open;
  }

  adopt(open: ReadonlyMap<string, string>): void {
    for (const [sessionId, userId] of open) this.openSessions.set(sessionId, userId);
  }

  /** Ends every session this process still has open. Failures are logged. */
  async closeAll(): Promise<number> {
    const ids = [...this.openSessions.keys()];
    this.openSessions.clear();
    const results = await Promise.allSettled(ids.map((id) => this.store.endSession(id)));
    let closed = 0;
    results.forEach((result, index) => {
      if (result.status === "fulfilled") {
        closed += 1;
      } else {
        this.logger?.warn({ err: result.reason, sessionId: ids[index] }, "could not end chat session");
      }
    });
    return closed;
  }
}
