import type {
  AppendHistoryInput,
  ChatSession,
  ChatSessionDetails,
  DatabaseType,
  HistoryEntry,
  HistoryFilter,
  User,
} from "@clia/shared";

/**
 * Single persistence surface used by the daemon regardless of the configured
 * backend. Every failure surfaces as StorageError.
 */
export interface HistoryStore {
  readonly backend: DatabaseType;
  append(input: AppendHistoryInput): Promise<HistoryEntry>;
  list(userId: string, filter: HistoryFilter): Promise<HistoryEntry[]>;
  clear(userId: string): Promise<number>;
  ensureUser(osIdentity: string): Promise<User>;
  getUserByOsIdentity(osIdentity: string): Promise<User | undefined>;
  createSession(userId: string, details: ChatSessionDetails): Promise<ChatSession>;
  getSession(sessionId: string): Promise<ChatSession | undefined>;
  endSession(sessionId: string): Promise<ChatSession | undefined>;
  /** Newest first. */
  listSessions(userId: string): Promise<ChatSession[]>;
  latestSession(userId: string): Promise<ChatSession | undefined>;
  /** Removes session rows only; their history entries stay. Returns the removed ids. */
  deleteSessions(userId: string, name?: string): Promise<string[]>;
  close(): Promise<void>;
}
