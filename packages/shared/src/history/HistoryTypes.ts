export interface User {
  id: string;
  osIdentity: string;
  createdAt: string;
}

export interface ChatSession {
  id: string;
  userId: string;
  /** Not unique; several sessions may share a name. */
  name: string;
  description?: string;
  createdAt: string;
  endedAt?: string;
}

export interface ChatSessionDetails {
  name: string;
  description?: string;
}

export const DEFAULT_SESSION_NAME = "default";

export interface HistoryEntry {
  id: number;
  userId: string;
  /** Null for queries asked outside a chat session. */
  sessionId: string | null;
  queryText: string;
  responseText: string;
  createdAt: string;
}

export interface AppendHistoryInput {
  userId: string;
  sessionId?: string | null;
  queryText: string;
  responseText: string;
}

export type HistoryFilter =
  | { kind: "all" }
  | { kind: "first" }
  | { kind: "last" }
  | { kind: "keyword"; keyword: string; caseSensitive: boolean }
  | { kind: "session"; sessionId: string };
