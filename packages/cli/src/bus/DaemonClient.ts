import dbus from "dbus-next";
import type { Message, MessageBus } from "dbus-next";
import type { z } from "zod";
import {
  BUS_SERVICES,
  ChatSessionSchema,
  ClearResponseSchema,
  DeleteSessionsResponseSchema,
  EndSessionResponseSchema,
  GetUserIdResponseSchema,
  HistoryListResponseSchema,
  LatestSessionResponseSchema,
  SessionListResponseSchema,
  SubmitResponseSchema,
  decodePayload,
  encodePayload,
  fromWireError,
  type ChatSession,
  type EndpointName,
  type HistoryEntry,
  type HistoryFilter,
  type QueryInput,
  type StartSessionRequest,
  type SubmitResponse,
} from "@clia/shared";

/** What the CLI asks of the daemon; one method per bus method. */
export interface DaemonClient {
  submit(input: QueryInput): Promise<SubmitResponse>;
  startSession(details?: StartSessionRequest): Promise<ChatSession>;
  endSession(sessionId: string): Promise<void>;
  listSessions(): Promise<ChatSession[]>;
  latestSession(): Promise<ChatSession | undefined>;
  /** Without a name every session of the caller goes. */
  deleteSessions(name?: string): Promise<number>;
  listHistory(filter: HistoryFilter): Promise<HistoryEntry[]>;
  clearHistory(): Promise<number>;
  getUserId(uid: number): Promise<string>;
  close(): void;
}

export class DbusDaemonClient implements DaemonClient {
  constructor(private bus: MessageBus) {}

  static connect(): DbusDaemonClient {
    return new DbusDaemonClient(dbus.systemBus());
  }

  submit(input: QueryInput): Promise<SubmitResponse> {
    return this.call("chat", "Submit", input, SubmitResponseSchema);
  }

  startSession(details: StartSessionRequest = {}): Promise<ChatSession> {
    return this.call("chat", "StartSession", details, ChatSessionSchema);
  }

  async endSession(sessionId: string): Promise<void> {
    await this.call("chat", "EndSession", { sessionId }, EndSessionResponseSchema);
  }

  listSessions(): Promise<ChatSession[]> {
    return this.call("chat", "ListSessions", {}, SessionListResponseSchema);
  }

  async latestSession(): Promise<ChatSession | undefined> {
    const { session } = await this.call("chat", "GetLatestSession", {}, LatestSessionResponseSchema);
    return session ?? undefined;
  }

  async deleteSessions(name?: string): Promise<number> {
    const { deleted } = await this.call("chat", "DeleteSessions", name ? { name } : {}, DeleteSessionsResponseSchema);
    return deleted;
  }

  listHistory(filter: HistoryFilter): Promise<HistoryEntry[]> {
    return this.call("history", "List", filter, HistoryListResponseSchema);
  }

  async clearHistory(): Promise<number> {
    const { deleted } = await this.call("history", "Clear", {}, ClearResponseSchema);
    return deleted;
  }

  async getUserId(uid: number): Promise<string> {
    const { userId } = await this.call("user", "GetUserId", { uid }, GetUserIdResponseSchema);
    return userId;
  }

  close(): void {
    this.bus.disconnect();
  }

  private async call<S extends z.ZodTypeAny>(
    endpoint: EndpointName,
    method: string,
    payload: unknown,
    schema: S,
  ): Promise<z.output<S>> {
    const service = BUS_SERVICES[endpoint];
    let reply: Message | null;
    try {
      reply = await this.bus.call(
        new dbus.Message({
          destination: service.serviceName,
          path: service.objectPath,
          interface: service.interfaceName,
          member: method,
          signature: "s",
          body: [encodePayload(payload)],
        }),
      );
    } catch (error) {
      if (error instanceof dbus.DBusError) throw fromWireError(error.type, error.text);
      throw error;
    }
    const body: unknown = reply?.body[0];
    return decodePayload(schema, typeof body === "string" ? body : "");
  }
}
