import {
  DeleteSessionsRequestSchema,
  EndSessionRequestSchema,
  QueryInputSchema,
  RequestTimeoutError,
  ResponseGeneratedButNotStoredError,
  StartSessionRequestSchema,
  decodePayload,
  type ChatSession,
  type DeleteSessionsResponse,
  type LatestSessionResponse,
  type SubmitResponse,
} from "@clia/shared";
import { composeQuery, limitQuery } from "@clia/core";
import type { DaemonContext } from "../context/DaemonContext.js";
import type { EndpointDefinition, HandlerCall } from "./EndpointDefinition.js";

const submit = async (context: DaemonContext, call: HandlerCall): Promise<SubmitResponse> => {
  const input = decodePayload(QueryInputSchema, call.payload);
  call.audit.query = input.positional ?? input.stdin;
  const { config, sessions, backend, history } = context;

  const query = composeQuery(input, { minLength: config.query.minLength });
  const limited = limitQuery(query.effectiveText, config.query.maxLength);
  call.audit.query = limited.text;

  const user = await sessions.resolveUser(call.caller.uid);
  if (input.sessionId) await sessions.requireOpenSession(input.sessionId, user.id);

  const response = await backend.submit(limited.text, {
    stdin: query.stdin,
    attachment: query.attachment,
    terminal: query.lastCapture,
  });
  if (call.signal.aborted) {
    // Nobody is waiting for this answer any more; it must not reach history.
    throw new RequestTimeoutError("chat.Submit", config.daemon.requestTimeoutMs);
  }

  let stored = false;
  try {
    const entry = await history.record({
      userId: user.id,
      sessionId: input.sessionId ?? null,
      queryText: limited.text,
      responseText: response,
    });
    stored = entry !== undefined;
  } catch (error) {
    context.logger.error({ err: error, userId: user.id }, "response generated but not stored");
    throw new ResponseGeneratedButNotStoredError(response, error);
  }

  return {
    response,
    truncated: limited.truncated,
    stored,
    ...(input.sessionId ? { sessionId: input.sessionId } : {}),
  };
};

const startSession = async (context: DaemonContext, call: HandlerCall): Promise<ChatSession> => {
  const details = decodePayload(StartSessionRequestSchema, call.payload);
  const user = await context.sessions.resolveUser(call.caller.uid);
  return context.sessions.startSession(user, details);
};

const listSessions = async (context: DaemonContext, call: HandlerCall): Promise<ChatSession[]> => {
  const user = await context.sessions.resolveUser(call.caller.uid);
  return context.sessions.listSessions(user);
};

const latestSession = async (context: DaemonContext, call: HandlerCall): Promise<LatestSessionResponse> => {
  const user = await context.sessions.resolveUser(call.caller.uid);
  return { session: (await context.sessions.latestSession(user)) ?? null };
};

const deleteSessions = async (context: DaemonContext, call: HandlerCall): Promise<DeleteSessionsResponse> => {
  const { name } = decodePayload(DeleteSessionsRequestSchema, call.payload);
  const user = await context.sessions.resolveUser(call.caller.uid);
  return { deleted: await context.sessions.deleteSessions(user, name) };
};

const endSession = async (context: DaemonContext, call: HandlerCall): Promise<{ ended: true }> => {
  const { sessionId } = decodePayload(EndSessionRequestSchema, call.payload);
  const user = await context.sessions.resolveUser(call.caller.uid);
  await context.sessions.endSession(sessionId, user.id);
  return { ended: true };
};

export const chatEndpoint: EndpointDefinition = {
  name: "chat",
  methods: {
    Submit: submit,
    StartSession: startSession,
    EndSession: endSession,
    ListSessions: listSessions,
    GetLatestSession: latestSession,
    DeleteSessions: deleteSessions,
  },
};
