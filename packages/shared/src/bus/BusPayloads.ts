import { z } from "zod";
import { InvalidQueryError } from "../errors/CliaError.js";
import { DEFAULT_SESSION_NAME, type HistoryFilter } from "../history/HistoryTypes.js";

export const QueryInputSchema = z.object({
  positional: z.string().optional(),
  stdin: z.string().optional(),
  attachment: z.string().optional(),
  lastCapture: z.string().optional(),
  sessionId: z.string().min(1).optional(),
});
export type QueryInput = z.infer<typeof QueryInputSchema>;

export const HistoryFilterSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("all") }),
  z.object({ kind: z.literal("first") }),
  z.object({ kind: z.literal("last") }),
  z.object({
    kind: z.literal("keyword"),
    keyword: z.string().min(1),
    caseSensitive: z.boolean().default(false),
  }),
  z.object({ kind: z.literal("session"), sessionId: z.string().min(1) }),
]);

export const StartSessionRequestSchema = z.object({
  name: z.string().trim().min(1).max(64).default(DEFAULT_SESSION_NAME),
  description: z.string().trim().min(1).max(256).optional(),
});
export type StartSessionRequest = z.input<typeof StartSessionRequestSchema>;

export const DeleteSessionsRequestSchema = z.object({
  /** Absent deletes every session of the caller. */
  name: z.string().trim().min(1).optional(),
});
export type DeleteSessionsRequest = z.infer<typeof DeleteSessionsRequestSchema>;

export const EndSessionRequestSchema = z.object({
  sessionId: z.string().min(1),
});
export type EndSessionRequest = z.infer<typeof EndSessionRequestSchema>;

export const GetUserIdRequestSchema = z.object({
  uid: z.number().int().nonnegative(),
});
export type GetUserIdRequest = z.infer<typeof GetUserIdRequestSchema>;

export const SubmitResponseSchema = z.object({
  response: z.string(),
  truncated: z.boolean(),
  sessionId: z.string().optional(),
  stored: z.boolean(),
});
export type SubmitResponse = z.infer<typeof SubmitResponseSchema>;

export const ChatSessionSchema = z.object({
  id: z.string(),
  userId: z.string(),
  name: z.string(),
  description: z.string().optional(),
  createdAt: z.string(),
  endedAt: z.string().optional(),
});

export const SessionListResponseSchema = z.array(ChatSessionSchema);

export const LatestSessionResponseSchema = z.object({ session: ChatSessionSchema.nullable() });
export type LatestSessionResponse = z.infer<typeof LatestSessionResponseSchema>;

export const DeleteSessionsResponseSchema = z.object({ deleted: z.number().int().nonnegative() });
export type DeleteSessionsResponse = z.infer<typeof DeleteSessionsResponseSchema>;

export const HistoryEntrySchema = z.object({
  id: z.number().int(),
  userId: z.string(),
  sessionId: z.string().nullable(),
  queryText: z.string(),
  responseText: z.string(),
  createdAt: z.string(),
});

export const HistoryListResponseSchema = z.array(HistoryEntrySchema);

export const ClearResponseSchema = z.object({ deleted: z.number().int().nonnegative() });
export type ClearResponse = z.infer<typeof ClearResponseSchema>;

export const EndSessionResponseSchema = z.object({ ended: z.literal(true) });

export const GetUserIdResponseSchema = z.object({ userId: z.string() });
export type GetUserIdResponse = z.infer<typeof GetUserIdResponseSchema>;

const describeIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");

/**
 * Parses a JSON text body and validates it. Malformed bodies are reported as
 * InvalidQueryError so callers see a typed rejection rather than a crash.
 */
export const decodePayload = <S extends z.ZodTypeAny>(schema: S, raw: string): z.output<S> => {
  let parsed: unknown;
  try {
    parsed = raw.trim() ? JSON.parse(raw) : {};
  } catch (error) {
    throw new InvalidQueryError("Malformed request payload: body is not valid JSON.", {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new InvalidQueryError(`Malformed request payload: ${describeIssues(result.error)}`);
  }
  return result.data;
};

export const encodePayload = (value: unknown): string => JSON.stringify(value ?? {});

export const parseHistoryFilter = (raw: string): HistoryFilter => decodePayload(HistoryFilterSchema, raw);
