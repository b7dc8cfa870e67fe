import { parseHistoryFilter, type ClearResponse, type HistoryEntry, type HistoryFilter } from "@clia/shared";
import type { DaemonContext } from "../context/DaemonContext.js";
import type { EndpointDefinition, HandlerCall } from "./EndpointDefinition.js";

const filterFrom = (payload: string): HistoryFilter =>
  payload.trim() ? parseHistoryFilter(payload) : { kind: "all" };

const list = async (context: DaemonContext, call: HandlerCall): Promise<HistoryEntry[]> => {
  const filter = filterFrom(call.payload);
  if (filter.kind === "keyword") call.audit.query = filter.keyword;
  const user = await context.sessions.resolveUser(call.caller.uid);
  return context.history.list(user.id, filter);
};

const clear = async (context: DaemonContext, call: HandlerCall): Promise<ClearResponse> => {
  const user = await context.sessions.resolveUser(call.caller.uid);
  return { deleted: await context.history.clear(user.id) };
};

export const historyEndpoint: EndpointDefinition = {
  name: "history",
  methods: {
    List: list,
    Clear: clear,
  },
};
