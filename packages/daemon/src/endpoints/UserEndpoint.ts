import { GetUserIdRequestSchema, PermissionDeniedError, decodePayload, type GetUserIdResponse } from "@clia/shared";
import type { DaemonContext } from "../context/DaemonContext.js";
import type { EndpointDefinition, HandlerCall } from "./EndpointDefinition.js";

const getUserId = async (context: DaemonContext, call: HandlerCall): Promise<GetUserIdResponse> => {
  const { uid } = decodePayload(GetUserIdRequestSchema, call.payload);
  if (uid !== call.caller.uid) {
    throw new PermissionDeniedError("Callers may only look up their own user id.", {
      requested: uid,
      caller: call.caller.uid,
    });
  }
  const user = await context.sessions.resolveUser(uid);
  return { userId: user.id };
};

export const userEndpoint: EndpointDefinition = {
  name: "user",
  methods: {
    GetUserId: getUserId,
  },
};
