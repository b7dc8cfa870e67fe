import { chatEndpoint } from "./ChatEndpoint.js";
import type { EndpointDefinition } from "./EndpointDefinition.js";
import { historyEndpoint } from "./HistoryEndpoint.js";
import { userEndpoint } from "./UserEndpoint.js";

export const DAEMON_ENDPOINTS: readonly EndpointDefinition[] = [chatEndpoint, historyEndpoint, userEndpoint];
