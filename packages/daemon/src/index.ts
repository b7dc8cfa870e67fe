export * from "./policy/AccessPolicy.js";
export * from "./context/DaemonContext.js";
export * from "./endpoints/EndpointDefinition.js";
export * from "./endpoints/EndpointLifecycle.js";
export * from "./endpoints/ChatEndpoint.js";
export * from "./endpoints/HistoryEndpoint.js";
export * from "./endpoints/UserEndpoint.js";
export * from "./endpoints/index.js";
export * from "./bus/BusDispatcher.js";
export * from "./bus/DbusTransport.js";
export * from "./supervisor/Supervisor.js";
export { runDaemon, type RunDaemonOptions } from "./bin/CliadEntrypoint.js";
