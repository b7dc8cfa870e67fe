export * from "./config/ConfigLoader.js";
export * from "./logging/Logger.js";
export * from "./services/context/ContextComposer.js";
export * from "./services/context/AttachmentReader.js";
export * from "./services/context/TerminalCaptureReader.js";
export * from "./services/credentials/CredentialResolver.js";
export * from "./services/session/SessionManager.js";
export * from "./services/history/HistoryService.js";
export * from "./services/audit/AuditLogger.js";
export * from "./services/backend/BackendClient.js";
