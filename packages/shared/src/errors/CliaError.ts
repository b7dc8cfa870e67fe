export type CliaErrorKind =
  | "EmptyQueryError"
  | "InvalidQueryError"
  | "AttachmentNotFoundError"
  | "AttachmentUnreadableError"
  | "BinaryAttachmentError"
  | "IdentityResolutionError"
  | "PermissionDeniedError"
  | "StorageError"
  | "CredentialMissingError"
  | "CredentialNamingError"
  | "BackendTimeoutError"
  | "BackendUnavailableError"
  | "ResponseGeneratedButNotStoredError"
  | "HistoryDisabledError"
  | "SessionNotFoundError"
  | "ConfigError"
  | "UnknownMethodError"
  | "RequestTimeoutError"
  | "ServiceUnavailableError";

export type CliaErrorDetails = Record<string, unknown>;

type CliaErrorInput = {
  kind: CliaErrorKind;
  message: string;
  details?: CliaErrorDetails;
  cause?: unknown;
};

export class CliaError extends Error {
  readonly kind: CliaErrorKind;
  readonly details?: CliaErrorDetails;

  constructor({ kind, message, details, cause }: CliaErrorInput) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = kind;
    this.kind = kind;
    this.details = details;
  }
}

export class EmptyQueryError extends CliaError {
  constructor(
    message = "No input provided. Pass a query, pipe stdin, attach a file or include terminal output.",
  ) {
    super({ kind: "EmptyQueryError", message });
  }
}

export class InvalidQueryError extends CliaError {
  constructor(message: string, details?: CliaErrorDetails) {
    super({ kind: "InvalidQueryError", message, details });
  }
}

export class AttachmentNotFoundError extends CliaError {
  constructor(filePath: string, cause?: unknown) {
    super({
      kind: "AttachmentNotFoundError",
      message: `Attachment not found: ${filePath}`,
      details: { path: filePath },
      cause,
    });
  }
}

export class AttachmentUnreadableError extends CliaError {
  constructor(filePath: string, reason: string, cause?: unknown) {
    super({
      kind: "AttachmentUnreadableError",
      message: `Attachment ${filePath} could not be read: ${reason}`,
      details: { path: filePath, reason },
      cause,
    });
  }
}

export class BinaryAttachmentError extends CliaError {
  constructor(filePath: string) {
    super({
      kind: "BinaryAttachmentError",
      message: `Attachment ${filePath} looks like a binary file; only text attachments are supported.`,
      details: { path: filePath },
    });
  }
}

export class IdentityResolutionError extends CliaError {
  constructor(message: string, cause?: unknown) {
    super({ kind: "IdentityResolutionError", message, cause });
  }
}

export class PermissionDeniedError extends CliaError {
  constructor(message = "Access denied.", details?: CliaErrorDetails) {
    super({ kind: "PermissionDeniedError", message, details });
  }
}

export class StorageError extends CliaError {
  constructor(message: string, cause?: unknown) {
    super({ kind: "StorageError", message, cause });
  }
}

export class CredentialMissingError extends CliaError {
  constructor(name: string) {
    super({
      kind: "CredentialMissingError",
      message: `Credential '${name}' is required but was found neither in the configuration file, the environment nor the secret store.`,
      details: { name },
    });
  }
}

export class CredentialNamingError extends CliaError {
  constructor(message: string, details?: CliaErrorDetails) {
    super({ kind: "CredentialNamingError", message, details });
  }
}

export class BackendTimeoutError extends CliaError {
  constructor(timeoutMs: number) {
    super({
      kind: "BackendTimeoutError",
      message: `The inference backend did not answer within ${timeoutMs}ms.`,
      details: { timeoutMs },
    });
  }
}

export class BackendUnavailableError extends CliaError {
  constructor(message: string, cause?: unknown) {
    super({ kind: "BackendUnavailableError", message, cause });
  }
}

export class ResponseGeneratedButNotStoredError extends CliaError {
  readonly response: string;

  constructor(response: string, cause?: unknown) {
    super({
      kind: "ResponseGeneratedButNotStoredError",
      message: "A response was generated but could not be saved to history.",
      details: { response },
      cause,
    });
    this.response = response;
  }
}

export class HistoryDisabledError extends CliaError {
  constructor(
    message = "History is disabled. Enable it in the configuration file before accessing history.",
  ) {
    super({ kind: "HistoryDisabledError", message });
  }
}

export class SessionNotFoundError extends CliaError {
  constructor(sessionId: string) {
    super({
      kind: "SessionNotFoundError",
      message: `Chat session not found: ${sessionId}`,
      details: { sessionId },
    });
  }
}

export class ConfigError extends CliaError {
  constructor(message: string, details?: CliaErrorDetails) {
    super({ kind: "ConfigError", message, details });
  }
}

export class UnknownMethodError extends CliaError {
  constructor(endpoint: string, method: string) {
    super({
      kind: "UnknownMethodError",
      message: `Unknown method ${endpoint}.${method}`,
      details: { endpoint, method },
    });
  }
}

export class RequestTimeoutError extends CliaError {
  constructor(operation: string, timeoutMs: number) {
    super({
      kind: "RequestTimeoutError",
      message: `${operation} did not complete within ${timeoutMs}ms.`,
      details: { operation, timeoutMs },
    });
  }
}

export class ServiceUnavailableError extends CliaError {
  constructor(message = "The service is shutting down. Try again shortly.") {
    super({ kind: "ServiceUnavailableError", message });
  }
}

const ERROR_KINDS: ReadonlySet<string> = new Set<CliaErrorKind>([
  "EmptyQueryError",
  "InvalidQueryError",
  "AttachmentNotFoundError",
  "AttachmentUnreadableError",
  "BinaryAttachmentError",
  "IdentityResolutionError",
  "PermissionDeniedError",
  "StorageError",
  "CredentialMissingError",
  "CredentialNamingError",
  "BackendTimeoutError",
  "BackendUnavailableError",
  "ResponseGeneratedButNotStoredError",
  "HistoryDisabledError",
  "SessionNotFoundError",
  "ConfigError",
  "UnknownMethodError",
  "RequestTimeoutError",
  "ServiceUnavailableError",
]);

export const isCliaErrorKind = (value: string): value is CliaErrorKind => ERROR_KINDS.has(value);
