import {
  AttachmentNotFoundError,
  AttachmentUnreadableError,
  BackendTimeoutError,
  BackendUnavailableError,
  BinaryAttachmentError,
  CliaError,
  ConfigError,
  CredentialMissingError,
  CredentialNamingError,
  EmptyQueryError,
  HistoryDisabledError,
  IdentityResolutionError,
  InvalidQueryError,
  PermissionDeniedError,
  RequestTimeoutError,
  ResponseGeneratedButNotStoredError,
  ServiceUnavailableError,
  SessionNotFoundError,
  StorageError,
  UnknownMethodError,
  isCliaErrorKind,
  type CliaErrorDetails,
  type CliaErrorKind,
} from "./CliaError.js";

export const WIRE_ERROR_PREFIX = "io.clia.Error.";
export const INTERNAL_ERROR_NAME = `${WIRE_ERROR_PREFIX}InternalError`;

export interface WireError {
  name: string;
  text: string;
}

interface WireErrorBody {
  message: string;
  details?: CliaErrorDetails;
}

/**
 * Encodes an error as a bus error name plus a JSON text body. Errors outside the
 * CliaError taxonomy are reported as an internal error without their message.
 */
export const toWireError = (error: unknown): WireError => {
  if (error instanceof CliaError) {
    const body: WireErrorBody = { message: error.message, details: error.details };
    return { name: `${WIRE_ERROR_PREFIX}${error.kind}`, text: JSON.stringify(body) };
  }
  return {
    name: INTERNAL_ERROR_NAME,
    text: JSON.stringify({ message: "The service failed to process the request." }),
  };
};

const parseBody = (text: string): WireErrorBody => {
  try {
    const parsed: unknown = JSON.parse(text);
    if (parsed && typeof parsed === "object" && "message" in parsed && typeof parsed.message === "string") {
      const details =
        "details" in parsed && parsed.details && typeof parsed.details === "object" && !Array.isArray(parsed.details)
          ? { ...parsed.details }
          : undefined;
      return { message: parsed.message, details };
    }
  } catch {
    // plain-text bodies come from the bus itself (e.g. activation failures)
  }
  return { message: text };
};

export const kindFromWireName = (name: string): CliaErrorKind | undefined => {
  if (!name.startsWith(WIRE_ERROR_PREFIX)) return undefined;
  const kind = name.slice(WIRE_ERROR_PREFIX.length);
  return isCliaErrorKind(kind) ? kind : undefined;
};

const detailText = (details: CliaErrorDetails | undefined, key: string): string | undefined => {
  const value = details?.[key];
  return typeof value === "string" ? value : undefined;
};

const detailNumber = (details: CliaErrorDetails | undefined, key: string): number | undefined => {
  const value = details?.[key];
  return typeof value === "number" ? value : undefined;
};

/** Picks the specific error class for a kind; falls back to the base class when details are incomplete. */
export const restoreError = (kind: CliaErrorKind, message: string, details?: CliaErrorDetails): CliaError => {
  const fallback = new CliaError({ kind, message, details });
  switch (kind) {
    case "EmptyQueryError":
      return new EmptyQueryError(message);
    case "InvalidQueryError":
      return new InvalidQueryError(message, details);
    case "AttachmentNotFoundError": {
      const filePath = detailText(details, "path");
      return filePath === undefined ? fallback : new AttachmentNotFoundError(filePath);
    }
    case "AttachmentUnreadableError": {
      const filePath = detailText(details, "path");
      const reason = detailText(details, "reason");
      return filePath === undefined || reason === undefined
        ? fallback
        : new AttachmentUnreadableError(filePath, reason);
    }
    case "BinaryAttachmentError": {
      const filePath = detailText(details, "path");
      return filePath === undefined ? fallback : new BinaryAttachmentError(filePath);
    }
    case "IdentityResolutionError":
      return new IdentityResolutionError(message);
    case "PermissionDeniedError":
      return new PermissionDeniedError(message, details);
    case "StorageError":
      return new StorageError(message);
    case "CredentialMissingError": {
      const name = detailText(details, "name");
      return name === undefined ? fallback : new CredentialMissingError(name);
    }
    case "CredentialNamingError":
      return new CredentialNamingError(message, details);
    case "BackendTimeoutError": {
      const timeoutMs = detailNumber(details, "timeoutMs");
      return timeoutMs === undefined ? fallback : new BackendTimeoutError(timeoutMs);
    }
    case "BackendUnavailableError":
      return new BackendUnavailableError(message);
    case "ResponseGeneratedButNotStoredError": {
      const response = detailText(details, "response");
      return response === undefined ? fallback : new ResponseGeneratedButNotStoredError(response);
    }
    case "HistoryDisabledError":
      return new HistoryDisabledError(message);
    case "SessionNotFoundError": {
      const sessionId = detailText(details, "sessionId");
      return sessionId === undefined ? fallback : new SessionNotFoundError(sessionId);
    }
    case "ConfigError":
      return new ConfigError(message, details);
    case "UnknownMethodError": {
      const endpoint = detailText(details, "endpoint");
      const method = detailText(details, "method");
      return endpoint === undefined || method === undefined ? fallback : new UnknownMethodError(endpoint, method);
    }
    case "RequestTimeoutError": {
      const operation = detailText(details, "operation");
      const timeoutMs = detailNumber(details, "timeoutMs");
      return operation === undefined || timeoutMs === undefined
        ? fallback
        : new RequestTimeoutError(operation, timeoutMs);
    }
    case "ServiceUnavailableError":
      return new ServiceUnavailableError(message);
  }
};

/**
 * Rebuilds the specific CliaError class from a bus error. Unknown names
 * (including bus-level failures such as a missing service) become
 * ServiceUnavailableError.
 */
export const fromWireError = (name: string, text: string): CliaError => {
  const body = parseBody(text);
  const kind = kindFromWireName(name);
  if (kind) return restoreError(kind, body.message, body.details);
  const message = name.startsWith(WIRE_ERROR_PREFIX) ? body.message : `${name}: ${body.message}`;
  return new ServiceUnavailableError(message);
};
