import { CliaError, type CliaErrorKind } from "@clia/shared";

/** Bad command-line usage; reported with the command's usage text. */
export class UsageError extends Error {
  constructor(
    message: string,
    readonly usage: string,
  ) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE_EXIT_CODE = 2;
export const UNEXPECTED_EXIT_CODE = 1;

// sysexits(3) where one fits
export const EXIT_CODES: Record<CliaErrorKind, number> = {
  EmptyQueryError: 64,
  InvalidQueryError: 64,
  SessionNotFoundError: 64,
  AttachmentNotFoundError: 66,
  AttachmentUnreadableError: 66,
  BinaryAttachmentError: 65,
  IdentityResolutionError: 67,
  PermissionDeniedError: 77,
  StorageError: 74,
  ResponseGeneratedButNotStoredError: 74,
  CredentialMissingError: 78,
  CredentialNamingError: 78,
  ConfigError: 78,
  HistoryDisabledError: 78,
  BackendTimeoutError: 75,
  RequestTimeoutError: 75,
  BackendUnavailableError: 69,
  ServiceUnavailableError: 69,
  UnknownMethodError: 70,
};

export interface ErrorOutput {
  err(line: string): void;
}

export const formatError = (error: unknown): string => {
  if (error instanceof CliaError) return `error[${error.kind}]: ${error.message}`;
  if (error instanceof UsageError) return `error[Usage]: ${error.message}\n${error.usage}`;
  return `error[InternalError]: ${error instanceof Error ? error.message : String(error)}`;
};

export const exitCodeFor = (error: unknown): number => {
  if (error instanceof CliaError) return EXIT_CODES[error.kind];
  if (error instanceof UsageError) return USAGE_EXIT_CODE;
  return UNEXPECTED_EXIT_CODE;
};

export const reportError = (error: unknown, output: ErrorOutput): number => {
  output.err(formatError(error));
  return exitCodeFor(error);
};
