/**
 * Error taxonomy of the log shipper. Every class carries a `kind`
 * discriminator so callers can branch without string matching.
 */

export type CredentialsErrorKind = "unreadable" | "malformed" | "wrongCredentialsType";

export class CredentialsError extends Error {
  constructor(
    message: string,
    public readonly kind: CredentialsErrorKind,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = "CredentialsError";
  }
}

export class StoreUnavailableError extends Error {
  public readonly kind = "storeUnavailable";

  constructor(
    message: string,
    public readonly path: string,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = "StoreUnavailableError";
  }
}

/** Structured error payload returned by the backend: `{ error: { code, message, status } }`. */
export interface BackendErrorPayload {
  code: number;
  message: string;
  status: string;
}

export type TokenRequestErrorKind =
  | "invalidUrl"
  | "signingFailed"
  | "transport"
  | "noDataReceived"
  | "errorReceived"
  | "wrongTokenType";

export class TokenRequestError extends Error {
  constructor(
    message: string,
    public readonly kind: TokenRequestErrorKind,
    public readonly details?: {
      httpStatus?: number;
      backendError?: BackendErrorPayload;
      tokenType?: string;
      originalError?: Error;
    }
  ) {
    super(message);
    this.name = "TokenRequestError";
  }
}

export type EntriesWriteErrorKind =
  | "noEntriesToSend"
  | "tokenExpired"
  | "transport"
  | "noDataReceived"
  | "errorReceived";

export class EntriesWriteError extends Error {
  constructor(
    message: string,
    public readonly kind: EntriesWriteErrorKind,
    public readonly details?: {
      httpStatus?: number;
      backendError?: BackendErrorPayload;
      originalError?: Error;
    }
  ) {
    super(message);
    this.name = "EntriesWriteError";
  }

  /** Failures detected before any network I/O. */
  public get isPrecondition(): boolean {
    return this.kind === "noEntriesToSend" || this.kind === "tokenExpired";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
